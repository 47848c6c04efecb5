import { deriveStakeAddress, StakeType } from '../../src'
import { LAMPORTS_PER_SOL, pubkey, STAKE_RENT } from './utils'

import type {
  RawAccountDto,
  RawStakeAccountDto,
  RawValidatorDto,
  RawValidatorInfoDto,
  RawValidatorPerfDto,
  RawVoteAccountDto,
} from '../../src'

const infiniteGenerator = function* (offset: number): Generator<string, never> {
  for (let i = offset; ; i++) {
    yield pubkey(i)
  }
}
export const generateVoteAccounts = () => infiniteGenerator(1_000)
export const generateIdentities = () => infiniteGenerator(2_000)
export const generateMaintainers = () => infiniteGenerator(3_000)

export const VOTE_ACCOUNT_DATA_LEN = 3762

// Lamports per state, `inactive` defaults to the rent-exempt reserve of a stake account
export type StakeAccountMock = {
  inactive?: number
  activating?: number
  active?: number
  deactivating?: number
  activationEpoch?: number
}

type OffchainPerfMock = {
  updatedAt: number
  blockProductionRate: string
  voteSuccessRate: string
}

const stakeAccountTotal = ({ inactive = STAKE_RENT, activating = 0, active = 0, deactivating = 0 }: StakeAccountMock) =>
  inactive + activating + active + deactivating

export class ValidatorMockBuilder {
  private active = true
  private commission = 5
  private hasPerf = true
  private perfCommission: number | null = null
  private perfCommissionUpdatedAt: number | null = null
  private offchainPerf: OffchainPerfMock | null = null
  private credits = 0
  private blockProductionRate: string | null = null
  private voteAccountClosed = false
  private name: string | null = 'Lido / Validator'
  private stakeAccounts: StakeAccountMock[] = []
  private unstakeAccounts: StakeAccountMock[] = []
  private stakeSeedsBegin = 0
  private unstakeSeedsBegin = 0
  private stakeAccountsBalance: number | null = null
  private unstakeAccountsBalance: number | null = null
  private identityBalance = 10 * LAMPORTS_PER_SOL
  private voteBalance = LAMPORTS_PER_SOL

  constructor (public readonly voteAccount: string, public readonly identity: string) { }

  withInactive (): this {
    this.active = false
    return this
  }

  withCommission (commission: number): this {
    this.commission = commission
    return this
  }

  // Commission as last stored by the program, defaults to the one of the vote account
  withPerfCommission (commission: number, updatedAt?: number): this {
    this.perfCommission = commission
    this.perfCommissionUpdatedAt = updatedAt ?? null
    return this
  }

  withOffchainPerf (offchainPerf: OffchainPerfMock): this {
    this.offchainPerf = offchainPerf
    return this
  }

  withoutPerf (): this {
    this.hasPerf = false
    return this
  }

  withCredits (credits: number): this {
    this.credits = credits
    return this
  }

  withBlockProductionRate (rate: string): this {
    this.blockProductionRate = rate
    return this
  }

  withClosedVoteAccount (): this {
    this.voteAccountClosed = true
    return this
  }

  withName (name: string | null): this {
    this.name = name
    return this
  }

  withStakeAccount (stakeAccount: StakeAccountMock): this {
    this.stakeAccounts.push(stakeAccount)
    return this
  }

  withUnstakeAccount (unstakeAccount: StakeAccountMock): this {
    this.unstakeAccounts.push(unstakeAccount)
    return this
  }

  withStakeSeedsBegin (begin: number): this {
    this.stakeSeedsBegin = begin
    return this
  }

  withUnstakeSeedsBegin (begin: number): this {
    this.unstakeSeedsBegin = begin
    return this
  }

  // Balances recorded by the program, by default they match the stake accounts
  withStakeAccountsBalance (lamports: number): this {
    this.stakeAccountsBalance = lamports
    return this
  }

  withUnstakeAccountsBalance (lamports: number): this {
    this.unstakeAccountsBalance = lamports
    return this
  }

  withIdentityBalance (lamports: number): this {
    this.identityBalance = lamports
    return this
  }

  isVoteAccountClosed (): boolean {
    return this.voteAccountClosed
  }

  toRawValidatorDto (): RawValidatorDto {
    const unstakeTotal = this.unstakeAccounts.reduce((sum, account) => sum + stakeAccountTotal(account), 0)
    const stakeTotal = this.stakeAccounts.reduce((sum, account) => sum + stakeAccountTotal(account), 0) + unstakeTotal
    return {
      vote_account_address: this.voteAccount,
      stake_seeds: { begin: this.stakeSeedsBegin, end: this.stakeSeedsBegin + this.stakeAccounts.length },
      unstake_seeds: { begin: this.unstakeSeedsBegin, end: this.unstakeSeedsBegin + this.unstakeAccounts.length },
      stake_accounts_balance: String(this.stakeAccountsBalance ?? stakeTotal),
      unstake_accounts_balance: String(this.unstakeAccountsBalance ?? unstakeTotal),
      active: this.active,
    }
  }

  toRawStakeAccounts (programId: string, solidoAddress: string): Record<string, RawStakeAccountDto> {
    const toRaw = (mock: StakeAccountMock): RawStakeAccountDto => ({
      lamports: String(stakeAccountTotal(mock)),
      voter: this.voteAccount,
      activation_epoch: mock.activationEpoch ?? 0,
      effective: String(mock.active ?? 0),
      activating: String(mock.activating ?? 0),
      deactivating: String(mock.deactivating ?? 0),
    })
    const accounts: Record<string, RawStakeAccountDto> = {}
    this.stakeAccounts.forEach((mock, i) => {
      const seed = this.stakeSeedsBegin + i
      accounts[deriveStakeAddress(programId, solidoAddress, this.voteAccount, seed, StakeType.STAKE)] = toRaw(mock)
    })
    this.unstakeAccounts.forEach((mock, i) => {
      const seed = this.unstakeSeedsBegin + i
      accounts[deriveStakeAddress(programId, solidoAddress, this.voteAccount, seed, StakeType.UNSTAKE)] = toRaw(mock)
    })
    return accounts
  }

  toRawValidatorPerfDto (epoch: number): RawValidatorPerfDto | null {
    if (!this.hasPerf) {
      return null
    }
    return {
      validator_vote_account_address: this.voteAccount,
      commission: this.perfCommission ?? this.commission,
      commission_updated_at: this.perfCommissionUpdatedAt ?? epoch,
      rest: this.offchainPerf && {
        updated_at: this.offchainPerf.updatedAt,
        block_production_rate: this.offchainPerf.blockProductionRate,
        vote_success_rate: this.offchainPerf.voteSuccessRate,
      },
    }
  }

  toRawVoteAccountDto (rentExemptBalance: number, slot: number): RawVoteAccountDto | null {
    if (this.voteAccountClosed) {
      return null
    }
    return {
      lamports: String(rentExemptBalance + this.voteBalance),
      data_len: VOTE_ACCOUNT_DATA_LEN,
      node_pubkey: this.identity,
      commission: this.commission,
      credits: this.credits,
      last_timestamp: { slot: slot - 1, timestamp: 1_700_000_000 },
    }
  }

  toRawIdentityAccountDto (rentExemptBalance: number): RawAccountDto {
    return { lamports: String(rentExemptBalance + this.identityBalance), data_len: 0 }
  }

  toRawValidatorInfoDto (): RawValidatorInfoDto | null {
    return this.name === null ? null : { name: this.name, keybase_username: null }
  }

  getBlockProductionRate (): string | null {
    return this.blockProductionRate
  }
}
