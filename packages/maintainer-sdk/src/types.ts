import Decimal from 'decimal.js'
import { StakeTime } from './config'
import { InvariantViolationError } from './errors'
import { Clock, EpochSchedule, Rent, StakeHistory } from './sysvars'
import { Lamports, StLamports } from './token'

/** Half-open range `[begin, end)` of stake account seeds. */
export type SeedRange = {
  begin: number
  end: number
}

export type Validator = {
  // Vote account of the validator
  pubkey: string
  stakeSeeds: SeedRange
  unstakeSeeds: SeedRange
  // Sum of the balances of the stake accounts and unstake accounts, as last observed by the program
  stakeAccountsBalance: Lamports
  // Sum of the balances of the unstake accounts, as last observed by the program
  unstakeAccountsBalance: Lamports
  // Inactive validators receive no new stake and get unstaked
  active: boolean
}

export type Maintainer = {
  pubkey: string
}

export type StakeBalance = {
  inactive: Lamports
  activating: Lamports
  active: Lamports
  deactivating: Lamports
}

export type StakeAccount = {
  balance: StakeBalance
  seed: number
  activationEpoch: number
  // Vote account the stake is delegated to
  voter: string
}

export type StakeAccountEntry = {
  address: string
  account: StakeAccount
}

// Rates are scaled by `2^64 - 1`, see `per64`.
export type OffchainValidatorPerf = {
  updatedAt: number
  blockProductionRate: Decimal
  voteSuccessRate: Decimal
}

export type ValidatorPerf = {
  // Vote account of the validator
  pubkey: string
  // Commission observed on-chain, in percent
  commission: number
  commissionUpdatedAt: number
  rest: OffchainValidatorPerf | null
}

export type Criteria = {
  // Percent
  maxCommission: number
  minBlockProductionRate: Decimal
  minVoteSuccessRate: Decimal
}

export type ExchangeRate = {
  computedInEpoch: number
  stSolSupply: StLamports
  solBalance: Lamports
}

export type FeeRecipients = {
  treasuryAccount: string
  developerAccount: string
}

export type Lido = {
  exchangeRate: ExchangeRate
  criteria: Criteria
  stSolMint: string
  feeRecipients: FeeRecipients
  validatorList: string
  validatorPerfList: string
  maintainerList: string
}

export type VoteState = {
  // Identity of the validator node, pays for the votes
  nodePubkey: string
  commission: number
  // Credits earned by the vote account over its lifetime
  credits: number
  lastTimestamp: {
    slot: number
    timestamp: number
  }
}

export type ValidatorInfo = {
  name: string
  keybaseUsername: string | null
}

export class AccountList<T extends { pubkey: string }> {
  readonly entries: readonly T[]

  constructor (readonly maxEntries: number, entries: readonly T[]) {
    if (entries.length > maxEntries) {
      throw new InvariantViolationError(`Account list holds ${entries.length} entries but has room for ${maxEntries}`)
    }
    this.entries = Object.freeze([...entries])
  }

  get length (): number {
    return this.entries.length
  }

  position (pubkey: string): number | null {
    const index = this.entries.findIndex(entry => entry.pubkey === pubkey)
    return index === -1 ? null : index
  }

  find (pubkey: string): T | null {
    return this.entries.find(entry => entry.pubkey === pubkey) ?? null
  }
}

/**
 * Point-in-time view of every account relevant to the pool.
 *
 * Arrays named `validator*` run parallel to `validators.entries`,
 * `maintainerBalances` runs parallel to `maintainers.entries`.
 */
export type SolidoState = {
  readonly producedAt: Date

  readonly solidoProgramId: string
  readonly solidoAddress: string
  readonly solido: Lido

  readonly validators: AccountList<Validator>
  readonly maintainers: AccountList<Maintainer>

  // Stake accounts for the seeds in `[stakeSeeds.begin, stakeSeeds.end)`
  readonly validatorStakeAccounts: readonly (readonly StakeAccountEntry[])[]
  // Unstake accounts for the seeds in `[unstakeSeeds.begin, unstakeSeeds.end)`
  readonly validatorUnstakeAccounts: readonly (readonly StakeAccountEntry[])[]
  // Balance above the rent-exempt minimum, null when the vote account is closed
  readonly validatorVoteAccountBalances: readonly (Lamports | null)[]
  // Null when the vote account is closed
  readonly validatorVoteAccounts: readonly (VoteState | null)[]
  readonly validatorIdentityAccountBalances: readonly (Lamports | null)[]
  readonly validatorPerfs: readonly (ValidatorPerf | null)[]
  readonly validatorBlockProductionRates: readonly (Decimal | null)[]
  readonly validatorInfos: readonly (ValidatorInfo | null)[]

  readonly maintainerBalances: readonly Lamports[]

  readonly stSolSupply: StLamports

  readonly reserveAddress: string
  readonly reserveBalance: Lamports

  readonly rent: Rent
  readonly clock: Clock
  readonly epochSchedule: EpochSchedule
  readonly stakeHistory: StakeHistory

  // Maintainer performing the maintenance
  readonly maintainerAddress: string
  readonly stakeTime: StakeTime
  // Percent of the epoch after which it is considered near its end
  readonly endOfEpochThreshold: number
}
