import axios from 'axios'
import fs from 'fs'
import { deriveReserveAddress, deriveStakeAddress, StakeType } from '../addresses'
import { InputsSource, MaintainerConfig } from '../config'
import { invariant, SnapshotError } from '../errors'
import { minimumBalance, Rent } from '../sysvars'
import { Lamports, StLamports, toU64 } from '../token'
import {
  AccountList,
  Maintainer,
  SeedRange,
  SolidoState,
  StakeAccountEntry,
  Validator,
  ValidatorInfo,
  ValidatorPerf,
  VoteState,
} from '../types'
import {
  RawAccountDto,
  RawAccountListDto,
  RawBlockProductionDto,
  RawMaintainerDto,
  RawMintDto,
  RawSolidoDto,
  RawSourceData,
  RawStakeAccountDto,
  RawSysvarsDto,
  RawValidatorDto,
  RawValidatorInfoDto,
  RawValidatorPerfDto,
  RawVoteAccountDto,
} from './data-provider.dto'

const seeds = ({ begin, end }: SeedRange): number[] => Array.from({ length: end - begin }, (_, i) => begin + i)

const toSnapshotError = (error: unknown, url: string): SnapshotError => {
  if (axios.isAxiosError(error)) {
    return new SnapshotError(`Failed to fetch snapshot data: ${error.message}`, url, error.response?.status ?? null)
  }
  return new SnapshotError(`Failed to fetch snapshot data: ${error instanceof Error ? error.message : String(error)}`, url)
}

// The rent-exempt minimum stays locked in the account.
const balanceExceptRent = (rent: Rent, account: RawAccountDto): Lamports =>
  new Lamports(account.lamports).sub(minimumBalance(rent, account.data_len))

export class DataProvider {
  constructor (
    protected readonly config: MaintainerConfig,
    private readonly dataSource: InputsSource,
  ) {
    this.validateConfig()
  }

  private validateConfig () {
    switch (this.dataSource) {
      case InputsSource.APIS:
        if (this.config.cacheInputs && !this.config.inputsCacheDirPath) {
          throw new Error('Cannot cache inputs without cache directory path configured')
        }
        break
      case InputsSource.FILES:
        if (!this.config.inputsCacheDirPath) {
          throw new Error(`Missing inputs cache directory path for inputs source: ${this.dataSource}`)
        }
        if (this.config.cacheInputs) {
          throw new Error(`Caching inputs not supported for inputs source: ${this.dataSource}`)
        }
        break
      default:
        throw new Error(`Unsupported inputs source: ${String(this.dataSource)}`)
    }
  }

  async getState (producedAt = new Date()): Promise<SolidoState> {
    const data = this.dataSource === InputsSource.FILES ? this.parseCachedSourceData() : await this.fetchSourceData()
    return this.aggregateState(data, producedAt)
  }

  aggregateValidatorStakeAccounts (data: RawSourceData, validator: Validator, stakeType: StakeType): StakeAccountEntry[] {
    const seedRange = stakeType === StakeType.STAKE ? validator.stakeSeeds : validator.unstakeSeeds
    return seeds(seedRange).map(seed => {
      const address = deriveStakeAddress(this.config.solidoProgramId, this.config.solidoAddress, validator.pubkey, seed, stakeType)
      const raw: RawStakeAccountDto | undefined = data.stakeAccounts[address]
      if (raw === undefined) {
        throw new SnapshotError(`Missing ${stakeType.toLowerCase()} account ${address} with seed ${seed} of validator ${validator.pubkey}`)
      }
      invariant(raw.voter === validator.pubkey, `Stake account ${address} delegates to ${raw.voter} instead of validator ${validator.pubkey}`)

      const active = new Lamports(raw.effective)
      const activating = new Lamports(raw.activating)
      const deactivating = new Lamports(raw.deactivating)
      const inactive = new Lamports(raw.lamports).sub(active.add(activating).add(deactivating))
      return {
        address,
        account: {
          balance: { inactive, activating, active, deactivating },
          seed,
          activationEpoch: raw.activation_epoch,
          voter: raw.voter,
        },
      }
    })
  }

  aggregateValidators (data: RawSourceData): AccountList<Validator> {
    const { max_entries, entries } = data.validators
    return new AccountList(max_entries, entries.map((raw): Validator => ({
      pubkey: raw.vote_account_address,
      stakeSeeds: { ...raw.stake_seeds },
      unstakeSeeds: { ...raw.unstake_seeds },
      stakeAccountsBalance: new Lamports(raw.stake_accounts_balance),
      unstakeAccountsBalance: new Lamports(raw.unstake_accounts_balance),
      active: raw.active,
    })))
  }

  aggregateValidatorPerfs (data: RawSourceData): AccountList<ValidatorPerf> {
    const { max_entries, entries } = data.validatorPerfs
    return new AccountList(max_entries, entries.map((raw): ValidatorPerf => ({
      pubkey: raw.validator_vote_account_address,
      commission: raw.commission,
      commissionUpdatedAt: raw.commission_updated_at,
      rest: raw.rest
        ? {
          updatedAt: raw.rest.updated_at,
          blockProductionRate: toU64(raw.rest.block_production_rate, 'Block production rate'),
          voteSuccessRate: toU64(raw.rest.vote_success_rate, 'Vote success rate'),
        }
        : null,
    })))
  }

  aggregateState (data: RawSourceData, producedAt: Date): SolidoState {
    const { solido, sysvars } = data
    const rent: Rent = {
      lamportsPerByteYear: sysvars.rent.lamports_per_byte_year,
      exemptionThreshold: sysvars.rent.exemption_threshold,
      burnPercent: sysvars.rent.burn_percent,
    }

    const validators = this.aggregateValidators(data)
    const validatorPerfs = this.aggregateValidatorPerfs(data)
    const maintainers = new AccountList(
      data.maintainers.max_entries,
      data.maintainers.entries.map(({ pubkey }): Maintainer => ({ pubkey })),
    )

    const voteAccounts = validators.entries.map((validator): RawVoteAccountDto | null => data.voteAccounts[validator.pubkey] ?? null)
    const validatorVoteAccounts = voteAccounts.map((raw): VoteState | null => raw && {
      nodePubkey: raw.node_pubkey,
      commission: raw.commission,
      credits: raw.credits,
      lastTimestamp: { ...raw.last_timestamp },
    })
    const validatorInfos = voteAccounts.map((raw): ValidatorInfo | null => {
      const info = raw && data.validatorInfos[raw.node_pubkey]
      return info ? { name: info.name, keybaseUsername: info.keybase_username } : null
    })
    const validatorIdentityAccountBalances = voteAccounts.map(raw => {
      const identity: RawAccountDto | undefined = raw ? data.identityAccounts[raw.node_pubkey] : undefined
      return identity ? balanceExceptRent(rent, identity) : null
    })
    const validatorBlockProductionRates = voteAccounts.map(raw => {
      const rate: string | undefined = raw ? data.blockProduction.rates[raw.node_pubkey] : undefined
      return rate !== undefined ? toU64(rate, 'Block production rate') : null
    })

    const maintainerBalances = maintainers.entries.map(({ pubkey }) => {
      const account: RawAccountDto | undefined = data.maintainerAccounts[pubkey]
      if (account === undefined) {
        throw new SnapshotError(`Missing account of maintainer ${pubkey}`)
      }
      return new Lamports(account.lamports)
    })

    return Object.freeze({
      producedAt,
      solidoProgramId: this.config.solidoProgramId,
      solidoAddress: this.config.solidoAddress,
      solido: {
        exchangeRate: {
          computedInEpoch: solido.exchange_rate.computed_in_epoch,
          stSolSupply: new StLamports(solido.exchange_rate.st_sol_supply),
          solBalance: new Lamports(solido.exchange_rate.sol_balance),
        },
        criteria: {
          maxCommission: solido.criteria.max_commission,
          minBlockProductionRate: toU64(solido.criteria.min_block_production_rate, 'Minimum block production rate'),
          minVoteSuccessRate: toU64(solido.criteria.min_vote_success_rate, 'Minimum vote success rate'),
        },
        stSolMint: solido.st_sol_mint,
        feeRecipients: {
          treasuryAccount: solido.fee_recipients.treasury_account,
          developerAccount: solido.fee_recipients.developer_account,
        },
        validatorList: solido.validator_list,
        validatorPerfList: solido.validator_perf_list,
        maintainerList: solido.maintainer_list,
      },
      validators,
      maintainers,
      validatorStakeAccounts: validators.entries.map(v => this.aggregateValidatorStakeAccounts(data, v, StakeType.STAKE)),
      validatorUnstakeAccounts: validators.entries.map(v => this.aggregateValidatorStakeAccounts(data, v, StakeType.UNSTAKE)),
      validatorVoteAccountBalances: voteAccounts.map(raw => raw && balanceExceptRent(rent, raw)),
      validatorVoteAccounts,
      validatorIdentityAccountBalances,
      validatorPerfs: validators.entries.map(({ pubkey }) => validatorPerfs.find(pubkey)),
      validatorBlockProductionRates,
      validatorInfos,
      maintainerBalances,
      stSolSupply: new StLamports(data.stSolMint.supply),
      reserveAddress: deriveReserveAddress(this.config.solidoProgramId, this.config.solidoAddress),
      reserveBalance: new Lamports(data.reserve.lamports),
      rent,
      clock: {
        slot: sysvars.clock.slot,
        epoch: sysvars.clock.epoch,
        unixTimestamp: sysvars.clock.unix_timestamp,
      },
      epochSchedule: {
        slotsPerEpoch: sysvars.epoch_schedule.slots_per_epoch,
        leaderScheduleSlotOffset: sysvars.epoch_schedule.leader_schedule_slot_offset,
        warmup: sysvars.epoch_schedule.warmup,
        firstNormalEpoch: sysvars.epoch_schedule.first_normal_epoch,
        firstNormalSlot: sysvars.epoch_schedule.first_normal_slot,
      },
      stakeHistory: sysvars.stake_history.map(entry => ({
        epoch: entry.epoch,
        effective: new Lamports(entry.effective),
        activating: new Lamports(entry.activating),
        deactivating: new Lamports(entry.deactivating),
      })),
      maintainerAddress: this.config.maintainerAddress,
      stakeTime: this.config.stakeTime,
      endOfEpochThreshold: this.config.endOfEpochThreshold,
    })
  }

  cacheSourceData (data: RawSourceData) {
    if (!this.config.inputsCacheDirPath) {
      throw new Error('Cannot cache data without cache directory path configured')
    }
    const dir = this.config.inputsCacheDirPath
    fs.writeFileSync(`${dir}/solido.json`, JSON.stringify(data.solido, null, 2))
    fs.writeFileSync(`${dir}/validators.json`, JSON.stringify(data.validators, null, 2))
    fs.writeFileSync(`${dir}/validator-perfs.json`, JSON.stringify(data.validatorPerfs, null, 2))
    fs.writeFileSync(`${dir}/maintainers.json`, JSON.stringify(data.maintainers, null, 2))
    fs.writeFileSync(`${dir}/sysvars.json`, JSON.stringify(data.sysvars, null, 2))
    fs.writeFileSync(`${dir}/reserve.json`, JSON.stringify(data.reserve, null, 2))
    fs.writeFileSync(`${dir}/st-sol-mint.json`, JSON.stringify(data.stSolMint, null, 2))
    fs.writeFileSync(`${dir}/maintainer-accounts.json`, JSON.stringify(data.maintainerAccounts, null, 2))
    fs.writeFileSync(`${dir}/stake-accounts.json`, JSON.stringify(data.stakeAccounts, null, 2))
    fs.writeFileSync(`${dir}/vote-accounts.json`, JSON.stringify(data.voteAccounts, null, 2))
    fs.writeFileSync(`${dir}/identity-accounts.json`, JSON.stringify(data.identityAccounts, null, 2))
    fs.writeFileSync(`${dir}/validator-infos.json`, JSON.stringify(data.validatorInfos, null, 2))
    fs.writeFileSync(`${dir}/block-production.json`, JSON.stringify(data.blockProduction, null, 2))
  }

  parseCachedSourceData (): RawSourceData {
    if (!this.config.inputsCacheDirPath) {
      throw new Error('Cannot parse cached data without cache directory path configured')
    }
    const dir = this.config.inputsCacheDirPath
    const read = (file: string) => fs.readFileSync(`${dir}/${file}`).toString()
    const solido: RawSolidoDto = JSON.parse(read('solido.json'))
    const validators: RawAccountListDto<RawValidatorDto> = JSON.parse(read('validators.json'))
    const validatorPerfs: RawAccountListDto<RawValidatorPerfDto> = JSON.parse(read('validator-perfs.json'))
    const maintainers: RawAccountListDto<RawMaintainerDto> = JSON.parse(read('maintainers.json'))
    const sysvars: RawSysvarsDto = JSON.parse(read('sysvars.json'))
    const reserve: RawAccountDto = JSON.parse(read('reserve.json'))
    const stSolMint: RawMintDto = JSON.parse(read('st-sol-mint.json'))
    const maintainerAccounts: Record<string, RawAccountDto> = JSON.parse(read('maintainer-accounts.json'))
    const stakeAccounts: Record<string, RawStakeAccountDto> = JSON.parse(read('stake-accounts.json'))
    const voteAccounts: Record<string, RawVoteAccountDto | null> = JSON.parse(read('vote-accounts.json'))
    const identityAccounts: Record<string, RawAccountDto> = JSON.parse(read('identity-accounts.json'))
    const validatorInfos: Record<string, RawValidatorInfoDto | null> = JSON.parse(read('validator-infos.json'))

    const blockProductionFile = `${dir}/block-production.json`
    const blockProduction: RawBlockProductionDto = fs.existsSync(blockProductionFile)
      ? JSON.parse(read('block-production.json'))
      : { rates: {} }

    return {
      solido,
      validators,
      validatorPerfs,
      maintainers,
      sysvars,
      reserve,
      stSolMint,
      maintainerAccounts,
      stakeAccounts,
      voteAccounts,
      identityAccounts,
      validatorInfos,
      blockProduction,
    }
  }

  async fetchSourceData (): Promise<RawSourceData> {
    const solido = await this.fetchSolido()
    const reserveAddress = deriveReserveAddress(this.config.solidoProgramId, this.config.solidoAddress)
    const [
      validators,
      validatorPerfs,
      maintainers,
      sysvars,
      reserve,
      stSolMint,
      blockProduction,
    ] = await Promise.all([
      this.fetchValidatorList(solido.validator_list),
      this.fetchValidatorPerfList(solido.validator_perf_list),
      this.fetchMaintainerList(solido.maintainer_list),
      this.fetchSysvars(),
      this.fetchAccount(reserveAddress),
      this.fetchMint(solido.st_sol_mint),
      this.fetchBlockProductionRates(),
    ])

    const maintainerAccounts: Record<string, RawAccountDto> = {}
    const stakeAccounts: Record<string, RawStakeAccountDto> = {}
    const voteAccounts: Record<string, RawVoteAccountDto | null> = {}
    const identityAccounts: Record<string, RawAccountDto> = {}
    const validatorInfos: Record<string, RawValidatorInfoDto | null> = {}

    await Promise.all(maintainers.entries.map(async ({ pubkey }) => {
      maintainerAccounts[pubkey] = await this.fetchAccount(pubkey)
    }))

    await Promise.all(validators.entries.map(async validator => {
      const voteAccount = await this.fetchVoteAccount(validator.vote_account_address)
      voteAccounts[validator.vote_account_address] = voteAccount
      if (voteAccount) {
        const [identityAccount, validatorInfo] = await Promise.all([
          this.fetchAccount(voteAccount.node_pubkey),
          this.fetchValidatorInfo(voteAccount.node_pubkey),
        ])
        identityAccounts[voteAccount.node_pubkey] = identityAccount
        validatorInfos[voteAccount.node_pubkey] = validatorInfo
      }

      const addresses = [
        ...seeds(validator.stake_seeds).map(seed => deriveStakeAddress(
          this.config.solidoProgramId, this.config.solidoAddress, validator.vote_account_address, seed, StakeType.STAKE,
        )),
        ...seeds(validator.unstake_seeds).map(seed => deriveStakeAddress(
          this.config.solidoProgramId, this.config.solidoAddress, validator.vote_account_address, seed, StakeType.UNSTAKE,
        )),
      ]
      for (const address of addresses) {
        stakeAccounts[address] = await this.fetchStakeAccount(address)
      }
    }))

    const data: RawSourceData = {
      solido,
      validators,
      validatorPerfs,
      maintainers,
      sysvars,
      reserve,
      stSolMint,
      maintainerAccounts,
      stakeAccounts,
      voteAccounts,
      identityAccounts,
      validatorInfos,
      blockProduction,
    }
    if (this.config.cacheInputs) {
      this.cacheSourceData(data)
    }
    return data
  }

  private async get<T> (path: string): Promise<T> {
    const url = `${this.config.snapshotApiBaseUrl}${path}`
    try {
      const response = await axios.get<T>(url)
      return response.data
    } catch (error) {
      throw toSnapshotError(error, url)
    }
  }

  // A 404 means the account does not exist (any more), anything else is fatal.
  private async getOptional<T> (path: string): Promise<T | null> {
    const url = `${this.config.snapshotApiBaseUrl}${path}`
    try {
      const response = await axios.get<T>(url)
      return response.data
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null
      }
      throw toSnapshotError(error, url)
    }
  }

  async fetchSolido (): Promise<RawSolidoDto> {
    return this.get<RawSolidoDto>(`/solido/${this.config.solidoAddress}`)
  }

  async fetchValidatorList (address: string): Promise<RawAccountListDto<RawValidatorDto>> {
    return this.get<RawAccountListDto<RawValidatorDto>>(`/validator-lists/${address}`)
  }

  async fetchValidatorPerfList (address: string): Promise<RawAccountListDto<RawValidatorPerfDto>> {
    return this.get<RawAccountListDto<RawValidatorPerfDto>>(`/validator-perf-lists/${address}`)
  }

  async fetchMaintainerList (address: string): Promise<RawAccountListDto<RawMaintainerDto>> {
    return this.get<RawAccountListDto<RawMaintainerDto>>(`/maintainer-lists/${address}`)
  }

  async fetchSysvars (): Promise<RawSysvarsDto> {
    return this.get<RawSysvarsDto>('/sysvars')
  }

  async fetchAccount (address: string): Promise<RawAccountDto> {
    return this.get<RawAccountDto>(`/accounts/${address}`)
  }

  async fetchMint (address: string): Promise<RawMintDto> {
    return this.get<RawMintDto>(`/mints/${address}`)
  }

  async fetchStakeAccount (address: string): Promise<RawStakeAccountDto> {
    return this.get<RawStakeAccountDto>(`/stake-accounts/${address}`)
  }

  // Operators may close their vote account, the validator then gets deactivated and removed.
  async fetchVoteAccount (address: string): Promise<RawVoteAccountDto | null> {
    return this.getOptional<RawVoteAccountDto>(`/vote-accounts/${address}`)
  }

  async fetchValidatorInfo (identity: string): Promise<RawValidatorInfoDto | null> {
    return this.getOptional<RawValidatorInfoDto>(`/validator-infos/${identity}`)
  }

  async fetchBlockProductionRates (): Promise<RawBlockProductionDto> {
    return this.get<RawBlockProductionDto>('/block-production')
  }
}
