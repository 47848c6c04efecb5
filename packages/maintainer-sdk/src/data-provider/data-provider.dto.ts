// Lamport amounts and per-64 rates are decimal strings, they do not fit in a JSON number.

export type RawSeedRangeDto = {
  begin: number
  end: number
}

export type RawSolidoDto = {
  exchange_rate: {
    computed_in_epoch: number
    st_sol_supply: string
    sol_balance: string
  }
  criteria: {
    max_commission: number
    min_block_production_rate: string
    min_vote_success_rate: string
  }
  st_sol_mint: string
  fee_recipients: {
    treasury_account: string
    developer_account: string
  }
  validator_list: string
  validator_perf_list: string
  maintainer_list: string
}

export type RawAccountListDto<T> = {
  max_entries: number
  entries: T[]
}

export type RawValidatorDto = {
  vote_account_address: string
  stake_seeds: RawSeedRangeDto
  unstake_seeds: RawSeedRangeDto
  stake_accounts_balance: string
  unstake_accounts_balance: string
  active: boolean
}

export type RawValidatorPerfDto = {
  validator_vote_account_address: string
  commission: number
  commission_updated_at: number
  rest: {
    updated_at: number
    block_production_rate: string
    vote_success_rate: string
  } | null
}

export type RawMaintainerDto = {
  pubkey: string
}

export type RawSysvarsDto = {
  clock: {
    slot: number
    epoch: number
    unix_timestamp: number
  }
  rent: {
    lamports_per_byte_year: number
    exemption_threshold: number
    burn_percent: number
  }
  epoch_schedule: {
    slots_per_epoch: number
    leader_schedule_slot_offset: number
    warmup: boolean
    first_normal_epoch: number
    first_normal_slot: number
  }
  stake_history: {
    epoch: number
    effective: string
    activating: string
    deactivating: string
  }[]
}

export type RawAccountDto = {
  lamports: string
  data_len: number
}

// Activation as reported by the node for the current epoch
export type RawStakeAccountDto = {
  lamports: string
  voter: string
  activation_epoch: number
  effective: string
  activating: string
  deactivating: string
}

export type RawVoteAccountDto = RawAccountDto & {
  node_pubkey: string
  commission: number
  credits: number
  last_timestamp: {
    slot: number
    timestamp: number
  }
}

export type RawValidatorInfoDto = {
  name: string
  keybase_username: string | null
}

export type RawMintDto = {
  supply: string
}

export type RawBlockProductionDto = {
  // Identity account to block production rate
  rates: Record<string, string>
}

export type RawSourceData = {
  solido: RawSolidoDto
  validators: RawAccountListDto<RawValidatorDto>
  validatorPerfs: RawAccountListDto<RawValidatorPerfDto>
  maintainers: RawAccountListDto<RawMaintainerDto>
  sysvars: RawSysvarsDto
  reserve: RawAccountDto
  stSolMint: RawMintDto
  // Keyed by account address
  maintainerAccounts: Record<string, RawAccountDto>
  stakeAccounts: Record<string, RawStakeAccountDto>
  // Null for closed vote accounts
  voteAccounts: Record<string, RawVoteAccountDto | null>
  identityAccounts: Record<string, RawAccountDto>
  validatorInfos: Record<string, RawValidatorInfoDto | null>
  blockProduction: RawBlockProductionDto
}
