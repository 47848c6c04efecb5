export enum InputsSource {
  APIS = 'APIS',
  FILES = 'FILES',
}

export enum StakeTime {
  // Stake and unstake whenever the pool is out of balance
  ANYTIME = 'ANYTIME',
  // Only stake and unstake in the final part of the epoch, see `endOfEpochThreshold`
  ONLY_NEAR_EPOCH_END = 'ONLY_NEAR_EPOCH_END',
}

export enum LogVerbosity {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type MaintainerConfig = {
  // Fetch source data from APIs or from local files
  inputsSource: InputsSource
  // Directory where to write/read input data (optional)
  inputsCacheDirPath?: string
  // Whether to cache input data (optional)
  cacheInputs?: boolean

  // Base URL of the API serving the raw ledger accounts of the pool
  snapshotApiBaseUrl: string

  // Program id of the pool program
  solidoProgramId: string
  // Address of the pool instance account
  solidoAddress: string
  // Address of the maintainer performing the maintenance, must be in the maintainer list to stake
  maintainerAddress: string

  // When stake and unstake instructions are allowed
  stakeTime: StakeTime
  // Percentage of the epoch after which we consider the epoch to be near its end
  endOfEpochThreshold: number

  // Validators are expected to be named with this prefix, it is stripped for metrics
  validatorNamePrefix: string

  // Validator vote accounts to collect debug info for
  debugVoteAccounts: string[]
  logVerbosity: LogVerbosity
}

// NOTE: Tests rely on DEFAULT_CONFIG, change the values with care.
export const DEFAULT_CONFIG: MaintainerConfig = {
  inputsSource: InputsSource.APIS,

  snapshotApiBaseUrl: 'http://127.0.0.1:8899/snapshot',

  solidoProgramId: 'CrX7kMhLC3cSsXJdT7JDgqrRVWGnUpX3gfEfxxU2NVLi',
  solidoAddress: '49Yi1TKkNyYjPAFdR9LBvoHcUjuPX4Df5T5yv39w2XTn',
  maintainerAddress: '',

  stakeTime: StakeTime.ANYTIME,
  endOfEpochThreshold: 95,

  validatorNamePrefix: 'Lido / ',

  debugVoteAccounts: [],
  logVerbosity: LogVerbosity.INFO,
}
