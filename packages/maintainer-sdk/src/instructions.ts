import Decimal from 'decimal.js'
import { Lamports } from './token'

export enum InstructionKind {
  STAKE_DEPOSIT = 'STAKE_DEPOSIT',
  UNSTAKE = 'UNSTAKE',
  MERGE_STAKE = 'MERGE_STAKE',
  UPDATE_EXCHANGE_RATE = 'UPDATE_EXCHANGE_RATE',
  UPDATE_STAKE_ACCOUNT_BALANCE = 'UPDATE_STAKE_ACCOUNT_BALANCE',
  UPDATE_ONCHAIN_VALIDATOR_PERF = 'UPDATE_ONCHAIN_VALIDATOR_PERF',
  UPDATE_OFFCHAIN_VALIDATOR_PERF = 'UPDATE_OFFCHAIN_VALIDATOR_PERF',
  DEACTIVATE_IF_VIOLATES = 'DEACTIVATE_IF_VIOLATES',
  REACTIVATE_IF_COMPLIES = 'REACTIVATE_IF_COMPLIES',
  REMOVE_VALIDATOR = 'REMOVE_VALIDATOR',
}

type Intent<K extends InstructionKind, A, D = unknown> = {
  kind: K
  programId: string
  accounts: A
} & D

export type StakeDepositAccounts = {
  lido: string
  maintainer: string
  reserve: string
  validatorVoteAccount: string
  // Same as `stakeAccountEnd` when the deposit creates a new account instead of merging
  stakeAccountMergeInto: string
  stakeAccountEnd: string
  stakeAuthority: string
  validatorList: string
  maintainerList: string
}

export type UnstakeAccounts = {
  lido: string
  maintainer: string
  validatorVoteAccount: string
  sourceStakeAccount: string
  destinationUnstakeAccount: string
  stakeAuthority: string
  validatorList: string
  maintainerList: string
}

export type MergeStakeAccounts = {
  lido: string
  validatorVoteAccount: string
  fromStake: string
  toStake: string
  stakeAuthority: string
  validatorList: string
}

export type UpdateExchangeRateAccounts = {
  lido: string
  reserve: string
  stSolMint: string
  validatorList: string
}

export type UpdateStakeAccountBalanceAccounts = {
  lido: string
  validatorVoteAccount: string
  // Stake accounts first, then unstake accounts, both in seed order
  stakeAccounts: string[]
  reserve: string
  stakeAuthority: string
  mintAuthority: string
  stSolMint: string
  treasuryStSolAccount: string
  developerStSolAccount: string
  validatorList: string
}

export type ValidatorPerfAccounts = {
  lido: string
  validatorVoteAccount: string
  validatorList: string
  validatorPerfList: string
}

export type RemoveValidatorAccounts = {
  lido: string
  validatorVoteAccountToRemove: string
  validatorList: string
}

export type StakeDepositInstruction = Intent<InstructionKind.STAKE_DEPOSIT, StakeDepositAccounts, {
  amount: Lamports
  validatorIndex: number
  maintainerIndex: number
}>
export type UnstakeInstruction = Intent<InstructionKind.UNSTAKE, UnstakeAccounts, {
  amount: Lamports
  validatorIndex: number
  maintainerIndex: number
}>
export type MergeStakeInstruction = Intent<InstructionKind.MERGE_STAKE, MergeStakeAccounts, { validatorIndex: number }>
export type UpdateExchangeRateInstruction = Intent<InstructionKind.UPDATE_EXCHANGE_RATE, UpdateExchangeRateAccounts>
export type UpdateStakeAccountBalanceInstruction = Intent<
  InstructionKind.UPDATE_STAKE_ACCOUNT_BALANCE,
  UpdateStakeAccountBalanceAccounts,
  { validatorIndex: number }
>
export type UpdateOnchainValidatorPerfInstruction = Intent<InstructionKind.UPDATE_ONCHAIN_VALIDATOR_PERF, ValidatorPerfAccounts>
export type UpdateOffchainValidatorPerfInstruction = Intent<InstructionKind.UPDATE_OFFCHAIN_VALIDATOR_PERF, ValidatorPerfAccounts, {
  blockProductionRate: Decimal
  voteSuccessRate: Decimal
}>
export type DeactivateIfViolatesInstruction = Intent<InstructionKind.DEACTIVATE_IF_VIOLATES, ValidatorPerfAccounts>
export type ReactivateIfCompliesInstruction = Intent<InstructionKind.REACTIVATE_IF_COMPLIES, ValidatorPerfAccounts>
export type RemoveValidatorInstruction = Intent<InstructionKind.REMOVE_VALIDATOR, RemoveValidatorAccounts, { validatorIndex: number }>

/** What the maintainer asks the pool program to do; encoding it for the wire is up to the submitter. */
export type InstructionIntent =
  | StakeDepositInstruction
  | UnstakeInstruction
  | MergeStakeInstruction
  | UpdateExchangeRateInstruction
  | UpdateStakeAccountBalanceInstruction
  | UpdateOnchainValidatorPerfInstruction
  | UpdateOffchainValidatorPerfInstruction
  | DeactivateIfViolatesInstruction
  | ReactivateIfCompliesInstruction
  | RemoveValidatorInstruction

export const stakeDeposit = (
  programId: string,
  accounts: StakeDepositAccounts,
  amount: Lamports,
  validatorIndex: number,
  maintainerIndex: number,
): StakeDepositInstruction => ({ kind: InstructionKind.STAKE_DEPOSIT, programId, accounts, amount, validatorIndex, maintainerIndex })

export const unstake = (
  programId: string,
  accounts: UnstakeAccounts,
  amount: Lamports,
  validatorIndex: number,
  maintainerIndex: number,
): UnstakeInstruction => ({ kind: InstructionKind.UNSTAKE, programId, accounts, amount, validatorIndex, maintainerIndex })

export const mergeStake = (programId: string, accounts: MergeStakeAccounts, validatorIndex: number): MergeStakeInstruction =>
  ({ kind: InstructionKind.MERGE_STAKE, programId, accounts, validatorIndex })

export const updateExchangeRate = (programId: string, accounts: UpdateExchangeRateAccounts): UpdateExchangeRateInstruction =>
  ({ kind: InstructionKind.UPDATE_EXCHANGE_RATE, programId, accounts })

export const updateStakeAccountBalance = (
  programId: string,
  accounts: UpdateStakeAccountBalanceAccounts,
  validatorIndex: number,
): UpdateStakeAccountBalanceInstruction =>
  ({ kind: InstructionKind.UPDATE_STAKE_ACCOUNT_BALANCE, programId, accounts, validatorIndex })

export const updateOnchainValidatorPerf = (programId: string, accounts: ValidatorPerfAccounts): UpdateOnchainValidatorPerfInstruction =>
  ({ kind: InstructionKind.UPDATE_ONCHAIN_VALIDATOR_PERF, programId, accounts })

export const updateOffchainValidatorPerf = (
  programId: string,
  accounts: ValidatorPerfAccounts,
  blockProductionRate: Decimal,
  voteSuccessRate: Decimal,
): UpdateOffchainValidatorPerfInstruction =>
  ({ kind: InstructionKind.UPDATE_OFFCHAIN_VALIDATOR_PERF, programId, accounts, blockProductionRate, voteSuccessRate })

export const deactivateIfViolates = (programId: string, accounts: ValidatorPerfAccounts): DeactivateIfViolatesInstruction =>
  ({ kind: InstructionKind.DEACTIVATE_IF_VIOLATES, programId, accounts })

export const reactivateIfComplies = (programId: string, accounts: ValidatorPerfAccounts): ReactivateIfCompliesInstruction =>
  ({ kind: InstructionKind.REACTIVATE_IF_COMPLIES, programId, accounts })

export const removeValidator = (programId: string, accounts: RemoveValidatorAccounts, validatorIndex: number): RemoveValidatorInstruction =>
  ({ kind: InstructionKind.REMOVE_VALIDATOR, programId, accounts, validatorIndex })
