import Decimal from 'decimal.js'
import { InstructionIntent } from './instructions'
import { Lamports, toF64 } from './token'

export enum MaintenanceTask {
  STAKE_DEPOSIT = 'STAKE_DEPOSIT',
  UPDATE_EXCHANGE_RATE = 'UPDATE_EXCHANGE_RATE',
  UPDATE_OFFCHAIN_VALIDATOR_PERF = 'UPDATE_OFFCHAIN_VALIDATOR_PERF',
  UPDATE_ONCHAIN_VALIDATOR_PERF = 'UPDATE_ONCHAIN_VALIDATOR_PERF',
  UPDATE_STAKE_ACCOUNT_BALANCE = 'UPDATE_STAKE_ACCOUNT_BALANCE',
  MERGE_STAKE = 'MERGE_STAKE',
  UNSTAKE_FROM_INACTIVE_VALIDATOR = 'UNSTAKE_FROM_INACTIVE_VALIDATOR',
  DEACTIVATE_IF_VIOLATES = 'DEACTIVATE_IF_VIOLATES',
  REACTIVATE_IF_COMPLIES = 'REACTIVATE_IF_COMPLIES',
  REMOVE_VALIDATOR = 'REMOVE_VALIDATOR',
  UNSTAKE_FROM_ACTIVE_VALIDATOR = 'UNSTAKE_FROM_ACTIVE_VALIDATOR',
}

export type Unstake = {
  validatorVoteAccount: string
  fromStakeAccount: string
  toUnstakeAccount: string
  fromStakeSeed: number
  toUnstakeSeed: number
  amount: Lamports
}

export type MaintenanceOutput =
  | {
    task: MaintenanceTask.STAKE_DEPOSIT
    validatorVoteAccount: string
    stakeAccount: string
    amount: Lamports
  }
  | { task: MaintenanceTask.UPDATE_EXCHANGE_RATE }
  | {
    task: MaintenanceTask.UPDATE_OFFCHAIN_VALIDATOR_PERF
    validatorVoteAccount: string
    blockProductionRate: Decimal
    voteSuccessRate: Decimal
  }
  | { task: MaintenanceTask.UPDATE_ONCHAIN_VALIDATOR_PERF, validatorVoteAccount: string }
  | {
    task: MaintenanceTask.UPDATE_STAKE_ACCOUNT_BALANCE
    validatorVoteAccount: string
    // Only what we expect, another transaction may land before ours
    expectedDifferenceStake: Lamports
    unstakeWithdrawnToReserve: Lamports
  }
  | {
    task: MaintenanceTask.MERGE_STAKE
    validatorVoteAccount: string
    fromStake: string
    toStake: string
    fromStakeSeed: number
    toStakeSeed: number
  }
  | ({ task: MaintenanceTask.UNSTAKE_FROM_INACTIVE_VALIDATOR } & Unstake)
  | { task: MaintenanceTask.DEACTIVATE_IF_VIOLATES, validatorVoteAccount: string }
  | { task: MaintenanceTask.REACTIVATE_IF_COMPLIES, validatorVoteAccount: string }
  | { task: MaintenanceTask.REMOVE_VALIDATOR, validatorVoteAccount: string }
  | ({ task: MaintenanceTask.UNSTAKE_FROM_ACTIVE_VALIDATOR } & Unstake)

export type MaintenanceInstruction = {
  instruction: InstructionIntent
  output: MaintenanceOutput
  // Keys that have to sign besides the maintainer
  additionalSigners: string[]
}

export const maintenanceInstruction = (instruction: InstructionIntent, output: MaintenanceOutput): MaintenanceInstruction =>
  ({ instruction, output, additionalSigners: [] })

const formatPercent = (rate: Decimal) => `${(100 * toF64(rate)).toFixed(2)}%`

const formatUnstake = (unstake: Unstake): string[] => [
  `  Validator vote account: ${unstake.validatorVoteAccount}`,
  `  Stake account:               ${unstake.fromStakeAccount}, seed: ${unstake.fromStakeSeed}`,
  `  Unstake account:             ${unstake.toUnstakeAccount}, seed: ${unstake.toUnstakeSeed}`,
  `  Amount:              ${unstake.amount.toString()}`,
]

export const formatMaintenanceOutput = (output: MaintenanceOutput): string => {
  switch (output.task) {
    case MaintenanceTask.STAKE_DEPOSIT:
      return [
        'Staked deposit.',
        `  Validator vote account: ${output.validatorVoteAccount}`,
        `  Stake account:          ${output.stakeAccount}`,
        `  Amount staked:          ${output.amount.toString()}`,
      ].join('\n')
    case MaintenanceTask.UPDATE_EXCHANGE_RATE:
      return 'Updated exchange rate.'
    case MaintenanceTask.UPDATE_OFFCHAIN_VALIDATOR_PERF:
      return [
        'Updated off-chain validator performance.',
        `  Validator vote account:     ${output.validatorVoteAccount}`,
        `  New block production rate:  ${formatPercent(output.blockProductionRate)}`,
        `  New vote success rate:      ${formatPercent(output.voteSuccessRate)}`,
      ].join('\n')
    case MaintenanceTask.UPDATE_ONCHAIN_VALIDATOR_PERF:
      return [
        'Updated on-chain validator performance.',
        `  Validator vote account:     ${output.validatorVoteAccount}`,
      ].join('\n')
    case MaintenanceTask.UPDATE_STAKE_ACCOUNT_BALANCE:
      return [
        'Updated stake account balance.',
        `  Validator vote account:        ${output.validatorVoteAccount}`,
        `  Expected difference in stake:  ${output.expectedDifferenceStake.toString()}`,
        `  Amount withdrawn from unstake: ${output.unstakeWithdrawnToReserve.toString()}`,
      ].join('\n')
    case MaintenanceTask.MERGE_STAKE:
      return [
        'Stake accounts merged',
        `  Validator vote account: ${output.validatorVoteAccount}`,
        `  From stake:             ${output.fromStake}, seed: ${output.fromStakeSeed}`,
        `  To stake:               ${output.toStake}, seed: ${output.toStakeSeed}`,
      ].join('\n')
    case MaintenanceTask.UNSTAKE_FROM_INACTIVE_VALIDATOR:
      return ['Unstake from inactive validator', ...formatUnstake(output)].join('\n')
    case MaintenanceTask.UNSTAKE_FROM_ACTIVE_VALIDATOR:
      return ['Unstake from active validator', ...formatUnstake(output)].join('\n')
    case MaintenanceTask.DEACTIVATE_IF_VIOLATES:
      return [
        'Deactivate a validator that fails to meet our criteria.',
        `  Validator vote account: ${output.validatorVoteAccount}`,
      ].join('\n')
    case MaintenanceTask.REACTIVATE_IF_COMPLIES:
      return [
        'Reactivate a validator that meets our criteria.',
        `  Validator vote account: ${output.validatorVoteAccount}`,
      ].join('\n')
    case MaintenanceTask.REMOVE_VALIDATOR:
      return [
        'Remove a validator.',
        `  Validator vote account: ${output.validatorVoteAccount}`,
      ].join('\n')
  }
}

export type SerializedMaintenanceOutput = { task: MaintenanceTask } & Record<string, string | number>

const serializeUnstake = (unstake: Unstake) => ({
  validatorVoteAccount: unstake.validatorVoteAccount,
  fromStakeAccount: unstake.fromStakeAccount,
  toUnstakeAccount: unstake.toUnstakeAccount,
  fromStakeSeed: unstake.fromStakeSeed,
  toUnstakeSeed: unstake.toUnstakeSeed,
  amountLamports: unstake.amount.toJSON(),
})

// Amounts are written as integer strings so that no precision is lost in JSON.
export const serializeMaintenanceOutput = (output: MaintenanceOutput): SerializedMaintenanceOutput => {
  switch (output.task) {
    case MaintenanceTask.STAKE_DEPOSIT:
      return {
        task: output.task,
        validatorVoteAccount: output.validatorVoteAccount,
        stakeAccount: output.stakeAccount,
        amountLamports: output.amount.toJSON(),
      }
    case MaintenanceTask.UPDATE_EXCHANGE_RATE:
      return { task: output.task }
    case MaintenanceTask.UPDATE_OFFCHAIN_VALIDATOR_PERF:
      return {
        task: output.task,
        validatorVoteAccount: output.validatorVoteAccount,
        blockProductionRate: output.blockProductionRate.toFixed(0),
        voteSuccessRate: output.voteSuccessRate.toFixed(0),
      }
    case MaintenanceTask.UPDATE_STAKE_ACCOUNT_BALANCE:
      return {
        task: output.task,
        validatorVoteAccount: output.validatorVoteAccount,
        expectedDifferenceStakeLamports: output.expectedDifferenceStake.toJSON(),
        unstakeWithdrawnToReserveLamports: output.unstakeWithdrawnToReserve.toJSON(),
      }
    case MaintenanceTask.MERGE_STAKE:
      return {
        task: output.task,
        validatorVoteAccount: output.validatorVoteAccount,
        fromStake: output.fromStake,
        toStake: output.toStake,
        fromStakeSeed: output.fromStakeSeed,
        toStakeSeed: output.toStakeSeed,
      }
    case MaintenanceTask.UNSTAKE_FROM_INACTIVE_VALIDATOR:
    case MaintenanceTask.UNSTAKE_FROM_ACTIVE_VALIDATOR:
      return { task: output.task, ...serializeUnstake(output) }
    case MaintenanceTask.UPDATE_ONCHAIN_VALIDATOR_PERF:
    case MaintenanceTask.DEACTIVATE_IF_VIOLATES:
    case MaintenanceTask.REACTIVATE_IF_COMPLIES:
    case MaintenanceTask.REMOVE_VALIDATOR:
      return { task: output.task, validatorVoteAccount: output.validatorVoteAccount }
  }
}
