import Decimal from 'decimal.js'
import { invariant } from './errors'
import { Lamports, U64_MAX } from './token'
import { AccountList, Criteria, Validator, ValidatorPerf } from './types'

export const MAXIMUM_UNSTAKE_ACCOUNTS = 3

export enum RemovalBlocker {
  STILL_ACTIVE = 'STILL_ACTIVE',
  HAS_STAKE_ACCOUNTS = 'HAS_STAKE_ACCOUNTS',
  HAS_UNSTAKE_ACCOUNTS = 'HAS_UNSTAKE_ACCOUNTS',
}

export const computeEffectiveStakeBalance = (validator: Validator): Lamports =>
  validator.stakeAccountsBalance.sub(validator.unstakeAccountsBalance)

export const seedCount = ({ begin, end }: { begin: number, end: number }): number => end - begin

/** Returns what prevents the validator from being removed, or null when it can be removed. */
export const checkCanBeRemoved = (validator: Validator): RemovalBlocker | null => {
  if (validator.active) {
    return RemovalBlocker.STILL_ACTIVE
  }
  if (validator.stakeSeeds.begin !== validator.stakeSeeds.end) {
    return RemovalBlocker.HAS_STAKE_ACCOUNTS
  }
  if (validator.unstakeSeeds.begin !== validator.unstakeSeeds.end) {
    return RemovalBlocker.HAS_UNSTAKE_ACCOUNTS
  }
  invariant(
    validator.stakeAccountsBalance.isZero(),
    `Validator ${validator.pubkey} has no stake accounts but records a balance of ${validator.stakeAccountsBalance.toString()}`,
  )
  return null
}

// Off-chain rates that were never measured count as perfect.
export const doesPerformWell = (criteria: Criteria, commission: number, perf: ValidatorPerf | null): boolean => {
  const blockProductionRate: Decimal = perf?.rest?.blockProductionRate ?? U64_MAX
  const voteSuccessRate: Decimal = perf?.rest?.voteSuccessRate ?? U64_MAX
  return commission <= criteria.maxCommission &&
    blockProductionRate.gte(criteria.minBlockProductionRate) &&
    voteSuccessRate.gte(criteria.minVoteSuccessRate)
}

export const activeValidators = (validators: AccountList<Validator>): Validator[] =>
  validators.entries.filter(({ active }) => active)
