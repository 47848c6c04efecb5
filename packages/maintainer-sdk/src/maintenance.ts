import { Allocator } from './balance'
import { deriveMintAuthority, deriveStakeAddress, deriveStakeAuthority, deriveTemporaryStakeAddress, StakeType } from './addresses'
import { Debug } from './debug'
import { MaintenanceError } from './errors'
import * as instructions from './instructions'
import { MaintenanceInstruction, maintenanceInstruction, MaintenanceTask } from './output'
import { canMerge, isFullyInactive, stakeBalanceTotal } from './stake-account'
import { getSlotsInEpoch, minimumBalance } from './sysvars'
import { confirmShouldStakeUnstakeInCurrentSlot, isAtEpochEnd } from './timing'
import { Lamports, per64, Rational, U64_MAX } from './token'
import { SolidoState, StakeAccountEntry, Validator } from './types'
import {
  checkCanBeRemoved,
  computeEffectiveStakeBalance,
  doesPerformWell,
  MAXIMUM_UNSTAKE_ACCOUNTS,
  seedCount,
} from './validator'

export const MINIMUM_STAKE_ACCOUNT_BALANCE = Lamports.fromSol(1)
// Below this, the fees of withdrawing would eat most of what we withdraw.
export const MINIMUM_WITHDRAW_AMOUNT = new Lamports(10_000 * 100)
// Validators more than this fraction above their target get unstaked.
export const UNBALANCE_THRESHOLD = new Rational(1, 10)
export const MINIMUM_MAINTAINER_BALANCE = new Lamports(100_000_000)
// Size of a stake account, its rent-exempt reserve is never withdrawn.
export const STAKE_ACCOUNT_DATA_LEN = 200

export type MaintenanceContext = {
  allocator: Allocator
  debug: Debug
}

export type MaintenanceStep = (state: SolidoState, context: MaintenanceContext) => MaintenanceInstruction | null

/** Reserve balance that can be spent while keeping the reserve rent-exempt. */
export const getEffectiveReserve = ({ reserveBalance, rent }: SolidoState): Lamports =>
  reserveBalance.saturatingSub(minimumBalance(rent, 0))

const stakeAuthority = (state: SolidoState) => deriveStakeAuthority(state.solidoProgramId, state.solidoAddress)

const validatorPerfAccounts = (state: SolidoState, validator: Validator): instructions.ValidatorPerfAccounts => ({
  lido: state.solidoAddress,
  validatorVoteAccount: validator.pubkey,
  validatorList: state.solido.validatorList,
  validatorPerfList: state.solido.validatorPerfList,
})

/**
 * Fails before anything is attempted when the acting maintainer cannot pay
 * for transactions, rather than having them rejected one by one.
 */
export const assertMaintainerFunded = (state: SolidoState): void => {
  const index = state.maintainers.position(state.maintainerAddress)
  if (index === null) {
    return
  }
  const balance = state.maintainerBalances[index]
  if (balance.lt(MINIMUM_MAINTAINER_BALANCE)) {
    throw new MaintenanceError(
      `Balance of the maintainer account ${state.maintainerAddress} is less than ${MINIMUM_MAINTAINER_BALANCE.toString()}. ` +
      'Please fund the maintainer account.',
    )
  }
}

// Merging first keeps the number of accounts a balance update has to reference low.
export const tryMergeOnAllStakes: MaintenanceStep = (state, { debug }) => {
  for (const [index, validator] of state.validators.entries.entries()) {
    const stakeAccounts = state.validatorStakeAccounts[index]
    if (stakeAccounts.length < 2) {
      continue
    }
    const [from, to] = stakeAccounts
    if (!canMerge(to.account, from.account)) {
      debug.pushValidatorEvent(validator.pubkey, `cannot merge stake seed ${from.account.seed} into seed ${to.account.seed}`)
      continue
    }
    const instruction = instructions.mergeStake(state.solidoProgramId, {
      lido: state.solidoAddress,
      validatorVoteAccount: validator.pubkey,
      fromStake: from.address,
      toStake: to.address,
      stakeAuthority: stakeAuthority(state),
      validatorList: state.solido.validatorList,
    }, index)
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.MERGE_STAKE,
      validatorVoteAccount: validator.pubkey,
      fromStake: from.address,
      toStake: to.address,
      fromStakeSeed: from.account.seed,
      toStakeSeed: to.account.seed,
    })
  }
  return null
}

export const tryUpdateExchangeRate: MaintenanceStep = (state) => {
  if (state.solido.exchangeRate.computedInEpoch >= state.clock.epoch) {
    return null
  }
  const instruction = instructions.updateExchangeRate(state.solidoProgramId, {
    lido: state.solidoAddress,
    reserve: state.reserveAddress,
    stSolMint: state.solido.stSolMint,
    validatorList: state.solido.validatorList,
  })
  return maintenanceInstruction(instruction, { task: MaintenanceTask.UPDATE_EXCHANGE_RATE })
}

/**
 * The stored commission is refreshed once per epoch near its end, or right
 * away when the validator raised it beyond the allowed maximum.
 */
export const tryUpdateOnchainValidatorPerfs: MaintenanceStep = (state, { debug }) => {
  const atEpochEnd = isAtEpochEnd(state)
  for (const [index, validator] of state.validators.entries.entries()) {
    const voteState = state.validatorVoteAccounts[index]
    if (voteState === null) {
      // Closed vote accounts get deactivated by a later step.
      continue
    }
    const perf = state.validatorPerfs[index]
    const expired = (perf === null || perf.commissionUpdatedAt < state.clock.epoch) && atEpochEnd
    const exceedsMax = perf !== null &&
      voteState.commission > state.solido.criteria.maxCommission &&
      voteState.commission > perf.commission
    if (!expired && !exceedsMax) {
      continue
    }
    debug.pushValidatorEvent(validator.pubkey, `on-chain perf update, expired: ${expired}, commission exceeds max: ${exceedsMax}`)
    const instruction = instructions.updateOnchainValidatorPerf(state.solidoProgramId, validatorPerfAccounts(state, validator))
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.UPDATE_ONCHAIN_VALIDATOR_PERF,
      validatorVoteAccount: validator.pubkey,
    })
  }
  return null
}

export const tryUpdateOffchainValidatorPerfs: MaintenanceStep = (state) => {
  if (!isAtEpochEnd(state)) {
    return null
  }
  for (const [index, validator] of state.validators.entries.entries()) {
    const rest = state.validatorPerfs[index]?.rest ?? null
    if (rest !== null && state.clock.epoch <= rest.updatedAt) {
      continue
    }
    const voteState = state.validatorVoteAccounts[index]
    if (voteState === null) {
      continue
    }
    const blockProductionRate = state.validatorBlockProductionRates[index] ?? U64_MAX
    const slotsInEpoch = getSlotsInEpoch(state.epochSchedule, state.clock.epoch)
    const voteSuccessRate = per64(Math.min(voteState.credits, slotsInEpoch), slotsInEpoch)

    const instruction = instructions.updateOffchainValidatorPerf(
      state.solidoProgramId,
      validatorPerfAccounts(state, validator),
      blockProductionRate,
      voteSuccessRate,
    )
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.UPDATE_OFFCHAIN_VALIDATOR_PERF,
      validatorVoteAccount: validator.pubkey,
      blockProductionRate,
      voteSuccessRate,
    })
  }
  return null
}

export const tryUpdateValidatorPerfs: MaintenanceStep = (state, context) =>
  tryUpdateOnchainValidatorPerfs(state, context) ?? tryUpdateOffchainValidatorPerfs(state, context)

export const tryReactivateIfComplies: MaintenanceStep = (state) => {
  if (!isAtEpochEnd(state)) {
    return null
  }
  for (const [index, validator] of state.validators.entries.entries()) {
    const voteState = state.validatorVoteAccounts[index]
    if (validator.active || voteState === null) {
      continue
    }
    if (!doesPerformWell(state.solido.criteria, voteState.commission, state.validatorPerfs[index])) {
      continue
    }
    const instruction = instructions.reactivateIfComplies(state.solidoProgramId, validatorPerfAccounts(state, validator))
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.REACTIVATE_IF_COMPLIES,
      validatorVoteAccount: validator.pubkey,
    })
  }
  return null
}

const getUnstakeInstruction = (
  state: SolidoState,
  validatorIndex: number,
  stakeAccount: StakeAccountEntry,
  amount: Lamports,
): { unstakeAccount: string, instruction: instructions.UnstakeInstruction } | null => {
  const validator = state.validators.entries[validatorIndex]
  const maintainerIndex = state.maintainers.position(state.maintainerAddress)
  if (maintainerIndex === null) {
    return null
  }
  const unstakeAccount = deriveStakeAddress(
    state.solidoProgramId,
    state.solidoAddress,
    validator.pubkey,
    validator.unstakeSeeds.end,
    StakeType.UNSTAKE,
  )
  const instruction = instructions.unstake(state.solidoProgramId, {
    lido: state.solidoAddress,
    maintainer: state.maintainerAddress,
    validatorVoteAccount: validator.pubkey,
    sourceStakeAccount: stakeAccount.address,
    destinationUnstakeAccount: unstakeAccount,
    stakeAuthority: stakeAuthority(state),
    validatorList: state.solido.validatorList,
    maintainerList: state.solido.maintainerList,
  }, amount, validatorIndex, maintainerIndex)
  return { unstakeAccount, instruction }
}

export const tryUnstakeFromInactiveValidator: MaintenanceStep = (state, { debug }) => {
  for (const [index, validator] of state.validators.entries.entries()) {
    if (validator.active) {
      continue
    }
    if (seedCount(validator.unstakeSeeds) >= MAXIMUM_UNSTAKE_ACCOUNTS) {
      debug.pushValidatorEvent(validator.pubkey, `already has ${MAXIMUM_UNSTAKE_ACCOUNTS} unstake accounts`)
      continue
    }
    const stakeAccounts = state.validatorStakeAccounts[index]
    if (stakeAccounts.length === 0) {
      continue
    }
    const stakeAccount = stakeAccounts[0]
    const amount = stakeBalanceTotal(stakeAccount.account.balance)
    const unstake = getUnstakeInstruction(state, index, stakeAccount, amount)
    if (unstake === null) {
      return null
    }
    return maintenanceInstruction(unstake.instruction, {
      task: MaintenanceTask.UNSTAKE_FROM_INACTIVE_VALIDATOR,
      validatorVoteAccount: validator.pubkey,
      fromStakeAccount: stakeAccount.address,
      toUnstakeAccount: unstake.unstakeAccount,
      fromStakeSeed: validator.stakeSeeds.begin,
      toUnstakeSeed: validator.unstakeSeeds.end,
      amount,
    })
  }
  return null
}

/**
 * Picks up rewards and donations, withdraws inactive stake left behind by
 * merges, and sweeps fully deactivated unstake accounts back to the reserve.
 */
export const tryUpdateStakeAccountBalance: MaintenanceStep = (state, { debug }) => {
  const stakeRent = minimumBalance(state.rent, STAKE_ACCOUNT_DATA_LEN)
  for (const [index, validator] of state.validators.entries.entries()) {
    const stakeAccounts = state.validatorStakeAccounts[index]
    const unstakeAccounts = state.validatorUnstakeAccounts[index]

    let totalStakeBalance = Lamports.ZERO
    let canBeWithdrawn = Lamports.ZERO
    for (const { account } of stakeAccounts) {
      totalStakeBalance = totalStakeBalance.add(stakeBalanceTotal(account.balance))
      canBeWithdrawn = canBeWithdrawn.add(account.balance.inactive.sub(stakeRent))
    }

    const effectiveStakeBalance = computeEffectiveStakeBalance(validator)
    const expectedDifferenceStake = totalStakeBalance.gt(effectiveStakeBalance)
      ? totalStakeBalance.sub(effectiveStakeBalance)
      : canBeWithdrawn

    // Unstake accounts deactivate in order, stop at the first one still deactivating.
    let removedUnstake = Lamports.ZERO
    for (const { account } of unstakeAccounts) {
      if (!isFullyInactive(account)) {
        break
      }
      removedUnstake = removedUnstake.add(stakeBalanceTotal(account.balance))
    }

    if (expectedDifferenceStake.lte(MINIMUM_WITHDRAW_AMOUNT) && removedUnstake.isZero()) {
      debug.pushValidatorEvent(validator.pubkey, `balance in sync, expected difference ${expectedDifferenceStake.toString()}`)
      continue
    }

    const instruction = instructions.updateStakeAccountBalance(state.solidoProgramId, {
      lido: state.solidoAddress,
      validatorVoteAccount: validator.pubkey,
      stakeAccounts: [...stakeAccounts, ...unstakeAccounts].map(({ address }) => address),
      reserve: state.reserveAddress,
      stakeAuthority: stakeAuthority(state),
      mintAuthority: deriveMintAuthority(state.solidoProgramId, state.solidoAddress),
      stSolMint: state.solido.stSolMint,
      treasuryStSolAccount: state.solido.feeRecipients.treasuryAccount,
      developerStSolAccount: state.solido.feeRecipients.developerAccount,
      validatorList: state.solido.validatorList,
    }, index)
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.UPDATE_STAKE_ACCOUNT_BALANCE,
      validatorVoteAccount: validator.pubkey,
      expectedDifferenceStake,
      unstakeWithdrawnToReserve: removedUnstake,
    })
  }
  return null
}

export const tryDeactivateIfViolates: MaintenanceStep = (state, { debug }) => {
  for (const [index, validator] of state.validators.entries.entries()) {
    if (!validator.active) {
      continue
    }
    const voteState = state.validatorVoteAccounts[index]
    if (voteState !== null && doesPerformWell(state.solido.criteria, voteState.commission, state.validatorPerfs[index])) {
      continue
    }
    debug.pushValidatorEvent(validator.pubkey, voteState === null ? 'vote account closed' : 'does not meet the criteria')
    const instruction = instructions.deactivateIfViolates(state.solidoProgramId, validatorPerfAccounts(state, validator))
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.DEACTIVATE_IF_VIOLATES,
      validatorVoteAccount: validator.pubkey,
    })
  }
  return null
}

export const tryStakeDeposit: MaintenanceStep = (state, { allocator, debug }) => {
  if (!confirmShouldStakeUnstakeInCurrentSlot(state)) {
    return null
  }
  if (!state.validators.entries.some(({ active }) => active)) {
    return null
  }

  const reserveBalance = getEffectiveReserve(state)
  const targets = allocator.getTargetBalance(reserveBalance, state.validators)
  const { index, amount: amountBelowTarget } = allocator.getMinimumStakeValidatorIndexAmount(state.validators, targets)
  const validator = state.validators.entries[index]

  // Top up to at most the target, unless that is less than a stake account
  // can hold. Then we overshoot and later deposits restore the balance.
  const amount = amountBelowTarget.min(reserveBalance).max(MINIMUM_STAKE_ACCOUNT_BALANCE)
  if (amount.gt(reserveBalance)) {
    debug.pushValidatorEvent(validator.pubkey, `reserve ${reserveBalance.toString()} too small to stake ${amount.toString()}`)
    return null
  }

  // A deposit into a validator whose last stake account activated in this
  // epoch goes to a temporary account that gets merged into the last one.
  const stakeAccounts = state.validatorStakeAccounts[index]
  const lastStakeAccount = stakeAccounts.length > 0 ? stakeAccounts[stakeAccounts.length - 1] : null
  let stakeAccountEnd: string
  let stakeAccountMergeInto: string
  if (lastStakeAccount !== null && lastStakeAccount.account.activationEpoch === state.clock.epoch) {
    stakeAccountEnd = deriveTemporaryStakeAddress(
      state.solidoProgramId,
      state.solidoAddress,
      validator.pubkey,
      validator.stakeSeeds.end,
      state.clock.epoch,
    )
    stakeAccountMergeInto = lastStakeAccount.address
  } else {
    stakeAccountEnd = deriveStakeAddress(
      state.solidoProgramId,
      state.solidoAddress,
      validator.pubkey,
      validator.stakeSeeds.end,
      StakeType.STAKE,
    )
    stakeAccountMergeInto = stakeAccountEnd
  }

  const maintainerIndex = state.maintainers.position(state.maintainerAddress)
  if (maintainerIndex === null) {
    return null
  }

  const instruction = instructions.stakeDeposit(state.solidoProgramId, {
    lido: state.solidoAddress,
    maintainer: state.maintainerAddress,
    reserve: state.reserveAddress,
    validatorVoteAccount: validator.pubkey,
    stakeAccountMergeInto,
    stakeAccountEnd,
    stakeAuthority: stakeAuthority(state),
    validatorList: state.solido.validatorList,
    maintainerList: state.solido.maintainerList,
  }, amount, index, maintainerIndex)
  return maintenanceInstruction(instruction, {
    task: MaintenanceTask.STAKE_DEPOSIT,
    validatorVoteAccount: validator.pubkey,
    stakeAccount: stakeAccountEnd,
    amount,
  })
}

export const tryUnstakeFromActiveValidators: MaintenanceStep = (state, { allocator, debug }) => {
  if (!confirmShouldStakeUnstakeInCurrentSlot(state)) {
    return null
  }
  if (!state.validators.entries.some(({ active }) => active)) {
    return null
  }

  const targets = allocator.getTargetBalance(getEffectiveReserve(state), state.validators)
  const unstakeTarget = allocator.getUnstakeValidatorIndex(state.validators, targets, UNBALANCE_THRESHOLD)
  if (unstakeTarget === null) {
    return null
  }
  const { index, amount: excess } = unstakeTarget
  const validator = state.validators.entries[index]
  const stakeAccounts = state.validatorStakeAccounts[index]
  if (stakeAccounts.length === 0) {
    return null
  }
  const stakeAccount = stakeAccounts[0]

  // Stake accounts never hold less than the minimum balance, anything else is a bug.
  const maximumUnstake = stakeBalanceTotal(stakeAccount.account.balance).sub(MINIMUM_STAKE_ACCOUNT_BALANCE)
  const amount = excess.min(maximumUnstake)
  if (amount.lt(MINIMUM_STAKE_ACCOUNT_BALANCE)) {
    debug.pushValidatorEvent(validator.pubkey, `unstake of ${amount.toString()} is below the minimum stake account balance`)
    return null
  }

  const unstake = getUnstakeInstruction(state, index, stakeAccount, amount)
  if (unstake === null) {
    return null
  }
  return maintenanceInstruction(unstake.instruction, {
    task: MaintenanceTask.UNSTAKE_FROM_ACTIVE_VALIDATOR,
    validatorVoteAccount: validator.pubkey,
    fromStakeAccount: stakeAccount.address,
    toUnstakeAccount: unstake.unstakeAccount,
    fromStakeSeed: validator.stakeSeeds.begin,
    toUnstakeSeed: validator.unstakeSeeds.end,
    amount,
  })
}

export const tryRemovePendingValidators: MaintenanceStep = (state) => {
  for (const [index, validator] of state.validators.entries.entries()) {
    if (checkCanBeRemoved(validator) !== null) {
      continue
    }
    const instruction = instructions.removeValidator(state.solidoProgramId, {
      lido: state.solidoAddress,
      validatorVoteAccountToRemove: validator.pubkey,
      validatorList: state.solido.validatorList,
    }, index)
    return maintenanceInstruction(instruction, {
      task: MaintenanceTask.REMOVE_VALIDATOR,
      validatorVoteAccount: validator.pubkey,
    })
  }
  return null
}

// Order matters: the exchange rate has to be current before balances are
// updated, and balances before anything is staked or unstaked.
export const MAINTENANCE_STEPS: readonly MaintenanceStep[] = [
  tryMergeOnAllStakes,
  tryUpdateExchangeRate,
  tryUpdateValidatorPerfs,
  tryReactivateIfComplies,
  tryUnstakeFromInactiveValidator,
  tryUpdateStakeAccountBalance,
  tryDeactivateIfViolates,
  tryStakeDeposit,
  tryUnstakeFromActiveValidators,
  tryRemovePendingValidators,
]

/** The first maintenance that applies to the snapshot, or null when there is nothing to do. */
export const selectMaintenance = (state: SolidoState, context: MaintenanceContext): MaintenanceInstruction | null => {
  for (const step of MAINTENANCE_STEPS) {
    const maintenance = step(state, context)
    if (maintenance !== null) {
      context.debug.pushInfo('selected maintenance', maintenance.output.task)
      return maintenance
    }
  }
  return null
}
