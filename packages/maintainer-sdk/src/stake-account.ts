import { Lamports } from './token'
import { StakeAccount, StakeBalance } from './types'

export const ZERO_STAKE_BALANCE: StakeBalance = {
  inactive: Lamports.ZERO,
  activating: Lamports.ZERO,
  active: Lamports.ZERO,
  deactivating: Lamports.ZERO,
}

export const stakeBalanceTotal = ({ inactive, activating, active, deactivating }: StakeBalance): Lamports =>
  inactive.add(activating).add(active).add(deactivating)

export const sumStakeBalances = (balances: Iterable<StakeBalance>): StakeBalance => {
  let sum = ZERO_STAKE_BALANCE
  for (const balance of balances) {
    sum = {
      inactive: sum.inactive.add(balance.inactive),
      activating: sum.activating.add(balance.activating),
      active: sum.active.add(balance.active),
      deactivating: sum.deactivating.add(balance.deactivating),
    }
  }
  return sum
}

export const isActiveStakeAccount = ({ balance }: StakeAccount): boolean =>
  !balance.active.isZero() && balance.activating.isZero() && balance.deactivating.isZero()

export const isInactiveStakeAccount = ({ balance }: StakeAccount): boolean =>
  balance.active.isZero() && balance.activating.isZero() && balance.deactivating.isZero()

export const isActivatingStakeAccount = ({ balance }: StakeAccount): boolean =>
  !balance.activating.isZero() && balance.deactivating.isZero()

// Fully inactive accounts hold only lamports that can be withdrawn right away.
export const isFullyInactive = ({ balance }: StakeAccount): boolean =>
  balance.inactive.eq(stakeBalanceTotal(balance))

/**
 * Whether the stake program would accept merging `source` into `target`.
 */
export const canMerge = (target: StakeAccount, source: StakeAccount): boolean => {
  const bothInactive = isInactiveStakeAccount(target) && isInactiveStakeAccount(source)
  const bothActive = isActiveStakeAccount(target) && isActiveStakeAccount(source)
  const bothActivatingSameEpoch = isActivatingStakeAccount(target) &&
    isActivatingStakeAccount(source) &&
    target.activationEpoch === source.activationEpoch
  return bothInactive || bothActive || bothActivatingSameEpoch
}
