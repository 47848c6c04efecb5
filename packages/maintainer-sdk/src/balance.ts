import Decimal from 'decimal.js'
import { NoActiveValidatorsError } from './errors'
import { Lamports, Rational } from './token'
import { AccountList, Validator } from './types'
import { computeEffectiveStakeBalance } from './validator'

export type ValidatorIndexAmount = {
  index: number
  amount: Lamports
}

/**
 * Decides how much stake each validator of the pool should hold.
 * Targets are returned in the order of `validators.entries`.
 */
export interface Allocator {
  getTargetBalance (undelegated: Lamports, validators: AccountList<Validator>): Lamports[]
  getMinimumStakeValidatorIndexAmount (validators: AccountList<Validator>, targets: readonly Lamports[]): ValidatorIndexAmount
  getUnstakeValidatorIndex (
    validators: AccountList<Validator>,
    targets: readonly Lamports[],
    threshold: Rational,
  ): ValidatorIndexAmount | null
}

// Every active validator gets the same share, the lamports that do not divide
// evenly go one each to the first active validators. Inactive validators get nothing.
export const uniformAllocator: Allocator = {
  getTargetBalance (undelegated, validators) {
    const activeCount = validators.entries.filter(({ active }) => active).length
    if (activeCount === 0) {
      throw new NoActiveValidatorsError()
    }
    const total = Lamports.sum(validators.entries.map(computeEffectiveStakeBalance)).add(undelegated)
    const share = total.divFloor(activeCount)
    const remainder = total.rem(activeCount).amount.toNumber()

    let activeIndex = 0
    return validators.entries.map(({ active }) => {
      if (!active) {
        return Lamports.ZERO
      }
      const target = activeIndex < remainder ? share.add(new Lamports(1)) : share
      activeIndex++
      return target
    })
  },

  getMinimumStakeValidatorIndexAmount (validators, targets) {
    let best: { index: number, belowTarget: Decimal } | null = null
    for (const [index, validator] of validators.entries.entries()) {
      if (!validator.active) {
        continue
      }
      const belowTarget = targets[index].amount.sub(computeEffectiveStakeBalance(validator).amount)
      if (best === null || belowTarget.gt(best.belowTarget)) {
        best = { index, belowTarget }
      }
    }
    if (best === null) {
      throw new NoActiveValidatorsError()
    }
    const { index, belowTarget } = best
    return { index, amount: new Lamports(Decimal.max(belowTarget, 0)) }
  },

  getUnstakeValidatorIndex (validators, targets, threshold) {
    let best: ValidatorIndexAmount | null = null
    for (const [index, validator] of validators.entries.entries()) {
      const target = targets[index]
      const balance = computeEffectiveStakeBalance(validator)
      if (!validator.active || balance.lte(target)) {
        continue
      }
      const excess = balance.sub(target)
      if (excess.lte(target.mulRational(threshold))) {
        continue
      }
      if (best === null || excess.gt(best.amount)) {
        best = { index, amount: excess }
      }
    }
    return best
  },
}
