import { StakeTime } from './config'
import { invariant } from './errors'
import { getFirstSlotInEpoch, getSlotsInEpoch } from './sysvars'
import { Rational } from './token'
import { SolidoState } from './types'

export type EpochTimingState = Pick<SolidoState, 'clock' | 'epochSchedule' | 'stakeTime' | 'endOfEpochThreshold'>

const endOfEpochRatio = ({ endOfEpochThreshold }: EpochTimingState): Rational =>
  new Rational(endOfEpochThreshold, 100)

export const slotsIntoCurrentEpoch = ({ clock, epochSchedule }: EpochTimingState): number => {
  const epochStart = getFirstSlotInEpoch(epochSchedule, clock.epoch)
  invariant(clock.slot >= epochStart, `Slot ${clock.slot} lies before the start of epoch ${clock.epoch} at slot ${epochStart}`)
  return clock.slot - epochStart
}

export const isAtEpochEnd = (state: EpochTimingState): boolean => {
  const progress = new Rational(slotsIntoCurrentEpoch(state), getSlotsInEpoch(state.epochSchedule, state.clock.epoch))
  return progress.gte(endOfEpochRatio(state))
}

/**
 * Whether stake and unstake instructions may be issued in the current slot.
 * Returning false means "not now", the caller retries in a later slot.
 */
export const confirmShouldStakeUnstakeInCurrentSlot = (state: EpochTimingState): boolean => {
  switch (state.stakeTime) {
    case StakeTime.ANYTIME:
      return true
    case StakeTime.ONLY_NEAR_EPOCH_END: {
      const { clock, epochSchedule } = state
      const epochStart = getFirstSlotInEpoch(epochSchedule, clock.epoch)
      const nextEpochStart = getFirstSlotInEpoch(epochSchedule, clock.epoch + 1)
      invariant(nextEpochStart > epochStart, `Epoch ${clock.epoch + 1} does not start after epoch ${clock.epoch}`)
      const progress = new Rational(slotsIntoCurrentEpoch(state), nextEpochStart - epochStart)
      return progress.gt(endOfEpochRatio(state))
    }
  }
}
