import { SolidoState } from './types'

// Slots between the start of one duty slice and the start of the next.
export const MAINTAINER_DUTY_SLICE_LENGTH = 100
// Slots at the end of every slice in which nobody is on duty.
export const MAINTAINER_DUTY_PAUSE_LENGTH = 10

export type DutyState = Pick<SolidoState, 'maintainers' | 'clock'>

/**
 * Time is divided in slices of `MAINTAINER_DUTY_SLICE_LENGTH` slots, and the
 * maintainers take turns in list order. Nobody is on duty in the last
 * `MAINTAINER_DUTY_PAUSE_LENGTH` slots of a slice, so that a transaction sent
 * at the end of one slice lands before the next maintainer starts.
 *
 * All maintainers agree on the result because it only depends on the snapshot.
 */
export const getCurrentMaintainerDuty = ({ maintainers, clock }: DutyState): string | null => {
  if (maintainers.length === 0) {
    return null
  }
  const dutySlice = Math.floor(clock.slot / MAINTAINER_DUTY_SLICE_LENGTH)
  const slotInDutySlice = clock.slot % MAINTAINER_DUTY_SLICE_LENGTH
  if (slotInDutySlice >= MAINTAINER_DUTY_SLICE_LENGTH - MAINTAINER_DUTY_PAUSE_LENGTH) {
    return null
  }
  return maintainers.entries[dutySlice % maintainers.length].pubkey
}

/**
 * Start slot of the next duty slice of `maintainer`, strictly after the current slot.
 * When the maintainer is on duty right now this is the start of its following slice.
 */
export const getNextMaintainerDutySlot = ({ maintainers, clock }: DutyState, maintainer: string): number | null => {
  if (maintainers.length === 0) {
    return null
  }
  const maintainerIndex = maintainers.position(maintainer)
  if (maintainerIndex === null) {
    return null
  }
  // In every cycle each maintainer has exactly one slice.
  const cycleLength = maintainers.length * MAINTAINER_DUTY_SLICE_LENGTH
  const cycleStart = Math.floor(clock.slot / cycleLength) * cycleLength
  const sliceStart = cycleStart + maintainerIndex * MAINTAINER_DUTY_SLICE_LENGTH
  return sliceStart <= clock.slot ? sliceStart + cycleLength : sliceStart
}
