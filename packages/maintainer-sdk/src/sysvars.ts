import Decimal from 'decimal.js'
import { invariant } from './errors'
import { Lamports } from './token'

export type Clock = {
  slot: number
  epoch: number
  unixTimestamp: number
}

export const MINIMUM_SLOTS_PER_EPOCH = 32
const MINIMUM_SLOTS_PER_EPOCH_LOG2 = 5

export type EpochSchedule = {
  slotsPerEpoch: number
  leaderScheduleSlotOffset: number
  // Whether epochs start short and double in length until they reach `slotsPerEpoch`
  warmup: boolean
  firstNormalEpoch: number
  firstNormalSlot: number
}

const nextPowerOfTwo = (n: number): number => {
  let power = 1
  while (power < n) {
    power *= 2
  }
  return power
}

const log2 = (powerOfTwo: number): number => Math.round(Math.log2(powerOfTwo))

export const customEpochSchedule = (slotsPerEpoch: number, leaderScheduleSlotOffset: number, warmup: boolean): EpochSchedule => {
  invariant(slotsPerEpoch >= MINIMUM_SLOTS_PER_EPOCH, `Epochs need at least ${MINIMUM_SLOTS_PER_EPOCH} slots, got ${slotsPerEpoch}`)
  if (!warmup) {
    return { slotsPerEpoch, leaderScheduleSlotOffset, warmup, firstNormalEpoch: 0, firstNormalSlot: 0 }
  }
  const slotsPerEpochPow2 = nextPowerOfTwo(slotsPerEpoch)
  return {
    slotsPerEpoch,
    leaderScheduleSlotOffset,
    warmup,
    firstNormalEpoch: log2(slotsPerEpochPow2) - MINIMUM_SLOTS_PER_EPOCH_LOG2,
    firstNormalSlot: slotsPerEpochPow2 - MINIMUM_SLOTS_PER_EPOCH,
  }
}

export const DEFAULT_SLOTS_PER_EPOCH = 432_000
export const defaultEpochSchedule = (): EpochSchedule =>
  customEpochSchedule(DEFAULT_SLOTS_PER_EPOCH, DEFAULT_SLOTS_PER_EPOCH, true)

export const getSlotsInEpoch = (schedule: EpochSchedule, epoch: number): number =>
  epoch < schedule.firstNormalEpoch
    ? 2 ** (epoch + MINIMUM_SLOTS_PER_EPOCH_LOG2)
    : schedule.slotsPerEpoch

export const getFirstSlotInEpoch = (schedule: EpochSchedule, epoch: number): number =>
  epoch <= schedule.firstNormalEpoch
    ? (2 ** epoch - 1) * MINIMUM_SLOTS_PER_EPOCH
    : (epoch - schedule.firstNormalEpoch) * schedule.slotsPerEpoch + schedule.firstNormalSlot

export const getEpochAndSlotIndex = (schedule: EpochSchedule, slot: number): { epoch: number, slotIndex: number } => {
  if (slot < schedule.firstNormalSlot) {
    const epoch = log2(nextPowerOfTwo(slot + MINIMUM_SLOTS_PER_EPOCH + 1)) - MINIMUM_SLOTS_PER_EPOCH_LOG2 - 1
    const epochLength = 2 ** (epoch + MINIMUM_SLOTS_PER_EPOCH_LOG2)
    return { epoch, slotIndex: slot - (epochLength - MINIMUM_SLOTS_PER_EPOCH) }
  }
  const normalSlotIndex = slot - schedule.firstNormalSlot
  return {
    epoch: schedule.firstNormalEpoch + Math.floor(normalSlotIndex / schedule.slotsPerEpoch),
    slotIndex: normalSlotIndex % schedule.slotsPerEpoch,
  }
}

export type Rent = {
  lamportsPerByteYear: number
  exemptionThreshold: number
  burnPercent: number
}

// Every account is charged as if it had this many bytes of metadata on top of its data.
const ACCOUNT_STORAGE_OVERHEAD = 128

export const DEFAULT_RENT: Rent = {
  lamportsPerByteYear: 3480,
  exemptionThreshold: 2.0,
  burnPercent: 50,
}

export const minimumBalance = (rent: Rent, dataLen: number): Lamports =>
  new Lamports(
    new Decimal(ACCOUNT_STORAGE_OVERHEAD + dataLen)
      .mul(rent.lamportsPerByteYear)
      .mul(rent.exemptionThreshold)
      .floor(),
  )

export type StakeHistoryEntry = {
  epoch: number
  effective: Lamports
  activating: Lamports
  deactivating: Lamports
}

export type StakeHistory = readonly StakeHistoryEntry[]

// The history is only written at epoch boundaries, so the current epoch is never in it.
export const getStakeHistoryEntry = (history: StakeHistory, epoch: number): StakeHistoryEntry | null =>
  history.find(entry => entry.epoch === epoch) ?? null
