import { getEffectiveReserve } from './maintenance'
import { stakeBalanceTotal, sumStakeBalances } from './stake-account'
import { getFirstSlotInEpoch, getStakeHistoryEntry } from './sysvars'
import { SolidoState } from './types'

export type StatusBalancesSol = {
  inactive: number
  activating: number
  active: number
  deactivating: number
}

export type ValidatorMetrics = {
  voteAccount: string
  name: string
  keybaseUsername: string | null
  // Stake and unstake accounts together
  balanceSol: StatusBalancesSol
  totalBalanceSol: number
  lastVotedSlot: number | null
  lastVotedTimestamp: number | null
  voteCredits: number | null
  // Above the rent-exempt minimum, the identity pays for the votes
  identityAccountBalanceSol: number | null
}

export type PoolMetrics = {
  producedAt: Date
  slot: number
  epoch: number
  epochStartSlot: number
  slotsPerEpoch: number
  // Stake of the whole network in the *previous* epoch, the current one is not in the stake history yet
  networkStakeSol: Omit<StatusBalancesSol, 'inactive'> | null
  maintainerBalancesSol: { maintainerAddress: string, balanceSol: number }[]
  reserveBalanceSol: number
  validators: ValidatorMetrics[]
  stSolSupply: number
  exchangeRate: {
    stSolSupply: number
    solBalance: number
    computedInEpoch: number
  }
}

const isEmojiLike = (codePoint: number): boolean =>
  // Supplementary planes, mostly emoji and dingbats
  codePoint >= 0x10000 ||
  // Variation selectors that turn regular code points into emoji
  (codePoint >= 0xfe00 && codePoint <= 0xfe0f) ||
  // Miscellaneous Symbols, nowadays rendered as emoji
  (codePoint >= 0x2600 && codePoint <= 0x26ff)

/** Validator name for dashboards: the pool prefix and emoji stripped. */
export const sanitizeValidatorName = (name: string, prefix: string): string => {
  if (!name.startsWith(prefix)) {
    return `INVALID: ${name}`
  }
  return Array.from(name.slice(prefix.length))
    .filter(char => !isEmojiLike(char.codePointAt(0) ?? 0))
    .join('')
    .trim()
}

export const collectPoolMetrics = (state: SolidoState, validatorNamePrefix: string): PoolMetrics => {
  const { clock, epochSchedule, solido } = state
  const history = clock.epoch > 0 ? getStakeHistoryEntry(state.stakeHistory, clock.epoch - 1) : null

  const validators = state.validators.entries.map((validator, index): ValidatorMetrics => {
    const balance = sumStakeBalances(
      [...state.validatorStakeAccounts[index], ...state.validatorUnstakeAccounts[index]].map(({ account }) => account.balance),
    )
    const voteState = state.validatorVoteAccounts[index]
    const info = state.validatorInfos[index]
    return {
      voteAccount: validator.pubkey,
      name: info ? sanitizeValidatorName(info.name, validatorNamePrefix) : `INVALID: ${validator.pubkey}`,
      keybaseUsername: info?.keybaseUsername ?? null,
      balanceSol: {
        inactive: balance.inactive.toSol(),
        activating: balance.activating.toSol(),
        active: balance.active.toSol(),
        deactivating: balance.deactivating.toSol(),
      },
      totalBalanceSol: stakeBalanceTotal(balance).toSol(),
      lastVotedSlot: voteState?.lastTimestamp.slot ?? null,
      lastVotedTimestamp: voteState?.lastTimestamp.timestamp ?? null,
      voteCredits: voteState?.credits ?? null,
      identityAccountBalanceSol: state.validatorIdentityAccountBalances[index]?.toSol() ?? null,
    }
  })

  return {
    producedAt: state.producedAt,
    slot: clock.slot,
    epoch: clock.epoch,
    epochStartSlot: getFirstSlotInEpoch(epochSchedule, clock.epoch),
    slotsPerEpoch: epochSchedule.slotsPerEpoch,
    networkStakeSol: history
      ? {
        activating: history.activating.toSol(),
        active: history.effective.toSol(),
        deactivating: history.deactivating.toSol(),
      }
      : null,
    maintainerBalancesSol: state.maintainers.entries.map(({ pubkey }, index) => ({
      maintainerAddress: pubkey,
      balanceSol: state.maintainerBalances[index].toSol(),
    })),
    reserveBalanceSol: getEffectiveReserve(state).toSol(),
    validators,
    stSolSupply: state.stSolSupply.toSol(),
    exchangeRate: {
      stSolSupply: solido.exchangeRate.stSolSupply.toSol(),
      solBalance: solido.exchangeRate.solBalance.toSol(),
      computedInEpoch: solido.exchangeRate.computedInEpoch,
    },
  }
}
