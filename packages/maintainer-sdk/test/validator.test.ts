import {
  canMerge,
  checkCanBeRemoved,
  computeEffectiveStakeBalance,
  doesPerformWell,
  InvariantViolationError,
  isFullyInactive,
  Lamports,
  per64,
  RemovalBlocker,
  StakeAccount,
  StakeBalance,
  U64,
  Validator,
  ValidatorPerf,
  ZERO_STAKE_BALANCE,
} from '../src'

const validator = (overrides: Partial<Validator> = {}): Validator => ({
  pubkey: 'vote',
  stakeSeeds: { begin: 0, end: 0 },
  unstakeSeeds: { begin: 0, end: 0 },
  stakeAccountsBalance: Lamports.ZERO,
  unstakeAccountsBalance: Lamports.ZERO,
  active: false,
  ...overrides,
})

const stakeAccount = (balance: Partial<StakeBalance>, activationEpoch = 0): StakeAccount => ({
  balance: { ...ZERO_STAKE_BALANCE, ...balance },
  seed: 0,
  activationEpoch,
  voter: 'vote',
})

describe('validator', () => {
  it('subtracts unstake accounts from the effective stake balance', () => {
    const effective = computeEffectiveStakeBalance(validator({
      stakeAccountsBalance: new Lamports(100),
      unstakeAccountsBalance: new Lamports(30),
    }))
    expect(effective.toJSON()).toEqual('70')
  })

  describe('removal', () => {
    it('is blocked while active', () => {
      expect(checkCanBeRemoved(validator({ active: true }))).toEqual(RemovalBlocker.STILL_ACTIVE)
    })

    it('is blocked by stake and unstake accounts', () => {
      expect(checkCanBeRemoved(validator({ stakeSeeds: { begin: 2, end: 3 } }))).toEqual(RemovalBlocker.HAS_STAKE_ACCOUNTS)
      expect(checkCanBeRemoved(validator({ unstakeSeeds: { begin: 0, end: 1 } }))).toEqual(RemovalBlocker.HAS_UNSTAKE_ACCOUNTS)
    })

    it('is allowed for an empty inactive validator', () => {
      expect(checkCanBeRemoved(validator({ stakeSeeds: { begin: 4, end: 4 } }))).toBeNull()
    })

    it('fails for a balance without stake accounts', () => {
      expect(() => checkCanBeRemoved(validator({ stakeAccountsBalance: new Lamports(1) }))).toThrow(InvariantViolationError)
    })
  })

  describe('performance criteria', () => {
    const criteria = {
      maxCommission: 10,
      minBlockProductionRate: per64(9, 10),
      minVoteSuccessRate: per64(9, 10),
    }
    const perf = (blockProductionRate: number, voteSuccessRate: number): ValidatorPerf => ({
      pubkey: 'vote',
      commission: 5,
      commissionUpdatedAt: 0,
      rest: {
        updatedAt: 0,
        blockProductionRate: per64(blockProductionRate, 100),
        voteSuccessRate: per64(voteSuccessRate, 100),
      },
    })

    it('accepts validators meeting every criterion', () => {
      expect(doesPerformWell(criteria, 10, perf(95, 99))).toBe(true)
    })

    it('rejects a commission above the maximum', () => {
      expect(doesPerformWell(criteria, 11, perf(95, 99))).toBe(false)
    })

    it('rejects low rates', () => {
      expect(doesPerformWell(criteria, 5, perf(80, 99))).toBe(false)
      expect(doesPerformWell(criteria, 5, perf(95, 80))).toBe(false)
    })

    it('treats unmeasured rates as perfect', () => {
      expect(doesPerformWell(criteria, 5, null)).toBe(true)
      expect(doesPerformWell({ ...criteria, minVoteSuccessRate: new U64(0) }, 5, { ...perf(0, 0), rest: null })).toBe(true)
    })
  })
})

describe('stake account', () => {
  it('merges accounts in the same state', () => {
    expect(canMerge(stakeAccount({ active: new Lamports(5) }), stakeAccount({ active: new Lamports(7) }))).toBe(true)
    expect(canMerge(stakeAccount({ inactive: new Lamports(5) }), stakeAccount({ inactive: new Lamports(7) }))).toBe(true)
  })

  it('merges activating accounts only within the same epoch', () => {
    expect(canMerge(stakeAccount({ activating: new Lamports(5) }, 3), stakeAccount({ activating: new Lamports(7) }, 3))).toBe(true)
    expect(canMerge(stakeAccount({ activating: new Lamports(5) }, 3), stakeAccount({ activating: new Lamports(7) }, 4))).toBe(false)
  })

  it('does not merge accounts in different states', () => {
    expect(canMerge(stakeAccount({ active: new Lamports(5) }), stakeAccount({ activating: new Lamports(7) }))).toBe(false)
    expect(canMerge(stakeAccount({ active: new Lamports(5) }), stakeAccount({ deactivating: new Lamports(7) }))).toBe(false)
  })

  it('is fully inactive only when every lamport is inactive', () => {
    expect(isFullyInactive(stakeAccount({ inactive: new Lamports(5) }))).toBe(true)
    expect(isFullyInactive(stakeAccount({ inactive: new Lamports(5), deactivating: new Lamports(1) }))).toBe(false)
  })
})
