import { AccountList, Lamports, NoActiveValidatorsError, Rational, uniformAllocator, Validator } from '../src'

const validator = (pubkey: string, stake: number, active = true): Validator => ({
  pubkey,
  stakeSeeds: { begin: 0, end: stake > 0 ? 1 : 0 },
  unstakeSeeds: { begin: 0, end: 0 },
  stakeAccountsBalance: new Lamports(stake),
  unstakeAccountsBalance: Lamports.ZERO,
  active,
})

const validators = (...entries: Validator[]) => new AccountList(entries.length, entries)

const amounts = (targets: Lamports[]) => targets.map(target => target.toJSON())

describe('uniform allocator', () => {
  describe('target balances', () => {
    it('spreads the remainder over the first active validators', () => {
      const targets = uniformAllocator.getTargetBalance(new Lamports(10), validators(
        validator('a', 0),
        validator('b', 0),
        validator('c', 0),
      ))
      expect(amounts(targets)).toEqual(['4', '3', '3'])
    })

    it('targets nothing for inactive validators', () => {
      const targets = uniformAllocator.getTargetBalance(new Lamports(11), validators(
        validator('a', 0),
        validator('b', 0, false),
        validator('c', 0),
      ))
      expect(amounts(targets)).toEqual(['6', '0', '5'])
    })

    it('redistributes stake already delegated', () => {
      const targets = uniformAllocator.getTargetBalance(new Lamports(20), validators(
        validator('a', 100),
        validator('b', 0),
        validator('c', 30, false),
      ))
      expect(amounts(targets)).toEqual(['75', '75', '0'])
    })

    it('sums up to the total stake when all validators are active', () => {
      const pool = validators(validator('a', 7), validator('b', 11), validator('c', 0), validator('d', 5))
      const targets = uniformAllocator.getTargetBalance(new Lamports(1_000_003), pool)
      expect(Lamports.sum(targets).toJSON()).toEqual('1000026')
    })

    it('fails without active validators', () => {
      expect(() => uniformAllocator.getTargetBalance(new Lamports(10), validators(validator('a', 0, false))))
        .toThrow(NoActiveValidatorsError)
    })
  })

  describe('validator to stake', () => {
    it('picks the active validator furthest below its target', () => {
      const pool = validators(validator('a', 50), validator('b', 10), validator('c', 0, false))
      const targets = [new Lamports(40), new Lamports(40), Lamports.ZERO]
      const { index, amount } = uniformAllocator.getMinimumStakeValidatorIndexAmount(pool, targets)
      expect(index).toEqual(1)
      expect(amount.toJSON()).toEqual('30')
    })

    it('picks the first validator on ties', () => {
      const pool = validators(validator('a', 0), validator('b', 0))
      const targets = [new Lamports(20), new Lamports(20)]
      expect(uniformAllocator.getMinimumStakeValidatorIndexAmount(pool, targets).index).toEqual(0)
    })

    it('returns a zero amount when every validator is at its target', () => {
      const pool = validators(validator('a', 20), validator('b', 25))
      const targets = [new Lamports(20), new Lamports(20)]
      const { index, amount } = uniformAllocator.getMinimumStakeValidatorIndexAmount(pool, targets)
      expect(index).toEqual(0)
      expect(amount.isZero()).toBe(true)
    })
  })

  describe('validator to unstake', () => {
    const threshold = new Rational(1, 10)

    it('picks the validator most above its target beyond the threshold', () => {
      const pool = validators(validator('a', 115), validator('b', 130), validator('c', 55))
      const targets = [new Lamports(100), new Lamports(100), new Lamports(100)]
      const unstake = uniformAllocator.getUnstakeValidatorIndex(pool, targets, threshold)
      expect(unstake?.index).toEqual(1)
      expect(unstake?.amount.toJSON()).toEqual('30')
    })

    it('tolerates an excess up to the threshold', () => {
      const pool = validators(validator('a', 110), validator('b', 90))
      const targets = [new Lamports(100), new Lamports(100)]
      expect(uniformAllocator.getUnstakeValidatorIndex(pool, targets, threshold)).toBeNull()
    })

    it('leaves inactive validators to their own unstake step', () => {
      const pool = validators(validator('a', 100), validator('b', 50, false))
      const targets = [new Lamports(100), Lamports.ZERO]
      expect(uniformAllocator.getUnstakeValidatorIndex(pool, targets, threshold)).toBeNull()
    })
  })
})
