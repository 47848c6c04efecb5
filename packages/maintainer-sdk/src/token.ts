import Decimal from 'decimal.js'
import { InvariantViolationError } from './errors'

// Enough significant digits to multiply two u64 values without rounding.
// Rounding towards zero is floor for unsigned values, and `x - x` stays +0 under it.
export const U64 = Decimal.clone({ precision: 64, rounding: Decimal.ROUND_DOWN, toExpPos: 64, toExpNeg: -64 })
export const U64_MAX = new U64('18446744073709551615')

const LAMPORTS_PER_SOL = 1_000_000_000

export const toU64 = (value: Decimal.Value, what = 'Value'): Decimal => {
  const decimal = new U64(value)
  if (decimal.isZero()) {
    // Normalizes -0
    return new U64(0)
  }
  if (!decimal.isInteger() || decimal.isNegative() || decimal.gt(U64_MAX)) {
    throw new InvariantViolationError(`${what} is not an unsigned 64-bit integer: ${decimal.toFixed()}`)
  }
  return decimal
}

/**
 * Unsigned amount of some token, in its smallest unit.
 *
 * Arithmetic is checked: a result outside of `[0, 2^64 - 1]` throws an
 * `InvariantViolationError` instead of wrapping or clamping.
 * Use `saturatingSub` where clamping at zero is what the caller wants.
 */
export abstract class TokenAmount<T extends TokenAmount<T>> {
  readonly amount: Decimal
  abstract readonly symbol: string

  protected constructor (value: Decimal.Value) {
    this.amount = toU64(value, 'Token amount')
  }

  protected abstract create (amount: Decimal): T

  add (other: T): T {
    const sum = this.amount.add(other.amount)
    if (sum.gt(U64_MAX)) {
      throw new InvariantViolationError(`Overflow when adding ${other.toString()} to ${this.toString()}`)
    }
    return this.create(sum)
  }

  sub (other: T): T {
    if (other.amount.gt(this.amount)) {
      throw new InvariantViolationError(`Underflow when subtracting ${other.toString()} from ${this.toString()}`)
    }
    return this.create(this.amount.sub(other.amount))
  }

  saturatingSub (other: T): T {
    return this.create(Decimal.max(this.amount.sub(other.amount), 0))
  }

  mul (factor: Decimal.Value): T {
    const product = this.amount.mul(toU64(factor, 'Multiplier'))
    if (product.gt(U64_MAX)) {
      throw new InvariantViolationError(`Overflow when multiplying ${this.toString()} by ${factor.toString()}`)
    }
    return this.create(product)
  }

  divFloor (divisor: Decimal.Value): T {
    return this.create(this.amount.divToInt(positive(divisor)))
  }

  rem (divisor: Decimal.Value): T {
    return this.create(this.amount.mod(positive(divisor)))
  }

  mulRational (ratio: Rational): T {
    return this.create(this.amount.mul(ratio.numerator).divToInt(ratio.denominator))
  }

  eq (other: T): boolean {
    return this.amount.eq(other.amount)
  }

  lt (other: T): boolean {
    return this.amount.lt(other.amount)
  }

  lte (other: T): boolean {
    return this.amount.lte(other.amount)
  }

  gt (other: T): boolean {
    return this.amount.gt(other.amount)
  }

  gte (other: T): boolean {
    return this.amount.gte(other.amount)
  }

  min (other: T): T {
    return this.create(Decimal.min(this.amount, other.amount))
  }

  max (other: T): T {
    return this.create(Decimal.max(this.amount, other.amount))
  }

  isZero (): boolean {
    return this.amount.isZero()
  }

  // Amount in whole tokens, lossy.
  toSol (): number {
    return this.amount.div(LAMPORTS_PER_SOL).toNumber()
  }

  toString (): string {
    const whole = this.amount.divToInt(LAMPORTS_PER_SOL).toFixed(0)
    const fraction = this.amount.mod(LAMPORTS_PER_SOL).toFixed(0).padStart(9, '0')
    return `${whole}.${fraction} ${this.symbol}`
  }

  toJSON (): string {
    return this.amount.toFixed(0)
  }
}

const positive = (divisor: Decimal.Value): Decimal => {
  const decimal = toU64(divisor, 'Divisor')
  if (decimal.isZero()) {
    throw new InvariantViolationError('Division by zero')
  }
  return decimal
}

export class Lamports extends TokenAmount<Lamports> {
  readonly symbol = 'SOL'

  static readonly ZERO = new Lamports(0)

  constructor (value: Decimal.Value) {
    super(value)
  }

  static fromSol (sol: Decimal.Value): Lamports {
    return new Lamports(new U64(sol).mul(LAMPORTS_PER_SOL))
  }

  static sum (amounts: Iterable<Lamports>): Lamports {
    let total = Lamports.ZERO
    for (const amount of amounts) {
      total = total.add(amount)
    }
    return total
  }

  protected create (amount: Decimal): Lamports {
    return new Lamports(amount)
  }
}

export class StLamports extends TokenAmount<StLamports> {
  readonly symbol = 'stSOL'

  static readonly ZERO = new StLamports(0)

  constructor (value: Decimal.Value) {
    super(value)
  }

  protected create (amount: Decimal): StLamports {
    return new StLamports(amount)
  }
}

export class Rational {
  readonly numerator: Decimal
  readonly denominator: Decimal

  constructor (numerator: Decimal.Value, denominator: Decimal.Value) {
    this.numerator = toU64(numerator, 'Numerator')
    this.denominator = toU64(denominator, 'Denominator')
    if (this.denominator.isZero()) {
      throw new InvariantViolationError('Rational with a zero denominator')
    }
  }

  // Compared by cross-multiplication, the products fit in the U64 precision.
  compare (other: Rational): number {
    return this.numerator.mul(other.denominator).cmp(other.numerator.mul(this.denominator))
  }

  gt (other: Rational): boolean {
    return this.compare(other) > 0
  }

  gte (other: Rational): boolean {
    return this.compare(other) >= 0
  }

  lt (other: Rational): boolean {
    return this.compare(other) < 0
  }

  toNumber (): number {
    return this.numerator.div(this.denominator).toNumber()
  }

  toString (): string {
    return `${this.numerator.toFixed(0)}/${this.denominator.toFixed(0)}`
  }
}

/** `numerator / denominator` scaled so that 1 maps to `2^64 - 1`. */
export const per64 = (numerator: Decimal.Value, denominator: Decimal.Value): Decimal =>
  toU64(numerator, 'Numerator').mul(U64_MAX).divToInt(positive(denominator))

export const toF64 = (value: Decimal.Value): number => new U64(value).div(U64_MAX).toNumber()
