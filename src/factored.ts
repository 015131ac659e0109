/**
 * @module factored
 * Arbitrary-precision integers kept as products of prime-power-like factors.
 *
 *     FactoredInteger = PowerFactor × PowerFactor × …
 *     PowerFactor     = base ^ FactoredInteger
 *
 * Exponents are themselves FactoredIntegers, so towers nest freely. Identity
 * is the materialized value: two factorizations of the same integer are equal.
 */

import { InvalidArgumentError } from './errors';
import type { Maybe } from './existence-set';
import { hashBigInt } from './hash';

/**
 * Largest exponent handed to `**` in one step.
 * V8 caps a BigInt at 2^30 bits, so for any base of 2 or more a power this
 * large cannot be held; such calls fail with InvalidArgumentError.
 */
export const DEFAULT_POW_CEILING = 0x7fffffffn;

export interface PowOptions {
    readonly ceiling?: bigint;
}

/**
 * `base ^ exponent` for any non-negative exponent.
 *
 * An exponent above the ceiling is split as `q * ceiling + r`; the ceiling
 * power is computed once, raised to `q` by square-and-multiply, and the `r`
 * power multiplied in. `**` never sees an exponent above the ceiling.
 *
 * @throws InvalidArgumentError for a negative base, exponent or a ceiling below 1,
 * and for a result too large for a BigInt.
 */
export function fullRangePow(base: bigint, exponent: bigint, options: PowOptions = {}): bigint {
    const ceiling = options.ceiling ?? DEFAULT_POW_CEILING;
    if (base < 0n) throw new InvalidArgumentError(`fullRangePow: base must be non-negative, got ${base}`);
    if (exponent < 0n) throw new InvalidArgumentError(`fullRangePow: exponent must be non-negative, got ${exponent}`);
    if (ceiling < 1n) throw new InvalidArgumentError(`fullRangePow: ceiling must be positive, got ${ceiling}`);

    if (exponent === 0n) return 1n;
    if (base === 0n || base === 1n) return base;

    try {
        return chunkedPow(base, exponent, ceiling);
    } catch (e) {
        if (e instanceof RangeError) {
            throw new InvalidArgumentError(`fullRangePow: ${base} ^ ${exponent} exceeds the maximum BigInt size`);
        }
        throw e;
    }
}

function chunkedPow(base: bigint, exponent: bigint, ceiling: bigint): bigint {
    if (exponent <= ceiling) return base ** exponent;

    const quotient = exponent / ceiling;
    const remainder = exponent % ceiling;

    let chunk = base ** ceiling;
    let acc = 1n;
    for (let q = quotient; q > 0n; q >>= 1n) {
        if (q & 1n) acc *= chunk;
        if (q > 1n) chunk *= chunk;
    }
    return acc * base ** remainder;
}

function toBigInt(what: string, value: bigint | number): bigint {
    if (typeof value === 'bigint') return value;
    if (!Number.isInteger(value)) {
        throw new InvalidArgumentError(`${what} must be an integer, got ${value}`);
    }
    return BigInt(value);
}

// ============================================================================
// 1. POWER FACTOR (P)
// ============================================================================

export class PowerFactor {
    readonly base: bigint;
    readonly exponent: FactoredInteger;
    #value: bigint | null = null;

    /**
     * @param base - non-negative
     * @param exponent - defaults to one (no factors)
     * @throws InvalidArgumentError for a negative base or exponent.
     */
    constructor(base: bigint | number = 1n, exponent: FactoredInteger | bigint | number = FactoredInteger.ONE) {
        const b = toBigInt('PowerFactor: base', base);
        if (b < 0n) throw new InvalidArgumentError(`PowerFactor: base must be non-negative, got ${b}`);
        this.base = b;
        if (exponent instanceof FactoredInteger) {
            this.exponent = exponent;
        } else {
            const e = toBigInt('PowerFactor: exponent', exponent);
            if (e < 0n) throw new InvalidArgumentError(`PowerFactor: exponent must be non-negative, got ${e}`);
            this.exponent = FactoredInteger.of(e);
        }
    }

    /** Materializes with an explicit ceiling. Does not touch the cache. */
    materialize(options: PowOptions = {}): bigint {
        return fullRangePow(this.base, this.exponent.materialize(options), options);
    }

    get value(): bigint {
        if (this.#value === null) this.#value = this.materialize();
        return this.#value;
    }

    get hashCode(): number { return hashBigInt(this.value); }

    /** Value equality against another PowerFactor or a FactoredInteger. */
    equals(other: unknown): boolean {
        return (other instanceof PowerFactor || other instanceof FactoredInteger) && this.value === other.value;
    }

    /** `P × P` is a two-factor FactoredInteger. */
    times(other: PowerFactor): FactoredInteger {
        return new FactoredInteger(this, other);
    }

    toString(): string {
        return `[${this.base} ^ (${this.exponent})]`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 2. FACTORED INTEGER (N)
// ============================================================================

export class FactoredInteger {
    /** The empty product. */
    static readonly ONE: FactoredInteger = new FactoredInteger();

    readonly factors: readonly PowerFactor[];
    #value: bigint | null = null;

    /**
     * @throws InvalidArgumentError if any factor is absent.
     */
    constructor(...factors: Maybe<PowerFactor>[]) {
        const checked: PowerFactor[] = [];
        for (let i = 0; i < factors.length; i++) {
            const f = factors[i];
            if (f === null || f === undefined) {
                throw new InvalidArgumentError(`FactoredInteger: factor at position ${i} is absent`);
            }
            checked.push(f);
        }
        this.factors = Object.freeze(checked);
    }

    /** `n` as the single factor `n ^ 1`. */
    static of(n: bigint | number): FactoredInteger {
        return new FactoredInteger(new PowerFactor(n));
    }

    /** A new FactoredInteger with `factor` appended. */
    times(factor: PowerFactor): FactoredInteger {
        return new FactoredInteger(...this.factors, factor);
    }

    materialize(options: PowOptions = {}): bigint {
        let r = 1n;
        for (const p of this.factors) r *= p.materialize(options);
        return r;
    }

    get value(): bigint {
        if (this.#value === null) {
            let r = 1n;
            for (const p of this.factors) r *= p.value;
            this.#value = r;
        }
        return this.#value;
    }

    get hashCode(): number { return hashBigInt(this.value); }

    equals(other: unknown): boolean {
        return (other instanceof FactoredInteger || other instanceof PowerFactor) && this.value === other.value;
    }

    toString(): string {
        return this.factors.length === 0 ? '1' : this.factors.map(p => p.toString()).join(' * ');
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/** `power(2, 3)` is 2³; a bare `power(p)` is p¹. */
export function power(base: bigint | number, exponent?: FactoredInteger | bigint | number): PowerFactor {
    return new PowerFactor(base, exponent);
}

export function factored(...factors: Maybe<PowerFactor>[]): FactoredInteger {
    return new FactoredInteger(...factors);
}
