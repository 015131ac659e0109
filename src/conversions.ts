/**
 * @module conversions
 * Explicit, named maps between kinds. Every conversion keeps the member set.
 *
 * Total maps return the target directly. Maps that could lose information
 * return a `Result` whose `err` arm says why. Every map passes an absent
 * input through as `undefined` instead of inventing a default.
 */

import { Void, invert } from './entity';
import { ConversionError, err, ok, type Result } from './errors';
import type { FactoredInteger } from './factored';
import {
    Infinite, Integer, Natural, Real, Zero,
    type IntegralNumber, type RealNumber,
} from './linear';
import { Complex, NaturalComplex } from './structural';

export type Conversion<T> = Result<ConversionError, T>;

// ============================================================================
// 1. ZERO / INFINITE / VOID
// ============================================================================

/** Zero(p) → Infinite(¬p). */
export function zeroToInfinite(z: Zero): Infinite;
export function zeroToInfinite(z: Zero | undefined): Infinite | undefined;
export function zeroToInfinite(z: Zero | undefined): Infinite | undefined {
    return z && new Infinite(invert(z.polarity), z.members);
}

/** Infinite(p) → Zero(¬p). Composed with `zeroToInfinite` it is the identity. */
export function infiniteToZero(i: Infinite): Zero;
export function infiniteToZero(i: Infinite | undefined): Zero | undefined;
export function infiniteToZero(i: Infinite | undefined): Zero | undefined {
    return i && new Zero(invert(i.polarity), i.members);
}

/** Zero → Void over the same members. The polarity is not carried. */
export function zeroToVoid(z: Zero): Void;
export function zeroToVoid(z: Zero | undefined): Void | undefined;
export function zeroToVoid(z: Zero | undefined): Void | undefined {
    return z && new Void(z.members);
}

/** Void → positive Zero over the same members. */
export function voidToZero(v: Void): Zero;
export function voidToZero(v: Void | undefined): Zero | undefined;
export function voidToZero(v: Void | undefined): Zero | undefined {
    return v && new Zero('positive', v.members);
}

// ============================================================================
// 2. INTEGER / REAL / NATURAL
// ============================================================================

function exactReal(value: bigint): number | undefined {
    const n = Number(value);
    return Number.isFinite(n) && BigInt(n) === value ? n : undefined;
}

/** Fails when the integer has no exact double. */
export function integerToReal(i: IntegralNumber): Conversion<Real>;
export function integerToReal(i: IntegralNumber | undefined): Conversion<Real> | undefined;
export function integerToReal(i: IntegralNumber | undefined): Conversion<Real> | undefined {
    if (!i) return undefined;
    const n = exactReal(i.value);
    if (n === undefined) return err(new ConversionError(i.kind, 'Real', `${i.value} has no exact double`));
    return ok(new Real(n, i.members));
}

/** Fails instead of truncating a fractional value. */
export function realToInteger(r: RealNumber): Conversion<Integer>;
export function realToInteger(r: RealNumber | undefined): Conversion<Integer> | undefined;
export function realToInteger(r: RealNumber | undefined): Conversion<Integer> | undefined {
    if (!r) return undefined;
    if (!Number.isInteger(r.value)) {
        return err(new ConversionError(r.kind, 'Integer', `${r.value} is not integral`));
    }
    return ok(new Integer(BigInt(r.value), r.members));
}

export function naturalToInteger(n: Natural): Integer;
export function naturalToInteger(n: Natural | undefined): Integer | undefined;
export function naturalToInteger(n: Natural | undefined): Integer | undefined {
    return n && new Integer(n.value, n.members);
}

/** Fails for a negative integer. */
export function integerToNatural(i: Integer): Conversion<Natural>;
export function integerToNatural(i: Integer | undefined): Conversion<Natural> | undefined;
export function integerToNatural(i: Integer | undefined): Conversion<Natural> | undefined {
    if (!i) return undefined;
    if (i.value < 0n) return err(new ConversionError('Integer', 'Natural', `${i.value} is negative`));
    return ok(new Natural(i.value, i.members));
}

// ============================================================================
// 3. NATURAL COMPLEX / COMPLEX
// ============================================================================

/** Promotes both parts natural → real; fails when a part has no exact double. */
export function naturalComplexToComplex(nc: NaturalComplex): Conversion<Complex>;
export function naturalComplexToComplex(nc: NaturalComplex | undefined): Conversion<Complex> | undefined;
export function naturalComplexToComplex(nc: NaturalComplex | undefined): Conversion<Complex> | undefined {
    if (!nc) return undefined;
    const re = exactReal(nc.real.value);
    const im = exactReal(nc.imaginary.value);
    if (re === undefined || im === undefined) {
        return err(new ConversionError('NaturalComplex', 'Complex', `${nc.real.value}, ${nc.imaginary.value} have no exact doubles`));
    }
    return ok(new Complex(new Real(re), new Real(im), nc.members));
}

/** Fails unless both parts are non-negative integers. */
export function complexToNaturalComplex(c: Complex): Conversion<NaturalComplex>;
export function complexToNaturalComplex(c: Complex | undefined): Conversion<NaturalComplex> | undefined;
export function complexToNaturalComplex(c: Complex | undefined): Conversion<NaturalComplex> | undefined {
    if (!c) return undefined;
    const re = c.real.value;
    const im = c.imaginary.value;
    if (!Number.isInteger(re) || !Number.isInteger(im) || re < 0 || im < 0) {
        return err(new ConversionError('Complex', 'NaturalComplex', `(${re}, ${im}) is not a pair of naturals`));
    }
    return ok(new NaturalComplex(new Natural(BigInt(re)), new Natural(BigInt(im)), c.members));
}

// ============================================================================
// 4. FACTORED INTEGERS
// ============================================================================

export function factoredToInteger(n: FactoredInteger): Integer {
    return new Integer(n.value);
}

/** A product of non-negative powers is never negative. */
export function factoredToNatural(n: FactoredInteger): Natural {
    return new Natural(n.value);
}
