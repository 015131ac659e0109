/**
 * @module arithmetic
 * Named operations over the number kinds, dispatched on `kind`.
 *
 * Case order in every binary operation:
 * 1. Infinite absorbs (either side).
 * 2. Zero is the additive identity and absorbs multiplication.
 * 3. Paired kinds go through their (re, im) parts. A pair that overflows on
 *    either axis saturates to the Infinite signed like its real part.
 * 4. Finite kinds take the narrowest kind that holds the result:
 *    - Natural op Natural stays Natural while the result is non-negative;
 *    - any other integral pair gives an Integer;
 *    - a ratio result with an integral value gives an Integer, else a Rational;
 *    - anything involving a Real or an Irrational gives a Real.
 *    A result past the double range saturates to Infinite.
 */

import { Being, Existence, Nature, Void, invert } from './entity';
import { InvalidArgumentError } from './errors';
import {
    Infinite, Integer, Irrational, Natural, Rational, Real, Zero,
    type FiniteNumber, type LinearNumber,
} from './linear';
import { isFiniteNumber, isIntegral, isLinear, type AnyEntity, type NumberKind } from './kinds';
import { Complex, NaturalComplex, type StructuralNumber } from './structural';

type BinaryOp = 'add' | 'multiply';
type FiniteOp = BinaryOp | 'subtract';

// ============================================================================
// 1. NEGATION
// ============================================================================

function negateLinear(x: LinearNumber): LinearNumber {
    switch (x.kind) {
        case 'Zero':
            return new Zero(invert(x.polarity), x.members);
        case 'Infinite':
            return new Infinite(invert(x.polarity), x.members);
        case 'Integer':
        case 'Natural':
            return new Integer(-x.value, x.members);
        case 'Real':
            return new Real(-x.value, x.members);
        case 'Rational':
            return new Rational(new Real(-x.numerator.value), x.denominator, x.members);
        case 'Irrational':
            return new Irrational(-x.value, x.members);
    }
}

function negateStructural(x: StructuralNumber): NumberKind {
    if (x.kind === 'Complex') {
        return new Complex(new Real(-x.real.value), new Real(-x.imaginary.value), x.members);
    }
    const re = -x.real.scalar;
    const im = -x.imaginary.scalar;
    // natural parts past the double range
    if (!Number.isFinite(re) || !Number.isFinite(im)) return new Infinite('negative', x.members);
    return new Complex(new Real(re), new Real(im), x.members);
}

/**
 * Opposite of an entity.
 * - Existence and Nature are their own opposite.
 * - Being and Void swap, keeping the member set, so `-(-b)` equals `b`.
 * - Numbers take their additive inverse; Zero and Infinite flip polarity and a
 *   Natural becomes an Integer.
 */
export function negate(x: Existence): Existence;
export function negate(x: Nature): Nature;
export function negate(x: Being): Void;
export function negate(x: Void): Being;
export function negate(x: LinearNumber): LinearNumber;
export function negate(x: StructuralNumber): NumberKind;
export function negate(x: NumberKind): NumberKind;
export function negate(x: AnyEntity): AnyEntity;
export function negate(x: AnyEntity): AnyEntity {
    switch (x.kind) {
        case 'Existence':
        case 'Nature':
            return x;
        case 'Being':
            return new Void(x.members);
        case 'Void':
            return new Being(x.members);
        case 'Complex':
        case 'NaturalComplex':
            return negateStructural(x);
        default:
            return negateLinear(x);
    }
}

// ============================================================================
// 2. FINITE KINDS
// ============================================================================

/**
 * Guards a real-valued result: past the double range it becomes Infinite.
 */
function saturate(value: number): Real | Infinite {
    if (Number.isNaN(value)) throw new InvalidArgumentError('Real: result is not a number');
    if (Number.isFinite(value)) return new Real(value);
    return new Infinite(value > 0 ? 'positive' : 'negative');
}

function applyBig(a: bigint, b: bigint, op: FiniteOp): bigint {
    switch (op) {
        case 'add': return a + b;
        case 'subtract': return a - b;
        case 'multiply': return a * b;
    }
}

function applyNumber(a: number, b: number, op: FiniteOp): number {
    switch (op) {
        case 'add': return a + b;
        case 'subtract': return a - b;
        case 'multiply': return a * b;
    }
}

type RatioNumber = Integer | Natural | Rational;

function isRatio(x: FiniteNumber): x is RatioNumber {
    return x.kind !== 'Real' && x.kind !== 'Irrational';
}

function ratioOf(x: RatioNumber): [number, number] {
    if (x.kind === 'Rational') return [x.numerator.value, x.denominator.value];
    return [Number(x.value), 1];
}

function combineRatios(a: RatioNumber, b: RatioNumber, op: FiniteOp): Integer | Rational | undefined {
    const [n1, d1] = ratioOf(a);
    const [n2, d2] = ratioOf(b);
    const n = op === 'multiply' ? n1 * n2 : applyNumber(n1 * d2, n2 * d1, op);
    const d = d1 * d2;
    const q = n / d;
    if (!Number.isFinite(n) || !Number.isFinite(d) || d === 0 || !Number.isFinite(q)) return undefined;
    return Number.isInteger(q) ? new Integer(BigInt(q)) : new Rational(new Real(n), new Real(d));
}

function combineFinite(a: FiniteNumber, b: FiniteNumber, op: FiniteOp): LinearNumber {
    if (isIntegral(a) && isIntegral(b)) {
        const v = applyBig(a.value, b.value, op);
        return a.kind === 'Natural' && b.kind === 'Natural' && v >= 0n ? new Natural(v) : new Integer(v);
    }

    // an integral operand past the double range reads as ±Infinity below
    if (op === 'multiply' && (a.isZero || b.isZero)) {
        return isRatio(a) && isRatio(b) ? new Integer(0n) : new Real(0);
    }

    if (isRatio(a) && isRatio(b)) {
        const r = combineRatios(a, b, op);
        if (r !== undefined) return r;
    }

    return saturate(applyNumber(a.scalar, b.scalar, op));
}

function combineLinear(a: LinearNumber, b: LinearNumber, op: BinaryOp): LinearNumber {
    if (a.kind === 'Infinite') return a;
    if (b.kind === 'Infinite') return b;
    if (a.kind === 'Zero') return op === 'add' ? b : a;
    if (b.kind === 'Zero') return op === 'add' ? a : b;
    return combineFinite(a, b, op);
}

// ============================================================================
// 3. PAIRED KINDS
// ============================================================================

function partsOf(x: FiniteNumber | StructuralNumber): [number, number] {
    switch (x.kind) {
        case 'Complex':
            return [x.real.value, x.imaginary.value];
        case 'NaturalComplex':
            return [x.real.scalar, x.imaginary.scalar];
        default:
            return [x.scalar, 0];
    }
}

/**
 * A complex result on the real axis collapses to a Real; one that leaves the
 * double range on either axis becomes the Infinite signed like its real part.
 */
function collapse(re: number, im: number): NumberKind {
    if (!Number.isFinite(re) || !Number.isFinite(im)) return new Infinite(re < 0 ? 'negative' : 'positive');
    if (im === 0) return new Real(re);
    return new Complex(new Real(re), new Real(im));
}

function combineNaturalComplex(a: NaturalComplex, b: NaturalComplex, op: BinaryOp): NumberKind {
    const ar = a.real.value, ai = a.imaginary.value;
    const br = b.real.value, bi = b.imaginary.value;
    if (op === 'add') {
        return new NaturalComplex(new Natural(ar + br), new Natural(ai + bi));
    }
    const re = ar * br - ai * bi;
    const im = ar * bi + ai * br;
    if (re >= 0n) return new NaturalComplex(new Natural(re), new Natural(im));
    return collapse(Number(re), Number(im));
}

function combineStructural(a: FiniteNumber | StructuralNumber, b: FiniteNumber | StructuralNumber, op: BinaryOp): NumberKind {
    if (a.kind === 'NaturalComplex' && b.kind === 'NaturalComplex') return combineNaturalComplex(a, b, op);
    if (op === 'multiply' && (a.isZero || b.isZero)) return new Real(0);

    const [ar, ai] = partsOf(a);
    const [br, bi] = partsOf(b);
    if (op === 'add') return collapse(ar + br, ai + bi);
    return collapse(ar * br - ai * bi, ar * bi + ai * br);
}

function combine(a: NumberKind, b: NumberKind, op: BinaryOp): NumberKind {
    if (isLinear(a) && isLinear(b)) return combineLinear(a, b, op);
    if (a.kind === 'Infinite') return a;
    if (b.kind === 'Infinite') return b;
    if (a.kind === 'Zero') return op === 'add' ? b : a;
    if (b.kind === 'Zero') return op === 'add' ? a : b;
    return combineStructural(a, b, op);
}

// ============================================================================
// 4. PUBLIC OPERATIONS
// ============================================================================

/** `Infinite + x = Infinite` and `x + Infinite = Infinite`, polarity unchanged. */
export function add(a: LinearNumber, b: LinearNumber): LinearNumber;
export function add(a: NumberKind, b: NumberKind): NumberKind;
export function add(a: NumberKind, b: NumberKind): NumberKind {
    return combine(a, b, 'add');
}

/**
 * `Infinite − x = Infinite`; `x − Infinite` is the Infinite of opposite polarity.
 * Two finite operands subtract directly, so a non-negative Natural difference stays Natural.
 */
export function subtract(a: LinearNumber, b: LinearNumber): LinearNumber;
export function subtract(a: NumberKind, b: NumberKind): NumberKind;
export function subtract(a: NumberKind, b: NumberKind): NumberKind {
    if (a.kind === 'Infinite') return a;
    if (isFiniteNumber(a) && isFiniteNumber(b)) return combineFinite(a, b, 'subtract');
    return combine(a, negate(b), 'add');
}

/** `Infinite × x = Infinite`, polarity unchanged, for every x including Zero. */
export function multiply(a: LinearNumber, b: LinearNumber): LinearNumber;
export function multiply(a: NumberKind, b: NumberKind): NumberKind;
export function multiply(a: NumberKind, b: NumberKind): NumberKind {
    return combine(a, b, 'multiply');
}
