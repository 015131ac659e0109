/**
 * @module linear
 * Ordered, signed, zero-testable number kinds.
 *
 * LinearNumber = Zero | Infinite | Integer | Natural | Real | Rational | Irrational.
 * Each variant is a flat subclass of `Entity`; code that needs to tell them
 * apart switches on `kind`.
 */

import { Entity, invert, type Polarity, type Scalar } from './entity';
import { DomainViolationError, InvalidArgumentError } from './errors';
import { ExistenceSet, type Maybe } from './existence-set';

/** What every linear kind can answer. */
export interface LinearCapability {
    /** `value >= 0`, or the polarity for Zero and Infinite. */
    readonly isPositive: boolean;
    readonly isZero: boolean;
    /** Semantic number view. Zero is 0, Infinite is ±Infinity. */
    readonly scalar: number;
}

function toBigInt(kind: string, value: bigint | number): bigint {
    if (typeof value === 'bigint') return value;
    if (!Number.isInteger(value)) {
        throw new InvalidArgumentError(`${kind}: value must be an integer, got ${value}`);
    }
    return BigInt(value);
}

function requireFinite(kind: string, value: number): number {
    if (!Number.isFinite(value)) {
        throw new InvalidArgumentError(`${kind}: value must be finite, got ${value}`);
    }
    // -0 and 0 are the same Real
    return value === 0 ? 0 : value;
}

// ============================================================================
// 1. UNBOUNDED KINDS
// ============================================================================

/**
 * Zero with a polarity. Its reciprocal dual is the Infinite of the opposite
 * polarity, and an empty Zero is interchangeable with an empty Void.
 */
export class Zero extends Entity implements LinearCapability {
    readonly kind = 'Zero' as const;

    constructor(
        readonly polarity: Polarity = 'positive',
        members: ExistenceSet = ExistenceSet.EMPTY
    ) {
        super(members);
    }

    protected override payload(): readonly Scalar[] { return [this.polarity === 'positive']; }

    get isPositive(): boolean { return this.polarity === 'positive'; }
    get isZero(): boolean { return true; }
    get scalar(): number { return 0; }
}

/** The unbounded value. Absorbs every finite perturbation under +, − and ×. */
export class Infinite extends Entity implements LinearCapability {
    readonly kind = 'Infinite' as const;

    constructor(
        readonly polarity: Polarity = 'positive',
        members: ExistenceSet = ExistenceSet.EMPTY
    ) {
        super(members);
    }

    protected override payload(): readonly Scalar[] { return [this.polarity === 'positive']; }

    get isPositive(): boolean { return this.polarity === 'positive'; }
    get isZero(): boolean { return false; }
    get scalar(): number { return this.polarity === 'positive' ? Infinity : -Infinity; }
}

// ============================================================================
// 2. INTEGRAL KINDS
// ============================================================================

/** Arbitrary-precision signed integer. */
export class Integer extends Entity implements LinearCapability {
    readonly kind = 'Integer' as const;
    readonly value: bigint;

    constructor(value: bigint | number = 0n, members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
        this.value = toBigInt('Integer', value);
    }

    protected override payload(): readonly Scalar[] { return [this.value]; }

    get isPositive(): boolean { return this.value >= 0n; }
    get isZero(): boolean { return this.value === 0n; }
    get scalar(): number { return Number(this.value); }
}

/** An Integer restricted to `value >= 0`. */
export class Natural extends Entity implements LinearCapability {
    readonly kind = 'Natural' as const;
    readonly value: bigint;

    /**
     * @throws InvalidArgumentError for a negative value.
     */
    constructor(value: bigint | number = 0n, members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
        const v = toBigInt('Natural', value);
        if (v < 0n) throw new InvalidArgumentError(`Natural: value must be non-negative, got ${v}`);
        this.value = v;
    }

    protected override payload(): readonly Scalar[] { return [this.value]; }

    get isPositive(): boolean { return true; }
    get isZero(): boolean { return this.value === 0n; }
    get scalar(): number { return Number(this.value); }
}

// ============================================================================
// 3. REAL KINDS
// ============================================================================

/** Double-precision real. Non-finite values belong to Infinite, not here. */
export class Real extends Entity implements LinearCapability {
    readonly kind = 'Real' as const;
    readonly value: number;

    constructor(value: number = 0, members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
        this.value = requireFinite('Real', value);
    }

    protected override payload(): readonly Scalar[] { return [this.value]; }

    get isPositive(): boolean { return this.value >= 0; }
    get isZero(): boolean { return this.value === 0; }
    get scalar(): number { return this.value; }
}

/**
 * A real tagged with its numerator/denominator pair.
 * Identity is the quotient, so 1/2 and 2/4 are the same Rational.
 */
export class Rational extends Entity implements LinearCapability {
    readonly kind = 'Rational' as const;
    readonly value: number;

    constructor(
        readonly numerator: Real,
        readonly denominator: Real = new Real(1),
        members: ExistenceSet = ExistenceSet.EMPTY
    ) {
        super(members);
        if (denominator.isZero) throw new InvalidArgumentError('Rational: denominator cannot be zero');
        this.value = requireFinite('Rational', numerator.value / denominator.value);
    }

    protected override payload(): readonly Scalar[] { return [this.value]; }

    get isPositive(): boolean { return this.value >= 0; }
    get isZero(): boolean { return this.value === 0; }
    get scalar(): number { return this.value; }
}

/** A real with no exact numerator/denominator, such as π or e. */
export class Irrational extends Entity implements LinearCapability {
    readonly kind = 'Irrational' as const;
    readonly value: number;

    constructor(value: number, members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
        this.value = requireFinite('Irrational', value);
    }

    protected override payload(): readonly Scalar[] { return [this.value]; }

    get isPositive(): boolean { return this.value >= 0; }
    get isZero(): boolean { return this.value === 0; }
    get scalar(): number { return this.value; }
}

// ============================================================================
// 4. UNIONS, FACTORIES, SIGN
// ============================================================================

export type IntegralNumber = Integer | Natural;
export type RealNumber = Real | Rational | Irrational;
export type FiniteNumber = IntegralNumber | RealNumber;
export type LinearNumber = FiniteNumber | Zero | Infinite;

export function zero(polarity: Polarity = 'positive', ...members: Maybe<Entity>[]): Zero {
    return new Zero(polarity, ExistenceSet.from(members));
}

export function infinite(polarity: Polarity = 'positive', ...members: Maybe<Entity>[]): Infinite {
    return new Infinite(polarity, ExistenceSet.from(members));
}

export function integer(value: bigint | number, ...members: Maybe<Entity>[]): Integer {
    return new Integer(value, ExistenceSet.from(members));
}

export function natural(value: bigint | number, ...members: Maybe<Entity>[]): Natural {
    return new Natural(value, ExistenceSet.from(members));
}

export function real(value: number, ...members: Maybe<Entity>[]): Real {
    return new Real(value, ExistenceSet.from(members));
}

export function rational(numerator: number, denominator: number = 1, ...members: Maybe<Entity>[]): Rational {
    return new Rational(new Real(numerator), new Real(denominator), ExistenceSet.from(members));
}

/**
 * Returns `x` with its sign forced, keeping its members.
 * A Natural accepts only the positive sign.
 *
 * @throws DomainViolationError when a Natural is asked to be negative.
 */
export function withSign(x: LinearNumber, positive: boolean): LinearNumber {
    if (x.isPositive === positive) return x;
    switch (x.kind) {
        case 'Zero':
            return new Zero(invert(x.polarity), x.members);
        case 'Infinite':
            return new Infinite(invert(x.polarity), x.members);
        case 'Natural':
            throw new DomainViolationError(`Natural: unable to set ${x.value} to negative`);
        case 'Integer':
            return new Integer(-x.value, x.members);
        case 'Real':
            return new Real(-x.value, x.members);
        case 'Rational':
            return new Rational(new Real(-x.numerator.value), x.denominator, x.members);
        case 'Irrational':
            return new Irrational(-x.value, x.members);
    }
}
