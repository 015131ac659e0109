/**
 * @module structural
 * Paired number kinds. The two axes are unordered with respect to each other,
 * so these kinds carry no sign; they expose magnitude and phase instead.
 */

import { Entity, type Scalar } from './entity';
import { ExistenceSet, type Maybe } from './existence-set';
import { Natural, Real } from './linear';

/** Real part and imaginary part over Reals. */
export class Complex extends Entity {
    readonly kind = 'Complex' as const;

    constructor(
        readonly real: Real = new Real(0),
        readonly imaginary: Real = new Real(0),
        members: ExistenceSet = ExistenceSet.EMPTY
    ) {
        super(members);
    }

    protected override payload(): readonly Scalar[] { return [this.real, this.imaginary]; }

    get magnitude(): number { return Math.hypot(this.real.value, this.imaginary.value); }
    get phase(): number { return Math.atan2(this.imaginary.value, this.real.value); }
    get isZero(): boolean { return this.real.isZero && this.imaginary.isZero; }
}

/** Real part and imaginary part over Naturals. Embeds into Complex. */
export class NaturalComplex extends Entity {
    readonly kind = 'NaturalComplex' as const;

    constructor(
        readonly real: Natural = new Natural(0),
        readonly imaginary: Natural = new Natural(0),
        members: ExistenceSet = ExistenceSet.EMPTY
    ) {
        super(members);
    }

    protected override payload(): readonly Scalar[] { return [this.real, this.imaginary]; }

    get magnitude(): number { return Math.hypot(this.real.scalar, this.imaginary.scalar); }
    get phase(): number { return Math.atan2(this.imaginary.scalar, this.real.scalar); }
    get isZero(): boolean { return this.real.isZero && this.imaginary.isZero; }
}

export type StructuralNumber = Complex | NaturalComplex;

export function complex(re: number, im: number = 0, ...members: Maybe<Entity>[]): Complex {
    return new Complex(new Real(re), new Real(im), ExistenceSet.from(members));
}

export function naturalComplex(re: bigint | number, im: bigint | number = 0n, ...members: Maybe<Entity>[]): NaturalComplex {
    return new NaturalComplex(new Natural(re), new Natural(im), ExistenceSet.from(members));
}
