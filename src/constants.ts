/**
 * @module constants
 * Well-known values, built once on first access and frozen.
 *
 * Build order (each step only reads earlier ones):
 *  1. Real          zero, one, minusOne
 *  2. Integer       zero, one, minusOne
 *  3. Natural       zero, one
 *  4. Rational      zero, one            (denominator: Real.one)
 *  5. Irrational    pi, e                (series)
 *  6. Complex       zero, one, minusOne, i, minusI
 *  7. NaturalComplex zero, one, j, oneJ
 *  8. Zero / Infinite of both polarities
 *  9. Sole          the memberless Nature
 * 10. Rotation      axis over (Infinite.positive, Real.one), I0 … I4
 */

import { Nature } from './entity';
import type { NumberKind } from './kinds';
import { Infinite, Integer, Irrational, Natural, Rational, Real, Zero } from './linear';
import { RotationAxis } from './rotation';
import { eSeries, piSeries } from './series';
import { Complex, NaturalComplex } from './structural';

export interface Constants {
    readonly real: { readonly zero: Real; readonly one: Real; readonly minusOne: Real };
    readonly integer: { readonly zero: Integer; readonly one: Integer; readonly minusOne: Integer };
    readonly natural: { readonly zero: Natural; readonly one: Natural };
    readonly rational: { readonly zero: Rational; readonly one: Rational };
    readonly irrational: { readonly pi: Irrational; readonly e: Irrational };
    readonly complex: {
        readonly zero: Complex;
        readonly one: Complex;
        readonly minusOne: Complex;
        readonly i: Complex;
        readonly minusI: Complex;
    };
    readonly naturalComplex: {
        readonly zero: NaturalComplex;
        readonly one: NaturalComplex;
        readonly j: NaturalComplex;
        readonly oneJ: NaturalComplex;
    };
    readonly zero: { readonly positive: Zero; readonly negative: Zero };
    readonly infinite: { readonly positive: Infinite; readonly negative: Infinite };
    readonly sole: Nature;
    readonly rotation: {
        readonly axis: RotationAxis;
        readonly i0: NumberKind;
        readonly i1: NumberKind;
        readonly i2: NumberKind;
        readonly i3: NumberKind;
        readonly i4: NumberKind;
    };
}

function build(): Constants {
    const real = Object.freeze({ zero: new Real(0), one: new Real(1), minusOne: new Real(-1) });
    const integer = Object.freeze({ zero: new Integer(0n), one: new Integer(1n), minusOne: new Integer(-1n) });
    const natural = Object.freeze({ zero: new Natural(0n), one: new Natural(1n) });
    const rational = Object.freeze({
        zero: new Rational(real.zero, real.one),
        one: new Rational(real.one, real.one),
    });
    const irrational = Object.freeze({
        pi: new Irrational(piSeries()),
        e: new Irrational(eSeries()),
    });
    const complex = Object.freeze({
        zero: new Complex(real.zero, real.zero),
        one: new Complex(real.one, real.zero),
        minusOne: new Complex(real.minusOne, real.zero),
        i: new Complex(real.zero, real.one),
        minusI: new Complex(real.zero, real.minusOne),
    });
    const naturalComplex = Object.freeze({
        zero: new NaturalComplex(natural.zero, natural.zero),
        one: new NaturalComplex(natural.one, natural.zero),
        j: new NaturalComplex(natural.zero, natural.one),
        oneJ: new NaturalComplex(natural.one, natural.one),
    });
    const zero = Object.freeze({ positive: new Zero('positive'), negative: new Zero('negative') });
    const infinite = Object.freeze({ positive: new Infinite('positive'), negative: new Infinite('negative') });
    const sole = new Nature();

    const axis = new RotationAxis(infinite.positive, real.one);
    const [i0, i1, i2, i3, i4] = axis.cycle;
    const rotation = Object.freeze({ axis, i0, i1, i2, i3, i4 });

    return Object.freeze({
        real, integer, natural, rational, irrational,
        complex, naturalComplex, zero, infinite, sole, rotation,
    });
}

let registry: Constants | null = null;

/** The process-wide constants. The first call builds them; every call returns the same object. */
export function constants(): Constants {
    if (registry === null) registry = build();
    return registry;
}
