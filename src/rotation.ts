/**
 * @module rotation
 * The imaginary axis, generated by one operator.
 *
 *     R(n) = (Infinite − I0) × n
 *
 * Under absorption `Infinite − I0` is the Infinite itself. The product in R
 * is defined, not computed: R(n) is `±i · n`, a quarter turn in the direction
 * of the generator's polarity, and only that polarity is read from the
 * generator. `multiply(generator, n)` would absorb n and stay Infinite; `apply`
 * multiplies by `turn` instead.
 *
 * Four turns from the real unit I0 close the cycle
 * I0 → I1 → I2 = −I0 → I3 → I4 = I0. Arithmetic drops member sets, so I0 must
 * have none for the cycle to close structurally.
 */

import { multiply, negate, subtract } from './arithmetic';
import { DomainViolationError } from './errors';
import type { NumberKind } from './kinds';
import { Infinite, Real } from './linear';
import { Complex } from './structural';

export type Cycle = readonly [NumberKind, NumberKind, NumberKind, NumberKind, NumberKind];

export class RotationAxis {
    /** `Infinite − I0`, an Infinite by absorption. */
    readonly generator: Infinite;
    /** The quarter turn the generator stands for. */
    readonly turn: Complex;
    /** I0 … I4. */
    readonly cycle: Cycle;

    /**
     * @param infinite - the unbounded value the generator is built from
     * @param unit - I0, the real unit
     * @throws DomainViolationError if the four-step cycle does not close on I0
     * or does not pass through −I0 at its midpoint.
     */
    constructor(infinite: Infinite, readonly unit: Real) {
        const g = subtract(infinite, unit);
        if (g.kind !== 'Infinite') {
            throw new DomainViolationError(`RotationAxis: generator must be Infinite, got ${g.kind}`);
        }
        this.generator = g;
        this.turn = new Complex(new Real(0), new Real(g.polarity === 'positive' ? 1 : -1));

        const i1 = this.apply(unit);
        const i2 = this.apply(i1);
        const i3 = this.apply(i2);
        const i4 = this.apply(i3);
        this.cycle = [unit, i1, i2, i3, i4];

        if (!i4.equals(unit)) {
            throw new DomainViolationError(`RotationAxis: cycle does not close, I4 = ${describe(i4)}`);
        }
        if (!i2.equals(negate(unit))) {
            throw new DomainViolationError(`RotationAxis: I2 = ${describe(i2)} is not -I0`);
        }
    }

    /** R(n) = `turn × n`, one quarter turn of `n`. */
    apply(n: NumberKind): NumberKind {
        return multiply(this.turn, n);
    }

    /** R applied `steps` times. */
    applyTimes(n: NumberKind, steps: number): NumberKind {
        let acc = n;
        for (let k = 0; k < steps; k++) acc = this.apply(acc);
        return acc;
    }

    /** I1, the imaginary unit of this axis. */
    get imaginaryUnit(): NumberKind { return this.cycle[1]; }

    /** I1 × I1, which equals −I0. */
    unitSquare(): NumberKind {
        return multiply(this.imaginaryUnit, this.imaginaryUnit);
    }
}

function describe(x: NumberKind): string {
    switch (x.kind) {
        case 'Complex':
            return `Complex(${x.real.value}, ${x.imaginary.value})`;
        case 'NaturalComplex':
            return `NaturalComplex(${x.real.value}, ${x.imaginary.value})`;
        default:
            return `${x.kind}(${x.scalar})`;
    }
}
