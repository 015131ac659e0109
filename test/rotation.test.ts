import { describe, it, expect } from 'vitest';
import { multiply, negate } from '../src/arithmetic';
import { constants } from '../src/constants';
import { being } from '../src/entity';
import { DomainViolationError } from '../src/errors';
import { Infinite, infinite, integer, real, zero } from '../src/linear';
import { RotationAxis } from '../src/rotation';
import { complex } from '../src/structural';

describe('RotationAxis', () => {
    const { rotation } = constants();

    it('closes the cycle after four turns', () => {
        expect(rotation.i4.equals(rotation.i0)).toBe(true);
    });

    it('passes through the opposite of the unit halfway', () => {
        expect(rotation.i2.equals(negate(rotation.i0))).toBe(true);
        expect(rotation.i2.equals(real(-1))).toBe(true);
    });

    it('visits both imaginary units', () => {
        expect(rotation.i1.equals(complex(0, 1))).toBe(true);
        expect(rotation.i3.equals(complex(0, -1))).toBe(true);
        expect(rotation.axis.imaginaryUnit).toBe(rotation.i1);
    });

    it('squares the imaginary unit to -1', () => {
        expect(rotation.axis.unitSquare().equals(real(-1))).toBe(true);
    });

    it('takes its generator from the Infinite by absorption', () => {
        expect(rotation.axis.generator).toBe(constants().infinite.positive);
        expect(rotation.axis.generator).toBeInstanceOf(Infinite);
    });

    it('turns by the generator polarity rather than multiplying by the generator', () => {
        const { axis } = rotation;
        expect(multiply(axis.generator, axis.unit).equals(infinite())).toBe(true);
        expect(axis.turn.equals(complex(0, 1))).toBe(true);
        expect(axis.apply(axis.unit).equals(complex(0, 1))).toBe(true);
    });

    it('turns the other way around a negative Infinite', () => {
        const axis = new RotationAxis(infinite('negative'), real(1));
        const [i0, i1, i2, , i4] = axis.cycle;
        expect(i1.equals(complex(0, -1))).toBe(true);
        expect(i2.equals(real(-1))).toBe(true);
        expect(i4.equals(i0)).toBe(true);
    });

    it('applies repeatedly', () => {
        expect(rotation.axis.applyTimes(integer(3), 2).equals(real(-3))).toBe(true);
        expect(rotation.axis.applyTimes(real(2), 4).equals(real(2))).toBe(true);
        expect(rotation.axis.applyTimes(real(2), 0).equals(real(2))).toBe(true);
    });

    it('leaves Zero where it is', () => {
        const z = zero();
        expect(rotation.axis.apply(z)).toBe(z);
    });

    it('rejects a unit whose cycle cannot close', () => {
        expect(() => new RotationAxis(infinite(), real(1, being()))).toThrow(DomainViolationError);
    });
});
