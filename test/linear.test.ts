import { describe, it, expect } from 'vitest';
import { being } from '../src/entity';
import { DomainViolationError, InvalidArgumentError } from '../src/errors';
import { ExistenceSet } from '../src/existence-set';
import { Integer, Natural, Real, infinite, integer, natural, rational, real, withSign, zero } from '../src/linear';
import { complex, naturalComplex } from '../src/structural';

describe('linear kinds', () => {
    describe('Natural', () => {
        it('accepts zero', () => {
            expect(natural(0).value).toBe(0n);
            expect(natural(0).isZero).toBe(true);
        });

        it('rejects negatives', () => {
            expect(() => natural(-1)).toThrow(InvalidArgumentError);
            expect(() => natural(-1)).toThrow('Natural: value must be non-negative, got -1');
        });

        it('is always positive', () => {
            expect(natural(5).isPositive).toBe(true);
        });
    });

    describe('Integer', () => {
        it('rejects fractions', () => {
            expect(() => new Integer(1.5)).toThrow('Integer: value must be an integer, got 1.5');
        });

        it('keeps arbitrary precision', () => {
            expect(integer(2n ** 100n).value).toBe(2n ** 100n);
        });

        it('reports sign and zero', () => {
            expect(integer(-3).isPositive).toBe(false);
            expect(integer(0).isZero).toBe(true);
            expect(integer(7).scalar).toBe(7);
        });
    });

    describe('Real', () => {
        it('rejects non-finite values', () => {
            expect(() => real(NaN)).toThrow(InvalidArgumentError);
            expect(() => real(Infinity)).toThrow('Real: value must be finite, got Infinity');
        });

        it('folds -0 into 0', () => {
            expect(real(-0).value).toBe(0);
            expect(real(-0).equals(real(0))).toBe(true);
        });
    });

    describe('Rational', () => {
        it('is identified by its quotient', () => {
            expect(rational(1, 2).equals(rational(2, 4))).toBe(true);
            expect(rational(1, 2).value).toBe(0.5);
        });

        it('rejects a zero denominator', () => {
            expect(() => rational(1, 0)).toThrow('Rational: denominator cannot be zero');
        });
    });

    describe('Zero and Infinite', () => {
        it('carry their polarity', () => {
            expect(zero('negative').isPositive).toBe(false);
            expect(zero().isPositive).toBe(true);
            expect(infinite('negative').scalar).toBe(-Infinity);
            expect(infinite().scalar).toBe(Infinity);
            expect(infinite().isZero).toBe(false);
        });

        it('differ by polarity', () => {
            expect(zero('positive').equals(zero('negative'))).toBe(false);
        });
    });

    describe('withSign', () => {
        it('refuses to make a Natural negative', () => {
            expect(() => withSign(natural(3), false)).toThrow(DomainViolationError);
            expect(() => withSign(natural(3), false)).toThrow('Natural: unable to set 3 to negative');
        });

        it('returns the value itself when the sign already matches', () => {
            const n = natural(3);
            expect(withSign(n, true)).toBe(n);
        });

        it('flips signs and polarities', () => {
            expect(withSign(integer(3), false).equals(integer(-3))).toBe(true);
            expect(withSign(zero(), false).equals(zero('negative'))).toBe(true);
            expect(withSign(infinite('negative'), true).equals(infinite())).toBe(true);
            expect(withSign(rational(1, 2), false).scalar).toBe(-0.5);
        });

        it('keeps members', () => {
            const x = real(2, being());
            expect(withSign(x, false).members.equals(ExistenceSet.of(being()))).toBe(true);
        });
    });
});

describe('structural kinds', () => {
    it('have magnitude and phase', () => {
        expect(complex(3, 4).magnitude).toBe(5);
        expect(complex(0, 1).phase).toBeCloseTo(Math.PI / 2, 12);
        expect(naturalComplex(3, 4).magnitude).toBe(5);
    });

    it('default to zero', () => {
        expect(complex(0).isZero).toBe(true);
        expect(naturalComplex(0).real).toBeInstanceOf(Natural);
        expect(complex(1).imaginary).toBeInstanceOf(Real);
    });

    it('reject negative natural parts', () => {
        expect(() => naturalComplex(-1)).toThrow(InvalidArgumentError);
    });

    it('compare by both parts', () => {
        expect(complex(1, 2).equals(complex(1, 2))).toBe(true);
        expect(complex(1, 2).equals(complex(2, 1))).toBe(false);
        expect(complex(1, 2).equals(naturalComplex(1, 2))).toBe(false);
    });
});
