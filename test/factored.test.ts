import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../src/errors';
import { DEFAULT_POW_CEILING, FactoredInteger, factored, fullRangePow, power } from '../src/factored';

describe('fullRangePow', () => {
    it('agrees with ** one step above the ceiling', () => {
        expect(fullRangePow(2n, 9n, { ceiling: 8n })).toBe(2n ** 9n);
    });

    it('agrees with ** far above the ceiling', () => {
        expect(fullRangePow(3n, 1000n, { ceiling: 7n })).toBe(3n ** 1000n);
        expect(fullRangePow(10n, 64n, { ceiling: 5n })).toBe(10n ** 64n);
    });

    it('short-circuits trivial bases and exponents', () => {
        expect(fullRangePow(1n, DEFAULT_POW_CEILING + 1n)).toBe(1n);
        expect(fullRangePow(0n, DEFAULT_POW_CEILING + 1n)).toBe(0n);
        expect(fullRangePow(0n, 0n)).toBe(1n);
        expect(fullRangePow(5n, 0n)).toBe(1n);
    });

    it('reports a result past the BigInt size limit', () => {
        expect(() => fullRangePow(2n, DEFAULT_POW_CEILING + 1n))
            .toThrow('fullRangePow: 2 ^ 2147483648 exceeds the maximum BigInt size');
        expect(() => power(2, DEFAULT_POW_CEILING).value).toThrow(InvalidArgumentError);
    });

    it('rejects negative inputs and a bad ceiling', () => {
        expect(() => fullRangePow(-2n, 3n)).toThrow(InvalidArgumentError);
        expect(() => fullRangePow(2n, -1n)).toThrow('fullRangePow: exponent must be non-negative, got -1');
        expect(() => fullRangePow(2n, 3n, { ceiling: 0n })).toThrow(InvalidArgumentError);
    });
});

describe('PowerFactor', () => {
    it('materializes base ^ exponent', () => {
        expect(power(2, 3).value).toBe(8n);
        expect(power(7).value).toBe(7n);
    });

    it('nests exponents', () => {
        expect(power(2, factored(power(2, 2))).value).toBe(16n);
    });

    it('honours an explicit ceiling', () => {
        expect(power(2, 10).materialize({ ceiling: 3n })).toBe(1024n);
    });

    it('rejects negative and fractional inputs', () => {
        expect(() => power(-2)).toThrow('PowerFactor: base must be non-negative, got -2');
        expect(() => power(2, -1)).toThrow('PowerFactor: exponent must be non-negative, got -1');
        expect(() => power(2.5)).toThrow('PowerFactor: base must be an integer, got 2.5');
    });

    it('multiplies into a FactoredInteger', () => {
        const n = power(2).times(power(3));
        expect(n).toBeInstanceOf(FactoredInteger);
        expect(n.value).toBe(6n);
    });

    it('renders its exponent in brackets', () => {
        expect(power(2).toString()).toBe('[2 ^ (1)]');
        expect(power(2, 3).toString()).toBe('[2 ^ ([3 ^ (1)])]');
    });
});

describe('FactoredInteger', () => {
    it('multiplies its factors', () => {
        expect(factored(power(2, 1), power(3, 1)).value).toBe(6n);
        expect(factored(power(1), power(2), power(3), power(5), power(7)).value).toBe(210n);
        expect(factored(power(2, 3), power(3, 5)).value).toBe(1944n);
    });

    it('is one when empty', () => {
        expect(FactoredInteger.ONE.value).toBe(1n);
        expect(FactoredInteger.ONE.toString()).toBe('1');
    });

    it('is equal across factorizations of the same value', () => {
        const a = factored(power(2, 2));
        const b = factored(power(4));
        expect(a.equals(b)).toBe(true);
        expect(a.hashCode).toBe(b.hashCode);
        expect(factored(power(2), power(3)).equals(factored(power(6)))).toBe(true);
        expect(power(2, 3).equals(factored(power(8)))).toBe(true);
        expect(factored(power(5)).equals(factored(power(6)))).toBe(false);
    });

    it('appends without mutating', () => {
        const n = factored(power(2));
        const m = n.times(power(5));
        expect(n.factors.length).toBe(1);
        expect(m.value).toBe(10n);
    });

    it('rejects absent factors', () => {
        expect(() => factored(power(2), undefined)).toThrow(InvalidArgumentError);
        expect(() => factored(power(2), undefined)).toThrow('FactoredInteger: factor at position 1 is absent');
    });

    it('renders factors joined by *', () => {
        expect(factored(power(2), power(3)).toString()).toBe('[2 ^ (1)] * [3 ^ (1)]');
    });

    it('handles exponents past the default ceiling', () => {
        expect(factored(power(1, DEFAULT_POW_CEILING + 1n)).value).toBe(1n);
    });
});
