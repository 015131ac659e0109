import { inspect } from 'node:util';
import { describe, it, expect } from 'vitest';
import { aliasesOf, kindOfAlias } from '../src/aliases';
import { negate } from '../src/arithmetic';
import { Void, being, existence, nature, voidOf } from '../src/entity';
import { ExistenceSet } from '../src/existence-set';
import { infinite, integer, real, zero } from '../src/linear';

describe('Entity', () => {
    describe('negation', () => {
        it('turns a Being into a Void over the same members', () => {
            const b = being(zero(), integer(2));
            const v = negate(b);
            expect(v).toBeInstanceOf(Void);
            expect(v.kind).toBe('Void');
            expect(v.members.equals(b.members)).toBe(true);
        });

        it('round-trips Being through Void', () => {
            const b = being(voidOf(), infinite('negative'));
            expect(negate(negate(b)).equals(b)).toBe(true);
        });

        it('leaves Existence and Nature alone', () => {
            const e = existence(being());
            const n = nature();
            expect(negate(e)).toBe(e);
            expect(negate(n)).toBe(n);
        });
    });

    describe('structural equality', () => {
        it('compares kind and members recursively', () => {
            expect(being(being(voidOf())).equals(being(being(voidOf())))).toBe(true);
            expect(being(being(voidOf())).equals(being(being(being())))).toBe(false);
            expect(being().equals(voidOf())).toBe(false);
        });

        it('separates kinds with the same scalar', () => {
            expect(integer(2).equals(real(2))).toBe(false);
        });

        it('is not equal to non-entities', () => {
            expect(being().equals('Being')).toBe(false);
            expect(being().equals(undefined)).toBe(false);
        });

        it('hashes equal entities alike', () => {
            expect(being(zero(), voidOf()).hashCode).toBe(being(voidOf(), zero()).hashCode);
        });
    });

    describe('rendering', () => {
        it('prints the kind name when there are no members', () => {
            expect(being().toString()).toBe('Being');
            expect(voidOf().toString()).toBe('Void');
            expect(existence().toString()).toBe('Existence');
            expect(zero().toString()).toBe('Zero');
            expect(infinite().toString()).toBe('Infinite');
        });

        it('prints members otherwise', () => {
            expect(being(voidOf(), being()).toString()).toBe('(Being,Void)');
            expect(being(being(voidOf())).toString()).toBe('((Void))');
        });

        it('hooks into util.inspect', () => {
            expect(inspect(being())).toBe('Being');
            expect(inspect(ExistenceSet.of(voidOf()))).toBe('(Void)');
        });
    });

    describe('flags', () => {
        it('only the bare Existence does not exist', () => {
            expect(existence().exists).toBe(false);
            expect(nature().exists).toBe(true);
            expect(being().exists).toBe(true);
            expect(integer(1).exists).toBe(true);
        });

        it('nothing is limited', () => {
            expect(nature().isLimited).toBe(false);
            expect(existence().isLimited).toBe(false);
        });
    });

    describe('aliases', () => {
        it('lists every name of a kind', () => {
            expect(aliasesOf('Being')).toEqual(['Being', '有', '存有']);
        });

        it('resolves an alias back to its kind', () => {
            expect(kindOfAlias('无穷')).toBe('Infinite');
            expect(kindOfAlias('Tao')).toBe('Nature');
            expect(kindOfAlias('Complex')).toBe('Complex');
            expect(kindOfAlias('nothing')).toBeUndefined();
        });
    });
});
