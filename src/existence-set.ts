/**
 * @module existence-set
 * Immutable, deduplicated, canonically ordered set of entities.
 *
 * Storage is a persistent red-black tree keyed by the entity total order
 * (`Entity.compare`), so every set built from the same members has the same
 * shape, the same iteration order and the same hash, whatever the input order.
 */

import createTree from 'functional-red-black-tree';
import type { Entity } from './entity';
import { InvalidArgumentError } from './errors';
import { combineUnordered } from './hash';

/** A member as it may arrive from a caller: possibly absent. */
export type Maybe<T> = T | null | undefined;

/** The slice of the red-black tree API the set relies on. */
interface MemberTree {
    readonly keys: Entity[];
    readonly length: number;
    get(key: Entity): true | void;
    insert(key: Entity, value: true): MemberTree;
}

function compareMembers(a: Entity, b: Entity): number {
    return a.compare(b);
}

function emptyTree(): MemberTree {
    return createTree<Entity, true>(compareMembers);
}

export class ExistenceSet implements Iterable<Entity> {
    static readonly EMPTY: ExistenceSet = new ExistenceSet(emptyTree());

    readonly #tree: MemberTree;
    #raw: readonly Entity[] | null = null;
    #hashCode: number | null = null;

    private constructor(tree: MemberTree) {
        this.#tree = tree;
    }

    /** Builds a set from members that are already sorted and unique. */
    static #fromSorted(members: readonly Entity[]): ExistenceSet {
        if (members.length === 0) return ExistenceSet.EMPTY;
        let tree = emptyTree();
        for (const m of members) tree = tree.insert(m, true);
        return new ExistenceSet(tree);
    }

    static of(...members: Maybe<Entity>[]): ExistenceSet {
        return ExistenceSet.from(members);
    }

    /**
     * Builds a set from any iterable, dropping duplicates.
     * @throws InvalidArgumentError if any member is `null` or `undefined`.
     */
    static from(members: Iterable<Maybe<Entity>>): ExistenceSet {
        let tree = emptyTree();
        let position = 0;
        for (const m of members) {
            if (m === null || m === undefined) {
                throw new InvalidArgumentError(`ExistenceSet: member at position ${position} is absent`);
            }
            if (tree.get(m) === undefined) tree = tree.insert(m, true);
            position++;
        }
        return tree.length === 0 ? ExistenceSet.EMPTY : new ExistenceSet(tree);
    }

    get size(): number { return this.#tree.length; }
    isEmpty(): boolean { return this.#tree.length === 0; }

    /** Members in canonical order. */
    get raw(): readonly Entity[] {
        if (this.#raw === null) this.#raw = Object.freeze(this.#tree.keys);
        return this.#raw;
    }

    has(member: Entity): boolean {
        return this.#tree.get(member) !== undefined;
    }

    /** Returns a set that also contains `member`; `this` when it is already present. */
    with(member: Entity): ExistenceSet {
        if (this.has(member)) return this;
        return new ExistenceSet(this.#tree.insert(member, true));
    }

    /**
     * Cached, order-independent hash of the members.
     */
    get hashCode(): number {
        if (this.#hashCode !== null) return this.#hashCode;
        this.#hashCode = combineUnordered(this.raw.map(m => m.hashCode));
        return this.#hashCode;
    }

    compare(other: ExistenceSet): number {
        if (this === other) return 0;
        const h1 = this.hashCode;
        const h2 = other.hashCode;
        if (h1 !== h2) return h1 - h2;

        const arrA = this.raw;
        const arrB = other.raw;
        const len = arrA.length;
        if (len !== arrB.length) return len - arrB.length;
        for (let i = 0; i < len; i++) {
            const cmp = arrA[i].compare(arrB[i]);
            if (cmp !== 0) return cmp;
        }
        return 0;
    }

    equals(other: ExistenceSet): boolean { return this.compare(other) === 0; }

    // === SET ALGEBRA (linear merges over the canonical order) ===

    union(other: ExistenceSet): ExistenceSet {
        if (this.isEmpty()) return other;
        if (other.isEmpty()) return this;

        const arrA = this.raw;
        const arrB = other.raw;
        const res: Entity[] = [];
        let i = 0, j = 0;
        const lenA = arrA.length, lenB = arrB.length;

        while (i < lenA && j < lenB) {
            const cmp = arrA[i].compare(arrB[j]);
            if (cmp < 0) res.push(arrA[i++]);
            else if (cmp > 0) res.push(arrB[j++]);
            else { res.push(arrA[i++]); j++; }
        }
        while (i < lenA) res.push(arrA[i++]);
        while (j < lenB) res.push(arrB[j++]);
        return ExistenceSet.#fromSorted(res);
    }

    intersection(other: ExistenceSet): ExistenceSet {
        const arrA = this.raw;
        const arrB = other.raw;
        const res: Entity[] = [];
        let i = 0, j = 0;
        const lenA = arrA.length, lenB = arrB.length;

        while (i < lenA && j < lenB) {
            const cmp = arrA[i].compare(arrB[j]);
            if (cmp < 0) i++;
            else if (cmp > 0) j++;
            else { res.push(arrA[i++]); j++; }
        }
        return ExistenceSet.#fromSorted(res);
    }

    difference(other: ExistenceSet): ExistenceSet {
        const arrA = this.raw;
        const arrB = other.raw;
        const res: Entity[] = [];
        let i = 0, j = 0;
        const lenA = arrA.length, lenB = arrB.length;

        while (i < lenA && j < lenB) {
            const cmp = arrA[i].compare(arrB[j]);
            if (cmp < 0) res.push(arrA[i++]);
            else if (cmp > 0) j++;
            else { i++; j++; }
        }
        while (i < lenA) res.push(arrA[i++]);
        return ExistenceSet.#fromSorted(res);
    }

    isSubset(other: ExistenceSet): boolean {
        if (this.size > other.size) return false;
        let i = 0, j = 0;
        const arrA = this.raw, arrB = other.raw;
        while (i < arrA.length && j < arrB.length) {
            const cmp = arrA[i].compare(arrB[j]);
            if (cmp < 0) return false;
            if (cmp > 0) j++;
            else { i++; j++; }
        }
        return i === arrA.length;
    }

    *[Symbol.iterator](): Iterator<Entity> { yield* this.raw; }

    toString(): string {
        return `(${this.raw.map(m => m.toString()).join(',')})`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
