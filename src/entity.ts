/**
 * @module entity
 * The closed set of entity kinds and their shared structural identity.
 *
 * Every entity is a `kind` tag, an optional scalar payload and a member set.
 * Two entities are equal iff all three agree; member sets compare unordered
 * and recursively. `compare` extends this to a total order so entities can be
 * stored in an `ExistenceSet`.
 */

import { ExistenceSet, type Maybe } from './existence-set';
import { finalize, hashBigInt, hashNumber, hashString, mix } from './hash';

export type Kind =
    | 'Existence'
    | 'Nature'
    | 'Being'
    | 'Void'
    | 'Zero'
    | 'Infinite'
    | 'Integer'
    | 'Natural'
    | 'Real'
    | 'Rational'
    | 'Irrational'
    | 'Complex'
    | 'NaturalComplex';

export const KINDS: readonly Kind[] = [
    'Existence', 'Nature', 'Being', 'Void',
    'Zero', 'Infinite',
    'Integer', 'Natural', 'Real', 'Rational', 'Irrational',
    'Complex', 'NaturalComplex',
];

const KIND_RANK = new Map<Kind, number>(KINDS.map((k, i) => [k, i]));

function rankOf(kind: Kind): number {
    return KIND_RANK.get(kind) ?? KINDS.length;
}

/** A single scalar slot of an entity's payload. */
export type Scalar = number | bigint | boolean | Entity;

// ============================================================================
// 1. PAYLOAD ORDERING & HASHING
// ============================================================================

function scalarTypeId(s: Scalar): number {
    if (typeof s === 'boolean') return 1;
    if (typeof s === 'number') return 2;
    if (typeof s === 'bigint') return 3;
    return 4;
}

function compareScalars(a: Scalar, b: Scalar): number {
    if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a === 'boolean' && typeof b === 'boolean') return a === b ? 0 : a ? 1 : -1;
    if (a instanceof Entity && b instanceof Entity) return a.compare(b);
    return scalarTypeId(a) - scalarTypeId(b);
}

function hashScalar(s: Scalar): number {
    if (typeof s === 'number') return hashNumber(s);
    if (typeof s === 'bigint') return hashBigInt(s);
    if (typeof s === 'boolean') return s ? 1231 : 1237;
    return s.hashCode;
}

// ============================================================================
// 2. ENTITY BASE
// ============================================================================

export abstract class Entity {
    abstract readonly kind: Kind;
    readonly members: ExistenceSet;
    #hashCode: number | null = null;

    protected constructor(members: ExistenceSet = ExistenceSet.EMPTY) {
        this.members = members;
    }

    /** Scalar slots that, with the kind and members, define identity. */
    protected payload(): readonly Scalar[] { return []; }

    /** Whether the entity exists. Only the bare Existence does not. */
    get exists(): boolean { return true; }

    /** Nothing in the hierarchy is limited. */
    get isLimited(): boolean { return false; }

    get hashCode(): number {
        if (this.#hashCode !== null) return this.#hashCode;
        let h = hashString(this.kind);
        for (const s of this.payload()) h = mix(h, hashScalar(s));
        h = mix(h, this.members.hashCode);
        this.#hashCode = finalize(h);
        return this.#hashCode;
    }

    /**
     * Total order: kind rank, hash, payload, then member sets.
     * Returns 0 exactly when the two entities are structurally equal.
     */
    compare(other: Entity): number {
        if (this === other) return 0;
        const byKind = rankOf(this.kind) - rankOf(other.kind);
        if (byKind !== 0) return byKind;

        const h1 = this.hashCode;
        const h2 = other.hashCode;
        if (h1 !== h2) return h1 - h2;

        const pa = this.payload();
        const pb = other.payload();
        if (pa.length !== pb.length) return pa.length - pb.length;
        for (let i = 0; i < pa.length; i++) {
            const cmp = compareScalars(pa[i], pb[i]);
            if (cmp !== 0) return cmp;
        }
        return this.members.compare(other.members);
    }

    equals(other: unknown): boolean {
        return other instanceof Entity && this.compare(other) === 0;
    }

    /** `(m1,m2,...)`, or the kind name when there are no members. */
    toString(): string {
        return this.members.isEmpty() ? this.kind : this.members.toString();
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 3. EXISTENCE, NATURE, BEING, VOID
// ============================================================================

/** Something that does not exist, and is therefore not limited. Its opposite is itself. */
export class Existence extends Entity {
    readonly kind = 'Existence' as const;

    constructor(members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
    }

    override get exists(): boolean { return false; }
}

/** An existence that exists from an unknown beginning. Its opposite is itself. */
export class Nature extends Entity {
    readonly kind = 'Nature' as const;

    constructor(members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
    }
}

/** Not Being is Void: `-being` is a Void over the same members. */
export class Being extends Entity {
    readonly kind = 'Being' as const;

    constructor(members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
    }
}

/** Not Void is Being. */
export class Void extends Entity {
    readonly kind = 'Void' as const;

    constructor(members: ExistenceSet = ExistenceSet.EMPTY) {
        super(members);
    }
}

export function existence(...members: Maybe<Entity>[]): Existence {
    return new Existence(ExistenceSet.from(members));
}

export function nature(...members: Maybe<Entity>[]): Nature {
    return new Nature(ExistenceSet.from(members));
}

export function being(...members: Maybe<Entity>[]): Being {
    return new Being(ExistenceSet.from(members));
}

export function voidOf(...members: Maybe<Entity>[]): Void {
    return new Void(ExistenceSet.from(members));
}

// ============================================================================
// 4. POLARITY
// ============================================================================

/** Sign bit carried by the unbounded kinds (Zero, Infinite). */
export type Polarity = 'positive' | 'negative';

export function invert(p: Polarity): Polarity {
    return p === 'positive' ? 'negative' : 'positive';
}
