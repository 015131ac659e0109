/**
 * @module hash
 * 32-bit hashing primitives shared by every entity and member set.
 *
 * Numbers mix their IEEE-754 words (FNV-1a), bigints are folded 32 bits at a
 * time, and member sets combine their elements order-independently so that
 * the hash of a set does not depend on how it was built.
 */

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

/**
 * Hashes a number using bitwise manipulation.
 * Integers in int32 range hash to themselves; everything else goes through the float words.
 */
export function hashNumber(val: number): number {
    if ((val | 0) === val) return val | 0;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

/**
 * FNV-1a hash for strings.
 */
export function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * FNV-1a over the 32-bit limbs of a bigint, least significant first.
 * The sign is mixed in last so that `n` and `-n` differ.
 */
export function hashBigInt(val: bigint): number {
    let h = FNV_OFFSET;
    let rest = val < 0n ? -val : val;
    do {
        h ^= Number(rest & 0xffffffffn);
        h = Math.imul(h, FNV_PRIME);
        rest >>= 32n;
    } while (rest > 0n);
    if (val < 0n) {
        h ^= 0x2d;
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/** Order-dependent step: `31 * h + v`, truncated to 32 bits. */
export function mix(h: number, v: number): number {
    return (Math.imul(31, h) + v) | 0;
}

/** Final avalanche (murmur3 fmix32). */
export function finalize(h: number): number {
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    return h >>> 0;
}

/**
 * Order-independent combination: the wrapping sum of the avalanched hashes.
 * Any permutation of `hashes` yields the same result.
 */
export function combineUnordered(hashes: Iterable<number>): number {
    let sum = 0;
    for (const h of hashes) sum = (sum + finalize(h)) | 0;
    return sum >>> 0;
}
