/**
 * @module coercion
 * Saturating coercion of linear numbers to fixed-width primitives.
 *
 * - Infinite: the type's max (positive) or min (negative); floats give ±Infinity.
 * - Zero: 0.
 * - Finite: truncated toward zero, then clamped to the type's range.
 * - Absent: 0, the neutral value of every type.
 */

import type { Maybe } from './existence-set';
import type { LinearNumber } from './linear';

export type IntegerType = 'int8' | 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32' | 'int64' | 'uint64';
export type WideIntegerType = 'int64' | 'uint64';
export type FloatType = 'float32' | 'float64';
export type PrimitiveType = IntegerType | FloatType;
export type NarrowType = Exclude<PrimitiveType, WideIntegerType>;

interface Bounds {
    readonly min: bigint;
    readonly max: bigint;
}

export const INTEGER_BOUNDS: Readonly<Record<IntegerType, Bounds>> = {
    int8: { min: -(2n ** 7n), max: 2n ** 7n - 1n },
    uint8: { min: 0n, max: 2n ** 8n - 1n },
    int16: { min: -(2n ** 15n), max: 2n ** 15n - 1n },
    uint16: { min: 0n, max: 2n ** 16n - 1n },
    int32: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
    uint32: { min: 0n, max: 2n ** 32n - 1n },
    int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
    uint64: { min: 0n, max: 2n ** 64n - 1n },
};

function isFloatType(type: PrimitiveType): type is FloatType {
    return type === 'float32' || type === 'float64';
}

function toFloat(x: LinearNumber, type: FloatType): number {
    let v: number;
    switch (x.kind) {
        case 'Integer':
        case 'Natural':
            v = Number(x.value);
            break;
        default:
            v = x.scalar;
    }
    return type === 'float32' ? Math.fround(v) : v;
}

function toInteger(x: LinearNumber, type: IntegerType): bigint {
    const { min, max } = INTEGER_BOUNDS[type];
    let v: bigint;
    switch (x.kind) {
        case 'Zero':
            return 0n;
        case 'Infinite':
            return x.polarity === 'positive' ? max : min;
        case 'Integer':
        case 'Natural':
            v = x.value;
            break;
        default:
            v = BigInt(Math.trunc(x.value));
    }
    if (v < min) return min;
    if (v > max) return max;
    return v;
}

/**
 * Coerces `x` to the primitive named by `type`.
 * 64-bit integer types come back as bigint, everything else as number.
 */
export function coerce(x: Maybe<LinearNumber>, type: WideIntegerType): bigint;
export function coerce(x: Maybe<LinearNumber>, type: NarrowType): number;
export function coerce(x: Maybe<LinearNumber>, type: PrimitiveType): number | bigint;
export function coerce(x: Maybe<LinearNumber>, type: PrimitiveType): number | bigint {
    if (isFloatType(type)) {
        return x ? toFloat(x, type) : 0;
    }
    if (type === 'int64' || type === 'uint64') {
        return x ? toInteger(x, type) : 0n;
    }
    return x ? Number(toInteger(x, type)) : 0;
}
