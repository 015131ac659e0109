/**
 * @module kinds
 * The closed unions over every entity variant, and the guards that narrow to them.
 */

import { Being, Entity, Existence, Nature, Void } from './entity';
import {
    Infinite, Integer, Irrational, Natural, Rational, Real, Zero,
    type FiniteNumber, type IntegralNumber, type LinearNumber,
} from './linear';
import { Complex, NaturalComplex, type StructuralNumber } from './structural';

export type NumberKind = LinearNumber | StructuralNumber;
export type AnyEntity = Existence | Nature | Being | Void | NumberKind;

export function isLinear(x: Entity): x is LinearNumber {
    return x instanceof Zero || x instanceof Infinite || isFiniteNumber(x);
}

export function isStructural(x: Entity): x is StructuralNumber {
    return x instanceof Complex || x instanceof NaturalComplex;
}

export function isNumber(x: Entity): x is NumberKind {
    return isLinear(x) || isStructural(x);
}

export function isFiniteNumber(x: Entity): x is FiniteNumber {
    return isIntegral(x) || x instanceof Real || x instanceof Rational || x instanceof Irrational;
}

export function isIntegral(x: Entity): x is IntegralNumber {
    return x instanceof Integer || x instanceof Natural;
}

/** Narrows any entity to the closed union of variants. */
export function isKnown(x: Entity): x is AnyEntity {
    return x instanceof Existence
        || x instanceof Nature
        || x instanceof Being
        || x instanceof Void
        || isNumber(x);
}
