/**
 * @module existence-numbers
 * Number kinds as structural entities: member sets with value semantics,
 * the zero/infinity duality, the rotation axis and factored big integers.
 */

export { combineUnordered, hashBigInt, hashNumber, hashString } from './hash';
export {
    ConversionError, DomainViolationError, InvalidArgumentError, OntologyError,
    err, ok, type Result,
} from './errors';
export { ExistenceSet, type Maybe } from './existence-set';
export {
    Being, Entity, Existence, KINDS, Nature, Void,
    being, existence, invert, nature, voidOf,
    type Kind, type Polarity, type Scalar,
} from './entity';
export {
    Infinite, Integer, Irrational, Natural, Rational, Real, Zero,
    infinite, integer, natural, rational, real, withSign, zero,
    type FiniteNumber, type IntegralNumber, type LinearCapability, type LinearNumber, type RealNumber,
} from './linear';
export { Complex, NaturalComplex, complex, naturalComplex, type StructuralNumber } from './structural';
export {
    isFiniteNumber, isIntegral, isKnown, isLinear, isNumber, isStructural,
    type AnyEntity, type NumberKind,
} from './kinds';
export { add, multiply, negate, subtract } from './arithmetic';
export {
    complexToNaturalComplex, factoredToInteger, factoredToNatural, infiniteToZero,
    integerToNatural, integerToReal, naturalComplexToComplex, naturalToInteger,
    realToInteger, voidToZero, zeroToInfinite, zeroToVoid,
    type Conversion,
} from './conversions';
export {
    INTEGER_BOUNDS, coerce,
    type FloatType, type IntegerType, type NarrowType, type PrimitiveType, type WideIntegerType,
} from './coercion';
export { DEFAULT_SERIES_TERMS, eSeries, piSeries, type SeriesOptions } from './series';
export { RotationAxis, type Cycle } from './rotation';
export {
    DEFAULT_POW_CEILING, FactoredInteger, PowerFactor, factored, fullRangePow, power,
    type PowOptions,
} from './factored';
export { aliasesOf, kindOfAlias } from './aliases';
export { constants, type Constants } from './constants';
