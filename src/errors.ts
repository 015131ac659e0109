/**
 * @module errors
 * Contract violations raised synchronously at construction or conversion time.
 * Nothing here is transient; none of these are retried.
 */

/** Root of every error the library raises. */
export class OntologyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** An absent member, a negative Natural, a negative power, a non-finite Real, ... */
export class InvalidArgumentError extends OntologyError {}

/** A sign or polarity forced onto a kind that is fixed to the other one. */
export class DomainViolationError extends OntologyError {}

/** Carried in the `err` arm of a fallible conversion. */
export class ConversionError extends OntologyError {
    constructor(
        readonly from: string,
        readonly to: string,
        reason: string
    ) {
        super(`${from} -> ${to}: ${reason}`);
    }
}

export type Result<TErr, TOk> = { ok: TOk } | { err: TErr };

export function ok<T>(value: T): { ok: T } {
    return { ok: value };
}

export function err<E>(error: E): { err: E } {
    return { err: error };
}
