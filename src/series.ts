/**
 * @module series
 * Convergent series for the irrational constants, evaluated from the tail inward.
 */

import { InvalidArgumentError } from './errors';

export const DEFAULT_SERIES_TERMS = 100;

export interface SeriesOptions {
    /** Depth of the series; must be a positive integer. */
    readonly terms?: number;
}

function termsOf(options: SeriesOptions): number {
    const terms = options.terms ?? DEFAULT_SERIES_TERMS;
    if (!Number.isInteger(terms) || terms < 1) {
        throw new InvalidArgumentError(`series: terms must be a positive integer, got ${terms}`);
    }
    return terms;
}

/**
 * π = 2 + (1/3)(2 + (2/5)(2 + (3/7)(…))), with tail `2·terms + 1`.
 */
export function piSeries(options: SeriesOptions = {}): number {
    const terms = termsOf(options);
    let acc = 2 * terms + 1;
    for (let n = terms - 1; n >= 1; n--) {
        acc = 2 + (n / (2 * n + 1)) * acc;
    }
    return acc;
}

/**
 * eˣ = 1 + (x/1)(1 + (x/2)(1 + …)), with tail 1.
 */
export function eSeries(x: number = 1, options: SeriesOptions = {}): number {
    const terms = termsOf(options);
    let acc = 1;
    for (let n = terms - 1; n >= 1; n--) {
        acc = 1 + (x / n) * acc;
    }
    return acc;
}
