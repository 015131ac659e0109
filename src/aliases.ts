/**
 * @module aliases
 * The names each kind is also called by.
 */

import table from './aliases.json';
import { KINDS, type Kind } from './entity';

const byAlias = new Map<string, Kind>();
for (const kind of KINDS) {
    for (const alias of table[kind]) byAlias.set(alias, kind);
}

export function aliasesOf(kind: Kind): readonly string[] {
    return table[kind];
}

/** Resolves an alias (in any of its languages) back to its kind. */
export function kindOfAlias(name: string): Kind | undefined {
    return byAlias.get(name);
}
