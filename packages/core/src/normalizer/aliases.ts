/**
 * Merchant alias substitution.
 */

import type { AliasEntry } from '../types/index.js';
import { ALIAS_SUGGESTION_THRESHOLD } from '../types/index.js';
import { normalizeDescription } from '../utils/normalize.js';
import { descriptionSimilarity } from '../matcher/similarity.js';

/**
 * Maps a normalized description to its aliased form, or null when no alias applies.
 */
export type AliasLookup = (description: string) => string | null;

function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a lookup from alias entries.
 *
 * Aliases and canonical names are normalized the same way descriptions are.
 * Matching is whole-word, the longest alias wins where several start at the
 * same position, and replaced text is never rewritten again. Duplicate
 * aliases keep their first entry.
 */
export function createAliasLookup(entries: ReadonlyArray<Pick<AliasEntry, 'alias' | 'canonical'>>): AliasLookup {
    const canonicalByAlias = new Map<string, string>();
    for (const entry of entries) {
        const alias = normalizeDescription(entry.alias);
        const canonical = normalizeDescription(entry.canonical);
        if (alias === '' || canonical === '' || canonicalByAlias.has(alias)) continue;
        canonicalByAlias.set(alias, canonical);
    }

    if (canonicalByAlias.size === 0) {
        return () => null;
    }

    const alternatives = [...canonicalByAlias.keys()]
        .sort((a, b) => b.length - a.length)
        .map(escapeRegex)
        .join('|');
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives})(?![\\p{L}\\p{N}_])`, 'gu');

    return (description: string) => {
        let matched = false;
        const replaced = description.replace(pattern, alias => {
            matched = true;
            return canonicalByAlias.get(alias) ?? alias;
        });
        return matched ? replaced : null;
    };
}

export interface AliasSuggestion {
    alias: string;
    canonical: string;
    similarity: number;
}

/**
 * Existing aliases that look like `description`, most similar first.
 *
 * Both sides are normalized before comparing. Entries scoring below
 * `threshold` are left out; equal scores keep their input order.
 */
export function findSimilarAliases(
    description: string,
    entries: ReadonlyArray<Pick<AliasEntry, 'alias' | 'canonical'>>,
    threshold: number = ALIAS_SUGGESTION_THRESHOLD
): AliasSuggestion[] {
    const target = normalizeDescription(description);
    const suggestions: AliasSuggestion[] = [];

    for (const entry of entries) {
        const similarity = descriptionSimilarity(target, normalizeDescription(entry.alias));
        if (similarity > 0 && similarity >= threshold) {
            suggestions.push({ alias: entry.alias, canonical: entry.canonical, similarity });
        }
    }

    return suggestions.sort((a, b) => b.similarity - a.similarity);
}
