/**
 * Description similarity.
 *
 * Indel similarity: Levenshtein distance where a substitution costs as much
 * as a deletion plus an insertion, scaled by the combined length.
 *
 *   similarity = 1 - indel / (len_a + len_b)
 *
 * 1.0 only for identical strings, 0.0 when nothing is shared.
 */

import natural from 'natural';

const INDEL_COSTS = {
    insertion_cost: 1,
    deletion_cost: 1,
    substitution_cost: 2,
};

/**
 * Similarity of two normalized descriptions in [0, 1].
 * Empty on either side scores 0.
 */
export function descriptionSimilarity(a: string, b: string): number {
    if (a === '' || b === '') return 0;
    if (a === b) return 1;

    const distance = natural.LevenshteinDistance(a, b, INDEL_COSTS);
    const similarity = 1 - distance / (a.length + b.length);
    return Math.min(1, Math.max(0, similarity));
}
