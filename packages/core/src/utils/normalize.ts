/**
 * Description normalization.
 *
 * NOTE: txn_id uses raw_description, not this normalized form.
 */

const EDGE_PUNCTUATION = /^[\p{P}\p{S}\s]+|[\p{P}\p{S}\s]+$/gu;
const APOSTROPHES = /['’‘`]/g;

/**
 * Normalize transaction description for comparison.
 *
 * Transformations:
 * - Convert to lowercase
 * - Collapse multiple whitespace to single space
 * - Strip leading/trailing punctuation and symbols
 *
 * @param raw - Raw description string
 * @returns Normalized description
 */
export function normalizeDescription(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .replace(EDGE_PUNCTUATION, '');
}

/**
 * Whitespace tokens of a description with apostrophes removed,
 * so "joe's" and "joes" compare equal.
 */
export function descriptionTokens(description: string): string[] {
    return description
        .toLowerCase()
        .replace(APOSTROPHES, '')
        .split(/\s+/)
        .filter(t => t.length > 0);
}

/**
 * Key used by the intelligent match: the first two tokens, or null when the
 * description has fewer than two.
 */
export function leadingTokenKey(description: string): string | null {
    const tokens = descriptionTokens(description);
    if (tokens.length < 2) return null;
    return `${tokens[0]} ${tokens[1]}`;
}
