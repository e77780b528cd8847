import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { AliasFileSchema, type AliasEntry } from '@tally/shared';
import type { Workspace } from '../types.js';

/**
 * Loads description aliases from config/aliases.yaml.
 * A missing file means no aliases.
 */
export function loadAliases(workspace: Workspace): AliasEntry[] {
    const path = workspace.config.aliasesPath;
    if (!existsSync(path)) {
        return [];
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    if (data === null || data === undefined) return [];

    // Support either a direct array or a wrapped object { aliases: [...] }
    const wrapped = Array.isArray(data) ? { aliases: data } : data;
    const result = AliasFileSchema.safeParse(wrapped);
    if (!result.success) {
        const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new Error(`Invalid alias file ${path}: ${problems.join('; ')}`);
    }
    return result.data.aliases;
}
