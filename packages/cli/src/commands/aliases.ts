import { resolve } from 'node:path';
import { normalizeDescription, findSimilarAliases, ALIAS_SUGGESTION_THRESHOLD } from '@tally/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadAliases } from '../workspace/config.js';
import { upsertAliasInYaml, removeAliasFromYaml } from '../yaml/aliases.js';
import { log, success, warn, info, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { AliasOptions, Workspace } from '../types.js';

function workspaceFor(options: AliasOptions): Workspace {
    const root = options.workspace ?? detectWorkspaceRoot() ?? process.cwd();
    return resolveWorkspace(resolve(root));
}

function today(now: Date = new Date()): string {
    return now.toISOString().slice(0, 10);
}

/**
 * `tally add-alias <alias> <canonical>`
 * Both sides must still contain something after normalization.
 */
export async function addAlias(alias: string, canonical: string, options: AliasOptions): Promise<number> {
    if (normalizeDescription(alias) === '' || normalizeDescription(canonical) === '') {
        error('Error: Alias and canonical description must not be empty.');
        return 1;
    }

    const workspace = workspaceFor(options);

    try {
        const existing = loadAliases(workspace)
            .find(a => normalizeDescription(a.alias) === normalizeDescription(alias));
        if (existing) {
            warn(`Alias "${existing.alias}" already maps to "${existing.canonical}"; updating it.`);
        }

        const outcome = await upsertAliasInYaml(workspace.config.aliasesPath, {
            alias,
            canonical,
            added_date: today(),
            ...(options.note !== undefined ? { note: options.note } : {}),
        });
        success(`Alias ${outcome}: "${alias}" -> "${canonical}"`);
        info(`Saved to ${workspace.config.aliasesPath}`);
        return 0;
    } catch (err) {
        error(`Error: Failed to save alias. ${errorMessage(err)}`);
        return 1;
    }
}

/**
 * `tally remove-alias <alias>`
 */
export async function removeAlias(alias: string, options: AliasOptions): Promise<number> {
    const workspace = workspaceFor(options);

    try {
        const removed = await removeAliasFromYaml(workspace.config.aliasesPath, alias);
        if (!removed) {
            warn(`Alias "${alias}" not found in ${workspace.config.aliasesPath}`);
            return 1;
        }
        success(`Alias removed: "${alias}"`);
        return 0;
    } catch (err) {
        error(`Error: Failed to remove alias. ${errorMessage(err)}`);
        return 1;
    }
}

/**
 * `tally aliases [description]`
 * With a description, lists only aliases similar to it, most similar first.
 */
export async function listAliases(options: AliasOptions): Promise<number> {
    const threshold = options.threshold ?? ALIAS_SUGGESTION_THRESHOLD;
    if (threshold < 0 || threshold > 1) {
        error(`Error: --threshold must be between 0 and 1, got ${threshold}`);
        return 1;
    }

    const workspace = workspaceFor(options);

    try {
        const aliases = loadAliases(workspace);
        if (aliases.length === 0) {
            info(`No aliases defined in ${workspace.config.aliasesPath}`);
            return 0;
        }

        if (options.similarTo !== undefined) {
            const similar = findSimilarAliases(options.similarTo, aliases, threshold);
            if (similar.length === 0) {
                info(`No aliases similar to "${options.similarTo}"`);
                return 0;
            }
            for (const s of similar) {
                log(`${s.alias} -> ${s.canonical}  (${Math.round(s.similarity * 100)}% similar)`);
            }
            return 0;
        }

        for (const entry of aliases) {
            log(`${entry.alias} -> ${entry.canonical}${entry.note ? `  (${entry.note})` : ''}`);
        }
        return 0;
    } catch (err) {
        error(`Error: Failed to load aliases. ${errorMessage(err)}`);
        return 1;
    }
}
