import { parseDocument, isSeq, isMap, YAMLSeq, type Document } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import { normalizeDescription } from '@tally/core';
import type { AliasEntry } from '@tally/shared';

const EMPTY_FILE = '# Description aliases: alias -> canonical\naliases:\n';

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readDocument(filePath: string): Promise<Document> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isMissingFile(err)) {
            content = EMPTY_FILE;
        } else {
            throw err;
        }
    }
    return parseDocument(content || 'aliases:');
}

/**
 * The alias list node, created when absent.
 * Accepts a top-level sequence or an `aliases:` key.
 */
function aliasList(doc: Document, filePath: string, create: boolean): YAMLSeq | null {
    const root = doc.contents;

    if (isSeq(root)) {
        return root;
    }
    if (isMap(root)) {
        const aliases = root.get('aliases');
        if (isSeq(aliases)) return aliases;
        if (aliases !== null && aliases !== undefined) {
            throw new Error(`Invalid YAML structure in ${filePath}: "aliases" must be a list.`);
        }
        if (!create) return null;
        const created = new YAMLSeq();
        root.set('aliases', created);
        return created;
    }
    if (!create) return null;
    const created = new YAMLSeq();
    doc.set('aliases', created);
    return created;
}

function findAlias(list: YAMLSeq, alias: string): number {
    const key = normalizeDescription(alias);
    return list.items.findIndex(item => {
        if (!isMap(item)) return false;
        const value = item.get('alias');
        return typeof value === 'string' && normalizeDescription(value) === key;
    });
}

/**
 * Adds an alias, or updates its canonical form when it already exists.
 * Comments and layout of the rest of the file are preserved.
 */
export async function upsertAliasInYaml(filePath: string, entry: AliasEntry): Promise<'added' | 'updated'> {
    const doc = await readDocument(filePath);
    const list = aliasList(doc, filePath, true);
    if (!list) {
        throw new Error(`Invalid YAML structure in ${filePath}`);
    }

    const index = findAlias(list, entry.alias);
    const existing = index >= 0 ? list.items[index] : undefined;
    if (isMap(existing)) {
        existing.set('canonical', entry.canonical);
        if (entry.note !== undefined) existing.set('note', entry.note);
        await writeFile(filePath, doc.toString());
        return 'updated';
    }

    list.add(doc.createNode(entry));
    await writeFile(filePath, doc.toString());
    return 'added';
}

/**
 * Removes an alias. Returns false (and writes nothing) when it was not present.
 */
export async function removeAliasFromYaml(filePath: string, alias: string): Promise<boolean> {
    const doc = await readDocument(filePath);
    const list = aliasList(doc, filePath, false);
    if (!list) return false;

    const index = findAlias(list, alias);
    if (index < 0) return false;

    list.items.splice(index, 1);
    await writeFile(filePath, doc.toString());
    return true;
}
