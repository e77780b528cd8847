import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parseCsv, resolveColumnMapping, ColumnMappingError } from '@tally/core';
import type { SourceKind } from '@tally/shared';
import type { PipelineStep, InputFile } from '../types.js';
import { hashContent } from '../../utils/hash.js';
import { decodeText } from '../../utils/decode.js';
import { errorMessage } from '../../utils/errors.js';
import { success } from '../../utils/console.js';

async function loadFile(role: SourceKind, path: string): Promise<InputFile> {
    const buffer = await readFile(path);
    const { text, encoding } = decodeText(buffer);
    const table = parseCsv(text);
    const mapping = resolveColumnMapping(table.headers);

    return {
        role,
        path,
        filename: basename(path),
        hash: hashContent(buffer),
        encoding,
        table,
        mapping,
    };
}

/**
 * Step 2: Load Files
 * Reads both CSV files and resolves which column holds which field.
 * Files that are not valid UTF-8 are read as latin-1 with a warning.
 * Either file failing to load is fatal: there is nothing to reconcile against.
 */
export const loadFiles: PipelineStep = async (state) => {
    const inputs: [SourceKind, string][] = [
        ['bank', state.bankPath],
        ['personal', state.personalPath],
    ];

    for (const [role, path] of inputs) {
        try {
            const file = await loadFile(role, path);
            state.files.push(file);
            if (file.encoding === 'latin1') {
                state.warnings.push(`[${role}] ${file.filename} is not valid UTF-8; read as latin-1.`);
            }
            success(`${role}: ${file.filename} (${file.table.rows.length} rows, ${file.mapping.format} amounts)`);
        } catch (err) {
            const reason = err instanceof ColumnMappingError
                ? err.message
                : `Failed to read ${path}: ${errorMessage(err)}`;
            state.errors.push({
                step: 'load',
                message: `[${role}] ${reason}`,
                fatal: true,
                error: err,
            });
            return state;
        }
    }

    return state;
};

export function findInput(files: readonly InputFile[], role: SourceKind): InputFile | undefined {
    return files.find(f => f.role === role);
}
