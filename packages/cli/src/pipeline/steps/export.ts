import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ReconcileOutput, RunManifest } from '@tally/shared';
import type { PipelineStep, PipelineState } from '../types.js';
import { findInput } from './load.js';
import { getOutputsPath } from '../../workspace/paths.js';
import { generateReviewExcel } from '../../excel/review.js';
import { buildReconciledCsv } from '../../csv/reconciled.js';
import { errorMessage } from '../../utils/errors.js';

export const MANIFEST_VERSION = '1.0.0';

/**
 * Manifest recording what went in and what was decided.
 * Matches RunManifestSchema in @tally/shared.
 */
export function buildManifest(state: PipelineState, result: ReconcileOutput, now: Date = new Date()): RunManifest {
    const accepted: RunManifest['accepted'] = [];
    for (const match of result.matches) {
        if (match.status === 'accepted' && match.personal_txn_id !== null) {
            accepted.push({ bank_txn_id: match.bank_txn_id, personal_txn_id: match.personal_txn_id });
        }
    }

    return {
        run_id: state.runId,
        run_timestamp: now.toISOString(),
        input_files: Object.fromEntries(state.files.map(f => [f.filename, f.hash])),
        config: result.config,
        sign_convention: result.sign_convention,
        stats: result.stats,
        accepted,
        version: MANIFEST_VERSION,
    };
}

/**
 * Step 6: Export
 * Writes the review workbook, the updated personal CSV and the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const result = state.result;
    const personal = findInput(state.files, 'personal');
    if (!result || !personal) {
        state.errors.push({ step: 'export', message: 'Nothing to export.', fatal: true });
        return state;
    }

    const outputPath = state.options.output ?? getOutputsPath(state.workspace, state.runId);

    try {
        await mkdir(outputPath, { recursive: true });

        const reviewWb = await generateReviewExcel(result);
        await reviewWb.xlsx.writeFile(join(outputPath, 'review.xlsx'));

        await writeFile(
            join(outputPath, 'personal.reconciled.csv'),
            buildReconciledCsv(personal.table, personal.mapping, result)
        );

        await writeFile(
            join(outputPath, 'run_manifest.json'),
            JSON.stringify(buildManifest(state, result), null, 2)
        );

        state.outputPath = outputPath;
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
