import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RunManifestSchema } from '@tally/shared';
import { exportResults, buildManifest } from '../src/pipeline/steps/export.js';
import { generateReviewExcel } from '../src/excel/review.js';
import { createWorkbook } from '../src/excel/utils.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import type { PipelineState, InputFile } from '../src/pipeline/types.js';
import { load, sampleResult, BANK_CSV, PERSONAL_CSV } from './fixtures.js';

vi.mock('node:fs/promises');
vi.mock('../src/excel/review.js');

function inputFile(role: InputFile['role'], csv: string): InputFile {
    const { table, mapping } = load(csv);
    return { role, path: `/data/${role}.csv`, filename: `${role}.csv`, hash: `sha256:${role}`, encoding: 'utf-8', table, mapping };
}

function state(overrides: Partial<PipelineState['options']> = {}): PipelineState {
    return {
        runId: '2024-04-01T09-00-00',
        workspace: resolveWorkspace('/books'),
        options: { dryRun: false, yes: true, autoAccept: true, ...overrides },
        bankPath: '/data/bank.csv',
        personalPath: '/data/personal.csv',
        aliases: [],
        files: [inputFile('bank', BANK_CSV), inputFile('personal', PERSONAL_CSV)],
        result: sampleResult(),
        warnings: [],
        errors: [],
    };
}

describe('Export step', () => {
    const workbook = createWorkbook();
    const writeWorkbook = vi.spyOn(workbook.xlsx, 'writeFile').mockResolvedValue(undefined);

    beforeEach(() => {
        vi.mocked(mkdir).mockClear();
        vi.mocked(writeFile).mockClear();
        writeWorkbook.mockClear();
        vi.mocked(generateReviewExcel).mockResolvedValue(workbook);
    });

    it('writes the workbook, reconciled CSV and manifest under the run directory', async () => {
        const result = await exportResults(state());
        const outDir = join('/books', 'outputs', '2024-04-01T09-00-00');

        expect(result.errors).toEqual([]);
        expect(result.outputPath).toBe(outDir);
        expect(mkdir).toHaveBeenCalledWith(outDir, { recursive: true });
        expect(writeWorkbook).toHaveBeenCalledWith(join(outDir, 'review.xlsx'));

        const written = vi.mocked(writeFile).mock.calls.map(call => call[0]);
        expect(written).toEqual([join(outDir, 'personal.reconciled.csv'), join(outDir, 'run_manifest.json')]);
    });

    it('honors --output', async () => {
        const result = await exportResults(state({ output: '/tmp/review' }));
        expect(result.outputPath).toBe('/tmp/review');
    });

    it('writes nothing on a dry run', async () => {
        const result = await exportResults(state({ dryRun: true }));

        expect(result.warnings).toEqual(['Dry run: Skipping file export.']);
        expect(mkdir).not.toHaveBeenCalled();
        expect(writeFile).not.toHaveBeenCalled();
    });

    it('records a fatal error when writing fails', async () => {
        vi.mocked(mkdir).mockRejectedValueOnce(new Error('EACCES: permission denied'));

        const result = await exportResults(state());

        expect(result.errors).toEqual([{
            step: 'export',
            message: `Failed to export results to ${join('/books', 'outputs', '2024-04-01T09-00-00')}: EACCES: permission denied`,
            fatal: true,
            error: expect.any(Error),
        }]);
    });
});

describe('buildManifest', () => {
    it('records inputs, decisions and counts', () => {
        const s = state();
        const result = sampleResult();
        const manifest = buildManifest(s, result, new Date('2024-04-01T09:00:00.000Z'));

        expect(RunManifestSchema.parse(manifest)).toEqual(manifest);
        expect(manifest.run_timestamp).toBe('2024-04-01T09:00:00.000Z');
        expect(manifest.input_files).toEqual({ 'bank.csv': 'sha256:bank', 'personal.csv': 'sha256:personal' });
        expect(manifest.accepted).toEqual([
            { bank_txn_id: result.bank[0].txn_id, personal_txn_id: result.personal[0].txn_id },
        ]);
        expect(manifest.stats.none).toBe(1);
        expect(manifest.config.min_confidence).toBe(0.1);
    });
});
