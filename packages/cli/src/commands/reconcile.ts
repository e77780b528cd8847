import { resolve } from 'node:path';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace, createRunId } from '../workspace/paths.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, section, success, warn, arrow, error } from '../utils/console.js';
import type { ReconcileOptions } from '../types.js';

/**
 * `tally reconcile <bank.csv> <personal.csv>`
 * Returns the process exit code.
 */
export async function reconcileFiles(bankPath: string, personalPath: string, options: ReconcileOptions): Promise<number> {
    log('\nTally - Reconciling bank statement against personal records');

    // 1. Workspace detection; without one the current directory is used
    arrow('Detecting workspace...');
    const root = options.workspace ?? detectWorkspaceRoot() ?? process.cwd();
    const workspace = resolveWorkspace(resolve(root));
    success(`Workspace: ${workspace.root}`);

    // 2. Run Pipeline
    const state = await runPipeline({
        runId: createRunId(),
        workspace,
        bankPath: resolve(bankPath),
        personalPath: resolve(personalPath),
        options,
    });

    // 3. Report Final Status
    section('Reconciliation Summary');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Reconciliation failed with fatal errors.');
            return 1;
        }
    }

    success('Reconciliation complete.');
    if (state.result) {
        arrow(`Matches proposed: ${state.result.matches.filter(m => m.personal_index !== null).length}`);
        arrow(`Missing from personal records: ${state.result.missing.length}`);
    }

    if (state.outputPath) {
        arrow(`Outputs saved to: ${state.outputPath}`);
    } else if (options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    }

    return 0;
}
