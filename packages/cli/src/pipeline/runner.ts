import type { PipelineState, PipelineStep } from './types.js';
import { configure } from './steps/configure.js';
import { loadFiles } from './steps/load.js';
import { matchFiles } from './steps/match.js';
import { reviewMatches } from './steps/review.js';
import { reportResults } from './steps/report.js';
import { exportResults } from './steps/export.js';
import type { Workspace, ReconcileOptions } from '../types.js';

export interface PipelineInput {
    runId: string;
    workspace: Workspace;
    bankPath: string;
    personalPath: string;
    options: ReconcileOptions;
}

export const PIPELINE_STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Configuration', fn: configure },
    { name: 'Load Files', fn: loadFiles },
    { name: 'Matching', fn: matchFiles },
    { name: 'Review', fn: reviewMatches },
    { name: 'Report', fn: reportResults },
    { name: 'Export', fn: exportResults },
];

/**
 * Orchestrates the execution of the reconcile pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    input: PipelineInput,
    steps: { name: string; fn: PipelineStep }[] = PIPELINE_STEPS
): Promise<PipelineState> {
    let state: PipelineState = {
        ...input,
        aliases: [],
        files: [],
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        console.log(`\n→ Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
