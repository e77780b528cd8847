import { join } from 'node:path';
import type { Workspace } from '../types.js';
import { ALIASES_FILE } from './detect.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        config: {
            aliasesPath: join(root, ALIASES_FILE),
        },
    };
}

/**
 * Run ids sort chronologically: 2024-03-31T18-05-09 style, taken in UTC.
 */
export function createRunId(now: Date = new Date()): string {
    return now.toISOString().slice(0, 19).replace(/:/g, '-');
}

export function getOutputsPath(workspace: Workspace, runId: string): string {
    return join(workspace.outputs, runId);
}
