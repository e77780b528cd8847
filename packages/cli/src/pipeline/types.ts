import type {
    AliasEntry,
    ColumnMapping,
    CsvTable,
    ReconcileConfig,
    ReconcileOutput,
    SourceKind,
} from '@tally/shared';
import type { Workspace, ReconcileOptions } from '../types.js';
import type { TextEncodingName } from '../utils/decode.js';

/**
 * One of the two CSV inputs, read and mapped.
 */
export interface InputFile {
    role: SourceKind;
    path: string;
    filename: string;
    hash: string;
    encoding: TextEncodingName;
    table: CsvTable;
    mapping: ColumnMapping;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the reconcile pipeline.
 */
export interface PipelineState {
    runId: string;
    workspace: Workspace;
    options: ReconcileOptions;
    bankPath: string;
    personalPath: string;

    // Accumulated during pipeline execution
    config?: ReconcileConfig;
    aliases: AliasEntry[];
    files: InputFile[];
    result?: ReconcileOutput;
    outputPath?: string;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
