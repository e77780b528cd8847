/**
 * Options for `tally reconcile`.
 * Numeric options stay undefined when not given so the core defaults apply.
 */
export interface ReconcileOptions {
    dryRun: boolean;
    yes: boolean;
    autoAccept: boolean;
    minConfidence?: number;
    dateWindow?: number;
    amountTolerance?: number;
    output?: string;
    workspace?: string;
}

export interface AliasOptions {
    workspace?: string;
    note?: string;
    /** `tally aliases <description>`: only list aliases similar to this. */
    similarTo?: string;
    threshold?: number;
}

export interface WorkspaceConfig {
    aliasesPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    config: WorkspaceConfig;
}
