/**
 * Error types raised by the engine.
 *
 * Only ConfigurationError and ColumnMappingError abort a run. NormalizationError
 * is caught per row and turned into a NormalizationIssue.
 */

import type { NormalizationIssue, SourceKind } from './types/index.js';

export type TallyErrorCode =
    | 'normalization'
    | 'configuration'
    | 'column_mapping'
    | 'review_conflict';

export class TallyError extends Error {
    public readonly code: TallyErrorCode;

    constructor(message: string, code: TallyErrorCode) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A row's date, amount or flag cannot be parsed.
 */
export class NormalizationError extends TallyError {
    public readonly field: NormalizationIssue['field'];
    public readonly value: string;
    public source?: SourceKind;
    public line?: number;

    constructor(field: NormalizationIssue['field'], value: string, message: string) {
        super(message, 'normalization');
        this.field = field;
        this.value = value;
    }

    /**
     * Attach the row's origin once it is known (parsers below the row level don't know it).
     */
    at(source: SourceKind, line: number): this {
        this.source = source;
        this.line = line;
        return this;
    }

    toIssue(source: SourceKind, line: number): NormalizationIssue {
        return {
            source: this.source ?? source,
            line: this.line ?? line,
            field: this.field,
            value: this.value,
            message: this.message,
        };
    }
}

/**
 * Invalid options. Raised before any matching begins.
 */
export class ConfigurationError extends TallyError {
    public readonly problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`, 'configuration');
        this.problems = problems;
    }
}

/**
 * Required columns could not be found among a file's headers.
 */
export class ColumnMappingError extends TallyError {
    public readonly missing: string[];
    public readonly headers: string[];

    constructor(missing: string[], headers: string[]) {
        super(
            `Missing required columns: ${missing.join(', ')}. Found: ${headers.join(', ')}`,
            'column_mapping'
        );
        this.missing = missing;
        this.headers = headers;
    }
}

/**
 * A review decision would break the one-accepted-match-per-personal-row invariant.
 */
export class ReviewConflictError extends TallyError {
    constructor(message: string) {
        super(message, 'review_conflict');
    }
}
