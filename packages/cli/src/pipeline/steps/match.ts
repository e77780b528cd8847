import { reconcile } from '@tally/core';
import type { NormalizationIssue, ReconcileOutput } from '@tally/shared';
import type { PipelineStep } from '../types.js';
import { findInput } from './load.js';
import { promptContinue } from '../../utils/prompt.js';
import { errorMessage } from '../../utils/errors.js';

export function formatIssue(issue: NormalizationIssue): string {
    return `[${issue.source} line ${issue.line}] ${issue.message}`;
}

/**
 * Step 3: Matching
 * Runs the core engine over both files. Rows that could not be normalized
 * are reported and, after confirmation, left out.
 */
export const matchFiles: PipelineStep = async (state) => {
    const bank = findInput(state.files, 'bank');
    const personal = findInput(state.files, 'personal');
    if (!bank || !personal || !state.config) {
        state.errors.push({ step: 'match', message: 'Inputs were not loaded.', fatal: true });
        return state;
    }

    let result: ReconcileOutput;
    try {
        result = reconcile({
            bank: { rows: bank.table.rows, mapping: bank.mapping },
            personal: { rows: personal.table.rows, mapping: personal.mapping },
            config: state.config,
            aliases: state.aliases,
        });
    } catch (err) {
        state.errors.push({
            step: 'match',
            message: `Reconciliation failed: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }
    state.result = result;

    for (const warning of result.warnings) {
        state.warnings.push(`[${warning.source}] ${warning.message}`);
    }
    for (const issue of result.issues) {
        state.warnings.push(formatIssue(issue));
    }

    const issueCount = result.issues.length;
    if (issueCount > 0) {
        const shouldContinue = await promptContinue(
            `\n⚠️  ${issueCount} row(s) could not be read and were left out of matching. Continue?`,
            state.options
        );

        if (!shouldContinue) {
            state.errors.push({
                step: 'match',
                message: 'Aborted by user after unreadable rows.',
                fatal: true,
            });
        }
    }

    return state;
};
