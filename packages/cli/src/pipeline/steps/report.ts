import { displayAmount, summarizeMatches } from '@tally/core';
import type { Transaction } from '@tally/shared';
import type { PipelineStep } from '../types.js';
import { log, detail, info, arrow } from '../../utils/console.js';

function describeTxn(txn: Transaction): string {
    return `${txn.date}  ${displayAmount(txn.amount).padStart(12)}  ${txn.raw_description}`;
}

/**
 * Step 5: Report
 * Prints tier counts, the sign decision and every bank row left unmatched.
 */
export const reportResults: PipelineStep = async (state) => {
    const result = state.result;
    if (!result) {
        state.errors.push({ step: 'report', message: 'No matching result to report.', fatal: true });
        return state;
    }

    const summary = summarizeMatches(result.matches);
    const { stats } = result;

    if (result.sign_convention.inverted) {
        info('Personal amounts were inverted to follow the bank sign convention.');
    }
    if (stats.personal_reconciled_filtered > 0) {
        info(`${stats.personal_reconciled_filtered} personal row(s) already reconciled, skipped.`);
    }
    if (stats.personal_after_cutoff_filtered > 0) {
        info(`${stats.personal_after_cutoff_filtered} personal row(s) dated after ${stats.cutoff_date ?? 'the statement'}, skipped.`);
    }

    arrow(`Bank rows: ${stats.bank_rows}, personal rows: ${stats.personal_rows}`);
    arrow(`High: ${summary.tiers.high}  Medium: ${summary.tiers.medium}  Low: ${summary.tiers.low}  None: ${summary.tiers.none}`);
    arrow(`Accepted: ${summary.statuses.accepted}  Pending: ${summary.statuses.pending}  Rejected: ${summary.statuses.rejected}`);

    if (result.missing.length > 0) {
        log(`\nMissing from personal records (${result.missing.length}):`);
        for (const txn of result.missing) {
            detail(describeTxn(txn));
        }
    }

    if (result.unmatched_personal.length > 0) {
        log(`\nPersonal rows with no bank counterpart (${result.unmatched_personal.length}):`);
        for (const txn of result.unmatched_personal) {
            detail(describeTxn(txn));
        }
    }

    return state;
};
