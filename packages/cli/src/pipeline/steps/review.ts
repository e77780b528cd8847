import { acceptHighTier } from '@tally/core';
import type { PipelineStep } from '../types.js';
import { info } from '../../utils/console.js';

/**
 * Step 4: Review
 * Accepts pending high-tier matches unless --no-auto-accept is given.
 * Everything else stays pending for review in the workbook.
 */
export const reviewMatches: PipelineStep = async (state) => {
    if (!state.result) {
        state.errors.push({ step: 'review', message: 'No matching result to review.', fatal: true });
        return state;
    }

    if (!state.options.autoAccept) {
        info('Auto-accept disabled: all matches left pending.');
        return state;
    }

    const before = state.result.matches.filter(m => m.status === 'accepted').length;
    const matches = acceptHighTier(state.result.matches);
    const after = matches.filter(m => m.status === 'accepted').length;

    state.result = { ...state.result, matches };
    info(`Accepted ${after - before} high-confidence match(es).`);

    return state;
};
