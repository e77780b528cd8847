import { resolveConfig, ConfigurationError } from '@tally/core';
import type { ReconcileConfigInput } from '@tally/shared';
import type { PipelineStep } from '../types.js';
import { loadAliases } from '../../workspace/config.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 1: Configuration
 * Validates matching options and loads the workspace aliases.
 * Nothing is read from the input files until both succeed.
 */
export const configure: PipelineStep = async (state) => {
    const input: ReconcileConfigInput = {};
    if (state.options.minConfidence !== undefined) input.min_confidence = state.options.minConfidence;
    if (state.options.dateWindow !== undefined) input.date_window_days = state.options.dateWindow;
    if (state.options.amountTolerance !== undefined) input.amount_tolerance = state.options.amountTolerance;

    try {
        state.config = resolveConfig(input);
    } catch (err) {
        state.errors.push({
            step: 'configure',
            message: err instanceof ConfigurationError ? err.message : `Invalid options: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    try {
        state.aliases = loadAliases(state.workspace);
    } catch (err) {
        state.errors.push({
            step: 'configure',
            message: `Failed to load aliases: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
