import type { ReconcileConfig, ReconcileConfigInput } from './types/index.js';
import { ReconcileConfigSchema } from './types/index.js';
import { ConfigurationError } from './errors.js';

/**
 * Fill defaults and validate reconcile options.
 *
 * @throws ConfigurationError listing every problem found
 */
export function resolveConfig(input: ReconcileConfigInput = {}): ReconcileConfig {
    const result = ReconcileConfigSchema.safeParse(input);
    if (!result.success) {
        const problems = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            return path && !issue.message.startsWith(path) ? `${path}: ${issue.message}` : issue.message;
        });
        throw new ConfigurationError(problems);
    }
    return result.data;
}
