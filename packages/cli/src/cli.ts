/**
 * Command line parsing and dispatch.
 */

import { parseArgs } from 'node:util';
import { reconcileFiles } from './commands/reconcile.js';
import { addAlias, removeAlias, listAliases } from './commands/aliases.js';
import { errorMessage } from './utils/errors.js';
import type { ReconcileOptions } from './types.js';

export const USAGE = `Tally - bank statement reconciliation

Usage:
  tally reconcile <bank.csv> <personal.csv> [options]
    -c, --min-confidence <n>    minimum confidence to propose a match (default 0.1)
    -d, --date-window <days>    days either side of the bank date (default 3)
        --amount-tolerance <n>  relative difference where the amount score reaches 0 (default 0.05)
        --dry-run               print results, write nothing
        --no-auto-accept        leave high-confidence matches pending
    -o, --output <dir>          output directory (default <workspace>/outputs/<run-id>)
    -w, --workspace <dir>       workspace root (default: search for config/aliases.yaml)
    -y, --yes                   continue past rows that could not be read
  tally add-alias <alias> <canonical> [-w <dir>] [--note <text>]
  tally remove-alias <alias> [-w <dir>]
  tally aliases [description] [-w <dir>] [--threshold <n>]
    with a description, list only aliases at least <n> similar to it (default 0.8)`;

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

/**
 * Our own usage errors, and the ERR_PARSE_ARGS_* errors node:util raises.
 */
function isUsageError(err: unknown): boolean {
    if (err instanceof UsageError) return true;
    return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('ERR_PARSE_ARGS');
}

function parseNumber(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n)) {
        throw new UsageError(`${flag} expects a number, got "${value}"`);
    }
    return n;
}

function expectArgs(command: string, positionals: string[], count: number): void {
    if (positionals.length !== count) {
        throw new UsageError(`${command} takes ${count} argument(s), got ${positionals.length}`);
    }
}

/**
 * Parses `reconcile` flags. Numeric flags are only checked for being
 * numbers here; range checks belong to the configuration step.
 */
export function parseReconcileArgs(args: string[]): { bankPath: string; personalPath: string; options: ReconcileOptions } {
    const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: {
            'min-confidence': { type: 'string', short: 'c' },
            'date-window': { type: 'string', short: 'd' },
            'amount-tolerance': { type: 'string' },
            'dry-run': { type: 'boolean', default: false },
            'no-auto-accept': { type: 'boolean', default: false },
            output: { type: 'string', short: 'o' },
            workspace: { type: 'string', short: 'w' },
            yes: { type: 'boolean', short: 'y', default: false },
        },
    });

    expectArgs('reconcile', positionals, 2);
    const [bankPath, personalPath] = positionals;

    return {
        bankPath,
        personalPath,
        options: {
            dryRun: values['dry-run'] ?? false,
            yes: values.yes ?? false,
            autoAccept: !(values['no-auto-accept'] ?? false),
            minConfidence: parseNumber('--min-confidence', values['min-confidence']),
            dateWindow: parseNumber('--date-window', values['date-window']),
            amountTolerance: parseNumber('--amount-tolerance', values['amount-tolerance']),
            output: values.output,
            workspace: values.workspace,
        },
    };
}

function parseAliasArgs(args: string[]): { positionals: string[]; workspace?: string; note?: string; threshold?: number } {
    const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: {
            workspace: { type: 'string', short: 'w' },
            note: { type: 'string' },
            threshold: { type: 'string' },
        },
    });
    return {
        positionals,
        workspace: values.workspace,
        note: values.note,
        threshold: parseNumber('--threshold', values.threshold),
    };
}

/**
 * Dispatches a command line (without the node and script arguments).
 * Returns the exit code.
 */
export async function main(argv: string[]): Promise<number> {
    const [command, ...rest] = argv;

    if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
        console.log(USAGE);
        return 0;
    }

    try {
        switch (command) {
            case 'reconcile': {
                const { bankPath, personalPath, options } = parseReconcileArgs(rest);
                return await reconcileFiles(bankPath, personalPath, options);
            }
            case 'add-alias': {
                const { positionals, workspace, note } = parseAliasArgs(rest);
                expectArgs('add-alias', positionals, 2);
                return await addAlias(positionals[0], positionals[1], { workspace, note });
            }
            case 'remove-alias': {
                const { positionals, workspace } = parseAliasArgs(rest);
                expectArgs('remove-alias', positionals, 1);
                return await removeAlias(positionals[0], { workspace });
            }
            case 'aliases': {
                const { positionals, workspace, threshold } = parseAliasArgs(rest);
                if (positionals.length > 1) {
                    throw new UsageError(`aliases takes at most 1 argument(s), got ${positionals.length}`);
                }
                if (positionals.length === 0) {
                    return await listAliases({ workspace });
                }
                return await listAliases({ workspace, similarTo: positionals[0], threshold });
            }
            default:
                throw new UsageError(`Unknown command "${command}"`);
        }
    } catch (err) {
        if (!isUsageError(err)) throw err;
        console.error(`✖ Error: ${errorMessage(err)}`);
        console.error('');
        console.error(USAGE);
        return 1;
    }
}
