#!/usr/bin/env node
/**
 * Tally CLI
 *
 * The CLI handles all file I/O and console output. The core receives rows
 * and returns results, warnings and unreadable rows as data.
 */

import { main } from './cli.js';
import { errorMessage } from './utils/errors.js';

main(process.argv.slice(2)).then(
    code => process.exit(code),
    (err: unknown) => {
        console.error(`✖ Error: ${errorMessage(err)}`);
        process.exit(1);
    }
);
