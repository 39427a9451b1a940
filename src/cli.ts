#!/usr/bin/env node
/**
 * exasol-ws-client - CLI Entry Point
 */

import { CommanderError } from 'commander';
import { createProgram } from './cli/program.js';
import { open } from './connection/Connector.js';
import { DriverError } from './types/index.js';
import { logger } from './utils/logger.js';

const program = createProgram(
    {
        out: (line) => process.stdout.write(`${line}\n`),
        err: (line) => process.stderr.write(`${line}\n`),
        env: process.env
    },
    (target) => open(target)
);

try {
    await program.parseAsync(process.argv);
} catch (error) {
    if (error instanceof CommanderError) {
        process.exitCode = error.exitCode;
    } else {
        logger.error('Query failed', {
            module: 'CLI',
            code: error instanceof DriverError ? error.code : 'UNEXPECTED',
            error: error instanceof Error ? error.message : 'Unknown error'
        });
        process.exitCode = 1;
    }
}
