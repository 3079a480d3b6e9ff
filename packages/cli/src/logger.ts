/**
 * Console logger for the CLI. Everything goes to stderr: stdout carries
 * only the key=value lines the workflow executor parses.
 */

import chalk from 'chalk';
import type { Logger } from '@gh-workspace/core';

export function createConsoleLogger(verbose = false, write: (line: string) => void = (line) => console.error(line)): Logger {
    return {
        debug: (message) => {
            if (verbose) write(chalk.dim(message));
        },
        info: (message) => write(chalk.cyan(message)),
        warn: (message) => write(`${chalk.yellow('Warning:')} ${message}`),
        error: (message) => write(`${chalk.red('Error:')} ${message}`),
    };
}
