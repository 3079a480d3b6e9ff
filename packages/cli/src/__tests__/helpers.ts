/**
 * Shared fixtures for command tests: a context rooted in a temp directory
 * whose git/gh calls are answered from a table.
 */

import { vi } from 'vitest';
import * as path from 'path';
import { silentLogger, type CommandResult } from '@gh-workspace/core';
import { createContext, type CliContext } from '../context.js';
import { DEFAULT_CONFIG } from '../config.js';

/** Command prefix => stdout, or an Error for a failing command */
export type RunnerTable = Record<string, string | Error>;

export function tableRunner(table: RunnerTable) {
    return vi.fn(async (command: string[]): Promise<CommandResult> => {
        const line = command.join(' ');
        const key = Object.keys(table)
            .filter((prefix) => line === prefix || line.startsWith(`${prefix} `))
            .sort((a, b) => b.length - a.length)[0];
        const answer = key === undefined ? new Error(`unexpected command: ${line}`) : table[key];
        if (answer instanceof Error) {
            return { success: false, stdout: '', stderr: answer.message, exitCode: 1, timedOut: false };
        }
        return { success: true, stdout: answer, stderr: '', exitCode: 0, timedOut: false };
    });
}

export function testContext(
    root: string,
    table: RunnerTable = {}
): { ctx: CliContext; output: () => string[]; runner: ReturnType<typeof tableRunner> } {
    const lines: string[] = [];
    const runner = tableRunner(table);
    const ctx = createContext({
        config: {
            ...DEFAULT_CONFIG,
            githubUsername: 'octocat',
            projectsRoot: path.join(root, 'projects'),
            checkoutRoot: path.join(root, 'checkouts'),
            lockTimeoutMs: 200,
        },
        logger: silentLogger,
        runner,
        write: (text) => lines.push(...text.split('\n')),
    });
    return { ctx, output: () => lines, runner };
}
