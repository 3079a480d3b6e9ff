/**
 * Default CommandRunner: runs git/gh through child_process.exec.
 *
 * Failures are returned, never thrown, so each caller decides whether a
 * failing tool is an error (push) or just absent data (PR lookup).
 */

import { exec } from 'child_process';
import { promisify } from 'util';
import { buildShellCommand } from './shell-utils.js';
import type { CommandResult, GitOptions } from './types.js';

const execAsync = promisify(exec);

/** Generous buffer for `git diff` output */
const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Error type from child_process.exec with additional properties
 */
interface ExecError extends Error {
    code?: number | string;
    killed?: boolean;
    stderr?: string;
    stdout?: string;
}

export async function runCommand(command: string[], options: GitOptions): Promise<CommandResult> {
    const commandLine = buildShellCommand(command);
    try {
        const { stdout, stderr } = await execAsync(commandLine, {
            cwd: options.cwd,
            timeout: options.timeoutMs ?? 0,
            maxBuffer: MAX_BUFFER,
        });
        return { success: true, stdout, stderr, exitCode: 0, timedOut: false };
    } catch (error) {
        const execError = error as ExecError;
        const timedOut = execError.killed === true && options.timeoutMs !== undefined;
        return {
            success: false,
            stdout: execError.stdout ?? '',
            stderr: execError.stderr || execError.message || 'Command failed',
            exitCode: typeof execError.code === 'number' ? execError.code : null,
            timedOut,
        };
    }
}

/**
 * Format a failed tool invocation the way callers report it:
 * "<label> failed: <stderr or stdout>".
 */
export function describeFailure(result: CommandResult, label: string): string {
    if (result.timedOut) {
        return `${label} timed out`;
    }
    const detail = result.stderr.trim() || result.stdout.trim();
    return detail ? `${label} failed: ${detail}` : `${label} failed`;
}
