/**
 * Shared types for @gh-workspace/core.
 */

// =============================================================================
// Repository / Command Types
// =============================================================================

/**
 * Options for functions that run external tools.
 * `cwd` is always explicit: nothing in this library changes the process
 * working directory.
 */
export interface GitOptions {
    cwd: string;
    /** Kill the tool after this many milliseconds (soft failure) */
    timeoutMs?: number;
}

/**
 * Outcome of one external tool invocation
 */
export interface CommandResult {
    success: boolean;
    stdout: string;
    stderr: string;
    /** Exit code, or null when the process was killed */
    exitCode: number | null;
    /** True when the process was killed because `timeoutMs` elapsed */
    timedOut: boolean;
}

/**
 * Runs an external tool. Implementations never throw for a failing tool;
 * failure is reported through the result.
 */
export type CommandRunner = (command: string[], options: GitOptions) => Promise<CommandResult>;

/**
 * Base result for every operation exposed to the host
 */
export interface OperationResult {
    /** Whether the operation completed successfully */
    success: boolean;
    /** Human-readable error if success is false */
    error?: string;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Base class for every error raised by this library
 */
export class WorkspaceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkspaceError';
    }
}

/**
 * A reference could not be resolved, or resolved to a conflicting directory.
 */
export class ResolutionError extends WorkspaceError {
    constructor(message: string) {
        super(message);
        this.name = 'ResolutionError';
    }
}

/**
 * A workspace slot could not be found, locked or claimed.
 */
export class AllocationError extends WorkspaceError {
    constructor(message: string) {
        super(message);
        this.name = 'AllocationError';
    }
}

/**
 * A submission safety check failed.
 */
export class PreconditionError extends WorkspaceError {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionError';
    }
}

/**
 * An external git or gh invocation failed. Carries the full context of the
 * command so callers can surface the tool's own error text.
 */
export class ToolInvocationError extends WorkspaceError {
    readonly command: string;
    readonly stderr: string;
    readonly exitCode: number | null;
    readonly cwd: string;

    constructor(details: {
        message: string;
        command: string;
        stderr: string;
        exitCode: number | null;
        cwd: string;
    }) {
        super(details.message);
        this.name = 'ToolInvocationError';
        this.command = details.command;
        this.stderr = details.stderr;
        this.exitCode = details.exitCode;
        this.cwd = details.cwd;
    }

    toDetailedString(): string {
        const lines = [
            `${this.name}: ${this.message}`,
            `Command: ${this.command}`,
            `CWD: ${this.cwd}`,
            `Exit code: ${this.exitCode ?? 'killed'}`,
        ];
        if (this.stderr) {
            lines.push(`Stderr: ${this.stderr}`);
        }
        return lines.join('\n');
    }
}

/**
 * Extract a message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
