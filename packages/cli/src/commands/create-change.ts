import { createChangeForBranch } from '@gh-workspace/core';
import type { CliContext } from '../context.js';
import { exitCodeFor, printKeyValues, type ExitCode } from '../output.js';

export const CREATE_CHANGE_KEYS = [
    'success',
    'error',
    'cl_name',
    'project_file',
    'default_branch',
    'meta_changespec',
] as const;

export interface CreateChangeOptions {
    name: string;
    prompt: string;
    cwd?: string;
}

/**
 * Record a change for the branch just pushed from the current workspace
 */
export async function createChangeCommand(ctx: CliContext, options: CreateChangeOptions): Promise<ExitCode> {
    const result = await createChangeForBranch(
        { cwd: options.cwd ?? process.cwd(), name: options.name, prompt: options.prompt },
        { projects: ctx.projects, changes: ctx.changes, git: ctx.git }
    );

    printKeyValues(
        CREATE_CHANGE_KEYS,
        {
            success: result.success,
            error: result.error,
            cl_name: result.changeName,
            project_file: result.projectFile,
            default_branch: result.defaultBranch,
            meta_changespec: result.changeName,
        },
        ctx.write
    );
    return exitCodeFor(result.success);
}
