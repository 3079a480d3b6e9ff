import { errorMessage, type AllocateOptions } from '@gh-workspace/core';
import type { CliContext } from '../context.js';
import { ownerPidFromEnv, preallocatedFromEnv } from '../context.js';
import { exitCodeFor, printKeyValues, type ExitCode } from '../output.js';

export const SETUP_KEYS = [
    'success',
    'error',
    'project_name',
    'project_file',
    'workspace_dir',
    'workspace_num',
    'checkout_target',
    'primary_workspace_dir',
    'should_release',
    'head_before',
    '_chdir',
    'meta_workspace',
] as const;

/**
 * Slot options shared by `setup` and `run`
 */
export interface SlotOptions {
    /** Explicit workspace number (-n) */
    workspace?: string;
    /** False when --no-release was given */
    release?: boolean;
}

/**
 * @throws {Error} If `value` is not a workspace number
 */
export function parseWorkspaceNumber(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new Error(`Invalid workspace number '${value}'`);
    }
    return Number.parseInt(value, 10);
}

/**
 * @throws {Error} If the workspace number or the pre-allocation variables are invalid
 */
export function toAllocateOptions(options: SlotOptions, env: NodeJS.ProcessEnv = process.env): AllocateOptions {
    return {
        slot: options.workspace === undefined ? undefined : parseWorkspaceNumber(options.workspace),
        release: options.release ?? true,
        preallocated: preallocatedFromEnv(env),
    };
}

/**
 * Allocate and prepare a workspace for `ref`, leaving it claimed for the
 * caller's run. `_chdir` tells the executor where to run, and `teardown`
 * finishes the run. The claim is recorded under the invoking process (or
 * GHWS_OWNER_PID), since this process exits before the run.
 */
export async function setupCommand(
    ctx: CliContext,
    ref: string,
    options: SlotOptions,
    env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
    let allocate: AllocateOptions;
    try {
        allocate = { ...toAllocateOptions(options, env), ownerPid: ownerPidFromEnv(env) };
    } catch (error) {
        printKeyValues(SETUP_KEYS, { success: false, error: errorMessage(error) }, ctx.write);
        return 1;
    }

    const result = await ctx.github.preAgent(ref, allocate);
    const context = result.context;
    if (!result.success) {
        ctx.logger.error(result.error ?? `Could not set up a workspace for ${ref}`);
    }

    printKeyValues(
        SETUP_KEYS,
        {
            success: result.success,
            error: result.error,
            project_name: context?.projectName,
            project_file: context?.projectFile,
            workspace_dir: context?.workspaceDir,
            workspace_num: context?.workspaceNum,
            checkout_target: context?.checkoutTarget,
            primary_workspace_dir: context?.primaryWorkspaceDir,
            should_release: context?.shouldRelease,
            head_before: result.success ? context?.headBefore : '',
            _chdir: result.success ? context?.workspaceDir : '',
            meta_workspace: context?.workspaceNum,
        },
        ctx.write
    );
    return exitCodeFor(result.success);
}
