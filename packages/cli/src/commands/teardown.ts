import { errorMessage } from '@gh-workspace/core';
import type { CliContext } from '../context.js';
import { exitCodeFor, printKeyValues, type ExitCode } from '../output.js';
import { finishRun } from './run.js';
import { parseWorkspaceNumber } from './setup.js';

export const TEARDOWN_KEYS = [
    'success',
    'error',
    'workspace_dir',
    'diff_path',
    'meta_workspace',
    'meta_commit_message',
] as const;

export interface TeardownOptions {
    /** Workspace number printed by setup (-n) */
    workspace: string;
    /** head_before printed by setup */
    headBefore?: string;
    /** False when --no-release was given */
    release?: boolean;
}

/**
 * Finish a run started with `setup`: release the slot and report the diff
 * and any new commit.
 */
export async function teardownCommand(ctx: CliContext, ref: string, options: TeardownOptions): Promise<ExitCode> {
    let slot: number;
    try {
        slot = parseWorkspaceNumber(options.workspace);
    } catch (error) {
        printKeyValues(TEARDOWN_KEYS, { success: false, error: errorMessage(error) }, ctx.write);
        return 1;
    }

    const reattached = await ctx.github.reattach(ref, {
        slot,
        release: options.release ?? true,
        headBefore: options.headBefore,
    });
    const runContext = reattached.context;
    if (!reattached.success || !runContext) {
        printKeyValues(TEARDOWN_KEYS, { success: false, error: reattached.error }, ctx.write);
        return 1;
    }

    const post = await finishRun(ctx, runContext);

    printKeyValues(
        TEARDOWN_KEYS,
        {
            success: !post.error,
            error: post.error,
            workspace_dir: runContext.workspaceDir,
            diff_path: post.diffPath,
            meta_workspace: post.meta.meta_workspace ?? slot,
            meta_commit_message: post.meta.meta_commit_message,
        },
        ctx.write
    );
    return exitCodeFor(!post.error);
}
