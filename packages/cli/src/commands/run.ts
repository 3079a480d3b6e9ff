import { errorMessage, type AllocateOptions, type PostAgentResult, type RunnerContext } from '@gh-workspace/core';
import type { CliContext } from '../context.js';
import { exitCodeFor, printKeyValues, type ExitCode } from '../output.js';
import { spawnInWorkspace, type CommandSpawner } from '../process.js';
import { toAllocateOptions, type SlotOptions } from './setup.js';

export const RUN_KEYS = [
    'success',
    'error',
    'workspace_dir',
    'exit_code',
    'diff_path',
    'meta_workspace',
    'meta_commit_message',
] as const;

/**
 * Allocate a workspace, run `argv` in it, then release the slot and report
 * the diff and any new commit.
 */
export async function runCommand(
    ctx: CliContext,
    ref: string,
    argv: string[],
    options: SlotOptions,
    spawner: CommandSpawner = spawnInWorkspace,
    env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
    if (argv.length === 0) {
        printKeyValues(RUN_KEYS, { success: false, error: 'No command given (use -- <command...>)' }, ctx.write);
        return 1;
    }

    let allocate: AllocateOptions;
    try {
        allocate = toAllocateOptions(options, env);
    } catch (error) {
        printKeyValues(RUN_KEYS, { success: false, error: errorMessage(error) }, ctx.write);
        return 1;
    }

    const prepared = await ctx.github.preAgent(ref, allocate);
    const runContext = prepared.context;
    if (!prepared.success || !runContext) {
        printKeyValues(
            RUN_KEYS,
            { success: false, error: prepared.error, workspace_dir: runContext?.workspaceDir },
            ctx.write
        );
        return 1;
    }

    let exitCode: number | null = null;
    let runError: string | undefined;
    try {
        ctx.logger.info(`Running ${argv.join(' ')} in ${runContext.workspaceDir}`);
        exitCode = await spawner(argv, runContext.workspaceDir);
    } catch (error) {
        runError = errorMessage(error);
    }

    const post = await finishRun(ctx, runContext);
    const commandError = exitCode === 0 ? undefined : `Command exited with code ${exitCode}`;
    const error = runError ?? commandError ?? post.error;

    printKeyValues(
        RUN_KEYS,
        {
            success: !error,
            error,
            workspace_dir: runContext.workspaceDir,
            exit_code: exitCode,
            diff_path: post.diffPath,
            meta_workspace: post.meta.meta_workspace ?? runContext.workspaceNum,
            meta_commit_message: post.meta.meta_commit_message,
        },
        ctx.write
    );
    return exitCodeFor(!error);
}

/**
 * postAgent with its failures folded into the result
 */
export async function finishRun(ctx: CliContext, runContext: RunnerContext): Promise<PostAgentResult> {
    try {
        return await ctx.github.postAgent(runContext);
    } catch (error) {
        ctx.logger.error(`Could not finish workspace #${runContext.workspaceNum}: ${errorMessage(error)}`);
        return { diffPath: null, meta: {}, error: errorMessage(error) };
    }
}
