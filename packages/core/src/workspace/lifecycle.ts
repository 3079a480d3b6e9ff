/**
 * Run Lifecycle Controller
 *
 * Brackets one automated run: preRun puts the claimed workspace into a
 * clean state at the checkout target, postRun releases the slot and
 * collects the diff and commit metadata.
 */

import type { GitClient } from '../git-utils.js';
import { silentLogger, type Logger } from '../logger.js';
import type { WorkspacePool } from '../pool/registry.js';
import { errorMessage } from '../types.js';
import type { PostAgentResult, RunnerContext } from './types.js';

export interface LifecycleOptions {
    pool: WorkspacePool;
    git: GitClient;
    logger?: Logger;
}

/**
 * Change id a run's claim is released with. Targets containing a path
 * separator (`origin/main`, `owner/repo`) are not change ids.
 */
export function releaseChangeName(checkoutTarget: string): string | null {
    return checkoutTarget.includes('/') ? null : checkoutTarget;
}

export class RunLifecycle {
    private readonly logger: Logger;

    constructor(private readonly options: LifecycleOptions) {
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Reset the workspace to `ctx.checkoutTarget` and record the starting
     * commit. The run itself executes with `ctx.workspaceDir` as its cwd.
     * @throws {ToolInvocationError} If preparing the workspace fails
     */
    async preRun(ctx: RunnerContext): Promise<void> {
        ctx.headBefore = await this.options.git.prepareWorkspace(ctx.workspaceDir, ctx.checkoutTarget);
        this.logger.debug(`Workspace #${ctx.workspaceNum} at ${ctx.headBefore}`);
    }

    /**
     * A failed release is reported in `error`; the diff and commit
     * metadata are still collected.
     */
    async postRun(ctx: RunnerContext): Promise<PostAgentResult> {
        const { git } = this.options;
        const error = ctx.shouldRelease ? await this.release(ctx) : undefined;

        const diffPath = await git.captureDiff(ctx.workspaceDir, ctx.headBefore);
        const meta: Record<string, string> = { meta_workspace: String(ctx.workspaceNum) };

        if (ctx.headBefore) {
            const headAfter = await git.headCommit(ctx.workspaceDir);
            if (headAfter && headAfter !== ctx.headBefore) {
                const subject = await git.lastCommitSubject(ctx.workspaceDir);
                if (subject) {
                    meta.meta_commit_message = subject;
                }
            }
        }

        return error ? { diffPath, meta, error } : { diffPath, meta };
    }

    private async release(ctx: RunnerContext): Promise<string | undefined> {
        try {
            const released = await this.options.pool.release(
                ctx.projectFile,
                ctx.workspaceNum,
                ctx.workflowName,
                releaseChangeName(ctx.checkoutTarget)
            );
            if (!released) {
                this.logger.warn(`Workspace #${ctx.workspaceNum} was not held by ${ctx.workflowName}`);
            }
            return undefined;
        } catch (error) {
            const message = `Could not release workspace #${ctx.workspaceNum}: ${errorMessage(error)}`;
            this.logger.error(message);
            return message;
        }
    }
}
