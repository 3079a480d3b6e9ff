/**
 * GitHub Workspace Provider
 *
 * Wires the resolver, pool, run lifecycle and submission flow together for
 * projects hosted on GitHub.
 */

import { GitHubActions } from '../github/actions.js';
import { detectWorkflowType, GITHUB_WORKFLOW } from '../github/classify.js';
import { SubmissionFlow } from '../github/submit.js';
import { GitVcsProvider } from '../github/vcs.js';
import type { GitClient } from '../git-utils.js';
import { silentLogger, type Logger } from '../logger.js';
import type { WorkspacePool } from '../pool/registry.js';
import type { ChangeStore } from '../records/change-store.js';
import type { ProjectStore } from '../records/project-store.js';
import type { ChangeRecord } from '../records/types.js';
import { errorMessage, ToolInvocationError, type OperationResult } from '../types.js';
import { WorkspaceAllocator } from '../workspace/allocator.js';
import { RunLifecycle } from '../workspace/lifecycle.js';
import { ReferenceResolver } from '../workspace/resolver.js';
import type {
    AllocateOptions,
    AllocateResult,
    PostAgentResult,
    ReattachOptions,
    ResolvedRef,
    RunnerContext,
} from '../workspace/types.js';
import type { WorkspaceProvider } from './types.js';

export interface GitHubProviderOptions {
    projects: ProjectStore;
    changes: ChangeStore;
    pool: WorkspacePool;
    git: GitClient;
    actions?: GitHubActions;
    checkoutRoot: string;
    githubUsername: string | null;
    probeTimeoutMs?: number;
    terminateHooks?: (change: ChangeRecord) => Promise<void> | void;
    pid?: number;
    logger?: Logger;
}

export class GitHubWorkspaceProvider implements WorkspaceProvider {
    readonly name = GITHUB_WORKFLOW;
    readonly actions: GitHubActions;

    private readonly resolver: ReferenceResolver;
    private readonly allocator: WorkspaceAllocator;
    private readonly lifecycle: RunLifecycle;
    private readonly submission: SubmissionFlow;
    private readonly logger: Logger;

    constructor(private readonly options: GitHubProviderOptions) {
        const { projects, changes, pool, git, pid } = options;
        const logger = options.logger ?? silentLogger;
        this.logger = logger;
        this.actions = options.actions ?? new GitHubActions({ logger });

        this.resolver = new ReferenceResolver({
            projects,
            changes,
            git,
            checkoutRoot: options.checkoutRoot,
            githubUsername: options.githubUsername,
            logger,
        });
        this.allocator = new WorkspaceAllocator({ resolver: this.resolver, pool, git, pid, logger });
        this.lifecycle = new RunLifecycle({ pool, git, logger });
        this.submission = new SubmissionFlow({
            projects,
            changes,
            pool,
            git,
            vcs: new GitVcsProvider(git),
            actions: this.actions,
            classify: (projectFile) => this.classify(projectFile),
            githubUsername: options.githubUsername,
            terminateHooks: options.terminateHooks,
            pid,
            logger,
        });
    }

    classify(projectFile: string): Promise<string | null> {
        return detectWorkflowType(projectFile, {
            projects: this.options.projects,
            git: this.options.git,
            probeTimeoutMs: this.options.probeTimeoutMs,
        });
    }

    async getChangeLabel(projectFile: string): Promise<string | null> {
        const workflowType = await this.classify(projectFile);
        return workflowType ? this.changeLabelFor(workflowType) : null;
    }

    changeLabelFor(workflowType: string): string | null {
        return workflowType === GITHUB_WORKFLOW ? 'PR' : null;
    }

    resolve(ref: string): Promise<ResolvedRef> {
        return this.resolver.resolve(ref);
    }

    /**
     * Allocate a slot and reset it to the checkout target. A slot that
     * cannot be prepared is released again unless it was pinned.
     */
    async preAgent(ref: string, options: AllocateOptions = {}): Promise<AllocateResult> {
        const allocated = await this.allocator.allocate(ref, options);
        const ctx = allocated.context;
        if (!allocated.success || !ctx) {
            return allocated;
        }

        try {
            await this.lifecycle.preRun(ctx);
            return { success: true, context: ctx };
        } catch (error) {
            this.logger.error(`Could not prepare workspace #${ctx.workspaceNum}`);
            if (error instanceof ToolInvocationError) {
                this.logger.debug(error.toDetailedString());
            }
            if (ctx.shouldRelease) {
                await this.options.pool
                    .release(ctx.projectFile, ctx.workspaceNum, ctx.workflowName, null)
                    .catch((releaseError: unknown) =>
                        this.logger.warn(
                            `Could not release workspace #${ctx.workspaceNum}: ${errorMessage(releaseError)}`
                        )
                    );
            }
            return { success: false, error: errorMessage(error), context: ctx };
        }
    }

    async reattach(ref: string, options: ReattachOptions): Promise<AllocateResult> {
        try {
            return { success: true, context: await this.allocator.reattach(ref, options) };
        } catch (error) {
            return { success: false, error: errorMessage(error) };
        }
    }

    postAgent(ctx: RunnerContext): Promise<PostAgentResult> {
        return this.lifecycle.postRun(ctx);
    }

    submit(change: ChangeRecord): Promise<OperationResult | null> {
        return this.submission.submit(change);
    }
}
