/**
 * Submission Flow
 *
 * Submits a GitHub change by merging its PR from a freshly claimed pool
 * slot. The slot is released on every path once it has been claimed.
 */

import type { GitClient } from '../git-utils.js';
import { silentLogger, type Logger } from '../logger.js';
import type { WorkspacePool } from '../pool/registry.js';
import { hasActiveChildren, type ChangeStore } from '../records/change-store.js';
import type { ProjectStore } from '../records/project-store.js';
import { TERMINAL_STATUSES, type ChangeRecord } from '../records/types.js';
import { errorMessage, type OperationResult } from '../types.js';
import type { GitHubActions } from './actions.js';
import { GITHUB_WORKFLOW } from './classify.js';
import type { GitVcsProvider } from './vcs.js';

export const SUBMITTED_STATUS = 'Submitted';

export interface SubmissionOptions {
    projects: ProjectStore;
    changes: Pick<ChangeStore, 'findAll' | 'setStatus'>;
    pool: WorkspacePool;
    git: GitClient;
    vcs: GitVcsProvider;
    actions: GitHubActions;
    classify: (projectFile: string) => Promise<string | null>;
    githubUsername: string | null;
    /** Stops automation still running for the change */
    terminateHooks?: (change: ChangeRecord) => Promise<void> | void;
    pid?: number;
    logger?: Logger;
}

/**
 * Workflow tag a submission's slot is claimed under
 */
export function submitWorkflowName(changeName: string): string {
    return `submit-${changeName}`;
}

function failure(error: string): OperationResult {
    return { success: false, error };
}

export class SubmissionFlow {
    private readonly pid: number;
    private readonly logger: Logger;

    constructor(private readonly options: SubmissionOptions) {
        this.pid = options.pid ?? process.pid;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Merge the PR of `change`.
     * Returns null when the change does not belong to a GitHub project.
     */
    async submit(change: ChangeRecord): Promise<OperationResult | null> {
        const { projects, changes, pool } = this.options;

        if ((await this.options.classify(change.filePath)) !== GITHUB_WORKFLOW) {
            return null;
        }

        await this.options.terminateHooks?.(change);

        if (hasActiveChildren(change, await changes.findAll(), TERMINAL_STATUSES)) {
            return failure(
                'Cannot submit: other ChangeSpecs have this one as their parent and are not Submitted, Reverted, or Archived'
            );
        }

        const primaryDir = await projects.getWorkspaceDir(change.filePath);
        if (!primaryDir) {
            return failure('WORKSPACE_DIR is not set for this project');
        }

        const workflow = submitWorkflowName(change.name);
        let slot: number;
        try {
            slot = await pool.firstAvailable(change.filePath);
        } catch (error) {
            return failure(errorMessage(error));
        }

        let dir: string;
        try {
            dir = await pool.directoryFor(slot, change.projectBasename);
        } catch (error) {
            return failure(`Failed to get workspace directory: ${errorMessage(error)}`);
        }

        try {
            if (!(await pool.claim(change.filePath, slot, workflow, this.pid, change.name))) {
                return failure(`Failed to claim workspace #${slot}`);
            }
        } catch (error) {
            return failure(errorMessage(error));
        }
        this.logger.info(`Claimed workspace #${slot}`);

        try {
            return await this.mergeFromSlot(change, primaryDir, dir);
        } catch (error) {
            return failure(errorMessage(error));
        } finally {
            await pool
                .release(change.filePath, slot, workflow, change.name)
                .then(() => this.logger.info(`Released workspace #${slot}`))
                .catch((error: unknown) =>
                    this.logger.warn(`Could not release workspace #${slot}: ${errorMessage(error)}`)
                );
        }
    }

    /**
     * Slot clones take their remote-tracking branches from the primary
     * checkout, so origin is fetched before the change branch is looked up.
     */
    private async mergeFromSlot(change: ChangeRecord, primaryDir: string, dir: string): Promise<OperationResult> {
        const { git, vcs, actions } = this.options;

        await git.ensureCloneAt(primaryDir, dir);
        await git.fetch(dir);
        this.logger.info(`Checking out ${change.name}...`);
        const branch = await vcs.resolveRevision(change.name, change.projectBasename, dir);
        const checkout = await vcs.checkout(branch, dir);
        if (!checkout.success) {
            return failure(`Failed to checkout branch: ${checkout.error ?? 'unknown error'}`);
        }

        const defaultBranch = (await git.defaultBranchRef(dir)).split('/').pop();
        this.logger.info(`Merging ${change.name} into ${defaultBranch}...`);

        if (!(await actions.hasPullRequest(dir))) {
            return failure('GitHub project has no PR for this branch. Create a PR first with #pr.');
        }

        if (!this.options.githubUsername) {
            return failure(
                "Cannot submit GitHub PR: 'githubUsername' is not configured. " +
                    'Set it in the gh-workspace config or GHWS_GITHUB_USERNAME.'
            );
        }

        const merge = await actions.mergePullRequest(dir);
        if (!merge.success) {
            return merge;
        }

        await this.options.changes.setStatus(change, SUBMITTED_STATUS);
        return { success: true };
    }
}
