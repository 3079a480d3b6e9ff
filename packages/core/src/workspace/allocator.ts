/**
 * Workspace Allocator
 *
 * Resolves a reference, picks a slot and claims it in the pool, producing
 * the RunnerContext for one run.
 */

import { silentLogger, type Logger } from '../logger.js';
import type { WorkspacePool } from '../pool/registry.js';
import { slotDirectory, type GitClient } from '../git-utils.js';
import { errorMessage, ToolInvocationError } from '../types.js';
import type { ReferenceResolver } from './resolver.js';
import type {
    AllocateOptions,
    AllocateResult,
    PreallocatedSlot,
    ReattachOptions,
    ResolvedRef,
    RunnerContext,
} from './types.js';

export interface AllocatorOptions {
    resolver: Pick<ReferenceResolver, 'resolve'>;
    pool: WorkspacePool;
    git: GitClient;
    /** Process id recorded on claims (default: process.pid) */
    pid?: number;
    logger?: Logger;
}

/**
 * Workflow tag a run's slot is claimed under
 */
export function runWorkflowName(ref: string): string {
    return `gh-${ref}`;
}

export class WorkspaceAllocator {
    private readonly pid: number;
    private readonly logger: Logger;

    constructor(private readonly options: AllocatorOptions) {
        this.pid = options.pid ?? process.pid;
        this.logger = options.logger ?? silentLogger;
    }

    async allocate(ref: string, options: AllocateOptions = {}): Promise<AllocateResult> {
        const release = options.release ?? true;
        try {
            const resolved = await this.options.resolver.resolve(ref);
            const { slot, dir } = options.preallocated ?? (await this.selectSlot(resolved, options.slot));

            const workflowName = runWorkflowName(ref);
            const claimed = await this.options.pool.claim(
                resolved.projectFile,
                slot,
                workflowName,
                options.ownerPid ?? this.pid,
                null,
                { pinned: !release }
            );
            if (!claimed) {
                return { success: false, error: `Failed to claim workspace #${slot}` };
            }

            this.logger.info(`Claimed workspace #${slot} (${dir}) for ${ref}`);
            return {
                success: true,
                context: {
                    ...resolved,
                    workspaceDir: dir,
                    workspaceNum: slot,
                    workflowName,
                    shouldRelease: release,
                    headBefore: '',
                },
            };
        } catch (error) {
            if (error instanceof ToolInvocationError) {
                this.logger.debug(error.toDetailedString());
            }
            return { success: false, error: errorMessage(error) };
        }
    }

    /**
     * Rebuild the context of a run whose slot was claimed earlier, so that
     * a separate process can finish it. Nothing is claimed.
     * @throws {ResolutionError} If the reference no longer resolves
     */
    async reattach(ref: string, options: ReattachOptions): Promise<RunnerContext> {
        const resolved = await this.options.resolver.resolve(ref);
        return {
            ...resolved,
            workspaceDir: slotDirectory(resolved.primaryWorkspaceDir, options.slot),
            workspaceNum: options.slot,
            workflowName: runWorkflowName(ref),
            shouldRelease: options.release ?? true,
            headBefore: options.headBefore ?? '',
        };
    }

    private async selectSlot(resolved: ResolvedRef, explicitSlot?: number): Promise<PreallocatedSlot> {
        const { pool, git } = this.options;
        const slot = explicitSlot ?? (await pool.firstAvailable(resolved.projectFile));
        const dir = await git.ensureSlotClone(resolved.primaryWorkspaceDir, slot);
        return { slot, dir };
    }
}
