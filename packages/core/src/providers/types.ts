/**
 * Workspace Provider Types
 *
 * A provider owns one workflow type (`gh` for GitHub) end to end: it
 * recognises its projects, resolves references, brackets runs and submits
 * changes.
 */

import type { ChangeRecord } from '../records/types.js';
import type { OperationResult } from '../types.js';
import type {
    AllocateOptions,
    AllocateResult,
    PostAgentResult,
    ReattachOptions,
    ResolvedRef,
    RunnerContext,
} from '../workspace/types.js';

export interface WorkspaceProvider {
    /** Workflow type tag, e.g. `gh` */
    readonly name: string;

    /** The provider's workflow type for a project, or null if it is not one of its projects */
    classify(projectFile: string): Promise<string | null>;

    /** What a change is called in the UI (`PR`), or null for foreign projects */
    getChangeLabel(projectFile: string): Promise<string | null>;

    /** Change label for a workflow type this provider already reported */
    changeLabelFor(workflowType: string): string | null;

    /**
     * @throws {ResolutionError} If the reference cannot be resolved
     */
    resolve(ref: string): Promise<ResolvedRef>;

    /** Allocate a slot and prepare it for a run */
    preAgent(ref: string, options?: AllocateOptions): Promise<AllocateResult>;

    /** Rebuild the context of a slot claimed by an earlier preAgent */
    reattach(ref: string, options: ReattachOptions): Promise<AllocateResult>;

    /** Release the slot and collect run output */
    postAgent(ctx: RunnerContext): Promise<PostAgentResult>;

    /** Submit a change; null when the change is not the provider's */
    submit(change: ChangeRecord): Promise<OperationResult | null>;
}
