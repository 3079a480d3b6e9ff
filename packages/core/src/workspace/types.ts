/**
 * Workspace Types
 *
 * Types shared by the resolver, allocator and run lifecycle.
 */

import type { OperationResult } from '../types.js';

/**
 * A reference resolved to a concrete project and checkout target
 */
export interface ResolvedRef {
    readonly projectName: string;
    /** Path of the project's `.gp` record */
    readonly projectFile: string;
    /** Slot-0 working directory; always ends in `/` */
    readonly primaryWorkspaceDir: string;
    /** Branch or ref to check out after allocation (e.g. `origin/main`) */
    readonly checkoutTarget: string;
}

/**
 * State of one in-flight run. Owned by that run only and never persisted.
 */
export interface RunnerContext extends ResolvedRef {
    /** Directory of the claimed slot */
    workspaceDir: string;
    workspaceNum: number;
    /** Owner tag the slot was claimed under */
    workflowName: string;
    /** False keeps the slot pinned after the run */
    shouldRelease: boolean;
    /** Commit id captured by preRun; '' means no snapshot was taken */
    headBefore: string;
}

/**
 * Output of a completed run
 */
export interface PostAgentResult {
    /** Captured diff file, if any */
    diffPath: string | null;
    /** Always has `meta_workspace`; `meta_commit_message` when HEAD moved */
    meta: Record<string, string>;
    /** Set when the slot could not be released */
    error?: string;
}

/**
 * Slot chosen by an interactive front-end before the run started
 */
export interface PreallocatedSlot {
    slot: number;
    dir: string;
}

export interface AllocateOptions {
    /** Explicit slot number */
    slot?: number;
    /** Release the slot after the run (default: true). False pins the claim. */
    release?: boolean;
    /** Trust this slot and directory verbatim */
    preallocated?: PreallocatedSlot;
    /**
     * Process the claim is recorded under (default: the allocator's pid).
     * A front-end that exits before the run must pass the run's owner here,
     * since claims of dead processes are reclaimed.
     */
    ownerPid?: number;
}

/**
 * Identifies a slot claimed by an earlier `preAgent` in another process
 */
export interface ReattachOptions {
    slot: number;
    /** Release the slot in postAgent (default: true) */
    release?: boolean;
    /** HEAD reported by the earlier preAgent; '' skips diff and commit capture */
    headBefore?: string;
}

export interface AllocateResult extends OperationResult {
    context?: RunnerContext;
}
