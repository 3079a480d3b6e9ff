/**
 * @gh-workspace/core
 *
 * Workspace pool, reference resolution and PR submission for GitHub-hosted
 * projects.
 *
 * @example Basic usage:
 * ```typescript
 * import {
 *     ChangeStore, GitClient, GitHubWorkspaceProvider, ProjectStore, WorkspacePool,
 * } from '@gh-workspace/core';
 *
 * const projects = new ProjectStore('/home/me/.gh-workspace/projects');
 * const git = new GitClient();
 * const provider = new GitHubWorkspaceProvider({
 *     projects,
 *     changes: new ChangeStore(projects.projectsRoot),
 *     pool: new WorkspacePool({ projects }),
 *     git,
 *     checkoutRoot: '/home/me/projects/github',
 *     githubUsername: 'octocat',
 * });
 *
 * const { success, context } = await provider.preAgent('octocat/hello-world');
 * ```
 */

// =============================================================================
// Types and Errors
// =============================================================================

export {
    WorkspaceError,
    ResolutionError,
    AllocationError,
    PreconditionError,
    ToolInvocationError,
    errorMessage,
} from './types.js';

export type { GitOptions, CommandResult, CommandRunner, OperationResult } from './types.js';

export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// =============================================================================
// Command Execution and Git
// =============================================================================

export { runCommand, describeFailure } from './command-runner.js';
export { GitClient, slotDirectory, branchFromRef } from './git-utils.js';
export type { GitClientOptions } from './git-utils.js';
export { shellEscape, buildShellCommand, isSafeRepoSegment } from './shell-utils.js';
export { repoNameFromUrl, buildCloneUrl, isNetworkRemote } from './url-parser.js';

// =============================================================================
// Records
// =============================================================================

export { ProjectStore, projectBasename } from './records/project-store.js';
export { ChangeStore, hasActiveChildren } from './records/change-store.js';
export { TERMINAL_STATUSES } from './records/types.js';
export type { ChangeRecord, CreateChangeOptions } from './records/types.js';

// =============================================================================
// Workspace Pool
// =============================================================================

export { WorkspacePool } from './pool/registry.js';
export type { WorkspacePoolOptions } from './pool/registry.js';
export { withFileLock, reclaimStaleLock, isProcessAlive } from './pool/lock.js';
export type { SlotClaim, PoolFile, ClaimOptions } from './pool/types.js';

// =============================================================================
// Resolution, Allocation and Run Lifecycle
// =============================================================================

export { ReferenceResolver } from './workspace/resolver.js';
export type { ResolverOptions } from './workspace/resolver.js';
export { WorkspaceAllocator, runWorkflowName } from './workspace/allocator.js';
export type { AllocatorOptions } from './workspace/allocator.js';
export { RunLifecycle, releaseChangeName } from './workspace/lifecycle.js';
export type {
    ResolvedRef,
    RunnerContext,
    PostAgentResult,
    PreallocatedSlot,
    AllocateOptions,
    AllocateResult,
    ReattachOptions,
} from './workspace/types.js';

// =============================================================================
// GitHub
// =============================================================================

export { GitHubActions } from './github/actions.js';
export type { ChangeUrlResult, ChangeNumberResult } from './github/actions.js';
export { detectWorkflowType, GITHUB_WORKFLOW } from './github/classify.js';
export { GitVcsProvider } from './github/vcs.js';
export { SubmissionFlow, submitWorkflowName, SUBMITTED_STATUS } from './github/submit.js';
export type { SubmissionOptions } from './github/submit.js';

// =============================================================================
// Changes
// =============================================================================

export { createChangeForBranch, changeNameFor } from './changes/create.js';
export type { CreateChangeRequest, CreateChangeResult } from './changes/create.js';

// =============================================================================
// Providers
// =============================================================================

export { GitHubWorkspaceProvider } from './providers/github.js';
export type { GitHubProviderOptions } from './providers/github.js';
export { ProviderRegistry } from './providers/registry.js';
export type { WorkspaceProvider } from './providers/types.js';
