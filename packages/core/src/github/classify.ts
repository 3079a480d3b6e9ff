/**
 * Decide whether a project belongs to the GitHub workflow.
 */

import { existsSync, statSync } from 'fs';
import { join } from 'path';
import type { GitClient } from '../git-utils.js';
import type { ProjectStore } from '../records/project-store.js';
import { isNetworkRemote } from '../url-parser.js';

export const GITHUB_WORKFLOW = 'gh';

export interface ClassifyOptions {
    projects: ProjectStore;
    git: GitClient;
    /** Bound on the remote URL probe (default: 5000ms) */
    probeTimeoutMs?: number;
}

function isDirectory(path: string): boolean {
    return existsSync(path) && statSync(path).isDirectory();
}

/**
 * `'gh'` when the project's primary checkout is a git clone of a network
 * remote, otherwise null.
 *
 * Projects backed by a bare local repository, or whose origin is a local
 * path, belong to another workflow. A probe that fails or times out does
 * not disqualify the project.
 */
export async function detectWorkflowType(
    projectFile: string,
    options: ClassifyOptions
): Promise<typeof GITHUB_WORKFLOW | null> {
    const { projects, git } = options;

    const workspaceDir = await projects.getWorkspaceDir(projectFile);
    if (!workspaceDir || !isDirectory(join(workspaceDir, '.git'))) {
        return null;
    }

    if (await projects.getBareRepoDir(projectFile)) {
        return null;
    }

    const url = await git.remoteUrl(workspaceDir, options.probeTimeoutMs ?? 5000);
    if (url && !isNetworkRemote(url)) {
        return null;
    }

    return GITHUB_WORKFLOW;
}
