/**
 * Record a change for a branch that was pushed from a workspace.
 */

import type { GitClient } from '../git-utils.js';
import type { ChangeStore } from '../records/change-store.js';
import type { ProjectStore } from '../records/project-store.js';
import { errorMessage, type OperationResult } from '../types.js';
import { repoNameFromUrl } from '../url-parser.js';

export interface CreateChangeRequest {
    /** Workspace the branch was committed in */
    cwd: string;
    /** Branch name, e.g. `fix-login` */
    name: string;
    /** Prompt the work was started from; its first line becomes the description */
    prompt: string;
}

export interface CreateChangeResult extends OperationResult {
    changeName: string | null;
    projectFile: string | null;
    /** Default branch without the remote prefix */
    defaultBranch: string | null;
}

export interface CreateChangeDeps {
    projects: ProjectStore;
    changes: Pick<ChangeStore, 'create'>;
    git: GitClient;
}

/**
 * Change name for a branch of a project (`hello` + `fix-login` => `hello_fix_login`).
 */
export function changeNameFor(projectName: string, branch: string): string {
    return `${projectName}_${branch.replace(/-/g, '_')}`;
}

/**
 * Project name of a workspace, taken from its origin URL.
 */
async function workspaceProjectName(git: GitClient, cwd: string): Promise<string | null> {
    const url = await git.remoteUrl(cwd);
    return url ? repoNameFromUrl(url) : null;
}

export async function createChangeForBranch(
    request: CreateChangeRequest,
    deps: CreateChangeDeps
): Promise<CreateChangeResult> {
    const { projects, changes, git } = deps;

    const projectName = await workspaceProjectName(git, request.cwd);
    if (!projectName) {
        return {
            success: false,
            error: 'Could not determine project name from workspace',
            changeName: null,
            projectFile: null,
            defaultBranch: null,
        };
    }

    const projectFile = projects.projectFileFor(projectName);
    const defaultBranch = (await git.defaultBranchRef(request.cwd)).split('/').pop() ?? 'main';
    const changeName = changeNameFor(projectName, request.name);
    const base = { projectFile, defaultBranch };

    try {
        const commits = await git.countCommits(`origin/${defaultBranch}..HEAD`, request.cwd);
        if (commits === 0) {
            return { success: false, error: 'No new commits found', changeName: null, ...base };
        }

        const record = await changes.create(projectFile, {
            name: changeName,
            description: request.prompt.split('\n')[0].trim(),
            status: 'Drafted',
            branch: request.name,
        });
        return { success: true, changeName: record.name, ...base };
    } catch (error) {
        return { success: false, error: errorMessage(error), changeName: null, ...base };
    }
}
