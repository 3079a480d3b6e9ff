/**
 * Generic git VCS provider used by submission.
 */

import type { GitClient } from '../git-utils.js';
import type { OperationResult } from '../types.js';

export class GitVcsProvider {
    constructor(private readonly git: GitClient) {}

    checkout(target: string, cwd: string): Promise<OperationResult> {
        return this.git.checkout(target, cwd);
    }

    /**
     * Branch that holds the change `name`.
     *
     * A branch named exactly like the change wins. Otherwise the project
     * prefix is dropped and underscores become dashes
     * (`proj_fix_login` => `fix-login`), which is how branches pushed
     * before their change record existed are named.
     */
    async resolveRevision(name: string, projectBasename: string, cwd: string): Promise<string> {
        if (await this.branchExistsAnywhere(name, cwd)) {
            return name;
        }

        const prefix = `${projectBasename}_`;
        if (name.startsWith(prefix)) {
            const branch = name.slice(prefix.length).replace(/_/g, '-');
            if (branch && (await this.branchExistsAnywhere(branch, cwd))) {
                return branch;
            }
        }
        return name;
    }

    private async branchExistsAnywhere(branch: string, cwd: string): Promise<boolean> {
        return (await this.git.branchExists(branch, cwd)) || this.git.branchExists(branch, cwd, true);
    }
}
