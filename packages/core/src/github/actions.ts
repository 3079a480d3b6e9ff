/**
 * GitHub Action Adapter
 *
 * Pull request operations through the `gh` CLI. A missing PR is reported
 * as `null`, never as a failure: lookups cannot tell "no PR" from "gh
 * failed" and do not try to.
 */

import { describeFailure, runCommand } from '../command-runner.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CommandResult, CommandRunner, OperationResult } from '../types.js';

export interface ChangeUrlResult extends OperationResult {
    url: string | null;
}

export interface ChangeNumberResult extends OperationResult {
    /** PR number as printed by gh */
    number: string | null;
}

export interface GitHubActionsOptions {
    runner?: CommandRunner;
    logger?: Logger;
}

export class GitHubActions {
    private readonly runner: CommandRunner;
    private readonly logger: Logger;

    constructor(options: GitHubActionsOptions = {}) {
        this.runner = options.runner ?? runCommand;
        this.logger = options.logger ?? silentLogger;
    }

    private async run(command: string[], cwd: string): Promise<CommandResult> {
        this.logger.debug(`${command.join(' ')}  (${cwd})`);
        return this.runner(command, { cwd });
    }

    private async prView(field: 'url' | 'number', cwd: string): Promise<string | null> {
        const result = await this.run(['gh', 'pr', 'view', '--json', field, '-q', `.${field}`], cwd);
        return result.success ? result.stdout.trim() || null : null;
    }

    /**
     * URL of the PR for the current branch. Always succeeds.
     */
    async getChangeUrl(cwd: string): Promise<ChangeUrlResult> {
        return { success: true, url: await this.prView('url', cwd) };
    }

    /**
     * Number of the PR for the current branch. Always succeeds.
     */
    async getChangeNumber(cwd: string): Promise<ChangeNumberResult> {
        return { success: true, number: await this.prView('number', cwd) };
    }

    /**
     * Push `revision` to origin and open a PR for it if none exists yet.
     * An existing PR is left as it is.
     */
    async mail(revision: string, cwd: string): Promise<OperationResult> {
        const push = await this.run(['git', 'push', '-u', 'origin', revision], cwd);
        if (!push.success) {
            return { success: false, error: describeFailure(push, 'git push') };
        }

        const existing = await this.run(['gh', 'pr', 'view', '--json', 'number', '-q', '.number'], cwd);
        if (existing.success) {
            return { success: true };
        }

        const create = await this.run(['gh', 'pr', 'create', '--fill'], cwd);
        if (!create.success) {
            return { success: false, error: describeFailure(create, 'gh pr create') };
        }
        this.logger.info(create.stdout.trim() || `Opened a PR for ${revision}`);
        return { success: true };
    }

    /**
     * Whether the current branch has a PR.
     */
    async hasPullRequest(cwd: string): Promise<boolean> {
        const result = await this.run(['gh', 'pr', 'view', '--json', 'number', '-q', '.number'], cwd);
        return result.success && result.stdout.trim() !== '';
    }

    /**
     * Merge the current branch's PR with a merge commit and delete the branch.
     */
    async mergePullRequest(cwd: string): Promise<OperationResult> {
        const result = await this.run(['gh', 'pr', 'merge', '--merge', '--delete-branch'], cwd);
        if (!result.success) {
            return { success: false, error: describeFailure(result, 'gh pr merge') };
        }
        return { success: true };
    }
}
