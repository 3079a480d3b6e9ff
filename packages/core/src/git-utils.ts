/**
 * Git operations shared by every hosted-git provider.
 *
 * GitClient wraps an injected CommandRunner, so providers compose it rather
 * than inherit from it, and tests swap the runner for a fake. Every method
 * takes an explicit working directory.
 */

import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { runCommand, describeFailure } from './command-runner.js';
import { silentLogger, type Logger } from './logger.js';
import { ToolInvocationError } from './types.js';
import type { CommandResult, CommandRunner, GitOptions, OperationResult } from './types.js';

export { ToolInvocationError };

/**
 * Directory of a numbered workspace slot. Slot 0 is the primary checkout;
 * every other slot is a sibling clone suffixed with `__<slot>`.
 *
 * @example
 * slotDirectory('/home/me/projects/github/octocat/hello/', 101)
 * // => '/home/me/projects/github/octocat/hello__101'
 */
export function slotDirectory(primaryDir: string, slot: number): string {
    if (slot === 0) {
        return primaryDir;
    }
    return `${primaryDir.replace(/\/+$/, '')}__${slot}`;
}

/**
 * Strip the remote prefix from a ref such as `origin/main`.
 */
export function branchFromRef(ref: string): string {
    return ref.replace(/^origin\//, '');
}

export interface GitClientOptions {
    runner?: CommandRunner;
    logger?: Logger;
    /** Where captured diffs are written (default: <tmpdir>/gh-workspace-diffs) */
    diffDir?: string;
}

export class GitClient {
    private readonly runner: CommandRunner;
    private readonly logger: Logger;
    private readonly diffDir: string;

    constructor(options: GitClientOptions = {}) {
        this.runner = options.runner ?? runCommand;
        this.logger = options.logger ?? silentLogger;
        this.diffDir = options.diffDir ?? join(tmpdir(), 'gh-workspace-diffs');
    }

    /**
     * Run a git subcommand and return its raw result.
     */
    async run(args: string[], options: GitOptions): Promise<CommandResult> {
        this.logger.debug(`git ${args.join(' ')}  (${options.cwd})`);
        return this.runner(['git', ...args], options);
    }

    /**
     * Run a git subcommand and return stdout.
     * @throws {ToolInvocationError} If git exits non-zero
     */
    async exec(args: string[], options: GitOptions): Promise<string> {
        const result = await this.run(args, options);
        if (!result.success) {
            throw new ToolInvocationError({
                message: describeFailure(result, `git ${args[0]}`),
                command: `git ${args.join(' ')}`,
                stderr: result.stderr,
                exitCode: result.exitCode,
                cwd: options.cwd,
            });
        }
        return result.stdout;
    }

    /**
     * Current HEAD commit id, or null when it cannot be read.
     */
    async headCommit(cwd: string): Promise<string | null> {
        const result = await this.run(['rev-parse', 'HEAD'], { cwd });
        return result.success ? result.stdout.trim() || null : null;
    }

    /**
     * Subject line of the newest commit, or null.
     */
    async lastCommitSubject(cwd: string): Promise<string | null> {
        const result = await this.run(['log', '-1', '--format=%s', 'HEAD'], { cwd });
        return result.success ? result.stdout.trim() || null : null;
    }

    /**
     * URL of the `origin` remote, or null when unset, failing or timed out.
     */
    async remoteUrl(cwd: string, timeoutMs?: number): Promise<string | null> {
        const result = await this.run(['config', '--get', 'remote.origin.url'], { cwd, timeoutMs });
        return result.success ? result.stdout.trim() || null : null;
    }

    /**
     * Check if a branch exists locally, or on `origin` when `remote` is set.
     */
    async branchExists(branch: string, cwd: string, remote = false): Promise<boolean> {
        const ref = remote ? `refs/remotes/origin/${branch}` : `refs/heads/${branch}`;
        const result = await this.run(['show-ref', '--verify', '--quiet', ref], { cwd });
        return result.success;
    }

    /**
     * Remote-qualified default branch (e.g. `origin/main`).
     * Tries the remote HEAD first, then falls back to main or master.
     */
    async defaultBranchRef(cwd: string): Promise<string> {
        const result = await this.run(['symbolic-ref', 'refs/remotes/origin/HEAD'], { cwd });
        if (result.success) {
            const match = result.stdout.trim().match(/^refs\/remotes\/(.+)$/);
            if (match) {
                return match[1];
            }
        }

        if (await this.branchExists('main', cwd, true)) {
            return 'origin/main';
        }
        return 'origin/master';
    }

    /**
     * Clone `url` into `targetDir`, creating parent directories.
     * @throws {ToolInvocationError} Carrying git's stderr if the clone fails
     */
    async clone(url: string, targetDir: string): Promise<void> {
        const target = targetDir.replace(/\/+$/, '');
        const parent = dirname(target);
        await mkdir(parent, { recursive: true });

        const result = await this.run(['clone', url, target], { cwd: parent });
        if (!result.success) {
            const stderr = result.stderr.trim();
            throw new ToolInvocationError({
                message: stderr ? `git clone failed for ${url}: ${stderr}` : `git clone failed for ${url}`,
                command: `git clone ${url} ${target}`,
                stderr: result.stderr,
                exitCode: result.exitCode,
                cwd: parent,
            });
        }
    }

    /**
     * Make sure the clone for `slot` exists and return its directory.
     */
    async ensureSlotClone(primaryDir: string, slot: number): Promise<string> {
        return this.ensureCloneAt(primaryDir, slotDirectory(primaryDir, slot));
    }

    /**
     * Make sure a slot clone exists at `dir`. Slots are cloned from the
     * primary checkout, then pointed at the primary's own origin so pushes
     * go to GitHub.
     */
    async ensureCloneAt(primaryDir: string, dir: string): Promise<string> {
        if (existsSync(dir.replace(/\/+$/, ''))) {
            return dir;
        }

        const originUrl = await this.remoteUrl(primaryDir);
        await this.clone(primaryDir.replace(/\/+$/, ''), dir);
        if (originUrl) {
            await this.exec(['remote', 'set-url', 'origin', originUrl], { cwd: dir });
        }
        return dir;
    }

    /**
     * Update the remote-tracking branches from `origin`.
     * @throws {ToolInvocationError} If the fetch fails
     */
    async fetch(cwd: string): Promise<void> {
        await this.exec(['fetch', 'origin'], { cwd });
    }

    /**
     * Reset the workspace to a clean checkout of `target` and return the
     * resulting HEAD commit id.
     *
     * A remote-qualified target (`origin/x`) is checked out as local branch
     * `x` reset to the remote tip.
     */
    async prepareWorkspace(dir: string, target: string): Promise<string> {
        const options = { cwd: dir };
        await this.fetch(dir);
        await this.exec(['reset', '--hard'], options);
        await this.exec(['clean', '-fd'], options);

        if (target.startsWith('origin/')) {
            await this.exec(['checkout', '-B', branchFromRef(target), target], options);
        } else {
            await this.exec(['checkout', target], options);
        }

        return (await this.exec(['rev-parse', 'HEAD'], options)).trim();
    }

    /**
     * Write the diff between `headBefore` and the working tree to a file.
     * Returns the file path, or null when there is no snapshot, no change,
     * or git fails.
     */
    async captureDiff(dir: string, headBefore: string): Promise<string | null> {
        if (!headBefore) {
            return null;
        }

        const result = await this.run(['diff', headBefore], { cwd: dir });
        if (!result.success) {
            this.logger.warn(describeFailure(result, 'git diff'));
            return null;
        }
        if (!result.stdout.trim()) {
            return null;
        }

        await mkdir(this.diffDir, { recursive: true });
        const diffPath = join(this.diffDir, `run-${Date.now()}-${process.pid}.diff`);
        await writeFile(diffPath, result.stdout, 'utf-8');
        return diffPath;
    }

    /**
     * Checkout an existing branch or ref.
     */
    async checkout(target: string, cwd: string): Promise<OperationResult> {
        const result = await this.run(['checkout', target], { cwd });
        if (!result.success) {
            return { success: false, error: describeFailure(result, 'git checkout') };
        }
        return { success: true };
    }

    /**
     * Number of commits in a revision range such as `origin/main..HEAD`.
     * @throws {ToolInvocationError} If the range cannot be resolved
     */
    async countCommits(range: string, cwd: string): Promise<number> {
        const stdout = await this.exec(['rev-list', '--count', range], { cwd });
        return parseInt(stdout.trim(), 10) || 0;
    }
}
