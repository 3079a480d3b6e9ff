/**
 * Tests for the submit and classify commands
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { submitCommand } from './submit.js';
import { classifyCommand } from './classify.js';
import { testContext, type RunnerTable } from '../__tests__/helpers.js';

const GITHUB_REMOTE: RunnerTable = {
    'git config --get remote.origin.url': 'git@github.com:octocat/hello.git\n',
};

describe('submit and classify commands', () => {
    let root: string;
    let projectFile: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'ghws-submit-cmd-'));
        const primary = path.join(root, 'checkouts', 'octocat', 'hello') + '/';
        projectFile = path.join(root, 'projects', 'hello', 'hello.gp');
        await fs.mkdir(path.dirname(projectFile), { recursive: true });
        await fs.writeFile(projectFile, `WORKSPACE_DIR: ${primary}\n\nNAME: hello_fix\nSTATUS: Mailed\n`);
        await fs.mkdir(path.join(primary, '.git'), { recursive: true });
        await fs.mkdir(`${primary.replace(/\/$/, '')}__100`, { recursive: true });
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('classifies a GitHub project', async () => {
        const { ctx, output, runner } = testContext(root, GITHUB_REMOTE);

        expect(await classifyCommand(ctx, projectFile)).toBe(0);
        expect(output()).toEqual(['workflow_type=gh', 'change_label=PR']);
        const remoteQueries = runner.mock.calls.filter(([command]) => command.join(' ') === 'git config --get remote.origin.url');
        expect(remoteQueries).toHaveLength(1);
    });

    it('prints empty keys for a project no provider owns', async () => {
        const { ctx, output } = testContext(root, {
            'git config --get remote.origin.url': '/srv/git/hello.git\n',
        });

        expect(await classifyCommand(ctx, projectFile)).toBe(0);
        expect(output()).toEqual(['workflow_type=', 'change_label=']);
    });

    it('submits a change by merging its PR', async () => {
        const { ctx, output } = testContext(root, {
            ...GITHUB_REMOTE,
            'git fetch origin': '',
            'git show-ref --verify --quiet refs/heads/hello_fix': '',
            'git checkout hello_fix': '',
            'git symbolic-ref refs/remotes/origin/HEAD': 'refs/remotes/origin/main\n',
            'gh pr view --json number -q .number': '12\n',
            'gh pr merge --merge --delete-branch': '',
        });

        expect(await submitCommand(ctx, 'hello_fix')).toBe(0);
        expect(output()).toEqual(['success=true', 'error=']);
        expect((await ctx.changes.find('hello_fix'))?.status).toBe('Submitted');
    });

    it('reports an unknown change', async () => {
        const { ctx, output } = testContext(root, GITHUB_REMOTE);

        expect(await submitCommand(ctx, 'hello_missing')).toBe(1);
        expect(output()).toEqual(['success=false', "error=ChangeSpec 'hello_missing' not found"]);
    });

    it('reports a change no provider handles', async () => {
        const { ctx, output } = testContext(root, {
            'git config --get remote.origin.url': '/srv/git/hello.git\n',
        });

        expect(await submitCommand(ctx, 'hello_fix')).toBe(1);
        expect(output()).toEqual(['success=false', `error=No workspace provider handles ${projectFile}`]);
    });
});
