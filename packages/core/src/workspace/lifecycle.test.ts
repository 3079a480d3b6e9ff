import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { RunLifecycle, releaseChangeName } from './lifecycle.js';
import { GitClient } from '../git-utils.js';
import { WorkspacePool } from '../pool/registry.js';
import { ProjectStore } from '../records/project-store.js';
import { createFakeRunner, ok, fail, type FakeResponse } from '../__tests__/fake-runner.js';
import type { RunnerContext } from './types.js';

const PID = 4242;

describe('releaseChangeName', () => {
    it('treats plain branch names as change ids', () => {
        expect(releaseChangeName('proj_fix')).toBe('proj_fix');
    });

    it('ignores targets with a path separator', () => {
        expect(releaseChangeName('origin/main')).toBeNull();
        expect(releaseChangeName('octocat/hello')).toBeNull();
    });
});

describe('RunLifecycle', () => {
    let root: string;
    let pool: WorkspacePool;
    let ctx: RunnerContext;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'ghws-lifecycle-'));
        const projects = new ProjectStore(path.join(root, 'projects'));
        const projectFile = projects.projectFileFor('hello');
        await projects.setWorkspaceDir(projectFile, '/w/hello/');
        pool = new WorkspacePool({ projects, lockTimeoutMs: 100, isProcessAlive: (pid) => pid === PID });
        ctx = {
            projectName: 'hello',
            projectFile,
            primaryWorkspaceDir: '/w/hello/',
            checkoutTarget: 'origin/main',
            workspaceDir: '/w/hello__100',
            workspaceNum: 100,
            workflowName: 'gh-hello',
            shouldRelease: true,
            headBefore: '',
        };
        await pool.claim(projectFile, 100, 'gh-hello', PID, null);
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    function createLifecycle(routes: Record<string, FakeResponse | FakeResponse[]>) {
        const fake = createFakeRunner(routes);
        const git = new GitClient({ runner: fake.runner, diffDir: path.join(root, 'diffs') });
        return { lifecycle: new RunLifecycle({ pool, git }), ...fake };
    }

    describe('preRun', () => {
        it('resets the workspace and records the starting commit', async () => {
            const { lifecycle, commands } = createLifecycle({
                'git fetch origin': ok(),
                'git reset --hard': ok(),
                'git clean -fd': ok(),
                'git checkout': ok(),
                'git rev-parse HEAD': ok('abc123\n'),
            });

            await lifecycle.preRun(ctx);

            expect(ctx.headBefore).toBe('abc123');
            expect(commands()).toEqual([
                'git fetch origin',
                'git reset --hard',
                'git clean -fd',
                'git checkout -B main origin/main',
                'git rev-parse HEAD',
            ]);
        });

        it('propagates preparation failures', async () => {
            const { lifecycle } = createLifecycle({ 'git fetch origin': fail('no network', 128) });

            await expect(lifecycle.preRun(ctx)).rejects.toThrow('git fetch failed: no network');
            expect(ctx.headBefore).toBe('');
        });
    });

    describe('postRun', () => {
        it('releases the slot and reports the new commit', async () => {
            ctx.headBefore = 'abc123';
            const { lifecycle } = createLifecycle({
                'git diff abc123': ok('diff --git a/x b/x\n+hello\n'),
                'git rev-parse HEAD': ok('def456\n'),
                'git log -1 --format=%s HEAD': ok('Add greeting\n'),
            });

            const result = await lifecycle.postRun(ctx);

            expect(result.meta).toEqual({ meta_workspace: '100', meta_commit_message: 'Add greeting' });
            expect(result.diffPath).not.toBeNull();
            expect(await fs.readFile(result.diffPath ?? '', 'utf-8')).toBe('diff --git a/x b/x\n+hello\n');
            expect(await pool.listClaims(ctx.projectFile)).toEqual([]);
        });

        it('omits the commit message when HEAD did not move', async () => {
            ctx.headBefore = 'abc123';
            const { lifecycle, commands } = createLifecycle({
                'git diff abc123': ok(''),
                'git rev-parse HEAD': ok('abc123\n'),
            });

            const result = await lifecycle.postRun(ctx);

            expect(result).toEqual({ diffPath: null, meta: { meta_workspace: '100' } });
            expect(commands()).not.toContain('git log -1 --format=%s HEAD');
        });

        it('omits the commit message when the subject is empty', async () => {
            ctx.headBefore = 'abc123';
            const { lifecycle } = createLifecycle({
                'git diff abc123': ok(''),
                'git rev-parse HEAD': ok('def456\n'),
                'git log -1 --format=%s HEAD': ok('\n'),
            });

            expect((await lifecycle.postRun(ctx)).meta).toEqual({ meta_workspace: '100' });
        });

        it('skips diff and commit queries without a starting commit', async () => {
            const { lifecycle, commands } = createLifecycle({});

            const result = await lifecycle.postRun(ctx);

            expect(result).toEqual({ diffPath: null, meta: { meta_workspace: '100' } });
            expect(commands()).toEqual([]);
        });

        it('treats failing git queries as missing metadata', async () => {
            ctx.headBefore = 'abc123';
            const { lifecycle } = createLifecycle({
                'git diff': fail('bad object'),
                'git rev-parse HEAD': fail('not a repo', 128),
            });

            expect(await lifecycle.postRun(ctx)).toEqual({ diffPath: null, meta: { meta_workspace: '100' } });
        });

        it('reports a release that cannot take the registry lock', async () => {
            ctx.headBefore = 'abc123';
            const lockPath = `${pool.registryPathFor(ctx.projectFile)}.lock`;
            await fs.writeFile(lockPath, String(process.pid));
            const { lifecycle } = createLifecycle({
                'git diff abc123': ok(''),
                'git rev-parse HEAD': ok('def456\n'),
                'git log -1 --format=%s HEAD': ok('Add greeting\n'),
            });

            expect(await lifecycle.postRun(ctx)).toEqual({
                diffPath: null,
                meta: { meta_workspace: '100', meta_commit_message: 'Add greeting' },
                error: `Could not release workspace #100: Timed out waiting for lock ${lockPath}`,
            });
        });

        it('keeps the slot when the run should not release it', async () => {
            ctx.shouldRelease = false;
            const { lifecycle } = createLifecycle({});

            await lifecycle.postRun(ctx);

            expect(await pool.listClaims(ctx.projectFile)).toHaveLength(1);
        });
    });
});
