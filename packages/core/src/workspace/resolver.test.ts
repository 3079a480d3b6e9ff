import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ReferenceResolver } from './resolver.js';
import { GitClient } from '../git-utils.js';
import { ChangeStore } from '../records/change-store.js';
import { ProjectStore } from '../records/project-store.js';
import { ResolutionError, ToolInvocationError } from '../types.js';
import { createFakeRunner, ok, fail, type FakeResponse } from '../__tests__/fake-runner.js';

describe('ReferenceResolver', () => {
    let root: string;
    let projectsRoot: string;
    let checkoutRoot: string;
    let projects: ProjectStore;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'ghws-resolver-'));
        projectsRoot = path.join(root, 'projects');
        checkoutRoot = path.join(root, 'checkouts');
        projects = new ProjectStore(projectsRoot);
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    function createResolver(
        routes: Record<string, FakeResponse | FakeResponse[]> = {},
        githubUsername: string | null = null
    ) {
        const fake = createFakeRunner({
            'git symbolic-ref refs/remotes/origin/HEAD': ok('refs/remotes/origin/main\n'),
            'git clone': ok(),
            ...routes,
        });
        const resolver = new ReferenceResolver({
            projects,
            changes: new ChangeStore(projectsRoot),
            git: new GitClient({ runner: fake.runner }),
            checkoutRoot,
            githubUsername,
        });
        return { resolver, ...fake };
    }

    async function writeProject(name: string, content: string): Promise<string> {
        const file = projects.projectFileFor(name);
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, content);
        return file;
    }

    describe('owner/project references', () => {
        it('clones a missing checkout over HTTPS and records it', async () => {
            const { resolver, commands } = createResolver();
            const primary = path.join(checkoutRoot, 'octocat', 'hello-world') + '/';

            const resolved = await resolver.resolve('octocat/hello-world');

            expect(resolved).toEqual({
                projectName: 'hello-world',
                projectFile: projects.projectFileFor('hello-world'),
                primaryWorkspaceDir: primary,
                checkoutTarget: 'origin/main',
            });
            expect(commands()).toContain(
                `git clone https://github.com/octocat/hello-world.git ${primary.replace(/\/$/, '')}`
            );
            expect(await projects.getWorkspaceDir(resolved.projectFile)).toBe(primary);
        });

        it('clones over SSH when the owner is the configured user', async () => {
            const { resolver, commands } = createResolver({}, 'octocat');

            await resolver.resolve('octocat/hello-world');

            expect(commands().some((c) => c.startsWith('git clone git@github.com:octocat/hello-world.git'))).toBe(
                true
            );
        });

        it('does not clone an existing checkout', async () => {
            const { resolver, commands } = createResolver();
            await fs.mkdir(path.join(checkoutRoot, 'octocat', 'hello-world'), { recursive: true });

            await resolver.resolve('octocat/hello-world');

            expect(commands().some((c) => c.startsWith('git clone'))).toBe(false);
        });

        it('accepts a recorded directory that differs only by a trailing slash', async () => {
            const { resolver } = createResolver();
            const primary = path.join(checkoutRoot, 'octocat', 'hello-world');
            await writeProject('hello-world', `WORKSPACE_DIR: ${primary}\n`);
            await fs.mkdir(primary, { recursive: true });

            const resolved = await resolver.resolve('octocat/hello-world');

            expect(resolved.primaryWorkspaceDir).toBe(`${primary}/`);
        });

        it('refuses a conflicting recorded directory', async () => {
            const { resolver } = createResolver();
            await writeProject('hello-world', 'WORKSPACE_DIR: /elsewhere/hello-world/\n');
            const derived = path.join(checkoutRoot, 'octocat', 'hello-world') + '/';

            await expect(resolver.resolve('octocat/hello-world')).rejects.toThrow(
                `WORKSPACE_DIR conflict for 'hello-world': existing=/elsewhere/hello-world/, derived=${derived}`
            );
        });

        it('rejects paths with more than two segments', async () => {
            const { resolver } = createResolver();

            await expect(resolver.resolve('a/b/c')).rejects.toThrow(
                "Invalid repo path 'a/b/c': expected 'owner/project'"
            );
        });

        it('rejects unsafe segments', async () => {
            const { resolver } = createResolver();

            await expect(resolver.resolve('octo cat/hello')).rejects.toBeInstanceOf(ResolutionError);
        });

        it('surfaces clone failures', async () => {
            const { resolver } = createResolver({ 'git clone': fail('Repository not found.', 128) });

            const error = await resolver.resolve('octocat/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ToolInvocationError);
            expect(error).toHaveProperty(
                'message',
                'git clone failed for https://github.com/octocat/missing.git: Repository not found.'
            );
        });
    });

    describe('project shorthand', () => {
        it('uses the recorded workspace directory', async () => {
            const { resolver } = createResolver();
            const file = await writeProject('proj', 'WORKSPACE_DIR: /w/proj/\n');

            expect(await resolver.resolve('proj')).toEqual({
                projectName: 'proj',
                projectFile: file,
                primaryWorkspaceDir: '/w/proj/',
                checkoutTarget: 'origin/main',
            });
        });

        it('falls through when the project has no workspace directory', async () => {
            const { resolver } = createResolver();
            await writeProject('proj', 'NAME: other_change\n');

            await expect(resolver.resolve('proj')).rejects.toThrow("Cannot resolve reference 'proj'");
        });

        it('wins over a change with the same name', async () => {
            const { resolver } = createResolver();
            await writeProject('proj', 'WORKSPACE_DIR: /w/proj/\n\nNAME: proj\n');

            const resolved = await resolver.resolve('proj');

            expect(resolved.checkoutTarget).toBe('origin/main');
        });
    });

    describe('change names', () => {
        it('checks out the change branch from origin', async () => {
            const { resolver } = createResolver();
            const file = await writeProject('proj', 'WORKSPACE_DIR: /w/proj/\n\nNAME: proj_fix_login\nSTATUS: Drafted\n');

            expect(await resolver.resolve('proj_fix_login')).toEqual({
                projectName: 'proj',
                projectFile: file,
                primaryWorkspaceDir: '/w/proj/',
                checkoutTarget: 'origin/proj_fix_login',
            });
        });

        it('fails when the owning project has no workspace directory', async () => {
            const { resolver } = createResolver();
            const file = await writeProject('proj', 'NAME: proj_fix_login\n');

            await expect(resolver.resolve('proj_fix_login')).rejects.toThrow(
                `ChangeSpec 'proj_fix_login' found in ${file} but WORKSPACE_DIR is not set`
            );
        });
    });

    it('fails for unknown references', async () => {
        const { resolver } = createResolver();

        await expect(resolver.resolve('nothing')).rejects.toThrow("Cannot resolve reference 'nothing'");
    });
});
