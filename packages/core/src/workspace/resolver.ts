/**
 * Reference Resolver
 *
 * Turns `owner/repo`, a project shorthand or a change name into a
 * ResolvedRef. The three forms are tried in a fixed order, so a token
 * that is both a project and a change name always resolves as the project.
 */

import { existsSync } from 'fs';
import { join, normalize } from 'path';
import type { GitClient } from '../git-utils.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ChangeStore } from '../records/change-store.js';
import type { ProjectStore } from '../records/project-store.js';
import { isSafeRepoSegment } from '../shell-utils.js';
import { ResolutionError } from '../types.js';
import { buildCloneUrl } from '../url-parser.js';
import type { ResolvedRef } from './types.js';

export interface ResolverOptions {
    projects: ProjectStore;
    changes: Pick<ChangeStore, 'findAll'>;
    git: GitClient;
    /** Root for primary checkouts: `<checkoutRoot>/<owner>/<project>/` */
    checkoutRoot: string;
    /** Configured GitHub user; their own repos are cloned over SSH */
    githubUsername: string | null;
    logger?: Logger;
}

function sameDirectory(a: string, b: string): boolean {
    const clean = (p: string) => normalize(p).replace(/\/+$/, '');
    return clean(a) === clean(b);
}

export class ReferenceResolver {
    private readonly logger: Logger;

    constructor(private readonly options: ResolverOptions) {
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * @throws {ResolutionError} If no form matches or a conflict is detected
     * @throws {ToolInvocationError} If cloning a new repository fails
     */
    async resolve(ref: string): Promise<ResolvedRef> {
        if (ref.includes('/')) {
            return this.resolveRepoPath(ref);
        }

        const fromProject = await this.resolveProjectShorthand(ref);
        if (fromProject) {
            return fromProject;
        }

        const fromChange = await this.resolveChangeName(ref);
        if (fromChange) {
            return fromChange;
        }

        throw new ResolutionError(`Cannot resolve reference '${ref}'`);
    }

    private async resolveRepoPath(ref: string): Promise<ResolvedRef> {
        const parts = ref.replace(/^\/+|\/+$/g, '').split('/');
        if (parts.length !== 2 || parts.some((part) => part.length === 0)) {
            throw new ResolutionError(`Invalid repo path '${ref}': expected 'owner/project'`);
        }
        const [owner, project] = parts;
        if (!isSafeRepoSegment(owner) || !isSafeRepoSegment(project)) {
            throw new ResolutionError(`Invalid repo path '${ref}': unsupported characters`);
        }

        const { projects, git } = this.options;
        const primaryWorkspaceDir = join(this.options.checkoutRoot, owner, project) + '/';
        const projectFile = projects.projectFileFor(project);

        const existing = await projects.getWorkspaceDir(projectFile);
        if (existing && !sameDirectory(existing, primaryWorkspaceDir)) {
            throw new ResolutionError(
                `WORKSPACE_DIR conflict for '${project}': existing=${existing}, derived=${primaryWorkspaceDir}`
            );
        }

        if (!existsSync(primaryWorkspaceDir.replace(/\/+$/, ''))) {
            const url = buildCloneUrl(owner, project, this.options.githubUsername === owner);
            this.logger.info(`Cloning ${url} into ${primaryWorkspaceDir}`);
            await git.clone(url, primaryWorkspaceDir);
        }

        await projects.setWorkspaceDir(projectFile, primaryWorkspaceDir);
        const checkoutTarget = await git.defaultBranchRef(primaryWorkspaceDir);

        return { projectName: project, projectFile, primaryWorkspaceDir, checkoutTarget };
    }

    private async resolveProjectShorthand(ref: string): Promise<ResolvedRef | null> {
        const { projects, git } = this.options;
        if (!projects.hasProject(ref)) {
            return null;
        }

        const projectFile = projects.projectFileFor(ref);
        const workspaceDir = await projects.getWorkspaceDir(projectFile);
        if (!workspaceDir) {
            this.logger.debug(`Project '${ref}' has no WORKSPACE_DIR, trying change names`);
            return null;
        }

        return {
            projectName: ref,
            projectFile,
            primaryWorkspaceDir: workspaceDir,
            checkoutTarget: await git.defaultBranchRef(workspaceDir),
        };
    }

    private async resolveChangeName(ref: string): Promise<ResolvedRef | null> {
        const changes = await this.options.changes.findAll();
        const change = changes.find((c) => c.name === ref);
        if (!change) {
            return null;
        }

        const workspaceDir = await this.options.projects.getWorkspaceDir(change.filePath);
        if (!workspaceDir) {
            throw new ResolutionError(
                `ChangeSpec '${ref}' found in ${change.filePath} but WORKSPACE_DIR is not set`
            );
        }

        return {
            projectName: change.projectBasename,
            projectFile: change.filePath,
            primaryWorkspaceDir: workspaceDir,
            checkoutTarget: `origin/${ref}`,
        };
    }
}
