/**
 * Project records: `<projectsRoot>/<name>/<name>.gp`
 */

import { existsSync, statSync } from 'fs';
import { basename, join } from 'path';
import { fieldValue, readGpFile, writeGpLines } from './gp-file.js';

export class ProjectStore {
    constructor(readonly projectsRoot: string) {}

    /**
     * Path of the project file for a project name.
     */
    projectFileFor(name: string): string {
        return join(this.projectsRoot, name, `${name}.gp`);
    }

    /**
     * Whether `<projectsRoot>/<name>/` exists and holds `<name>.gp`.
     */
    hasProject(name: string): boolean {
        const dir = join(this.projectsRoot, name);
        return existsSync(dir) && statSync(dir).isDirectory() && existsSync(this.projectFileFor(name));
    }

    /**
     * Recorded WORKSPACE_DIR, or null when the file or field is missing.
     */
    async getWorkspaceDir(projectFile: string): Promise<string | null> {
        const doc = await readGpFile(projectFile);
        return fieldValue(doc.header, 'WORKSPACE_DIR');
    }

    /**
     * Recorded BARE_REPO_DIR (projects served by a bare local repository).
     */
    async getBareRepoDir(projectFile: string): Promise<string | null> {
        const doc = await readGpFile(projectFile);
        return fieldValue(doc.header, 'BARE_REPO_DIR');
    }

    /**
     * Persist WORKSPACE_DIR, creating the project file if needed.
     */
    async setWorkspaceDir(projectFile: string, workspaceDir: string): Promise<void> {
        const doc = await readGpFile(projectFile);
        const lines = [...doc.lines];
        const entry = `WORKSPACE_DIR: ${workspaceDir}`;

        const existing = doc.header.find((f) => f.key === 'WORKSPACE_DIR');
        if (existing) {
            lines[existing.line] = entry;
        } else {
            lines.unshift(entry);
        }
        await writeGpLines(projectFile, lines);
    }
}

/**
 * Project name of a project file (`/x/proj/proj.gp` => `proj`).
 */
export function projectBasename(projectFile: string): string {
    return basename(projectFile).replace(/\.gp$/, '');
}
