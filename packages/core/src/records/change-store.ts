/**
 * Change records stored inside project files.
 */

import { existsSync } from 'fs';
import { readdir } from 'fs/promises';
import { join } from 'path';
import { fieldValue, readGpFile, writeGpLines, type GpField } from './gp-file.js';
import { projectBasename } from './project-store.js';
import { PreconditionError } from '../types.js';
import type { ChangeRecord, CreateChangeOptions } from './types.js';

function toChangeRecord(fields: GpField[], filePath: string): ChangeRecord {
    return {
        name: fieldValue(fields, 'NAME') ?? '',
        filePath,
        projectBasename: projectBasename(filePath),
        description: fieldValue(fields, 'DESCRIPTION') ?? '',
        parent: fieldValue(fields, 'PARENT'),
        status: fieldValue(fields, 'STATUS') ?? 'Drafted',
        branch: fieldValue(fields, 'BRANCH'),
    };
}

export class ChangeStore {
    constructor(readonly projectsRoot: string) {}

    /**
     * Every change record in every project file under the projects root,
     * in directory order.
     */
    async findAll(): Promise<ChangeRecord[]> {
        if (!existsSync(this.projectsRoot)) {
            return [];
        }

        const records: ChangeRecord[] = [];
        const projectDirs = (await readdir(this.projectsRoot, { withFileTypes: true }))
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name)
            .sort();

        for (const dir of projectDirs) {
            const files = (await readdir(join(this.projectsRoot, dir)))
                .filter((name) => name.endsWith('.gp'))
                .sort();
            for (const file of files) {
                records.push(...(await this.readFile(join(this.projectsRoot, dir, file))));
            }
        }
        return records;
    }

    /**
     * First change record named `name`, or null.
     */
    async find(name: string): Promise<ChangeRecord | null> {
        const all = await this.findAll();
        return all.find((record) => record.name === name) ?? null;
    }

    /**
     * Change records in a single project file.
     */
    async readFile(projectFile: string): Promise<ChangeRecord[]> {
        const doc = await readGpFile(projectFile);
        return doc.records.map((fields) => toChangeRecord(fields, projectFile));
    }

    /**
     * Append a change record to a project file.
     * @throws {PreconditionError} If a record with that name already exists in the file
     */
    async create(projectFile: string, options: CreateChangeOptions): Promise<ChangeRecord> {
        const doc = await readGpFile(projectFile);
        if (doc.records.some((fields) => fieldValue(fields, 'NAME') === options.name)) {
            throw new PreconditionError(`ChangeSpec '${options.name}' already exists in ${projectFile}`);
        }

        const block = [`NAME: ${options.name}`, `DESCRIPTION: ${options.description}`];
        if (options.parent) block.push(`PARENT: ${options.parent}`);
        block.push(`STATUS: ${options.status ?? 'Drafted'}`);
        if (options.branch) block.push(`BRANCH: ${options.branch}`);

        const lines = [...doc.lines];
        if (lines.length > 0 && lines[lines.length - 1].trim() !== '') {
            lines.push('');
        }
        lines.push(...block);
        await writeGpLines(projectFile, lines);

        const created = await this.readFile(projectFile);
        const record = created.find((r) => r.name === options.name);
        if (!record) {
            throw new PreconditionError(`ChangeSpec '${options.name}' was not written to ${projectFile}`);
        }
        return record;
    }

    /**
     * Rewrite the STATUS of a change record in place.
     * @throws {PreconditionError} If the record is no longer in its file
     */
    async setStatus(change: ChangeRecord, status: string): Promise<void> {
        const doc = await readGpFile(change.filePath);
        const fields = doc.records.find((f) => fieldValue(f, 'NAME') === change.name);
        if (!fields) {
            throw new PreconditionError(`ChangeSpec '${change.name}' not found in ${change.filePath}`);
        }

        const lines = [...doc.lines];
        const statusField = fields.find((f) => f.key === 'STATUS');
        if (statusField) {
            lines[statusField.line] = `STATUS: ${status}`;
        } else {
            const last = fields[fields.length - 1];
            lines.splice(last.line + 1, 0, `STATUS: ${status}`);
        }
        await writeGpLines(change.filePath, lines);
    }
}

/**
 * Whether another change names `change` as its parent and is not yet in
 * one of `terminalStatuses`.
 */
export function hasActiveChildren(
    change: ChangeRecord,
    all: ChangeRecord[],
    terminalStatuses: readonly string[]
): boolean {
    return all.some(
        (other) =>
            other.parent === change.name &&
            other.name !== change.name &&
            !terminalStatuses.includes(other.status)
    );
}
