/**
 * File-based Workspace Pool Registry
 *
 * Tracks which numbered workspace slots of a project are claimed, by which
 * workflow and process. Every read-modify-write happens under an exclusive
 * lock file so concurrent runs cannot claim the same slot.
 *
 * File location: `<projectsRoot>/<name>/<name>.workspaces.json`
 */

import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { slotDirectory } from '../git-utils.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ProjectStore } from '../records/project-store.js';
import { AllocationError } from '../types.js';
import { isProcessAlive, withFileLock } from './lock.js';
import { PoolFileSchema, type ClaimOptions, type PoolFile, type SlotClaim } from './types.js';

const POOL_VERSION = 1;

export interface WorkspacePoolOptions {
    projects: ProjectStore;
    /** First slot handed out by firstAvailable (default: 100) */
    firstSlot?: number;
    /** Last slot handed out by firstAvailable (default: 199) */
    lastSlot?: number;
    /** How long to wait for the registry lock (default: 5000ms) */
    lockTimeoutMs?: number;
    isProcessAlive?: (pid: number) => boolean;
    logger?: Logger;
}

function emptyPool(): PoolFile {
    return { version: POOL_VERSION, claims: {}, updatedAt: new Date().toISOString() };
}

export class WorkspacePool {
    readonly firstSlot: number;
    readonly lastSlot: number;
    private readonly projects: ProjectStore;
    private readonly lockTimeoutMs: number;
    private readonly alive: (pid: number) => boolean;
    private readonly logger: Logger;

    constructor(options: WorkspacePoolOptions) {
        this.projects = options.projects;
        this.firstSlot = options.firstSlot ?? 100;
        this.lastSlot = options.lastSlot ?? 199;
        this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
        this.alive = options.isProcessAlive ?? isProcessAlive;
        this.logger = options.logger ?? silentLogger;

        if (this.lastSlot < this.firstSlot) {
            throw new AllocationError(`Invalid workspace range ${this.firstSlot}-${this.lastSlot}`);
        }
    }

    /**
     * Path of the claims file for a project file.
     */
    registryPathFor(projectFile: string): string {
        return `${projectFile.replace(/\.gp$/, '')}.workspaces.json`;
    }

    /**
     * Claim `slot` for `workflow`.
     * Returns false when another live (or pinned) claim holds the slot.
     */
    async claim(
        projectFile: string,
        slot: number,
        workflow: string,
        pid: number,
        changeName: string | null,
        options: ClaimOptions = {}
    ): Promise<boolean> {
        return this.update(projectFile, (pool) => {
            const current = pool.claims[String(slot)];
            if (!this.isClaimable(current, workflow, pid)) {
                this.logger.debug(`Workspace #${slot} is held by ${current?.workflow} (pid ${current?.pid})`);
                return false;
            }

            pool.claims[String(slot)] = {
                slot,
                workflow,
                pid,
                changeName,
                pinned: options.pinned ?? false,
                claimedAt: new Date().toISOString(),
            };
            return true;
        });
    }

    /**
     * Release `slot` if it is held by `workflow` (and, when both sides name
     * a change, by that change).
     */
    async release(
        projectFile: string,
        slot: number,
        workflow: string,
        changeName: string | null
    ): Promise<boolean> {
        return this.update(projectFile, (pool) => {
            const current = pool.claims[String(slot)];
            if (!current || current.workflow !== workflow) {
                return false;
            }
            if (changeName && current.changeName && current.changeName !== changeName) {
                return false;
            }
            delete pool.claims[String(slot)];
            return true;
        });
    }

    /**
     * Lowest claimable slot in the configured range.
     * @throws {AllocationError} If every slot is held
     */
    async firstAvailable(projectFile: string): Promise<number> {
        const pool = await this.locked(projectFile, () => this.load(projectFile));
        for (let slot = this.firstSlot; slot <= this.lastSlot; slot++) {
            if (this.isClaimable(pool.claims[String(slot)])) {
                return slot;
            }
        }
        throw new AllocationError(
            `No available workspace for ${projectFile} (slots ${this.firstSlot}-${this.lastSlot} are all claimed)`
        );
    }

    /**
     * Directory of `slot` for the project named `projectBasename`.
     * @throws {AllocationError} If the slot or the project's workspace is unknown
     */
    async directoryFor(slot: number, projectBasename: string): Promise<string> {
        if (slot !== 0 && (slot < this.firstSlot || slot > this.lastSlot)) {
            throw new AllocationError(
                `Workspace #${slot} is outside ${this.firstSlot}-${this.lastSlot}`
            );
        }
        const workspaceDir = await this.projects.getWorkspaceDir(this.projects.projectFileFor(projectBasename));
        if (!workspaceDir) {
            throw new AllocationError(`WORKSPACE_DIR is not set for project '${projectBasename}'`);
        }
        return slotDirectory(workspaceDir, slot);
    }

    /**
     * Current claims, ordered by slot.
     */
    async listClaims(projectFile: string): Promise<SlotClaim[]> {
        const pool = await this.locked(projectFile, () => this.load(projectFile));
        return Object.values(pool.claims).sort((a, b) => a.slot - b.slot);
    }

    private isClaimable(claim: SlotClaim | undefined, workflow?: string, pid?: number): boolean {
        if (!claim) return true;
        if (claim.workflow === workflow && claim.pid === pid) return true;
        return !claim.pinned && !this.alive(claim.pid);
    }

    private async locked<T>(projectFile: string, fn: () => Promise<T>): Promise<T> {
        const path = this.registryPathFor(projectFile);
        await mkdir(dirname(path), { recursive: true });
        return withFileLock(`${path}.lock`, fn, {
            timeoutMs: this.lockTimeoutMs,
            isProcessAlive: this.alive,
        });
    }

    private async update(projectFile: string, mutate: (pool: PoolFile) => boolean): Promise<boolean> {
        return this.locked(projectFile, async () => {
            const pool = await this.load(projectFile);
            const changed = mutate(pool);
            if (changed) {
                await this.save(projectFile, pool);
            }
            return changed;
        });
    }

    private async load(projectFile: string): Promise<PoolFile> {
        const path = this.registryPathFor(projectFile);
        if (!existsSync(path)) {
            return emptyPool();
        }

        let data: unknown;
        try {
            data = JSON.parse(await readFile(path, 'utf-8'));
        } catch (error) {
            this.logger.warn(`Could not parse ${path}, starting fresh: ${String(error)}`);
            return emptyPool();
        }

        const parsed = PoolFileSchema.safeParse(data);
        if (!parsed.success) {
            this.logger.warn(`Ignoring malformed workspace registry ${path}`);
            return emptyPool();
        }
        return parsed.data;
    }

    private async save(projectFile: string, pool: PoolFile): Promise<void> {
        pool.updatedAt = new Date().toISOString();
        await writeFile(this.registryPathFor(projectFile), JSON.stringify(pool, null, 2), 'utf-8');
    }
}
