/**
 * Exclusive lock files for cross-process critical sections.
 *
 * The lock is a file created with O_EXCL ('wx') that holds the owner's pid.
 * A lock whose owner is no longer running is reclaimed.
 */

import { randomUUID } from 'crypto';
import { link, open, readFile, rename, rm } from 'fs/promises';
import { AllocationError } from '../types.js';

export interface LockOptions {
    timeoutMs: number;
    pollMs?: number;
    isProcessAlive?: (pid: number) => boolean;
}

function errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

/**
 * Whether a process with this pid exists (EPERM means it exists but belongs
 * to another user).
 */
export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        return errnoCode(error) === 'EPERM';
    }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function lockOwner(lockPath: string): Promise<number | null> {
    try {
        const pid = parseInt((await readFile(lockPath, 'utf-8')).trim(), 10);
        return Number.isNaN(pid) ? null : pid;
    } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
            return null;
        }
        throw error;
    }
}

/**
 * Remove the lock at `lockPath` only if it is still held by `stalePid`.
 *
 * The lock is first renamed aside, which only one waiter can do, and the
 * owner is checked on the renamed file. A lock that was taken over in the
 * meantime is linked back into place.
 */
export async function reclaimStaleLock(lockPath: string, stalePid: number): Promise<boolean> {
    const aside = `${lockPath}.${process.pid}.${randomUUID()}`;
    try {
        await rename(lockPath, aside);
    } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
            return false;
        }
        throw error;
    }

    try {
        if ((await lockOwner(aside)) === stalePid) {
            return true;
        }
        await link(aside, lockPath).catch((error: unknown) => {
            if (errnoCode(error) !== 'EEXIST') {
                throw error;
            }
        });
        return false;
    } finally {
        await rm(aside, { force: true });
    }
}

async function acquire(lockPath: string, options: LockOptions): Promise<void> {
    const alive = options.isProcessAlive ?? isProcessAlive;
    const deadline = Date.now() + options.timeoutMs;

    for (;;) {
        try {
            const handle = await open(lockPath, 'wx');
            try {
                await handle.writeFile(String(process.pid));
            } finally {
                await handle.close();
            }
            return;
        } catch (error) {
            if (errnoCode(error) !== 'EEXIST') {
                throw error;
            }
        }

        const owner = await lockOwner(lockPath);
        if (owner !== null && owner !== process.pid && !alive(owner)) {
            await reclaimStaleLock(lockPath, owner);
            continue;
        }

        if (Date.now() >= deadline) {
            throw new AllocationError(`Timed out waiting for lock ${lockPath}`);
        }
        await sleep(options.pollMs ?? 25);
    }
}

/**
 * Run `fn` while holding the lock at `lockPath`.
 * @throws {AllocationError} If the lock is not acquired within `timeoutMs`
 */
export async function withFileLock<T>(
    lockPath: string,
    fn: () => Promise<T>,
    options: LockOptions
): Promise<T> {
    await acquire(lockPath, options);
    try {
        return await fn();
    } finally {
        await rm(lockPath, { force: true });
    }
}
