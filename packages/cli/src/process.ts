/**
 * Runs the user's command inside a workspace.
 */

import { spawn } from 'child_process';

/** Runs argv in cwd and resolves with its exit code */
export type CommandSpawner = (argv: string[], cwd: string) => Promise<number>;

/**
 * Spawn `argv` in `cwd`. The child's stdout is sent to our stderr so that
 * stdout keeps only the key=value block.
 */
export const spawnInWorkspace: CommandSpawner = (argv, cwd) => {
    const [program, ...args] = argv;
    if (!program) {
        return Promise.reject(new Error('No command given'));
    }

    return new Promise((resolve, reject) => {
        const child = spawn(program, args, {
            cwd,
            stdio: ['inherit', process.stderr, 'inherit'],
        });

        child.on('exit', (code, signal) => {
            resolve(code ?? (signal ? 128 : 1));
        });

        child.on('error', (err) => {
            reject(err);
        });
    });
};
