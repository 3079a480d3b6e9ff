/**
 * Builds the stores, pool and providers every command works with.
 */

import {
    ChangeStore,
    GitClient,
    GitHubActions,
    GitHubWorkspaceProvider,
    ProjectStore,
    ProviderRegistry,
    WorkspacePool,
    type CommandRunner,
    type Logger,
    type PreallocatedSlot,
} from '@gh-workspace/core';
import { loadConfig, type Config } from './config.js';
import { createConsoleLogger } from './logger.js';

export interface CliContext {
    config: Config;
    logger: Logger;
    projects: ProjectStore;
    changes: ChangeStore;
    pool: WorkspacePool;
    git: GitClient;
    github: GitHubWorkspaceProvider;
    providers: ProviderRegistry;
    /** Destination of key=value output */
    write: (text: string) => void;
}

export interface ContextOptions {
    verbose?: boolean;
    env?: NodeJS.ProcessEnv;
    /** Overrides loading the config file */
    config?: Config;
    logger?: Logger;
    runner?: CommandRunner;
    write?: (text: string) => void;
}

export function createContext(options: ContextOptions = {}): CliContext {
    const logger = options.logger ?? createConsoleLogger(options.verbose);

    let config = options.config;
    if (!config) {
        const loaded = loadConfig(options.env);
        for (const issue of loaded.issues) {
            logger.warn(`Ignoring config: ${issue}`);
        }
        config = loaded.config;
    }

    const projects = new ProjectStore(config.projectsRoot);
    const changes = new ChangeStore(config.projectsRoot);
    const git = new GitClient({ runner: options.runner, logger });
    const pool = new WorkspacePool({
        projects,
        firstSlot: config.pool.firstSlot,
        lastSlot: config.pool.lastSlot,
        lockTimeoutMs: config.lockTimeoutMs,
        logger,
    });
    const github = new GitHubWorkspaceProvider({
        projects,
        changes,
        pool,
        git,
        actions: new GitHubActions({ runner: options.runner, logger }),
        checkoutRoot: config.checkoutRoot,
        githubUsername: config.githubUsername,
        probeTimeoutMs: config.probeTimeoutMs,
        logger,
    });

    const providers = new ProviderRegistry();
    providers.register(github);

    const write = options.write ?? ((text: string) => console.log(text));

    return { config, logger, projects, changes, pool, git, github, providers, write };
}

/**
 * Slot chosen by an interactive front-end, passed through
 * `GHWS_PRE_ALLOCATED=1`, `GHWS_WORKSPACE_NUM` and `GHWS_WORKSPACE_DIR`.
 *
 * @throws {Error} If the flag is set but the slot or directory is missing
 */
export function preallocatedFromEnv(env: NodeJS.ProcessEnv = process.env): PreallocatedSlot | undefined {
    if (env.GHWS_PRE_ALLOCATED !== '1') {
        return undefined;
    }
    const slot = Number.parseInt(env.GHWS_WORKSPACE_NUM ?? '', 10);
    const dir = env.GHWS_WORKSPACE_DIR;
    if (Number.isNaN(slot) || !dir) {
        throw new Error('GHWS_PRE_ALLOCATED is set but GHWS_WORKSPACE_NUM or GHWS_WORKSPACE_DIR is missing');
    }
    return { slot, dir };
}

/**
 * Process a `setup` claim is recorded under: `GHWS_OWNER_PID` when set,
 * else the process that invoked the CLI.
 *
 * @throws {Error} If GHWS_OWNER_PID is not a pid
 */
export function ownerPidFromEnv(env: NodeJS.ProcessEnv = process.env): number {
    const value = env.GHWS_OWNER_PID;
    if (value === undefined || value === '') {
        return process.ppid;
    }
    if (!/^\d+$/.test(value)) {
        throw new Error(`Invalid GHWS_OWNER_PID '${value}'`);
    }
    return Number.parseInt(value, 10);
}
