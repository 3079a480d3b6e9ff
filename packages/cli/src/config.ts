import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

// User config
const USER_CONFIG_DIR = join(homedir(), '.config', 'gh-workspace');
const USER_CONFIG_FILE = join(USER_CONFIG_DIR, 'config.json');

const ConfigSchema = z.object({
    /** Your GitHub login; repos you own are cloned over SSH */
    githubUsername: z.string().min(1).nullable(),
    /** Where project records live */
    projectsRoot: z.string().min(1),
    /** Primary checkouts go to `<checkoutRoot>/<owner>/<project>/` */
    checkoutRoot: z.string().min(1),
    pool: z.object({
        firstSlot: z.number().int().positive(),
        lastSlot: z.number().int().positive(),
    }),
    /** Bound on the remote URL probe used for classification */
    probeTimeoutMs: z.number().int().positive(),
    /** How long to wait for a workspace registry lock */
    lockTimeoutMs: z.number().int().positive(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = {
    githubUsername: null,
    projectsRoot: '~/.gh-workspace/projects',
    checkoutRoot: '~/projects/github',
    pool: {
        firstSlot: 100,
        lastSlot: 199,
    },
    probeTimeoutMs: 5000,
    lockTimeoutMs: 5000,
};

export interface LoadedConfig {
    config: Config;
    /** File the user settings were read from */
    path: string;
    /** Problems found in the file; the defaults were used when non-empty */
    issues: string[];
}

/**
 * Check if a value is a plain object (not array, null, or other types)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (right overwrites left, nested objects are merged,
 * arrays and primitives are replaced, undefined is skipped)
 */
export function deepMergeObjects(
    base: Record<string, unknown>,
    override: Record<string, unknown>
): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };
    for (const [key, overrideValue] of Object.entries(override)) {
        if (overrideValue === undefined) continue;

        const baseValue = result[key];
        if (isPlainObject(overrideValue) && isPlainObject(baseValue)) {
            result[key] = deepMergeObjects(baseValue, overrideValue);
        } else {
            result[key] = overrideValue;
        }
    }
    return result;
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(path: string, home = homedir()): string {
    if (path === '~') return home;
    if (path.startsWith('~/')) return join(home, path.slice(2));
    return path;
}

/**
 * Get the path to the user config file (`GHWS_CONFIG` overrides it)
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    return env.GHWS_CONFIG || USER_CONFIG_FILE;
}

function readUserConfig(path: string): { data: Record<string, unknown>; issues: string[] } {
    if (!existsSync(path)) {
        return { data: {}, issues: [] };
    }
    try {
        const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
        if (!isPlainObject(data)) {
            return { data: {}, issues: [`${path}: expected a JSON object`] };
        }
        return { data, issues: [] };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { data: {}, issues: [`${path}: ${message}`] };
    }
}

/**
 * Load merged config: defaults → user file → environment.
 * Paths come back with `~` expanded.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, home = homedir()): LoadedConfig {
    const path = getConfigPath(env);
    const user = readUserConfig(path);
    const issues = [...user.issues];

    let config = DEFAULT_CONFIG;
    const parsed = ConfigSchema.safeParse(deepMergeObjects(DEFAULT_CONFIG, user.data));
    if (parsed.success) {
        config = parsed.data;
    } else {
        issues.push(
            ...parsed.error.issues.map((issue) => `${path}: ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }

    if (config.pool.lastSlot < config.pool.firstSlot) {
        issues.push(`${path}: pool.lastSlot must not be below pool.firstSlot`);
        config = { ...config, pool: DEFAULT_CONFIG.pool };
    }

    if (env.GHWS_GITHUB_USERNAME) {
        config = { ...config, githubUsername: env.GHWS_GITHUB_USERNAME };
    }

    return {
        config: {
            ...config,
            projectsRoot: expandHome(config.projectsRoot, home),
            checkoutRoot: expandHome(config.checkoutRoot, home),
        },
        path,
        issues,
    };
}
