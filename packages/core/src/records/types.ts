/**
 * Record Store Types
 *
 * Project records and change records live together in one `<name>.gp`
 * file per project, under `<projectsRoot>/<name>/`.
 */

/**
 * One logical unit of work (a branch plus its metadata)
 */
export interface ChangeRecord {
    /** Unique change name, also used as the default branch name */
    name: string;
    /** Project file the record lives in */
    filePath: string;
    /** Project file name without the `.gp` extension */
    projectBasename: string;
    description: string;
    /** Name of the change this one is stacked on, if any */
    parent: string | null;
    /** Lifecycle status (Drafted, Running, Mailed, Submitted, Reverted, Archived, ...) */
    status: string;
    /** Branch name, when it differs from the change name */
    branch: string | null;
}

/**
 * Fields accepted when creating a change record
 */
export interface CreateChangeOptions {
    name: string;
    description: string;
    parent?: string;
    status?: string;
    branch?: string;
}

/**
 * Statuses after which a change no longer blocks its parent's submission
 */
export const TERMINAL_STATUSES = ['Submitted', 'Reverted', 'Archived'] as const;
