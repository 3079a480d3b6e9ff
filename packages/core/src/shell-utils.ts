/**
 * Shell Utilities - command line assembly for external tools
 *
 * Every tool is run through the shell with each argument single-quoted, so
 * refs, paths and PR titles are never interpreted.
 */

/**
 * Escape a string for safe use in shell commands.
 *
 * POSIX single-quote escaping: wrap in single quotes and turn each embedded
 * single quote into '\'' (close, escaped quote, reopen).
 *
 * @example
 * ```typescript
 * shellEscape("hello world")     // "'hello world'"
 * shellEscape("it's fine")       // "'it'\\''s fine'"
 * shellEscape("$(rm -rf /)")     // "'$(rm -rf /)'"
 * ```
 */
export function shellEscape(str: string): string {
    return "'" + str.replace(/'/g, "'\\''") + "'";
}

/**
 * Join an argv into one shell command line.
 * The program name stays bare when it is a plain word so that error text
 * from the shell (e.g. "gh: command not found") reads naturally.
 */
export function buildShellCommand(argv: string[]): string {
    if (argv.length === 0) {
        throw new Error('Cannot build an empty command');
    }
    const [program, ...args] = argv;
    const head = /^[\w./-]+$/.test(program) ? program : shellEscape(program);
    return [head, ...args.map(shellEscape)].join(' ');
}

/**
 * Whether a string is usable as one `owner` or `project` segment of a
 * GitHub repository path.
 */
export function isSafeRepoSegment(value: string): boolean {
    return /^[A-Za-z0-9._-]+$/.test(value) && value !== '.' && value !== '..';
}
