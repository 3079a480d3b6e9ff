/**
 * key=value output for the workflow executor.
 *
 * Every key of a command's fixed set is printed, in order, even when its
 * value is empty. Callers parse by key, so values are kept to one line.
 */

export type OutputValue = string | number | boolean | null | undefined;

function formatValue(value: OutputValue): string {
    if (value === null || value === undefined) return '';
    return String(value).replace(/\r?\n/g, ' ');
}

export function formatKeyValues<K extends string>(
    keys: readonly K[],
    values: Partial<Record<K, OutputValue>>
): string {
    return keys.map((key) => `${key}=${formatValue(values[key])}`).join('\n');
}

export function printKeyValues<K extends string>(
    keys: readonly K[],
    values: Partial<Record<K, OutputValue>>,
    write: (text: string) => void = (text) => console.log(text)
): void {
    write(formatKeyValues(keys, values));
}

/** Valid exit codes for the CLI (0 = success, 1 = error) */
export type ExitCode = 0 | 1;

export function exitCodeFor(success: boolean): ExitCode {
    return success ? 0 : 1;
}
