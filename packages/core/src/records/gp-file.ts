/**
 * Reader/writer for the `KEY: value` project file format.
 *
 * Lines before the first `NAME:` are project-level fields; every `NAME:`
 * line opens a change record that owns the fields after it.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';

export interface GpField {
    key: string;
    value: string;
    /** Zero-based line index in the file */
    line: number;
}

export interface GpDocument {
    lines: string[];
    header: GpField[];
    records: GpField[][];
}

const FIELD_PATTERN = /^([A-Z][A-Z0-9_]*):[ \t]?(.*)$/;

export function parseGpContent(content: string): GpDocument {
    const lines = content.length > 0 ? content.replace(/\n$/, '').split('\n') : [];
    const header: GpField[] = [];
    const records: GpField[][] = [];

    lines.forEach((text, line) => {
        const match = text.match(FIELD_PATTERN);
        if (!match) return;

        const field: GpField = { key: match[1], value: match[2].trim(), line };
        if (field.key === 'NAME') {
            records.push([field]);
        } else if (records.length > 0) {
            records[records.length - 1].push(field);
        } else {
            header.push(field);
        }
    });

    return { lines, header, records };
}

/**
 * Value of the first field named `key`, or null when absent or empty.
 */
export function fieldValue(fields: GpField[], key: string): string | null {
    const field = fields.find((f) => f.key === key);
    return field && field.value ? field.value : null;
}

export async function readGpFile(filePath: string): Promise<GpDocument> {
    if (!existsSync(filePath)) {
        return parseGpContent('');
    }
    return parseGpContent(await readFile(filePath, 'utf-8'));
}

export async function writeGpLines(filePath: string, lines: string[]): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, lines.join('\n') + '\n', 'utf-8');
}
