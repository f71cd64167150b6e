// credential_list.ts - newline-delimited key list

import * as fs from 'fs';
import { ErrorFactory } from './structured_error';
import type { Credential } from './types';

/**
 * One credential per line. Lines are trimmed; blank lines are dropped;
 * duplicates are kept so every line gets its own result row.
 */
export function parseCredentials(text: string): Credential[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

export function loadCredentials(filePath: string): Credential[] {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (e: unknown) {
        const code = e instanceof Error && 'code' in e ? e.code : undefined;
        if (code === 'ENOENT') throw ErrorFactory.inputNotFound(filePath);
        throw ErrorFactory.inputUnreadable(filePath, e instanceof Error ? e.message : String(e));
    }
    // Editors on Windows may prepend a BOM
    return parseCredentials(text.replace(/^\uFEFF/, ''));
}
