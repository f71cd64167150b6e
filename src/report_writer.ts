// report_writer.ts - results.csv, success.txt and the summary line

import { atomicWriteFileSync } from './atomic_write';
import type { FsyncMode } from './atomic_write';
import { createLogger } from './logger';
import { ErrorFactory } from './structured_error';
import type { Credential, ProbeResult, RunSummary } from './types';

const log = createLogger('report');

export const REPORT_COLUMNS = ['key', 'status', 'http_status', 'detail', 'elapsed_seconds'] as const;

const FILE_MODE = 0o644;
const ROW_TERMINATOR = '\r\n';

export function csvEscape(value: string): string {
    if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

function toCsvRow(values: ReadonlyArray<string | number>): string {
    return values.map((v) => csvEscape(String(v))).join(',') + ROW_TERMINATOR;
}

/** Rows in the order given, which is completion order for a dispatcher run */
export function renderReport(results: readonly ProbeResult[]): string {
    let csv = toCsvRow(REPORT_COLUMNS);
    for (const r of results) {
        csv += toCsvRow([r.credential, r.category, r.httpStatus, r.detail, r.elapsedSeconds.toFixed(2)]);
    }
    return csv;
}

/** Lexicographic by UTF-16 code unit, one key per line */
export function renderSuccessList(successSet: ReadonlySet<Credential>): string {
    return [...successSet]
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
        .map((k) => k + '\n')
        .join('');
}

export function formatSummary(summary: RunSummary): string {
    return `Done: total ${summary.total}, valid ${summary.valid}, invalid ${summary.invalid}, ` +
        `model_not_found ${summary.modelNotFound}, other errors ${summary.error}.`;
}

function writeArtifact(filePath: string, content: string, fsyncMode: FsyncMode): void {
    const warnings: string[] = [];
    try {
        atomicWriteFileSync({ filePath, content, mode: FILE_MODE, fsyncMode, warnings });
    } catch (e: unknown) {
        throw ErrorFactory.outputWriteFailed(filePath, e instanceof Error ? e.message : String(e));
    }
    for (const w of warnings) log.warn(w, { path: filePath });
}

export interface WriteReportsOptions {
    outputPath: string;
    successPath: string;
    fsyncMode?: FsyncMode;
}

export interface WrittenReports {
    reportPath: string;
    /** null when no credential was valid and the file was not written */
    successPath: string | null;
}

export function writeReports(
    results: readonly ProbeResult[],
    successSet: ReadonlySet<Credential>,
    options: WriteReportsOptions
): WrittenReports {
    const fsyncMode = options.fsyncMode ?? 'BEST_EFFORT';

    writeArtifact(options.outputPath, renderReport(results), fsyncMode);
    log.info('report written', { path: options.outputPath, rows: results.length });

    if (successSet.size === 0) {
        return { reportPath: options.outputPath, successPath: null };
    }

    writeArtifact(options.successPath, renderSuccessList(successSet), fsyncMode);
    log.info('success list written', { path: options.successPath, keys: successSet.size });
    return { reportPath: options.outputPath, successPath: options.successPath };
}
