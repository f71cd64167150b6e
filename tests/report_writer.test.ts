import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { csvEscape, formatSummary, renderReport, renderSuccessList, writeReports } from '../src/report_writer';
import { CliError } from '../src/structured_error';
import type { ProbeResult } from '../src/types';

function result(partial: Partial<ProbeResult> & Pick<ProbeResult, 'credential'>): ProbeResult {
    return { category: 'valid', httpStatus: 200, detail: 'OK', elapsedSeconds: 0.5, attempts: 1, ...partial };
}

describe('report_writer', () => {
    let tmpRoot: string;

    beforeEach(() => {
        tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'keyprobe-report-'));
    });

    afterEach(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    test('renders a header and one CRLF-terminated row per result in the given order', () => {
        const csv = renderReport([
            result({ credential: 'key-b', elapsedSeconds: 1.2 }),
            result({ credential: 'key-a', category: 'invalid', httpStatus: 401, detail: 'bad "key", denied', elapsedSeconds: 0.25 }),
            result({ credential: 'key-c', category: 'error', httpStatus: -1, detail: 'Timeout', elapsedSeconds: 3 }),
        ]);

        assert.equal(
            csv,
            'key,status,http_status,detail,elapsed_seconds\r\n' +
            'key-b,valid,200,OK,1.20\r\n' +
            'key-a,invalid,401,"bad ""key"", denied",0.25\r\n' +
            'key-c,error,-1,Timeout,3.00\r\n'
        );
    });

    test('quotes fields containing line breaks', () => {
        assert.equal(csvEscape('line1\nline2'), '"line1\nline2"');
        assert.equal(csvEscape('a\rb'), '"a\rb"');
        assert.equal(csvEscape('plain'), 'plain');
    });

    test('sorts the success list by code unit, one key per line', () => {
        assert.equal(renderSuccessList(new Set(['key-b', 'key-a', 'Key-C'])), 'Key-C\nkey-a\nkey-b\n');
        assert.equal(renderSuccessList(new Set()), '');
    });

    test('writes both artifacts and rewrites the success list byte for byte', () => {
        const outputPath = path.join(tmpRoot, 'out', 'results.csv');
        const successPath = path.join(tmpRoot, 'out', 'success.txt');
        const results = [result({ credential: 'key-2' }), result({ credential: 'key-1' })];
        const successSet = new Set(['key-2', 'key-1']);

        const first = writeReports(results, successSet, { outputPath, successPath });
        const firstBytes = fs.readFileSync(successPath);
        const second = writeReports(results, successSet, { outputPath, successPath });
        const secondBytes = fs.readFileSync(successPath);

        assert.deepEqual(first, { reportPath: outputPath, successPath });
        assert.deepEqual(second, first);
        assert.equal(firstBytes.toString('utf-8'), 'key-1\nkey-2\n');
        assert.ok(firstBytes.equals(secondBytes));
        assert.equal(fs.readFileSync(outputPath, 'utf-8').split('\r\n').length, 4);
        assert.deepEqual(fs.readdirSync(path.join(tmpRoot, 'out')).sort(), ['results.csv', 'success.txt']);
    });

    test('skips the success list when nothing was valid', () => {
        const outputPath = path.join(tmpRoot, 'results.csv');
        const successPath = path.join(tmpRoot, 'success.txt');

        const written = writeReports(
            [result({ credential: 'key-x', category: 'invalid', httpStatus: 403, detail: 'no' })],
            new Set(),
            { outputPath, successPath }
        );

        assert.deepEqual(written, { reportPath: outputPath, successPath: null });
        assert.equal(fs.existsSync(successPath), false);
        assert.equal(fs.existsSync(outputPath), true);
    });

    test('reports an unwritable destination as OUTPUT_WRITE_FAILED', () => {
        const blocker = path.join(tmpRoot, 'not-a-dir');
        fs.writeFileSync(blocker, 'x');

        assert.throws(
            () => writeReports([], new Set(), { outputPath: path.join(blocker, 'results.csv'), successPath: path.join(tmpRoot, 's.txt') }),
            (err: unknown) => err instanceof CliError && err.code === 'OUTPUT_WRITE_FAILED'
        );
    });

    test('formats the summary line', () => {
        assert.equal(
            formatSummary({ total: 10, valid: 3, invalid: 4, modelNotFound: 2, error: 1 }),
            'Done: total 10, valid 3, invalid 4, model_not_found 2, other errors 1.'
        );
    });
});
