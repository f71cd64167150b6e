import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { buildEndpoint } from '../src/config';
import { CliError, createStructuredError, ErrorFactory, exitCodeFor } from '../src/structured_error';

describe('structured errors', () => {
    test('assigns severity by code', () => {
        assert.equal(createStructuredError('OUTPUT_WRITE_FAILED', 'x').severity, 'FATAL');
        assert.equal(createStructuredError('INTERRUPTED', 'x').severity, 'WARNING');
        assert.equal(createStructuredError('INPUT_NOT_FOUND', 'x').severity, 'ERROR');
    });

    test('maps codes to exit statuses', () => {
        assert.equal(exitCodeFor('INVALID_ARGUMENT'), 2);
        assert.equal(exitCodeFor('INTERRUPTED'), 130);
        assert.equal(exitCodeFor('INPUT_NOT_FOUND'), 1);
        assert.equal(exitCodeFor('INPUT_UNREADABLE'), 1);
        assert.equal(exitCodeFor('OUTPUT_WRITE_FAILED'), 1);
    });

    test('factories carry message, context and hint', () => {
        const err = ErrorFactory.invalidArgument('--timeout', 'requires a value');
        assert.ok(err instanceof CliError);
        assert.equal(err.code, 'INVALID_ARGUMENT');
        assert.equal(err.message, '--timeout: requires a value');
        assert.deepEqual(err.structured.context, { flag: '--timeout' });
        assert.equal(err.structured.hint, 'Run `keyprobe --help` for usage.');

        const write = ErrorFactory.outputWriteFailed('out/results.csv', 'EACCES');
        assert.equal(write.message, 'Cannot write out/results.csv: EACCES');
        assert.deepEqual(write.structured.context, { path: 'out/results.csv', cause: 'EACCES' });
    });
});

describe('buildEndpoint', () => {
    test('substitutes and encodes the model name', () => {
        assert.equal(buildEndpoint('m-1', 'https://api.test/models/{model}:go'), 'https://api.test/models/m-1:go');
        assert.equal(buildEndpoint('a/b c', 'https://api.test/{model}'), 'https://api.test/a%2Fb%20c');
    });
});
