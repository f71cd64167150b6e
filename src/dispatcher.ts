/**
 * Dispatcher: fans one probe per credential out under a global ceiling.
 *
 * Every credential gets its own task up front; the limiter decides which of
 * them may be probing at any moment. A task holds its slot for the whole
 * probe, backoff sleeps included, so no more than `concurrency` HTTP requests
 * are ever outstanding. Results arrive in completion order.
 */

import { DEFAULT_CONCURRENCY, LIMITS } from './config';
import { ConcurrencyLimiter } from './concurrency_limiter';
import { createLogger } from './logger';
import { maskCredential, probeCredential } from './probe';
import type { RetryPolicy, SleepFn } from './probe';
import { ErrorFactory, RunAbortedError } from './structured_error';
import type { Transport } from './transport';
import type { Credential, ProbeResult, RunOutcome, RunSummary } from './types';

const log = createLogger('dispatcher');

export interface ProgressEvent {
    /** 1-based position among completions, not input order */
    index: number;
    total: number;
    result: ProbeResult;
}

export interface DispatchOptions {
    endpoint: string;
    timeoutMs: number;
    transport: Transport;
    concurrency?: number;
    signal?: AbortSignal;
    onProgress?: (event: ProgressEvent) => void;
    retry?: RetryPolicy;
    sleep?: SleepFn;
    now?: () => number;
}

export function formatProgressLine(event: ProgressEvent): string {
    const r = event.result;
    const key = maskCredential(r.credential, LIMITS.PROGRESS_KEY_PREFIX_CHARS);
    return `[${event.index}/${event.total}] key=${key} status=${r.category} http=${r.httpStatus} t=${r.elapsedSeconds.toFixed(2)}s`;
}

export async function runProbes(credentials: readonly Credential[], options: DispatchOptions): Promise<RunOutcome> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw ErrorFactory.invalidArgument('--concurrency', `must be an integer >= 1, got ${concurrency}`);
    }

    const { signal } = options;
    const limiter = new ConcurrencyLimiter(concurrency);
    const results: ProbeResult[] = [];
    const successSet = new Set<Credential>();
    const total = credentials.length;

    log.info('dispatch started', { total, concurrency, timeout_ms: options.timeoutMs });

    const tasks = credentials.map(async (credential) => {
        const result = await limiter.run(
            () => probeCredential(credential, {
                endpoint: options.endpoint,
                timeoutMs: options.timeoutMs,
                transport: options.transport,
                signal,
                retry: options.retry,
                sleep: options.sleep,
                now: options.now,
            }),
            signal
        );

        // No await between append and insert
        results.push(result);
        if (result.category === 'valid') successSet.add(credential);

        options.onProgress?.({ index: results.length, total, result });
    });

    const settled = await Promise.allSettled(tasks);

    const failures = settled.filter((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (failures.length > 0) {
        if (signal?.aborted || failures.some((f) => f.reason instanceof RunAbortedError)) {
            log.warn('dispatch aborted', { completed: results.length, total });
            throw new RunAbortedError();
        }
        // probeCredential folds per-credential failures into results; anything here is a bug
        throw failures[0].reason;
    }

    log.info('dispatch finished', { total, valid: successSet.size });
    return { results, successSet };
}

export function summarize(outcome: RunOutcome): RunSummary {
    const total = outcome.results.length;
    // A key listed twice counts once per row
    const valid = outcome.results.filter((r) => r.category === 'valid').length;
    const invalid = outcome.results.filter((r) => r.category === 'invalid').length;
    const modelNotFound = outcome.results.filter((r) => r.category === 'model_not_found').length;
    return { total, valid, invalid, modelNotFound, error: total - valid - invalid - modelNotFound };
}
