// probe.ts - one credential, bounded retries with exponential backoff

import { classifyAttempt, classifyUnexpected } from './classifier';
import type { Classification, Verdict } from './classifier';
import { RETRY } from './config';
import { createLogger } from './logger';
import { RunAbortedError } from './structured_error';
import type { Transport } from './transport';
import type { Credential, ProbeResult } from './types';

const log = createLogger('probe');

export interface RetryPolicy {
    maxRetries: number;
    initialBackoffMs: number;
    backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: RETRY.MAX_RETRIES,
    initialBackoffMs: RETRY.INITIAL_BACKOFF_MS,
    backoffFactor: RETRY.BACKOFF_FACTOR,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ProbeOptions {
    endpoint: string;
    timeoutMs: number;
    transport: Transport;
    signal?: AbortSignal;
    retry?: RetryPolicy;
    sleep?: SleepFn;
    /** Monotonic milliseconds */
    now?: () => number;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new RunAbortedError());
            return;
        }
        const onAbort = () => {
            clearTimeout(t);
            reject(new RunAbortedError());
        };
        const t = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/** Prefix shown in progress lines and logs; the full key is never printed */
export function maskCredential(credential: Credential, prefixChars = 6): string {
    return `${credential.slice(0, prefixChars)}...`;
}

export function roundSeconds(ms: number): number {
    return Math.round(ms / 10) / 100;
}

export async function probeCredential(credential: Credential, options: ProbeOptions): Promise<ProbeResult> {
    const policy = options.retry ?? DEFAULT_RETRY_POLICY;
    const pause = options.sleep ?? sleep;
    const now = options.now ?? (() => performance.now());
    const { signal } = options;

    const started = now();
    let delay = policy.initialBackoffMs;

    const finish = (result: Classification, attempts: number): ProbeResult => ({
        credential,
        ...result,
        elapsedSeconds: roundSeconds(now() - started),
        attempts,
    });

    for (let attempt = 1; ; attempt++) {
        let verdict: Verdict;
        try {
            const outcome = await options.transport.send({
                endpoint: options.endpoint,
                credential,
                timeoutMs: options.timeoutMs,
                signal,
            });
            verdict = classifyAttempt(outcome);
        } catch (e: unknown) {
            if (e instanceof RunAbortedError || signal?.aborted) throw new RunAbortedError();
            const unexpected = classifyUnexpected(e);
            log.warn('unexpected failure', { key: maskCredential(credential), error: unexpected.detail });
            return finish(unexpected, attempt);
        }

        if (verdict.kind === 'terminal') return finish(verdict.result, attempt);
        if (attempt >= policy.maxRetries) return finish(verdict.exhausted, attempt);

        log.debug('retrying', {
            key: maskCredential(credential),
            attempt,
            http_status: verdict.exhausted.httpStatus,
            delay_ms: delay,
        });
        await pause(delay, signal);
        delay *= policy.backoffFactor;
    }
}
