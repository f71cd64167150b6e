import { RunAbortedError } from '../../src/structured_error';
import type { AttemptRequest, Transport } from '../../src/transport';
import type { AttemptOutcome } from '../../src/types';

export type Step = AttemptOutcome | Error;

export const ok = (body = '{}'): AttemptOutcome => ({ kind: 'response', status: 200, body });
export const status = (code: number, body = ''): AttemptOutcome => ({ kind: 'response', status: code, body });
export const timeout = (): AttemptOutcome => ({ kind: 'timeout' });
export const network = (message: string): AttemptOutcome => ({ kind: 'network', message });

/**
 * Replays a per-credential script; the last step repeats once the script runs out.
 * Tracks how many sends are outstanding at once.
 */
export class ScriptedTransport implements Transport {
    readonly calls: AttemptRequest[] = [];
    inFlight = 0;
    maxInFlight = 0;
    private readonly seen = new Map<string, number>();

    constructor(private readonly scripts: Record<string, Step[]>, private readonly latencyMs = 0) { }

    async send(req: AttemptRequest): Promise<AttemptOutcome> {
        this.calls.push(req);
        const n = (this.seen.get(req.credential) ?? 0) + 1;
        this.seen.set(req.credential, n);

        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            await new Promise((r) => setTimeout(r, this.latencyMs));
            const script = this.scripts[req.credential] ?? [];
            const step = script[Math.min(n, script.length) - 1];
            if (!step) throw new Error(`no script for ${req.credential}`);
            if (step instanceof Error) throw step;
            return step;
        } finally {
            this.inFlight--;
        }
    }

    attemptsFor(credential: string): number {
        return this.seen.get(credential) ?? 0;
    }
}

/** Never answers; rejects only when the run is cancelled. */
export class HangingTransport implements Transport {
    started = 0;

    send(req: AttemptRequest): Promise<AttemptOutcome> {
        this.started++;
        return new Promise((_resolve, reject) => {
            if (req.signal?.aborted) {
                reject(new RunAbortedError());
                return;
            }
            req.signal?.addEventListener('abort', () => reject(new RunAbortedError()), { once: true });
        });
    }
}

/** Deterministic clock advanced only by the recorded sleeps */
export function fakeTime(): { now: () => number; sleep: (ms: number) => Promise<void>; delays: number[] } {
    let t = 0;
    const delays: number[] = [];
    return {
        now: () => t,
        sleep: async (ms: number) => {
            delays.push(ms);
            t += ms;
        },
        delays,
    };
}
