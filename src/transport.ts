// transport.ts - one HTTPS POST per probe attempt

import { Agent, fetch as undiciFetch } from 'undici';
import type { Dispatcher } from 'undici';
import { API_KEY_HEADER, PROBE_PAYLOAD } from './config';
import { createLogger } from './logger';
import { RunAbortedError } from './structured_error';
import type { AttemptOutcome, Credential } from './types';

const log = createLogger('transport');

export interface AttemptRequest {
    endpoint: string;
    credential: Credential;
    /** Socket connect and socket read limit, not a total-request limit */
    timeoutMs: number;
    /** Run-level cancellation */
    signal?: AbortSignal;
}

/**
 * The HTTP capability the probe depends on.
 *
 * Resolves with a response, a timeout, or a network failure. Rejects with
 * RunAbortedError when the run is cancelled; any other rejection is treated
 * as an unexpected failure by the caller.
 */
export interface Transport {
    send(req: AttemptRequest): Promise<AttemptOutcome>;
    /** Releases pooled connections once the run is over */
    close?(): Promise<void>;
}

export interface ProbeRequestInit {
    method: 'POST';
    headers: Record<string, string>;
    body: string;
    signal?: AbortSignal;
    dispatcher: Dispatcher;
}

export type FetchLike = (
    url: string,
    init: ProbeRequestInit
) => Promise<{ status: number; text(): Promise<string> }>;

// undici error codes for the connect, headers and idle-body limits
const SOCKET_TIMEOUT_CODES = new Set([
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
]);

function errorCode(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/** fetch wraps the undici error as the `cause` of a TypeError */
function isSocketTimeout(err: unknown): boolean {
    let current: unknown = err;
    for (let depth = 0; depth < 4 && current !== undefined; depth++) {
        const code = errorCode(current);
        if (code !== undefined && SOCKET_TIMEOUT_CODES.has(code)) return true;
        current = current instanceof Error ? current.cause : undefined;
    }
    return false;
}

/** Socket, DNS and TLS failures surface as a TypeError carrying the low-level cause */
function isNetworkError(err: unknown): err is TypeError {
    return err instanceof TypeError && err.cause !== undefined;
}

function describeNetworkError(err: TypeError): string {
    const cause = err.cause;
    if (cause instanceof Error) {
        const code = errorCode(cause);
        return `${err.message} (${code !== undefined ? `${code}: ` : ''}${cause.message})`;
    }
    return `${err.message} (${String(cause)})`;
}

export class FetchTransport implements Transport {
    // One pool per timeout value; a run uses a single one
    private readonly agents = new Map<number, Agent>();

    constructor(private readonly fetchImpl: FetchLike = undiciFetch) { }

    private agentFor(timeoutMs: number): Agent {
        let agent = this.agents.get(timeoutMs);
        if (!agent) {
            agent = new Agent({
                connect: { timeout: timeoutMs },
                headersTimeout: timeoutMs,
                bodyTimeout: timeoutMs,
            });
            this.agents.set(timeoutMs, agent);
        }
        return agent;
    }

    async send(req: AttemptRequest): Promise<AttemptOutcome> {
        if (req.signal?.aborted) throw new RunAbortedError();

        try {
            const resp = await this.fetchImpl(req.endpoint, {
                method: 'POST',
                headers: {
                    [API_KEY_HEADER]: req.credential,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(PROBE_PAYLOAD),
                signal: req.signal,
                dispatcher: this.agentFor(req.timeoutMs),
            });
            const body = await resp.text();
            return { kind: 'response', status: resp.status, body };
        } catch (e: unknown) {
            if (req.signal?.aborted) throw new RunAbortedError();
            if (isSocketTimeout(e)) {
                log.debug('attempt timed out', { timeout_ms: req.timeoutMs, code: errorCode(e instanceof Error ? e.cause : e) });
                return { kind: 'timeout' };
            }
            if (isNetworkError(e)) {
                const message = describeNetworkError(e);
                log.debug('network failure', { error: message });
                return { kind: 'network', message };
            }
            throw e;
        }
    }

    async close(): Promise<void> {
        const agents = [...this.agents.values()];
        this.agents.clear();
        await Promise.all(agents.map((agent) => agent.destroy()));
    }
}
