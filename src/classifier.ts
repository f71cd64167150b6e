// classifier.ts - maps one attempt outcome to a result category

import { LIMITS } from './config';
import { NO_RESPONSE_STATUS, UNEXPECTED_FAILURE_STATUS } from './types';
import type { AttemptOutcome, ResultCategory } from './types';

export interface Classification {
    category: ResultCategory;
    httpStatus: number;
    detail: string;
}

/**
 * A terminal verdict ends the probe. A retry verdict asks the probe to back off
 * and try again; `exhausted` is what the probe reports if no attempts remain.
 */
export type Verdict =
    | { kind: 'terminal'; result: Classification }
    | { kind: 'retry'; exhausted: Classification };

export function truncateDetail(text: string): string {
    return text.length > LIMITS.DETAIL_MAX_CHARS ? text.slice(0, LIMITS.DETAIL_MAX_CHARS) : text;
}

function snippet(message: string): string {
    return message.slice(0, LIMITS.EXCEPTION_SNIPPET_MAX_CHARS);
}

function terminal(category: ResultCategory, httpStatus: number, detail: string): Verdict {
    return { kind: 'terminal', result: { category, httpStatus, detail: truncateDetail(detail) } };
}

function retry(httpStatus: number, detail: string): Verdict {
    return { kind: 'retry', exhausted: { category: 'error', httpStatus, detail: truncateDetail(detail) } };
}

export function classifyAttempt(outcome: AttemptOutcome): Verdict {
    switch (outcome.kind) {
        case 'timeout':
            return retry(NO_RESPONSE_STATUS, 'Timeout');
        case 'network':
            return retry(NO_RESPONSE_STATUS, `ClientError: ${snippet(outcome.message)}`);
        case 'response': {
            const { status, body } = outcome;
            if (status >= 200 && status < 300) return terminal('valid', status, 'OK');
            if (status === 401 || status === 403) return terminal('invalid', status, body);
            if (status === 404) return terminal('model_not_found', status, body);
            if (status === 429) return retry(status, body);
            return terminal('error', status, body);
        }
    }
}

/** Failures outside the network stack are fatal for the credential and never retried. */
export function classifyUnexpected(err: unknown): Classification {
    const message = err instanceof Error ? err.message : String(err);
    return {
        category: 'error',
        httpStatus: UNEXPECTED_FAILURE_STATUS,
        detail: truncateDetail(`Unexpected: ${snippet(message)}`),
    };
}
