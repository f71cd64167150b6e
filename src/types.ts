// types.ts - probe engine data model

export type Credential = string;

export type ResultCategory = 'valid' | 'invalid' | 'model_not_found' | 'error';

export const RESULT_CATEGORIES: readonly ResultCategory[] = ['valid', 'invalid', 'model_not_found', 'error'];

/** No HTTP response was obtained (timeout or network failure). */
export const NO_RESPONSE_STATUS = -1;
/** The attempt failed for a reason outside the network stack. */
export const UNEXPECTED_FAILURE_STATUS = -2;

/**
 * Outcome of one HTTP round trip. Consumed immediately by the classifier.
 */
export type AttemptOutcome =
    | { kind: 'response'; status: number; body: string }
    | { kind: 'timeout' }
    | { kind: 'network'; message: string };

export interface ProbeResult {
    credential: Credential;
    category: ResultCategory;
    httpStatus: number;
    detail: string;
    elapsedSeconds: number;
    attempts: number;
}

export interface RunOutcome {
    /** Completion order, not input order */
    results: ProbeResult[];
    successSet: Set<Credential>;
}

export interface RunSummary {
    total: number;
    valid: number;
    invalid: number;
    modelNotFound: number;
    error: number;
}
