/**
 * Shared Configuration Constants
 *
 * Centralized defaults for keyprobe.
 * Values can be overridden via environment variables; CLI flags override both.
 */

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n >= 1 ? n : fallback;
}

// Model probed when --model is not given
export const DEFAULT_MODEL = process.env.KEYPROBE_MODEL || 'gemini-2.5-computer-use-preview-10-2025';

// {model} is substituted per run
export const DEFAULT_ENDPOINT_TEMPLATE =
    process.env.KEYPROBE_ENDPOINT_TEMPLATE ||
    'https://generativelanguage.googleapis.com/v1beta/models/{model}:generateContent';

export const DEFAULT_CONCURRENCY = envInt('KEYPROBE_CONCURRENCY', 20);
export const DEFAULT_TIMEOUT_SECONDS = envInt('KEYPROBE_TIMEOUT_SECONDS', 10);

export const DEFAULT_OUTPUT_FILE = 'results.csv';
export const DEFAULT_SUCCESS_FILE = 'success.txt';

// Retry policy
export const RETRY = {
    MAX_RETRIES: 3,
    INITIAL_BACKOFF_MS: 1000,
    BACKOFF_FACTOR: 2,
};

// Truncation limits (characters)
export const LIMITS = {
    DETAIL_MAX_CHARS: 500,
    EXCEPTION_SNIPPET_MAX_CHARS: 300,
    PROGRESS_KEY_PREFIX_CHARS: 6,
};

// Minimal request that still exercises the model
export const PROBE_PAYLOAD = {
    contents: [{ parts: [{ text: 'hi' }] }],
} as const;

export const API_KEY_HEADER = 'x-goog-api-key';

/**
 * Fill the endpoint template for a model
 */
export function buildEndpoint(model: string, template: string = DEFAULT_ENDPOINT_TEMPLATE): string {
    return template.replace('{model}', encodeURIComponent(model));
}
