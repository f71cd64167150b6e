/**
 * Main entry point - exports all public APIs
 */

export { classifyAttempt, classifyUnexpected, truncateDetail } from './classifier';
export type { Classification, Verdict } from './classifier';
export { ConcurrencyLimiter } from './concurrency_limiter';
export { loadCredentials, parseCredentials } from './credential_list';
export { runProbes, summarize, formatProgressLine } from './dispatcher';
export type { DispatchOptions, ProgressEvent } from './dispatcher';
export { probeCredential, maskCredential, DEFAULT_RETRY_POLICY } from './probe';
export type { ProbeOptions, RetryPolicy, SleepFn } from './probe';
export { renderReport, renderSuccessList, formatSummary, writeReports, REPORT_COLUMNS } from './report_writer';
export { CliError, ErrorFactory, RunAbortedError } from './structured_error';
export type { StructuredError, ErrorCode } from './structured_error';
export { FetchTransport } from './transport';
export type { Transport, AttemptRequest, FetchLike, ProbeRequestInit } from './transport';
export * from './types';
export { KeyprobeCLI, parseArgs } from './cli';
export type { CliOptions } from './cli';
