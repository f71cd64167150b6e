/**
 * Structured Logger for keyprobe
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when KEYPROBE_LOG_JSON=1
 * - Optional file output via KEYPROBE_LOG_FILE
 * - Module context (component name) on every line
 * - Run correlation ID propagated through all log entries
 *
 * Environment:
 *   KEYPROBE_LOG_LEVEL  = debug|info|warn|error (default: warn)
 *   KEYPROBE_LOG_JSON   = 1 (default: text)
 *   KEYPROBE_LOG_FILE   = path (optional, appends)
 *   KEYPROBE_DEBUG      = 1 (sets level to debug)
 *
 * Progress lines and the summary are user output and go through the CLI, not here.
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || '').toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'warn';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.KEYPROBE_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.KEYPROBE_DEBUG === '1' || process.env.KEYPROBE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.KEYPROBE_LOG_JSON === '1';
let logFile = process.env.KEYPROBE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

let _runId: string = '';
let _model: string = '';

/** Set the active run context. Called by the CLI before dispatching. */
export function setCorrelation(opts: { runId?: string; model?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.model !== undefined) _model = opts.model;
}

export function clearCorrelation(): void {
    _runId = '';
    _model = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_model) entry.model = _model;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _runId ? ` [${_runId.slice(0, 8)}${_model ? '/' + _model : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    // stdout carries the progress lines, so every log level goes to stderr
    process.stderr.write(line + '\n');

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            process.stderr.write(`[logger] disabling file output (${logFile}): ${reason}\n`);
            logFile = '';
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
