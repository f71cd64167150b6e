/**
 * Structured Error Schema for process-level failures
 *
 * Per-credential failures never reach this module: the probe folds them into
 * a ProbeResult. What remains (bad arguments, unreadable input, report write
 * failures, operator interrupt) is described here in machine-readable form so
 * the CLI can pick an exit code and print a hint.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // User errors
    | 'INVALID_ARGUMENT'
    | 'INPUT_NOT_FOUND'
    | 'INPUT_UNREADABLE'

    // Infrastructure errors
    | 'OUTPUT_WRITE_FAILED'

    // Operator
    | 'INTERRUPTED';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    hint: string | null;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    hint: string | null = null
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        hint,
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = ['OUTPUT_WRITE_FAILED'];
    const warningCodes: ErrorCode[] = ['INTERRUPTED'];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/** Exit status the CLI uses for each code */
export function exitCodeFor(code: ErrorCode): number {
    switch (code) {
        case 'INVALID_ARGUMENT': return 2;
        case 'INTERRUPTED': return 130;
        default: return 1;
    }
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class CliError extends Error {
    constructor(public readonly structured: StructuredError) {
        super(structured.message);
        this.name = 'CliError';
    }

    get code(): ErrorCode {
        return this.structured.code;
    }
}

/** Raised inside the engine when the operator cancels the run. */
export class RunAbortedError extends Error {
    constructor() {
        super('Run aborted');
        this.name = 'RunAbortedError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static invalidArgument(flag: string, reason: string): CliError {
        return new CliError(createStructuredError(
            'INVALID_ARGUMENT',
            `${flag}: ${reason}`,
            { flag },
            'Run `keyprobe --help` for usage.'
        ));
    }

    static inputNotFound(filePath: string): CliError {
        return new CliError(createStructuredError(
            'INPUT_NOT_FOUND',
            `Input file not found: ${filePath}`,
            { path: filePath },
            'Pass a text file with one API key per line.'
        ));
    }

    static inputUnreadable(filePath: string, cause: string): CliError {
        return new CliError(createStructuredError(
            'INPUT_UNREADABLE',
            `Cannot read input file ${filePath}: ${cause}`,
            { path: filePath, cause }
        ));
    }

    static outputWriteFailed(filePath: string, cause: string): CliError {
        return new CliError(createStructuredError(
            'OUTPUT_WRITE_FAILED',
            `Cannot write ${filePath}: ${cause}`,
            { path: filePath, cause },
            'Check that the destination directory is writable.'
        ));
    }

    static interrupted(totalKeys: number): CliError {
        return new CliError(createStructuredError(
            'INTERRUPTED',
            'Interrupted by user.',
            { total_keys: totalKeys }
        ));
    }
}
