#!/usr/bin/env node
/**
 * CLI Entry Point for keyprobe
 */

import { v4 as uuidv4 } from 'uuid';
import {
    buildEndpoint,
    DEFAULT_CONCURRENCY,
    DEFAULT_MODEL,
    DEFAULT_OUTPUT_FILE,
    DEFAULT_SUCCESS_FILE,
    DEFAULT_TIMEOUT_SECONDS,
} from './config';
import { loadCredentials } from './credential_list';
import { formatProgressLine, runProbes, summarize } from './dispatcher';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { formatSummary, writeReports } from './report_writer';
import { CliError, ErrorFactory, exitCodeFor, RunAbortedError } from './structured_error';
import { FetchTransport } from './transport';
import type { Transport } from './transport';

const log = createLogger('cli');

export interface CliOptions {
    input: string;
    output: string;
    success: string;
    concurrency: number;
    timeoutSeconds: number;
    model: string;
}

export type ParsedArgs = { kind: 'help' } | { kind: 'run'; options: CliOptions };

type ValueFlag = 'output' | 'success' | 'concurrency' | 'timeout' | 'model';

const FLAG_ALIASES: Record<string, ValueFlag> = {
    '--output': 'output', '-o': 'output',
    '--success': 'success', '-s': 'success',
    '--concurrency': 'concurrency', '-c': 'concurrency',
    '--timeout': 'timeout', '-t': 'timeout',
    '--model': 'model', '-m': 'model',
};

function parsePositiveInt(flag: string, raw: string): number {
    if (!/^\d+$/.test(raw.trim())) {
        throw ErrorFactory.invalidArgument(flag, `expected a positive integer, got "${raw}"`);
    }
    const n = parseInt(raw, 10);
    if (n < 1) throw ErrorFactory.invalidArgument(flag, `must be >= 1, got ${n}`);
    return n;
}

/**
 * Accepts `--flag value`, `--flag=value` and `-f value`.
 */
export function parseArgs(args: string[]): ParsedArgs {
    const values: Partial<Record<ValueFlag, string>> = {};
    const positionals: string[] = [];

    if (args.some((a) => a === '--help' || a === '-h')) return { kind: 'help' };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('-') && arg !== '-') {
            const eq = arg.indexOf('=');
            const name = eq === -1 ? arg : arg.slice(0, eq);
            const flag = FLAG_ALIASES[name];
            if (!flag) throw ErrorFactory.invalidArgument(name, 'unknown option');

            let value: string | undefined;
            if (eq !== -1) {
                value = arg.slice(eq + 1);
            } else {
                value = args[i + 1];
                i++;
            }
            if (value === undefined || value === '') {
                throw ErrorFactory.invalidArgument(name, 'requires a value');
            }
            values[flag] = value;
            continue;
        }

        positionals.push(arg);
    }

    if (positionals.length === 0) throw ErrorFactory.invalidArgument('input', 'missing path to the key list');
    if (positionals.length > 1) {
        throw ErrorFactory.invalidArgument('input', `expected one path, got ${positionals.length}`);
    }

    return {
        kind: 'run',
        options: {
            input: positionals[0],
            output: values.output ?? DEFAULT_OUTPUT_FILE,
            success: values.success ?? DEFAULT_SUCCESS_FILE,
            concurrency: values.concurrency !== undefined
                ? parsePositiveInt('--concurrency', values.concurrency)
                : DEFAULT_CONCURRENCY,
            timeoutSeconds: values.timeout !== undefined
                ? parsePositiveInt('--timeout', values.timeout)
                : DEFAULT_TIMEOUT_SECONDS,
            model: values.model ?? DEFAULT_MODEL,
        },
    };
}

export interface CliDeps {
    transport?: Transport;
    /** User-facing output; defaults to console.log / console.error */
    out?: (line: string) => void;
    err?: (line: string) => void;
    /** Extra cancellation source, in addition to SIGINT */
    signal?: AbortSignal;
    /** Where SIGINT is heard; defaults to the process */
    signalSource?: NodeJS.EventEmitter;
}

class KeyprobeCLI {
    private readonly transport: Transport;
    private readonly out: (line: string) => void;
    private readonly err: (line: string) => void;
    private readonly signalSource: NodeJS.EventEmitter;

    constructor(private readonly deps: CliDeps = {}) {
        this.transport = deps.transport ?? new FetchTransport();
        this.out = deps.out ?? ((line) => console.log(line));
        this.err = deps.err ?? ((line) => console.error(line));
        this.signalSource = deps.signalSource ?? process;
    }

    /** Resolves with the process exit code; never rejects for expected failures */
    async run(args: string[]): Promise<number> {
        try {
            const parsed = parseArgs(args);
            if (parsed.kind === 'help') {
                this.showHelp();
                return 0;
            }
            return await this.runProbe(parsed.options);
        } catch (e: unknown) {
            if (e instanceof CliError) {
                this.err(`Error: ${e.message}`);
                if (e.structured.hint) this.err(`   ${e.structured.hint}`);
                log.debug('cli error', { code: e.code, context: e.structured.context });
                return exitCodeFor(e.code);
            }
            throw e;
        }
    }

    private async runProbe(options: CliOptions): Promise<number> {
        const credentials = loadCredentials(options.input);
        if (credentials.length === 0) {
            this.out(`No credentials found in ${options.input}.`);
            return 0;
        }

        const runId = uuidv4();
        setCorrelation({ runId, model: options.model });

        const ac = new AbortController();
        const onSigint = () => ac.abort();
        const onExternalAbort = () => ac.abort();
        this.signalSource.once('SIGINT', onSigint);
        this.deps.signal?.addEventListener('abort', onExternalAbort, { once: true });
        if (this.deps.signal?.aborted) ac.abort();

        try {
            log.info('run started', { input: options.input, keys: credentials.length });

            const outcome = await runProbes(credentials, {
                endpoint: buildEndpoint(options.model),
                timeoutMs: options.timeoutSeconds * 1000,
                concurrency: options.concurrency,
                transport: this.transport,
                signal: ac.signal,
                onProgress: (event) => this.out(formatProgressLine(event)),
            });

            const written = writeReports(outcome.results, outcome.successSet, {
                outputPath: options.output,
                successPath: options.success,
            });

            this.out('');
            this.out(formatSummary(summarize(outcome)));
            if (written.successPath) {
                this.out(`Valid keys written to ${written.successPath}`);
            }
            return 0;
        } catch (e: unknown) {
            if (e instanceof RunAbortedError) {
                const interrupted = ErrorFactory.interrupted(credentials.length);
                this.err(interrupted.message);
                return exitCodeFor(interrupted.code);
            }
            throw e;
        } finally {
            this.signalSource.removeListener('SIGINT', onSigint);
            this.deps.signal?.removeEventListener('abort', onExternalAbort);
            clearCorrelation();
            await this.transport.close?.();
        }
    }

    private showHelp(): void {
        this.out(`
keyprobe - check which API keys can call a given Gemini model

USAGE:
  keyprobe <keys.txt> [options]

OPTIONS:
  -o, --output <file>       CSV report (default: ${DEFAULT_OUTPUT_FILE})
  -s, --success <file>      Valid keys, sorted, one per line (default: ${DEFAULT_SUCCESS_FILE})
  -c, --concurrency <n>     Max keys probed at once (default: ${DEFAULT_CONCURRENCY})
  -t, --timeout <seconds>   Per-attempt timeout (default: ${DEFAULT_TIMEOUT_SECONDS})
  -m, --model <name>        Model to probe (default: ${DEFAULT_MODEL})
  -h, --help                Show this help

EXAMPLES:
  keyprobe keys.txt
  keyprobe keys.txt -c 50 -t 15 -m gemini-2.5-flash -o report.csv
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new KeyprobeCLI();
    cli.run(process.argv.slice(2)).then(
        (code) => process.exit(code),
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(1);
        }
    );
}

export { KeyprobeCLI };
