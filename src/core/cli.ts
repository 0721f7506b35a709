// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: devloop <command> [options] [-- <build command...>]

Commands:
  serve [dir]           Serve dir over HTTP; re-run the build command on change
  watch                 Re-run the build command whenever sources change
  init                  Write a devloop.json with the default settings

Options:
  --ip <address>        Address to bind (serve, default 127.0.0.1)
  --port <number>       Port to bind (serve, default 8000)
  --not-found <file>    File answered for unknown paths, relative to dir (serve)
  -w, --watch <path>    Watch this path instead of the project root (repeatable)
  -i, --ignore <path>   Ignore changes under this path (repeatable)
  --debounce <ms>       Minimum delay between two runs of the command (default 2000)
  --help, -h            Show this help message

The build command comes after '--', or from "command" in devloop.json.

Examples:
  devloop serve dist -- npm run build
  devloop watch -w src -- npx tsc -p .
  devloop serve --port 3000 --not-found index.html
`.trim();

export type CliCommand = 'serve' | 'watch' | 'init';

export interface CliOptions {
    command: CliCommand;
    servedDir: string | null;
    host: string | null;
    port: number | null;
    notFound: string | null;
    watchPaths: string[];
    ignorePaths: string[];
    debounceMs: number | null;
    /** Everything after `--`: program followed by its arguments. */
    buildCommand: string[];
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

const KNOWN_COMMANDS: ReadonlySet<string> = new Set<CliCommand>(['serve', 'watch', 'init']);

function takeValue(args: string[], index: number, flag: string): string {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
        throw new CliUsageError(`Option ${flag} expects a value.`);
    }
    return value;
}

function parseInteger(raw: string, flag: string, max: number): number {
    const value = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value > max) {
        throw new CliUsageError(`Option ${flag} expects an integer between 0 and ${max}, got '${raw}'.`);
    }
    return value;
}

function isCliCommand(value: string): value is CliCommand {
    return KNOWN_COMMANDS.has(value);
}

/**
 * Parse `argv` (without the node and script entries). Throws
 * `CliUsageError` for anything it does not understand.
 */
export function parseCliArgs(argv: string[]): CliOptions {
    const separator = argv.indexOf('--');
    const args = separator === -1 ? argv : argv.slice(0, separator);
    const buildCommand = separator === -1 ? [] : argv.slice(separator + 1);

    const [command, ...rest] = args;
    if (command === undefined) {
        throw new CliUsageError('Missing command. Expected one of: serve, watch, init.');
    }
    if (!isCliCommand(command)) {
        throw new CliUsageError(`Unknown command: '${command}'`);
    }

    const options: CliOptions = {
        command,
        servedDir: null,
        host: null,
        port: null,
        notFound: null,
        watchPaths: [],
        ignorePaths: [],
        debounceMs: null,
        buildCommand,
    };

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        switch (arg) {
            case '--ip':
                options.host = takeValue(rest, i++, arg);
                break;
            case '--port':
                options.port = parseInteger(takeValue(rest, i++, arg), arg, 65_535);
                break;
            case '--not-found':
                options.notFound = takeValue(rest, i++, arg);
                break;
            case '-w':
            case '--watch':
                options.watchPaths.push(takeValue(rest, i++, arg));
                break;
            case '-i':
            case '--ignore':
                options.ignorePaths.push(takeValue(rest, i++, arg));
                break;
            case '--debounce':
                options.debounceMs = parseInteger(takeValue(rest, i++, arg), arg, Number.MAX_SAFE_INTEGER);
                break;
            default:
                if (arg.startsWith('-')) {
                    throw new CliUsageError(`Unknown option: '${arg}'`);
                }
                if (command !== 'serve' || options.servedDir !== null) {
                    throw new CliUsageError(`Unexpected argument: '${arg}'`);
                }
                options.servedDir = arg;
        }
    }

    if (command !== 'serve' && (options.host !== null || options.port !== null || options.notFound !== null)) {
        throw new CliUsageError('--ip, --port and --not-found only apply to serve.');
    }

    return options;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags appearing before any `--`.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    const separator = argv.indexOf('--');
    const own = separator === -1 ? argv : argv.slice(0, separator);
    if (own.length > 0 && !own.includes('--help') && !own.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Reject a first argument that is neither a known command nor a flag.
 * Returns `true` (and sets exit code 1) when it did.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    const [command] = argv;
    if (command === undefined || command.startsWith('-') || KNOWN_COMMANDS.has(command)) {
        return false;
    }

    console.error(`[devloop] Unknown command: '${command}'`);
    console.error(`Run 'devloop --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}
