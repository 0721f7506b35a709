import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = path.join('.devloop', 'logs');
const SENSITIVE_KEY_PATTERN = /(SECRET|TOKEN|PASSWORD|API_KEY|PRIVATE_KEY)/i;
const SENSITIVE_ASSIGNMENT_PATTERN =
    /\b([A-Za-z0-9_]*(?:SECRET|TOKEN|PASSWORD|API_KEY|PRIVATE_KEY)[A-Za-z0-9_]*)\s*=\s*("[^"]*"|'[^']*'|\S+)/gi;
const MIN_REDACTED_VALUE_LENGTH = 8;
const REDACTED = '[REDACTED]';

let configuredLogDir: string | null = null;

/** Set the log directory from configuration. `DEVLOOP_LOG_DIR` still wins. */
export function setLogDir(dir: string | null): void {
    configuredLogDir = dir;
}

/** Directory holding the daily activity logs. */
export function getLogDir(): string {
    return path.resolve(process.env.DEVLOOP_LOG_DIR?.trim() || configuredLogDir || DEFAULT_LOG_DIR);
}

/**
 * Redact `KEY=value` assignments whose key looks sensitive, and any raw value of
 * a sensitive environment variable wherever it appears in `text`.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(
        SENSITIVE_ASSIGNMENT_PATTERN,
        (_match, key: string) => `${key}=${REDACTED}`,
    );

    for (const [key, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_REDACTED_VALUE_LENGTH || !SENSITIVE_KEY_PATTERN.test(key)) {
            continue;
        }
        scrubbed = scrubbed.split(value).join(REDACTED);
    }

    return scrubbed;
}

async function appendEntry(kind: string, body: string): Promise<void> {
    const now = new Date();
    const dir = getLogDir();
    const filePath = path.join(dir, `${now.toISOString().slice(0, 10)}.md`);
    const entry = `\n## ${kind} @ ${now.toISOString()}\n${scrubSensitiveText(body)}\n`;

    try {
        await mkdir(dir, { recursive: true });
        await appendFile(filePath, entry, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log entry to ${filePath}: ${message}`);
    }
}

/** Record a free-form activity line in today's log. */
export async function logThought(message: string): Promise<void> {
    await appendEntry('thought', message);
}

/** Record a supervised command and how it ended. */
export async function logSystemCommand(command: string, output: string, exitCode: number | null): Promise<void> {
    const status = exitCode === null ? 'no exit code' : `exit ${exitCode}`;
    await appendEntry('command', `\`${command}\` (${status})\n\n${output}`);
}
