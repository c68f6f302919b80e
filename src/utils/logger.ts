import { appendFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

const SENSITIVE_ENV_PATTERN = /(API_KEY|TOKEN|SECRET|PASSWORD)$/i;
const MIN_SENSITIVE_VALUE_LENGTH = 8;
const MAX_LOGGED_RESULT_LENGTH = 2_000;
const REDACTED = '[REDACTED]';

const INLINE_SECRET_PATTERNS: readonly RegExp[] = [
    /\bsk-or-v1-[A-Za-z0-9]{16,}\b/g,
    /\bgsk_[A-Za-z0-9]{16,}\b/g,
    /\bhf_[A-Za-z0-9]{16,}\b/g,
    /\bsk-[A-Za-z0-9_-]{20,}\b/g,
    /\bgh[pousr]_[A-Za-z0-9]{36,}\b/g,
];
const KEY_VALUE_PATTERN = /\b((?:api[_-]?key|token|secret|password|authorization)\s*[:=]\s*)(["']?)[^\s"',;]+\2/gi;
const BEARER_PATTERN = /\b(Bearer\s+)[A-Za-z0-9._~+/=-]+/g;

let verbose = false;

/** Mirror every log entry to stderr in addition to the daily log file. */
export function setVerboseLogging(enabled: boolean): void {
    verbose = enabled;
}

export function isVerboseLogging(): boolean {
    return verbose;
}

export function getLogDir(): string {
    const configured = process.env.TOOLDRIVE_LOG_DIR?.trim();
    if (configured) {
        return path.resolve(configured);
    }
    return path.join(os.homedir(), '.config', 'tooldrive', 'logs');
}

export function getDailyLogPath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [key, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SENSITIVE_VALUE_LENGTH) {
            continue;
        }
        if (SENSITIVE_ENV_PATTERN.test(key)) {
            values.push(value);
        }
    }
    // Longest first so a value that contains another is replaced whole.
    return values.sort((a, b) => b.length - a.length);
}

/**
 * Redact credentials from free-form text before it reaches a log or the console.
 * Covers key=value assignments, bearer tokens, well-known token shapes and the
 * raw values of sensitive environment variables.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const value of sensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }
    for (const pattern of INLINE_SECRET_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, REDACTED);
    }
    scrubbed = scrubbed.replace(BEARER_PATTERN, `$1${REDACTED}`);
    scrubbed = scrubbed.replace(KEY_VALUE_PATTERN, `$1${REDACTED}`);
    return scrubbed;
}

function truncate(text: string): string {
    if (text.length <= MAX_LOGGED_RESULT_LENGTH) {
        return text;
    }
    return `${text.slice(0, MAX_LOGGED_RESULT_LENGTH)}\n...[truncated]`;
}

async function appendEntry(entry: string): Promise<void> {
    const scrubbed = scrubSensitiveText(entry);
    if (verbose) {
        process.stderr.write(`${scrubbed}\n`);
    }

    const logPath = getDailyLogPath();
    try {
        await mkdir(path.dirname(logPath), { recursive: true });
        await appendFile(logPath, `${scrubbed}\n\n`, 'utf8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write ${logPath}: ${message}`);
    }
}

function timestamp(): string {
    return new Date().toISOString();
}

/** Record an internal decision or lifecycle event. */
export async function logThought(thought: string): Promise<void> {
    await appendEntry(`### ${timestamp()} · thought\n${thought}`);
}

export async function logToolCall(toolName: string, args: unknown, result: string): Promise<void> {
    let serializedArgs: string;
    try {
        serializedArgs = JSON.stringify(args);
    } catch {
        serializedArgs = String(args);
    }
    await appendEntry(
        `### ${timestamp()} · tool \`${toolName}\`\nargs: ${serializedArgs}\n\n${truncate(result)}`,
    );
}

export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
    await appendEntry(
        `### ${timestamp()} · command (exit ${exitCode})\n\`\`\`\n$ ${command}\n${truncate(output)}\n\`\`\``,
    );
}
