import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logSystemCommand, scrubSensitiveText } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_TIMEOUT_MS = 600_000;
const MAX_OUTPUT_LENGTH = 30_000;
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;
const MAX_BUFFER_ERROR_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';
const BLOCKED_COMMAND_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /\brm\s+-rf\s+\/(\*|\s|$)/i, reason: 'destructive root delete' },
  { pattern: /\brm\s+-rf\s+(~|\$HOME)(\/|\s|$)/i, reason: 'destructive home delete' },
  { pattern: />\s*\/dev\/sd[a-z]/i, reason: 'raw disk write' },
  { pattern: /\bdd\s+if=\/dev\/zero/i, reason: 'raw disk overwrite' },
  { pattern: /\bmkfs(\.\w+)?\b/i, reason: 'filesystem format command' },
  { pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, reason: 'fork bomb' },
  { pattern: /\bchmod\s+-R\s+777\s+\/(\s|$)/i, reason: 'recursive root permission change' },
  { pattern: /\bshutdown\b/i, reason: 'system shutdown command' },
  { pattern: /\breboot\b/i, reason: 'system reboot command' },
];

export interface ShellExecutionOptions {
  timeoutMs?: number;
  /** Extra literal substrings that block a command, matched case-insensitively. */
  blockedSubstrings?: string[];
  /** Kills the subprocess when aborted. */
  signal?: AbortSignal;
  /** Combined stdout/stderr limit before the subprocess is stopped. @default 10 MiB */
  maxBufferBytes?: number;
}

export interface ShellExecutionResult {
  ok: boolean;
  output: string;
  exitCode: number;
  timedOut: boolean;
  blockedReason?: string;
}

interface ExecError extends Error {
  code?: number | string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
}

function isExecError(error: unknown): error is ExecError {
  return error instanceof Error;
}

export function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }

  return `${output.slice(0, MAX_OUTPUT_LENGTH)}\n\n... (output truncated)`;
}

export function resolveTimeout(timeoutMs?: number): number {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) {
    return DEFAULT_TIMEOUT_MS;
  }

  const parsed = Math.floor(timeoutMs);
  if (parsed < 1) {
    return DEFAULT_TIMEOUT_MS;
  }
  return Math.min(MAX_TIMEOUT_MS, parsed);
}

export function detectBlockedCommand(command: string, extraSubstrings: string[] = []): string | null {
  for (const entry of BLOCKED_COMMAND_PATTERNS) {
    if (entry.pattern.test(command)) {
      return entry.reason;
    }
  }

  const lowered = command.toLowerCase();
  for (const substring of extraSubstrings) {
    const normalized = substring.trim().toLowerCase();
    if (normalized && lowered.includes(normalized)) {
      return `matches blocked pattern '${substring.trim()}'`;
    }
  }
  return null;
}

/**
 * Run a command through `bash -c` in `cwd`.
 *
 * The subprocess is killed when `timeoutMs` elapses; the caller decides how to
 * surface that. Output is stdout followed by stderr, scrubbed and truncated.
 */
export async function executeShell(
  command: string,
  cwd: string,
  options: ShellExecutionOptions = {},
): Promise<ShellExecutionResult> {
  const normalizedCommand = command.trim();
  if (normalizedCommand.length === 0) {
    return {
      ok: false,
      output: 'Command must be a non-empty string.',
      exitCode: 1,
      timedOut: false,
    };
  }

  const blockedReason = detectBlockedCommand(normalizedCommand, options.blockedSubstrings);
  if (blockedReason) {
    const output = `Command blocked for safety (${blockedReason}).`;
    await logSystemCommand(normalizedCommand, output, 126);
    return { ok: false, output, exitCode: 126, timedOut: false, blockedReason };
  }

  const timeout = resolveTimeout(options.timeoutMs);
  const maxBuffer = options.maxBufferBytes ?? MAX_BUFFER_BYTES;
  try {
    const { stdout, stderr } = await execFileAsync('bash', ['-c', normalizedCommand], {
      cwd,
      timeout,
      killSignal: 'SIGKILL',
      windowsHide: true,
      maxBuffer,
      signal: options.signal,
      env: { ...process.env, TERM: 'dumb' },
    });

    const mergedOutput = truncateOutput(scrubSensitiveText(`${stdout}${stderr}`));
    await logSystemCommand(normalizedCommand, mergedOutput || '(no output)', 0);
    return { ok: true, output: mergedOutput, exitCode: 0, timedOut: false };
  } catch (error: unknown) {
    if (!isExecError(error)) {
      throw error;
    }
    if (options.signal?.aborted) {
      await logSystemCommand(normalizedCommand, 'Cancelled.', 130);
      return { ok: false, output: 'Command was cancelled.', exitCode: 130, timedOut: false };
    }
    const mergedOutput = truncateOutput(scrubSensitiveText(`${error.stdout ?? ''}${error.stderr ?? ''}`));
    const exitCode = typeof error.code === 'number' ? error.code : 1;

    // An output overflow is killed with the same signal as a timeout.
    if (error.code === MAX_BUFFER_ERROR_CODE) {
      const note = `(output exceeded ${maxBuffer} bytes; command stopped)`;
      await logSystemCommand(normalizedCommand, note, exitCode);
      return { ok: false, output: mergedOutput ? `${mergedOutput}\n\n${note}` : note, exitCode, timedOut: false };
    }

    const timedOut = error.killed === true && error.signal === 'SIGKILL';
    await logSystemCommand(
      normalizedCommand,
      timedOut ? `Timed out after ${timeout}ms.` : mergedOutput || error.message,
      exitCode,
    );
    return {
      ok: false,
      output: mergedOutput || (typeof error.code === 'string' ? error.message : ''),
      exitCode,
      timedOut,
    };
  }
}
