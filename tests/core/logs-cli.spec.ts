import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { appendFile, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { LogCursor, followLog, handleLogsCli } from '../../src/core/logs-cli.js';
import { getDailyLogPath } from '../../src/utils/logger.js';

describe('handleLogsCli', () => {
  let tempDir = '';

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'tooldrive-logs-cli-'));
    vi.stubEnv('TOOLDRIVE_LOG_DIR', tempDir);
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('ignores other commands', async () => {
    expect(await handleLogsCli(['config'])).toBe(false);
  });

  it("prints today's log when it exists", async () => {
    const logPath = getDailyLogPath();
    await mkdir(path.dirname(logPath), { recursive: true });
    await writeFile(logPath, '### 2026-01-01T00:00:00.000Z · thought\nhello from the agent', 'utf8');

    const writes: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });

    expect(await handleLogsCli(['logs'])).toBe(true);
    expect(process.exitCode).toBe(0);
    expect(writes.join('')).toBe('### 2026-01-01T00:00:00.000Z · thought\nhello from the agent');
  });

  it('fails when there is no log for today', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args) => errors.push(args.join(' ')));

    expect(await handleLogsCli(['logs'])).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(errors).toEqual([`[tooldrive logs] No logs found for today at ${getDailyLogPath()}.`]);
  });
});

describe('LogCursor', () => {
  let tempDir = '';
  let logPath = '';

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'tooldrive-log-cursor-'));
    logPath = path.join(tempDir, 'today.md');
    await writeFile(logPath, 'first\n', 'utf8');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns only what was appended since the last read', async () => {
    const cursor = new LogCursor(logPath);
    expect(await cursor.readAppended()).toBe('first\n');
    expect(await cursor.readAppended()).toBe('');

    await appendFile(logPath, 'second\n', 'utf8');
    expect(await cursor.readAppended()).toBe('second\n');
    expect(cursor.offset).toBe(13);
  });

  it('starts over when the file is rewritten shorter', async () => {
    const cursor = new LogCursor(logPath);
    await cursor.readAppended();
    await writeFile(logPath, 'new\n', 'utf8');
    expect(await cursor.readAppended()).toBe('new\n');
  });

  it('keeps a window of context before the end', async () => {
    await appendFile(logPath, 'x'.repeat(10), 'utf8');
    const cursor = await LogCursor.nearEnd(logPath, 4);
    expect(cursor.offset).toBe(12);
    expect(await cursor.readAppended()).toBe('xxxx');
  });
});

describe('followLog', () => {
  it('prints the tail and returns once aborted', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'tooldrive-follow-'));
    const logPath = path.join(tempDir, 'today.md');
    await writeFile(logPath, 'line one\nline two\n', 'utf8');

    const writes: string[] = [];
    await followLog(logPath, AbortSignal.abort(), (text) => writes.push(text));
    expect(writes).toEqual(['line one\nline two\n']);
    await rm(tempDir, { recursive: true, force: true });
  });
});
