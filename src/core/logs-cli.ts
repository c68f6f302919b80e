import { existsSync } from 'node:fs';
import { open, readFile, stat, watch } from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';
import { errorMessage } from './errors.js';

const TAIL_CONTEXT_BYTES = 4096;

/**
 * Handle the `logs` command.
 * Prints today's log file, or tails it with `--follow` until interrupted.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = getDailyLogPath();

    if (!existsSync(logPath)) {
        console.error(`[tooldrive logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (!follow) {
        process.stdout.write(await readFile(logPath, 'utf8'));
        process.exitCode = 0;
        return true;
    }

    console.log(`[tooldrive logs] Following ${logPath}...\n`);
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    try {
        await followLog(logPath, controller.signal);
        process.exitCode = 0;
    } catch (err) {
        console.error(`[tooldrive logs] Stopped following: ${errorMessage(err)}`);
        process.exitCode = 1;
    }
    return true;
}

/** Reads the bytes appended to a file since the previous read. */
export class LogCursor {
    #offset: number;

    constructor(readonly filePath: string, offset = 0) {
        this.#offset = offset;
    }

    /** A cursor that starts `contextBytes` before the current end of the file. */
    static async nearEnd(filePath: string, contextBytes: number): Promise<LogCursor> {
        const { size } = await stat(filePath);
        return new LogCursor(filePath, Math.max(0, size - contextBytes));
    }

    get offset(): number {
        return this.#offset;
    }

    /** A file that shrank was rewritten, so reading restarts from its beginning. */
    async readAppended(): Promise<string> {
        const handle = await open(this.filePath, 'r');
        try {
            const { size } = await handle.stat();
            if (size < this.#offset) this.#offset = 0;
            const length = size - this.#offset;
            if (length === 0) return '';

            const buffer = Buffer.alloc(length);
            const { bytesRead } = await handle.read(buffer, 0, length, this.#offset);
            this.#offset += bytesRead;
            return buffer.toString('utf8', 0, bytesRead);
        } finally {
            await handle.close();
        }
    }
}

/** Print the tail of `filePath`, then every later append, until `signal` aborts. */
export async function followLog(
    filePath: string,
    signal: AbortSignal,
    write: (text: string) => void = (text) => process.stdout.write(text),
): Promise<void> {
    const cursor = await LogCursor.nearEnd(filePath, TAIL_CONTEXT_BYTES);
    const flush = async () => {
        const text = await cursor.readAppended();
        if (text) write(text);
    };

    await flush();
    try {
        for await (const event of watch(filePath, { signal })) {
            if (event.eventType === 'change') await flush();
        }
    } catch (err) {
        if (!signal.aborted) throw err;
    }
}
