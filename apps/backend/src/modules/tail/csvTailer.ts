import { open, stat } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import { isMissingFile } from '../../utils/fileStat';
import { logger } from '../../utils/logger';
import { sleep } from '../runtime/sleep';
import { readHeaderLine } from './csvHeader';
import { parseCsvLine, stripLineEnding } from './csvRow';

const DEFAULT_POLL_MS = 50;
const DEFAULT_MAX_INITIAL_ROWS = 1200;
const READ_CHUNK_BYTES = 64 * 1024;
const ERROR_BACKOFF_MS = 200;

export interface CsvTailerOptions {
    maxInitialRows?: number;
    pollMs?: number;
}

type FileIdentity = {
    dev: number;
    ino: number;
};

type FileChange = 'truncated' | 'replaced' | null;

function normalizeNonNegativeInteger(value: number | undefined, fallback: number): number {
    if (value === undefined || !Number.isFinite(value) || value < 0) return fallback;
    return Math.floor(value);
}

/**
 * Follows a CSV file that another process keeps appending to.
 *
 * The header line is read once per opened file. Rows already present when the
 * file is opened are available through `readInitialRows` (trailing window
 * only); `iterNewRows` then yields each complete line as it is appended. When
 * the file shrinks below the read offset, or the path starts pointing at a
 * different inode (rename-over), the tailer reopens it and starts from its
 * first data row. A new header array is installed on every reopen.
 */
export class CsvTailer {
    private readonly maxInitialRows: number;
    private readonly pollMs: number;
    private handle: FileHandle | null = null;
    private identity: FileIdentity | null = null;
    private offset = 0;
    private carry = '';
    private decoder = new StringDecoder('utf8');
    private currentHeader: string[] | null = null;

    constructor(readonly filePath: string, options: CsvTailerOptions = {}) {
        this.maxInitialRows = normalizeNonNegativeInteger(options.maxInitialRows, DEFAULT_MAX_INITIAL_ROWS);
        this.pollMs = Math.max(1, normalizeNonNegativeInteger(options.pollMs, DEFAULT_POLL_MS));
    }

    header(): string[] | null {
        return this.currentHeader;
    }

    /**
     * Waits for the header, then returns the last `maxInitialRows` rows that
     * are already in the file. Resolves to [] if aborted first.
     */
    async readInitialRows(signal: AbortSignal): Promise<string[][]> {
        if (!this.handle && !(await this.openWhenReady(signal))) {
            return [];
        }
        const max = this.maxInitialRows;
        let window: string[][] = [];
        await this.readAppended((row) => {
            if (max === 0) return;
            window.push(row);
            if (window.length >= max * 2) {
                window = window.slice(window.length - max);
            }
        });
        return window.length > max ? window.slice(window.length - max) : window;
    }

    async *iterNewRows(signal: AbortSignal): AsyncGenerator<string[]> {
        try {
            while (!signal.aborted) {
                if (!this.handle && !(await this.openWhenReady(signal))) {
                    return;
                }

                const rows: string[][] = [];
                try {
                    const change = await this.detectChange();
                    if (change) {
                        logger.info(`[CsvTailer] ${this.filePath} was ${change}; reopening`);
                        await this.closeHandle();
                        continue;
                    }
                    await this.readAppended((row) => rows.push(row));
                } catch (error) {
                    logger.debug(`[CsvTailer] ${this.filePath} read failed, retrying: ${String(error)}`);
                    await this.closeHandle();
                    await sleep(ERROR_BACKOFF_MS, signal);
                    continue;
                }

                for (const row of rows) {
                    if (signal.aborted) return;
                    yield row;
                }
                if (rows.length === 0) {
                    await sleep(this.pollMs, signal);
                }
            }
        } finally {
            await this.closeHandle();
        }
    }

    async close(): Promise<void> {
        await this.closeHandle();
    }

    private async openWhenReady(signal: AbortSignal): Promise<boolean> {
        while (!signal.aborted) {
            try {
                if (await this.tryOpen()) {
                    return true;
                }
            } catch (error) {
                if (!isMissingFile(error)) {
                    logger.debug(`[CsvTailer] ${this.filePath} open failed, retrying: ${String(error)}`);
                }
                await this.closeHandle();
            }
            await sleep(this.pollMs, signal);
        }
        return false;
    }

    /** Opens the file and consumes its header; false while the header line is incomplete. */
    private async tryOpen(): Promise<boolean> {
        const handle = await open(this.filePath, 'r');
        let columns = 0;
        try {
            const header = await readHeaderLine(handle);
            if (!header) {
                await handle.close();
                return false;
            }
            const info = await handle.stat();
            this.handle = handle;
            this.identity = { dev: info.dev, ino: info.ino };
            this.offset = header.endOffset;
            this.currentHeader = header.cells;
            columns = header.cells.length;
        } catch (error) {
            await handle.close();
            throw error;
        }

        this.carry = '';
        this.decoder = new StringDecoder('utf8');
        logger.debug(`[CsvTailer] opened ${this.filePath} (${columns} columns)`);
        return true;
    }

    private async detectChange(): Promise<FileChange> {
        const handle = this.handle;
        const identity = this.identity;
        if (!handle || !identity) {
            return null;
        }
        try {
            const onDisk = await stat(this.filePath);
            if (onDisk.ino !== identity.ino || onDisk.dev !== identity.dev) {
                return 'replaced';
            }
        } catch (error) {
            // Unlinked but still open: keep draining the old handle until a new file appears.
            if (!isMissingFile(error)) throw error;
        }
        const info = await handle.stat();
        return info.size < this.offset ? 'truncated' : null;
    }

    private async readAppended(onRow: (row: string[]) => void): Promise<void> {
        const handle = this.handle;
        if (!handle) {
            return;
        }
        const end = (await handle.stat()).size;
        while (this.offset < end) {
            const length = Math.min(READ_CHUNK_BYTES, end - this.offset);
            const chunk = Buffer.allocUnsafe(length);
            const { bytesRead } = await handle.read(chunk, 0, length, this.offset);
            if (bytesRead <= 0) break;
            this.offset += bytesRead;

            const segments = `${this.carry}${this.decoder.write(chunk.subarray(0, bytesRead))}`.split('\n');
            this.carry = segments.pop() ?? '';
            for (const segment of segments) {
                const line = stripLineEnding(segment);
                if (line.trim().length === 0) continue;
                onRow(parseCsvLine(line));
            }
        }
    }

    private async closeHandle(): Promise<void> {
        const handle = this.handle;
        this.handle = null;
        this.identity = null;
        if (handle) {
            try {
                await handle.close();
            } catch (error) {
                logger.debug(`[CsvTailer] close failed for ${this.filePath}: ${String(error)}`);
            }
        }
    }
}
