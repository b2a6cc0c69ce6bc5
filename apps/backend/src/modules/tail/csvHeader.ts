import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { parseCsvLine, stripLineEnding } from './csvRow';

const READ_CHUNK_BYTES = 64 * 1024;
const MAX_HEADER_BYTES = 1024 * 1024;

export type HeaderLine = {
    cells: string[];
    /** Byte offset of the first data row. */
    endOffset: number;
};

/** Reads the first newline-terminated line; null while the line is still incomplete. */
export async function readHeaderLine(handle: FileHandle): Promise<HeaderLine | null> {
    const chunks: Buffer[] = [];
    let position = 0;
    while (position < MAX_HEADER_BYTES) {
        const chunk = Buffer.allocUnsafe(READ_CHUNK_BYTES);
        const { bytesRead } = await handle.read(chunk, 0, READ_CHUNK_BYTES, position);
        if (bytesRead <= 0) {
            return null;
        }
        const view = chunk.subarray(0, bytesRead);
        const newline = view.indexOf(0x0a);
        if (newline >= 0) {
            chunks.push(view.subarray(0, newline));
            const line = stripLineEnding(Buffer.concat(chunks).toString('utf8')).replace(/^\uFEFF/, '');
            return { cells: parseCsvLine(line), endOffset: position + newline + 1 };
        }
        chunks.push(view);
        position += bytesRead;
    }
    return null;
}

/** Header cells of a CSV file, or null when it is missing or has no complete first line. */
export async function readCsvHeader(filePath: string): Promise<string[] | null> {
    let handle: FileHandle;
    try {
        handle = await open(filePath, 'r');
    } catch {
        return null;
    }
    try {
        const header = await readHeaderLine(handle);
        return header ? header.cells : null;
    } catch {
        return null;
    } finally {
        await handle.close();
    }
}
