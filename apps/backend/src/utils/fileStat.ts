import { stat } from 'fs/promises';
import type { FileStat } from '@nf-live/shared';

export function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'ENOENT';
}

/** Best-effort stat for status payloads; any failure reads as a missing file. */
export async function statFile(filePath: string): Promise<FileStat> {
    try {
        const info = await stat(filePath);
        if (!info.isFile()) {
            return { exists: false };
        }
        return {
            exists: true,
            size_bytes: info.size,
            mtime_utc: info.mtimeMs / 1000,
        };
    } catch {
        return { exists: false };
    }
}

export function weakEtag(sizeBytes: number, mtimeUtc: number): string {
    return `W/"${Math.trunc(sizeBytes)}-${Math.trunc(mtimeUtc)}"`;
}

export function etagForStat(info: FileStat): string | null {
    if (!info.exists || info.size_bytes === undefined || info.mtime_utc === undefined) {
        return null;
    }
    return weakEtag(info.size_bytes, info.mtime_utc);
}

export function httpDate(epochSeconds: number): string {
    return new Date(epochSeconds * 1000).toUTCString();
}

/** True when an If-None-Match header value covers `etag` ("*" or a comma list). */
export function ifNoneMatchMatches(headerValue: string | undefined, etag: string): boolean {
    if (!headerValue) {
        return false;
    }
    const trimmed = headerValue.trim();
    if (trimmed === '*') {
        return true;
    }
    return trimmed
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .includes(etag);
}
