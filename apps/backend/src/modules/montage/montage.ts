import { readFile } from 'fs/promises';
import type { PositionSource } from '@nf-live/shared';
import { isMissingFile } from '../../utils/fileStat';
import { logger } from '../../utils/logger';
import { parseCsvLine } from '../tail/csvRow';
import { normalizeChannelName } from './channelNames';
import builtinTable from './montage_10_10.json';

export type Position = [number, number];

export type ChannelPositions = {
    positions: Position[];
    sources: PositionSource[];
    fallbackCount: number;
};

const FALLBACK_RING_RADIUS = 0.85;

/** Approximate 2D positions of the 61 standard 10-10 sites, keyed by normalized name. */
export const BUILTIN_MONTAGE: ReadonlyMap<string, Position> = new Map(
    Object.entries(builtinTable).map(([name, xy]): [string, Position] => [name, [xy[0], xy[1]]]),
);

/**
 * Reads a `name,x,y` montage file. Lines starting with '#' and rows that do
 * not parse are skipped; a missing or unreadable file yields an empty map.
 */
export async function loadMontageCsv(filePath: string): Promise<Map<string, Position>> {
    const out = new Map<string, Position>();
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        if (!isMissingFile(error)) {
            logger.warn(`[Montage] ${filePath} not loaded: ${String(error)}`);
        }
        return out;
    }

    for (const rawLine of text.split(/\r?\n/)) {
        const row = parseCsvLine(rawLine);
        if (row.length < 3 || row[0].trim().startsWith('#')) {
            continue;
        }
        const name = row[0].trim();
        const x = row[1].trim();
        const y = row[2].trim();
        if (!name || !x || !y) {
            continue;
        }
        const px = Number(x);
        const py = Number(y);
        const key = normalizeChannelName(name);
        if (key && Number.isFinite(px) && Number.isFinite(py)) {
            out.set(key, [px, py]);
        }
    }
    return out;
}

/**
 * Places each channel using the custom montage first, then the built-in table.
 * Whatever is left is spread over a ring, starting at 12 o'clock and going
 * clockwise.
 */
export function resolveChannelPositions(
    channels: string[],
    custom: ReadonlyMap<string, Position> = new Map(),
): ChannelPositions {
    const positions: (Position | null)[] = [];
    const sources: PositionSource[] = [];

    for (const channel of channels) {
        const key = normalizeChannelName(channel);
        const customPosition = key ? custom.get(key) : undefined;
        if (customPosition) {
            positions.push(customPosition);
            sources.push('custom');
            continue;
        }
        const builtin = BUILTIN_MONTAGE.get(key);
        if (builtin) {
            positions.push(builtin);
            sources.push('builtin');
            continue;
        }
        positions.push(null);
        sources.push('fallback');
    }

    const missing = positions.reduce<number[]>((acc, position, index) => {
        if (position === null) acc.push(index);
        return acc;
    }, []);
    const resolved = positions.map((position): Position => position ?? [0, 0]);
    missing.forEach((index, j) => {
        const angle = Math.PI / 2 - 2 * Math.PI * (j / missing.length);
        resolved[index] = [FALLBACK_RING_RADIUS * Math.cos(angle), FALLBACK_RING_RADIUS * Math.sin(angle)];
    });

    return {
        positions: resolved,
        sources,
        fallbackCount: missing.length,
    };
}
