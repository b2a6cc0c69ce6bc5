import type { ArtifactFrame, BandpowerFrame, FeedbackFrame } from '@nf-live/shared';
import type { BandpowerHeader } from '../bandpower/bandpowerHeader';

/** Maps one CSV row to a frame; null means the row is skipped. */
export type RowMapper<T> = (row: string[]) => T | null;

export function safeFloat(raw: string | undefined): number | null {
    if (raw === undefined) {
        return null;
    }
    const text = raw.trim();
    if (!text) {
        return null;
    }
    const value = Number(text);
    return Number.isFinite(value) ? value : null;
}

function safeInt(raw: string | undefined): number {
    const value = safeFloat(raw);
    return value === null ? 0 : Math.trunc(value);
}

function cellAt(row: string[], index: number): string | undefined {
    return index >= 0 && index < row.length ? row[index] : undefined;
}

/** Lower-cased, trimmed column name -> index (the last duplicate wins). */
export function indexColumns(header: string[]): Map<string, number> {
    const columns = new Map<string, number>();
    header.forEach((name, index) => {
        columns.set(name.trim().toLowerCase(), index);
    });
    return columns;
}

function columnOf(columns: Map<string, number>, names: string[], fallback: number): number {
    for (const name of names) {
        const index = columns.get(name);
        if (index !== undefined) {
            return index;
        }
    }
    return fallback;
}

export function createFeedbackMapper(header: string[]): RowMapper<FeedbackFrame> {
    const columns = indexColumns(header);
    const tIdx = columnOf(columns, ['t_end_sec'], 0);
    const metricIdx = columnOf(columns, ['metric'], 1);
    const thresholdIdx = columnOf(columns, ['threshold'], 2);
    const rewardIdx = columnOf(columns, ['reward'], 3);
    const rewardRateIdx = columnOf(columns, ['reward_rate'], 4);
    const artifactReadyIdx = columnOf(columns, ['artifact_ready'], -1);
    const artifactIdx = columnOf(columns, ['artifact'], -1);
    const badChannelsIdx = columnOf(columns, ['bad_channels'], -1);
    const phaseIdx = columnOf(columns, ['phase'], -1);

    return (row) => {
        const t = safeFloat(cellAt(row, tIdx));
        if (t === null) {
            return null;
        }
        const frame: FeedbackFrame = {
            t,
            metric: safeFloat(cellAt(row, metricIdx)),
            threshold: safeFloat(cellAt(row, thresholdIdx)),
            reward: safeInt(cellAt(row, rewardIdx)),
            reward_rate: safeFloat(cellAt(row, rewardRateIdx)),
        };
        const artifactReady = cellAt(row, artifactReadyIdx);
        if (artifactReady !== undefined) {
            frame.artifact_ready = safeInt(artifactReady);
        }
        const artifact = cellAt(row, artifactIdx);
        if (artifact !== undefined) {
            frame.artifact = safeInt(artifact);
        }
        const badChannels = cellAt(row, badChannelsIdx);
        if (badChannels !== undefined) {
            frame.bad_channels = safeInt(badChannels);
        }
        const phase = cellAt(row, phaseIdx);
        if (phase !== undefined) {
            frame.phase = phase;
        }
        return frame;
    };
}

export function createArtifactMapper(header: string[]): RowMapper<ArtifactFrame> {
    const columns = indexColumns(header);
    const tIdx = columnOf(columns, ['t_end_sec'], 0);
    const readyIdx = columnOf(columns, ['ready', 'baseline_ready'], 1);
    const badIdx = columnOf(columns, ['bad'], 2);
    const badChannelsIdx = columnOf(columns, ['bad_channels', 'bad_channel_count'], 3);

    return (row) => {
        const t = safeFloat(cellAt(row, tIdx));
        if (t === null) {
            return null;
        }
        return {
            t,
            ready: safeInt(cellAt(row, readyIdx)),
            bad: safeInt(cellAt(row, badIdx)),
            bad_channels: safeInt(cellAt(row, badChannelsIdx)),
        };
    };
}

export function createBandpowerMapper(layout: BandpowerHeader): RowMapper<BandpowerFrame> {
    return (row) => {
        const t = safeFloat(cellAt(row, layout.timeIdx));
        if (t === null) {
            return null;
        }
        return {
            t,
            values: layout.colIndices.map((index) => safeFloat(cellAt(row, index))),
        };
    };
}
