import { readFile } from 'fs/promises';
import type { RunMetaInfo } from '@nf-live/shared';
import { etagForStat, statFile } from '../../utils/fileStat';

const SUMMARY_KEYS = [
    'Tool',
    'Version',
    'GitDescribe',
    'TimestampLocal',
    'OutputDir',
    'demo',
    'input_path',
    'protocol',
    'fs_hz',
    'metric_spec',
    'band_spec',
    'reward_direction',
    'threshold_init',
    'baseline_seconds',
    'baseline_quantile_used',
    'target_reward_rate',
    'adapt_mode',
    'adapt_eta',
    'window_seconds',
    'update_seconds',
    'metric_smooth_seconds',
    'artifact_gate',
    'qc_bad_channel_count',
    'qc_bad_channels',
    'biotrace_ui',
    'export_derived_events',
    'derived_events_written',
];

const MAX_LIST_ITEMS = 12;

function asRecord(input: unknown): Record<string, unknown> | null {
    if (!input || typeof input !== 'object' || Array.isArray(input)) {
        return null;
    }
    return input as Record<string, unknown>;
}

export function truncateList(value: unknown, maxItems = MAX_LIST_ITEMS): unknown {
    if (!Array.isArray(value) || value.length <= maxItems) {
        return value;
    }
    return [...value.slice(0, maxItems), `... (${value.length - maxItems} more)`];
}

/** Compact, display-oriented subset of the run metadata document. */
export function summarizeRunMeta(document: unknown): Record<string, unknown> | null {
    const record = asRecord(document);
    if (!record) {
        return null;
    }
    const summary: Record<string, unknown> = {};
    for (const key of SUMMARY_KEYS) {
        if (Object.prototype.hasOwnProperty.call(record, key)) {
            summary[key] = truncateList(record[key]);
        }
    }
    return Object.keys(summary).length > 0 ? summary : null;
}

export type ParsedRunMeta = {
    data: unknown;
    parseError: string | null;
};

export async function readRunMetaDocument(filePath: string): Promise<ParsedRunMeta> {
    try {
        const text = await readFile(filePath, 'utf8');
        return { data: JSON.parse(text), parseError: null };
    } catch (error) {
        return { data: null, parseError: error instanceof Error ? error.message : String(error) };
    }
}

/**
 * Stat + summary of the run metadata file. The parsed summary is reused while
 * the file's (mtime, size) pair is unchanged.
 */
export class RunMetaSummaryCache {
    private key: string | null = null;
    private summary: Record<string, unknown> | null = null;
    private parseError: string | null = null;

    constructor(private readonly filePath: string) {}

    async info(): Promise<RunMetaInfo> {
        const fileStat = await statFile(this.filePath);
        const info: RunMetaInfo = {
            path: this.filePath,
            stat: fileStat,
            etag: null,
            summary: null,
            parse_error: null,
        };
        if (!fileStat.exists) {
            return info;
        }
        info.etag = etagForStat(fileStat);

        const key = `${fileStat.mtime_utc ?? 0}:${fileStat.size_bytes ?? 0}`;
        if (this.key !== key) {
            const parsed = await readRunMetaDocument(this.filePath);
            this.key = key;
            this.summary = parsed.parseError === null ? summarizeRunMeta(parsed.data) : null;
            this.parseError = parsed.parseError;
        }
        info.summary = this.summary;
        info.parse_error = this.parseError;
        return info;
    }
}
