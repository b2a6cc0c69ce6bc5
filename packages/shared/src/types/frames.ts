export interface FeedbackFrame {
    t: number;
    metric: number | null;
    threshold: number | null;
    reward: number;
    reward_rate: number | null;
    artifact_ready?: number;
    artifact?: number;
    bad_channels?: number;
    phase?: string;
}

export interface BandpowerFrame {
    t: number;
    values: (number | null)[]; // band-major: values[b * channels + c]
}

export interface ArtifactFrame {
    t: number;
    ready: number;
    bad: number;
    bad_channels: number;
}

export type PositionSource = 'custom' | 'builtin' | 'fallback';

export interface FileStat {
    exists: boolean;
    size_bytes?: number;
    mtime_utc?: number;
}

export interface RunMetaInfo {
    path: string;
    stat: FileStat;
    etag: string | null;
    summary: Record<string, unknown> | null;
    parse_error: string | null;
}

export interface BandpowerMeta {
    bands: string[];
    channels: string[];
    positions: [number, number][];
    positions_source: PositionSource[];
    fallback_positions_count: number;
    montage_csv: string | null;
    time_col: string;
}

export type WatchedFileName =
    | 'nf_feedback'
    | 'bandpower_timeseries'
    | 'artifact_gate_timeseries'
    | 'nf_run_meta';

export interface MetaSnapshot {
    schema_version: 2;
    outdir: string;
    server_time_utc: number;
    files: Record<WatchedFileName, string>;
    files_stat: Record<WatchedFileName, FileStat>;
    run_meta: RunMetaInfo;
    bandpower: BandpowerMeta | null;
}
