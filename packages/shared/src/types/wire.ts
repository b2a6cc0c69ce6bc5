import type { ArtifactFrame, BandpowerFrame, FeedbackFrame, MetaSnapshot } from './frames';
import type { UiStateFrame } from './ui-state';

export type StreamTopic = 'nf' | 'bandpower' | 'artifact' | 'meta' | 'state';
export type Topic = 'config' | StreamTopic;

export interface TopicFrameMap {
    nf: FeedbackFrame;
    bandpower: BandpowerFrame;
    artifact: ArtifactFrame;
    meta: MetaSnapshot;
    state: UiStateFrame;
}

export interface Batch<T> {
    type: 'batch';
    reset: boolean;
    frames: T[];
}

export interface ServerFeatureFlags {
    ui_state: boolean;
    sse_stream: boolean;
    snapshot: boolean;
    run_meta: boolean;
    stats: boolean;
    asset_etag: boolean;
    last_event_id: boolean;
    health: boolean;
}

export interface DashboardConfig {
    schema_version: 2;
    api_version: 1;
    outdir: string;
    max_hz: number;
    history_rows: number;
    meta_interval_sec: number;
    frontend: FrontendMode;
    server_time_utc: number;
    server_instance_id: string;
    supports: ServerFeatureFlags;
}

export type FrontendMode = 'external' | 'none';

export type SnapshotTopicResult<T> = {
    cursor: number;
    batch: Batch<T>;
};

export type SnapshotResponse = {
    schema_version: 1;
    server_time_utc: number;
    server_instance_id: string;
    config?: DashboardConfig;
} & {
    [K in StreamTopic]?: SnapshotTopicResult<TopicFrameMap[K]>;
};

export type ConnectionKind = StreamTopic | 'stream';

export interface ServerStats {
    schema_version: 1;
    server_time_utc: number;
    server_instance_id: string;
    uptime_sec: number;
    frontend: FrontendMode;
    connections: Record<ConnectionKind, number> & { total: number };
    buffers: Record<StreamTopic, { oldest_seq: number; latest_seq: number; size: number }>;
}

export interface ErrorBody {
    error: {
        code: string;
        message: string;
    };
    server_time_utc: number;
}
