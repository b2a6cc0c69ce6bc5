export type ValueTransform = 'linear' | 'log10' | 'db';
export type ScaleMode = 'auto' | 'fixed';
export type LabelMode = 'on' | 'off';

export interface UiState {
    schema_version: number;
    win_sec: number;
    paused: boolean;
    band: string | null;
    channel: string | null;
    transform: ValueTransform;
    scale: ScaleMode;
    labels: LabelMode;
    updated_utc: number;
    updated_by: string | null;
}

/** What GET /api/state returns and what the state topic carries. */
export interface UiStateFrame extends UiState {
    server_time_utc: number;
    client_id?: string | null;
}
