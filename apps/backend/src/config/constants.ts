/**
 * Fixed names and limits shared by the hub, the SSE layer and the HTTP routes.
 * Tunables that come from the environment live in serverConfig.ts.
 */

// ── Watched files (relative to the output directory) ───────────────
export const FEEDBACK_CSV = 'nf_feedback.csv';
export const BANDPOWER_CSV = 'bandpower_timeseries.csv';
export const ARTIFACT_CSV = 'artifact_gate_timeseries.csv';
export const RUN_META_JSON = 'nf_run_meta.json';
export const MONTAGE_CSV = 'montage.csv';
export const UI_STATE_JSON = 'rt_dashboard_state.json';

// ── Buffers ─────────────────────────────────────────────────────────
export const META_BUFFER_MAXLEN = 2000;
export const STATE_BUFFER_MAXLEN = 2000;

export function feedbackBufferMaxlen(historyRows: number): number {
    return Math.max(20_000, historyRows * 4);
}

export function artifactBufferMaxlen(historyRows: number): number {
    return Math.max(40_000, historyRows * 6);
}

// ── Hub loop pacing ─────────────────────────────────────────────────
export const LOOP_RETRY_DELAY_MS = 200;
export const BANDPOWER_HEADER_RETRY_MS = 250;

// ── SSE ─────────────────────────────────────────────────────────────
export const SSE_RETRY_MS = 1500;
export const SSE_WAIT_SLICE_MS = 500;
export const SSE_MIN_HZ = 0.5;
export const SSE_MAX_HZ = 60;
export const STREAM_BATCH_LIMIT = 2500;
export const META_BATCH_LIMIT = 50;
export const STATE_BATCH_LIMIT = 200;

// ── HTTP ────────────────────────────────────────────────────────────
export const MAX_JSON_BODY_BYTES = 64 * 1024;
export const MAX_RAW_RUN_META_BYTES = 5_000_000;
export const SNAPSHOT_DEFAULT_LIMIT = 2500;
export const SNAPSHOT_MAX_LIMIT = 10_000;
export const STATIC_CACHE_CONTROL = 'public, max-age=0, must-revalidate';
