import type { ArtifactFrame, BandpowerFrame, FeedbackFrame, MetaSnapshot, UiStateFrame } from '@nf-live/shared';
import { StreamBuffer } from '../stream/streamBuffer';
import type { SnapshotQuery } from '../http/requestValidation';
import { buildSnapshot, SnapshotSources } from './snapshotBuilder';

function meta(outdir: string): MetaSnapshot {
    const missing = { exists: false };
    return {
        schema_version: 2,
        outdir,
        server_time_utc: 0,
        files: {
            nf_feedback: 'nf_feedback.csv',
            bandpower_timeseries: 'bandpower_timeseries.csv',
            artifact_gate_timeseries: 'artifact_gate_timeseries.csv',
            nf_run_meta: 'nf_run_meta.json',
        },
        files_stat: {
            nf_feedback: missing,
            bandpower_timeseries: missing,
            artifact_gate_timeseries: missing,
            nf_run_meta: missing,
        },
        run_meta: { path: 'nf_run_meta.json', stat: missing, etag: null, summary: null, parse_error: null },
        bandpower: null,
    };
}

function feedback(t: number): FeedbackFrame {
    return { t, metric: t / 10, threshold: 0.2, reward: 1, reward_rate: 0.5 };
}

const state: UiStateFrame = {
    schema_version: 1,
    win_sec: 10,
    paused: false,
    band: null,
    channel: null,
    transform: 'linear',
    scale: 'auto',
    labels: 'on',
    updated_utc: 0,
    updated_by: null,
    server_time_utc: 0,
};

function sources(): SnapshotSources {
    return {
        instanceId: 'instance-1',
        buffers: {
            nf: new StreamBuffer<FeedbackFrame>(8),
            bandpower: new StreamBuffer<BandpowerFrame>(8),
            artifact: new StreamBuffer<ArtifactFrame>(8),
            meta: new StreamBuffer<MetaSnapshot>(8),
            state: new StreamBuffer<UiStateFrame>(8),
        },
        config: () => {
            throw new Error('config was not requested');
        },
        currentMeta: async () => meta('/data/current'),
        currentState: () => state,
    };
}

function query(overrides: Partial<SnapshotQuery>): SnapshotQuery {
    return {
        topics: ['nf'],
        waitMs: 0,
        limit: 2500,
        cursors: { nf: 0, bandpower: 0, artifact: 0, meta: 0, state: 0 },
        ...overrides,
    };
}

describe('buildSnapshot', () => {
    it('returns frames after the cursor with the updated cursor', async () => {
        const src = sources();
        src.buffers.nf.append(feedback(1));
        src.buffers.nf.append(feedback(2));
        src.buffers.nf.append(feedback(3));

        const response = await buildSnapshot(
            src,
            query({ limit: 1, cursors: { nf: 1, bandpower: 0, artifact: 0, meta: 0, state: 0 } }),
        );

        expect(response.schema_version).toBe(1);
        expect(response.server_instance_id).toBe('instance-1');
        expect(response.nf).toEqual({ cursor: 2, batch: { type: 'batch', reset: false, frames: [feedback(2)] } });
        expect(response.meta).toBeUndefined();
        expect(response.config).toBeUndefined();
    });

    it('returns the current meta and state documents for zero cursors', async () => {
        const src = sources();
        src.buffers.meta.append(meta('/data/a'));
        src.buffers.meta.append(meta('/data/b'));

        const response = await buildSnapshot(src, query({ topics: ['meta', 'state'] }));

        expect(response.meta).toEqual({
            cursor: 2,
            batch: { type: 'batch', reset: false, frames: [meta('/data/current')] },
        });
        expect(response.state).toEqual({ cursor: 0, batch: { type: 'batch', reset: false, frames: [state] } });
        expect(response.nf).toBeUndefined();
    });

    it('long-polls until a requested buffer moves', async () => {
        const src = sources();
        const started = Date.now();
        setTimeout(() => src.buffers.nf.append(feedback(5)), 30);

        const response = await buildSnapshot(src, query({ waitMs: 5000 }));

        expect(Date.now() - started).toBeLessThan(4000);
        expect(response.nf).toEqual({ cursor: 1, batch: { type: 'batch', reset: false, frames: [feedback(5)] } });
    });

    it('returns empty batches when the wait elapses', async () => {
        const response = await buildSnapshot(sources(), query({ waitMs: 20 }));
        expect(response.nf).toEqual({ cursor: 0, batch: { type: 'batch', reset: false, frames: [] } });
    });

    it('restarts a cursor from an earlier server run without waiting', async () => {
        const src = sources();
        src.buffers.nf.append(feedback(1));
        src.buffers.nf.append(feedback(2));
        src.buffers.nf.append(feedback(3));
        const started = Date.now();

        const response = await buildSnapshot(
            src,
            query({ waitMs: 5000, cursors: { nf: 500, bandpower: 0, artifact: 0, meta: 0, state: 0 } }),
        );

        expect(Date.now() - started).toBeLessThan(4000);
        expect(response.nf).toEqual({
            cursor: 3,
            batch: { type: 'batch', reset: false, frames: [feedback(1), feedback(2), feedback(3)] },
        });
    });

    it('returns the current state document for a state cursor ahead of the buffer', async () => {
        const response = await buildSnapshot(
            sources(),
            query({ topics: ['state'], cursors: { nf: 0, bandpower: 0, artifact: 0, meta: 0, state: 42 } }),
        );
        expect(response.state).toEqual({ cursor: 0, batch: { type: 'batch', reset: false, frames: [state] } });
    });
});
