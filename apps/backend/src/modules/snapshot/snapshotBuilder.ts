import type {
    DashboardConfig,
    MetaSnapshot,
    SnapshotResponse,
    SnapshotTopicResult,
    StreamTopic,
    TopicFrameMap,
    UiStateFrame,
} from '@nf-live/shared';
import type { SnapshotQuery } from '../http/requestValidation';
import { DRAIN_ORDER } from '../sse/topics';
import { clampResumeCursor, toBatch } from '../sse/streamLoops';
import { StreamBuffer, waitForAny } from '../stream/streamBuffer';

export type TypedTopicBuffers = {
    [K in StreamTopic]: StreamBuffer<TopicFrameMap[K]>;
};

export interface SnapshotSources {
    instanceId: string;
    buffers: TypedTopicBuffers;
    config(): DashboardConfig;
    currentMeta(): Promise<MetaSnapshot>;
    currentState(): UiStateFrame;
}

function topicPayload<T>(buffer: StreamBuffer<T>, cursor: number, limit: number): SnapshotTopicResult<T> {
    const next = buffer.getSince(cursor, limit);
    return { cursor: next.cursor, batch: toBatch(next.frames, next.reset) };
}

/**
 * Polling counterpart of the multiplexed stream. Optionally long-polls until
 * one of the requested buffers moves past its cursor, then returns a batch
 * and an updated cursor per topic. A zero cursor on `meta` or `state` yields
 * the current document so a fresh client never starts empty. Cursors from an
 * earlier server run (above the buffer's latest seq) restart from 0.
 */
export async function buildSnapshot(
    sources: SnapshotSources,
    query: SnapshotQuery,
    signal?: AbortSignal,
): Promise<SnapshotResponse> {
    const { buffers } = sources;
    const cursors: Record<StreamTopic, number> = {
        nf: clampResumeCursor(buffers.nf, query.cursors.nf),
        bandpower: clampResumeCursor(buffers.bandpower, query.cursors.bandpower),
        artifact: clampResumeCursor(buffers.artifact, query.cursors.artifact),
        meta: clampResumeCursor(buffers.meta, query.cursors.meta),
        state: clampResumeCursor(buffers.state, query.cursors.state),
    };
    const wanted = DRAIN_ORDER.filter((topic) => query.topics.includes(topic));

    if (query.waitMs > 0) {
        await waitForAny(
            wanted.map((topic) => ({ buffer: buffers[topic], cursor: cursors[topic] })),
            query.waitMs,
            signal,
        );
    }

    const response: SnapshotResponse = {
        schema_version: 1,
        server_time_utc: Date.now() / 1000,
        server_instance_id: sources.instanceId,
    };
    if (query.topics.includes('config')) {
        response.config = sources.config();
    }
    if (wanted.includes('meta')) {
        if (cursors.meta === 0) {
            const cursor = buffers.meta.latestSeq();
            response.meta = { cursor, batch: toBatch([await sources.currentMeta()], false) };
        } else {
            response.meta = topicPayload(buffers.meta, cursors.meta, query.limit);
        }
    }
    if (wanted.includes('state')) {
        response.state = cursors.state === 0
            ? { cursor: buffers.state.latestSeq(), batch: toBatch([sources.currentState()], false) }
            : topicPayload(buffers.state, cursors.state, query.limit);
    }
    if (wanted.includes('nf')) {
        response.nf = topicPayload(buffers.nf, cursors.nf, query.limit);
    }
    if (wanted.includes('artifact')) {
        response.artifact = topicPayload(buffers.artifact, cursors.artifact, query.limit);
    }
    if (wanted.includes('bandpower')) {
        response.bandpower = topicPayload(buffers.bandpower, cursors.bandpower, query.limit);
    }
    return response;
}
