import type { Batch, DashboardConfig, StreamTopic, Topic } from '@nf-live/shared';
import { SSE_MAX_HZ, SSE_MIN_HZ } from '../../config/constants';
import { sleep } from '../runtime/sleep';
import { StreamBuffer, waitForAny } from '../stream/streamBuffer';
import { BATCH_LIMITS, DRAIN_ORDER } from './topics';
import type { SseConnection } from './sseConnection';

export type TopicBuffers = Record<StreamTopic, StreamBuffer<unknown>>;

export interface StreamPacing {
    hz: number;
    keepaliveMs: number;
    waitSliceMs: number;
}

export interface MultiplexSources {
    buffers: TopicBuffers;
    config(): DashboardConfig;
    currentMeta(): Promise<unknown>;
    currentState(): unknown;
}

export function toBatch<T>(frames: T[], reset: boolean): Batch<T> {
    return { type: 'batch', reset, frames };
}

/** Per-connection delivery rate: the client may only lower the server cap. */
export function effectiveHz(serverMaxHz: number, requested?: number | null): number {
    let hz = Number.isFinite(serverMaxHz) && serverMaxHz > 0 ? serverMaxHz : 15;
    if (requested !== undefined && requested !== null && Number.isFinite(requested) && requested > 0) {
        hz = Math.min(hz, requested);
    }
    return Math.max(SSE_MIN_HZ, Math.min(SSE_MAX_HZ, hz));
}

/** Spaces consecutive sends at least `1/hz` apart. */
export class SendThrottle {
    private readonly intervalMs: number;
    private lastSendAt = 0;

    constructor(hz: number) {
        this.intervalMs = 1000 / Math.max(SSE_MIN_HZ, hz);
    }

    async wait(signal?: AbortSignal): Promise<void> {
        const dueIn = this.lastSendAt + this.intervalMs - Date.now();
        if (dueIn > 0) {
            await sleep(dueIn, signal);
        }
        this.lastSendAt = Date.now();
    }
}

/** A resume cursor beyond what the buffer ever produced (server restart) starts over. */
export function clampResumeCursor(buffer: StreamBuffer<unknown>, requested: number | null | undefined): number {
    if (requested === undefined || requested === null || !Number.isFinite(requested) || requested < 0) {
        return 0;
    }
    return requested > buffer.latestSeq() ? 0 : Math.floor(requested);
}

export function parseSeq(raw: string | undefined): number | null {
    if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) {
        return null;
    }
    return Number(raw.trim());
}

/** Parses a multiplexed event id such as `nf=12,meta=3`. */
export function parseCompositeCursor(raw: string | undefined): Partial<Record<StreamTopic, number>> {
    const out: Partial<Record<StreamTopic, number>> = {};
    for (const part of (raw || '').split(',')) {
        const [name, value] = part.split('=');
        const seq = parseSeq(value);
        const topic = DRAIN_ORDER.find((candidate) => candidate === (name || '').trim());
        if (topic && seq !== null) {
            out[topic] = seq;
        }
    }
    return out;
}

export function formatCompositeCursor(topics: readonly StreamTopic[], cursors: Record<StreamTopic, number>): string {
    return topics.map((topic) => `${topic}=${cursors[topic]}`).join(',');
}

/**
 * Streams one buffer as unnamed `batch` events whose id is the buffer cursor.
 * With `initial`, the current document goes out first and streaming resumes
 * from the buffer's latest seq.
 */
export async function streamSingleTopic(
    conn: SseConnection,
    buffer: StreamBuffer<unknown>,
    options: StreamPacing & { limit: number; startCursor: number; initial?: unknown },
): Promise<void> {
    let cursor = options.startCursor;
    if (options.initial !== undefined) {
        cursor = buffer.latestSeq();
        if (!(await conn.send(toBatch([options.initial], false), { id: cursor }))) {
            return;
        }
    }

    const throttle = new SendThrottle(options.hz);
    while (!conn.closed) {
        if (buffer.latestSeq() > cursor) {
            await throttle.wait(conn.signal);
            const next = buffer.getSince(cursor, options.limit);
            if (next.frames.length > 0) {
                if (!(await conn.send(toBatch(next.frames, next.reset), { id: next.cursor }))) {
                    return;
                }
                cursor = next.cursor;
            }
            continue;
        }

        await buffer.waitForNew(cursor, options.waitSliceMs, conn.signal);
        if (buffer.latestSeq() <= cursor && conn.idleMs() >= options.keepaliveMs) {
            if (!(await conn.keepalive())) {
                return;
            }
        }
    }
}

/**
 * Serves several topics over one connection as named events. Sends `config`,
 * then the current meta and state documents, then drains the buffers round
 * robin. Event ids carry every stream cursor so a reconnect can resume.
 */
export async function streamMultiplexed(
    conn: SseConnection,
    sources: MultiplexSources,
    options: StreamPacing & { topics: Topic[]; resume: Partial<Record<StreamTopic, number>> },
): Promise<void> {
    const wanted = DRAIN_ORDER.filter((topic) => options.topics.includes(topic));
    const { buffers } = sources;
    const cursors: Record<StreamTopic, number> = {
        nf: clampResumeCursor(buffers.nf, options.resume.nf),
        artifact: clampResumeCursor(buffers.artifact, options.resume.artifact),
        bandpower: clampResumeCursor(buffers.bandpower, options.resume.bandpower),
        meta: buffers.meta.latestSeq(),
        state: buffers.state.latestSeq(),
    };
    const eventId = (): string => formatCompositeCursor(wanted, cursors);

    if (options.topics.includes('config')) {
        if (!(await conn.send(sources.config(), { event: 'config', id: eventId() }))) {
            return;
        }
    }
    if (options.topics.includes('meta')) {
        const meta = await sources.currentMeta();
        cursors.meta = buffers.meta.latestSeq();
        if (!(await conn.send(toBatch([meta], false), { event: 'meta', id: eventId() }))) {
            return;
        }
    }
    if (options.topics.includes('state')) {
        cursors.state = buffers.state.latestSeq();
        if (!(await conn.send(toBatch([sources.currentState()], false), { event: 'state', id: eventId() }))) {
            return;
        }
    }

    const throttle = new SendThrottle(options.hz);
    while (!conn.closed) {
        let sent = false;
        for (const topic of wanted) {
            const buffer = buffers[topic];
            if (buffer.latestSeq() <= cursors[topic]) {
                continue;
            }
            await throttle.wait(conn.signal);
            const next = buffer.getSince(cursors[topic], BATCH_LIMITS[topic]);
            if (next.frames.length === 0) {
                continue;
            }
            cursors[topic] = next.cursor;
            if (!(await conn.send(toBatch(next.frames, next.reset), { event: topic, id: eventId() }))) {
                return;
            }
            sent = true;
        }
        if (sent) {
            continue;
        }

        const pending = await waitForAny(
            wanted.map((topic) => ({ buffer: buffers[topic], cursor: cursors[topic] })),
            options.waitSliceMs,
            conn.signal,
        );
        if (!pending && conn.idleMs() >= options.keepaliveMs) {
            if (!(await conn.keepalive())) {
                return;
            }
        }
    }
}
