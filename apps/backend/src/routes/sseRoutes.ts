import { Request, Response, Router } from 'express';
import type { ConnectionKind, StreamTopic } from '@nf-live/shared';
import { SSE_RETRY_MS, SSE_WAIT_SLICE_MS } from '../config/constants';
import { requireToken } from '../middleware/auth';
import { parseStreamQuery } from '../modules/http/requestValidation';
import { SseConnection } from '../modules/sse/sseConnection';
import {
    clampResumeCursor,
    effectiveHz,
    parseCompositeCursor,
    parseSeq,
    streamMultiplexed,
    streamSingleTopic,
} from '../modules/sse/streamLoops';
import { BATCH_LIMITS } from '../modules/sse/topics';
import { logger } from '../utils/logger';
import type { DashboardContext } from './context';

const SINGLE_TOPICS: readonly StreamTopic[] = ['nf', 'bandpower', 'artifact', 'meta', 'state'];

async function serveStream(
    ctx: DashboardContext,
    req: Request,
    res: Response,
    kind: ConnectionKind,
    run: (conn: SseConnection) => Promise<void>,
): Promise<void> {
    const release = ctx.connections.acquire(kind);
    const conn = new SseConnection(res);
    logger.debug(`[SSE] ${kind} connected from ${req.socket.remoteAddress || 'unknown'}`);
    try {
        if (await conn.open(SSE_RETRY_MS)) {
            await run(conn);
        }
    } catch (error) {
        logger.warn(`[SSE] ${kind} stream failed: ${String(error)}`);
    } finally {
        release();
        conn.close();
        logger.debug(`[SSE] ${kind} disconnected`);
    }
}

export function createSseRouter(ctx: DashboardContext): Router {
    const router = Router();
    router.use(requireToken(ctx.config.token, 'text'));

    router.get('/stream', (req, res) => {
        const parsed = parseStreamQuery(req.query, req.header('Last-Event-ID'));
        if (!parsed.ok) {
            res.status(parsed.status).type('text/plain; charset=utf-8').send(`${parsed.message}\n`);
            return;
        }
        const sources = ctx.snapshotSources();
        void serveStream(ctx, req, res, 'stream', (conn) => streamMultiplexed(conn, sources, {
            hz: effectiveHz(ctx.config.maxHz, parsed.value.hz),
            keepaliveMs: ctx.config.keepaliveMs,
            waitSliceMs: SSE_WAIT_SLICE_MS,
            topics: parsed.value.topics,
            resume: parseCompositeCursor(parsed.value.lastEventId),
        }));
    });

    for (const topic of SINGLE_TOPICS) {
        router.get(`/${topic}`, (req, res) => {
            const parsed = parseStreamQuery(req.query, req.header('Last-Event-ID'));
            if (!parsed.ok) {
                res.status(parsed.status).type('text/plain; charset=utf-8').send(`${parsed.message}\n`);
                return;
            }
            const sources = ctx.snapshotSources();
            const buffer = sources.buffers[topic];
            const pacing = {
                hz: effectiveHz(ctx.config.maxHz, parsed.value.hz),
                keepaliveMs: ctx.config.keepaliveMs,
                waitSliceMs: SSE_WAIT_SLICE_MS,
                limit: BATCH_LIMITS[topic],
            };
            void serveStream(ctx, req, res, topic, async (conn) => {
                if (topic === 'meta' || topic === 'state') {
                    const initial = topic === 'meta' ? await sources.currentMeta() : sources.currentState();
                    await streamSingleTopic(conn, buffer, { ...pacing, startCursor: 0, initial });
                    return;
                }
                const startCursor = clampResumeCursor(buffer, parseSeq(parsed.value.lastEventId));
                await streamSingleTopic(conn, buffer, { ...pacing, startCursor });
            });
        });
    }

    return router;
}
