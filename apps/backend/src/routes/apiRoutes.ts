import express, { NextFunction, Request, Response, Router } from 'express';
import { readFile, stat } from 'fs/promises';
import { MAX_JSON_BODY_BYTES, MAX_RAW_RUN_META_BYTES } from '../config/constants';
import { requireToken } from '../middleware/auth';
import { parseSnapshotQuery, validateUiStatePatchBody } from '../modules/http/requestValidation';
import { readRunMetaDocument } from '../modules/meta/runMetaSummary';
import { buildSnapshot } from '../modules/snapshot/snapshotBuilder';
import { etagForStat, httpDate, ifNoneMatchMatches, statFile } from '../utils/fileStat';
import { sendJsonError } from '../utils/jsonError';
import { logger } from '../utils/logger';
import type { DashboardContext } from './context';

const RAW_FLAGS = new Set(['1', 'true', 'yes', 'y']);

function queryText(req: Request, name: string): string {
    const raw = req.query[name];
    const value = Array.isArray(raw) ? raw[0] : raw;
    return typeof value === 'string' ? value.trim().toLowerCase() : '';
}

/** Aborts when the client goes away before the response is written. */
function requestSignal(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => controller.abort());
    return controller.signal;
}

async function readBoundedFile(filePath: string, maxBytes: number): Promise<Buffer | null> {
    try {
        const info = await stat(filePath);
        if (!info.isFile() || info.size > maxBytes) {
            return null;
        }
        return await readFile(filePath);
    } catch {
        return null;
    }
}

async function handleRunMeta(ctx: DashboardContext, req: Request, res: Response): Promise<void> {
    const wantRaw = ['raw', 'file'].includes(queryText(req, 'format')) || RAW_FLAGS.has(queryText(req, 'raw'));
    const filePath = ctx.hub.runMetaPath();
    const fileStat = await statFile(filePath);
    const etag = etagForStat(fileStat);

    res.setHeader('Cache-Control', 'no-cache');
    if (etag) {
        res.setHeader('ETag', etag);
        res.setHeader('Last-Modified', httpDate(fileStat.mtime_utc ?? 0));
        if (ifNoneMatchMatches(req.header('If-None-Match'), etag)) {
            res.status(304).end();
            return;
        }
    }

    if (wantRaw) {
        const data = await readBoundedFile(filePath, MAX_RAW_RUN_META_BYTES);
        if (!data) {
            sendJsonError(res, 404, 'not_found', 'nf_run_meta.json not found');
            return;
        }
        res.status(200).type('application/json; charset=utf-8').send(data);
        return;
    }

    const parsed = fileStat.exists ? await readRunMetaDocument(filePath) : { data: null, parseError: null };
    res.status(200).json({
        schema_version: 1,
        server_time_utc: Date.now() / 1000,
        server_instance_id: ctx.instanceId,
        path: filePath,
        stat: fileStat,
        etag,
        data: parsed.data,
        parse_error: parsed.parseError,
    });
}

export function createApiRouter(ctx: DashboardContext): Router {
    const router = Router();
    router.use(requireToken(ctx.config.token, 'json'));
    router.use((_req, res, next) => {
        res.setHeader('Cache-Control', 'no-store');
        next();
    });

    router.get('/health', (_req, res) => {
        res.json({
            status: 'ok',
            server_time_utc: Date.now() / 1000,
            server_instance_id: ctx.instanceId,
            hub_running: ctx.hub.running,
        });
    });

    router.get('/config', (_req, res) => {
        res.json(ctx.buildConfig());
    });

    router.get('/stats', (_req, res) => {
        res.json(ctx.buildStats());
    });

    router.get('/meta', async (_req, res, next) => {
        try {
            res.json(await ctx.hub.latestMeta());
        } catch (error) {
            next(error);
        }
    });

    router.get('/state', (_req, res) => {
        res.json(ctx.uiState.current());
    });

    const jsonBody = express.json({ limit: MAX_JSON_BODY_BYTES, strict: false, type: () => true });
    const updateState = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const patch = validateUiStatePatchBody(req.body);
        if (!patch.ok) {
            res.status(patch.status).type('text/plain; charset=utf-8').send(`${patch.message}\n`);
            return;
        }
        try {
            const updated = await ctx.uiState.update(patch.value);
            logger.debug(`[UiState] updated by ${updated.updated_by || 'anonymous'}`);
            res.json(updated);
        } catch (error) {
            next(error);
        }
    };
    router.put('/state', jsonBody, updateState);
    router.post('/state', jsonBody, updateState);

    router.get('/snapshot', async (req, res, next) => {
        const query = parseSnapshotQuery(req.query, ctx.config.snapshotMaxWaitMs);
        if (!query.ok) {
            sendJsonError(res, query.status, 'bad_request', query.message);
            return;
        }
        try {
            const snapshot = await buildSnapshot(ctx.snapshotSources(), query.value, requestSignal(res));
            if (!res.writableEnded) {
                res.json(snapshot);
            }
        } catch (error) {
            next(error);
        }
    });

    router.get('/run_meta', async (req, res, next) => {
        try {
            await handleRunMeta(ctx, req, res);
        } catch (error) {
            next(error);
        }
    });

    return router;
}
