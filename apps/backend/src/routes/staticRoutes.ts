import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { readFile } from 'fs/promises';
import path from 'path';
import type { FileStat } from '@nf-live/shared';
import { STATIC_CACHE_CONTROL } from '../config/constants';
import { requirePageToken } from '../middleware/auth';
import { etagForStat, httpDate, ifNoneMatchMatches, statFile } from '../utils/fileStat';
import type { DashboardContext } from './context';

type AssetRoute = {
    file: string;
    gated: boolean;
};

export const ASSET_ROUTES: Record<string, AssetRoute> = {
    '/': { file: 'index.html', gated: true },
    '/index.html': { file: 'index.html', gated: true },
    '/kiosk': { file: 'kiosk.html', gated: true },
    '/kiosk.html': { file: 'kiosk.html', gated: true },
    '/app.js': { file: 'app.js', gated: false },
    '/app_legacy.js': { file: 'app_legacy.js', gated: false },
    '/kiosk.js': { file: 'kiosk.js', gated: false },
    '/style.css': { file: 'style.css', gated: false },
};

const CONTENT_TYPES: Record<string, string> = {
    '.html': 'text/html; charset=utf-8',
    '.js': 'application/javascript; charset=utf-8',
    '.css': 'text/css; charset=utf-8',
};

/** Resolves `file` inside `baseDir`, refusing anything that escapes it. */
export function resolveAsset(baseDir: string, file: string): string | null {
    const base = path.resolve(baseDir);
    const resolved = path.resolve(base, file);
    const relative = path.relative(base, resolved);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
        return null;
    }
    return resolved;
}

function serveAsset(frontendDir: string, file: string): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            const filePath = resolveAsset(frontendDir, file);
            const fileStat: FileStat = filePath ? await statFile(filePath) : { exists: false };
            const etag = etagForStat(fileStat);
            if (!filePath || !etag) {
                next();
                return;
            }

            res.setHeader('Cache-Control', STATIC_CACHE_CONTROL);
            res.setHeader('ETag', etag);
            res.setHeader('Last-Modified', httpDate(fileStat.mtime_utc ?? 0));
            if (ifNoneMatchMatches(req.header('If-None-Match'), etag)) {
                res.status(304).end();
                return;
            }
            const body = await readFile(filePath);
            res.status(200).type(CONTENT_TYPES[path.extname(file)] || 'application/octet-stream').send(body);
        } catch (error) {
            next(error);
        }
    };
}

/**
 * Dashboard pages and their assets from the configured frontend directory.
 * Without a frontend directory every asset path falls through to 404.
 */
export function createStaticRouter(ctx: DashboardContext): Router {
    const router = Router();
    const { frontendDir } = ctx;
    if (!frontendDir) {
        return router;
    }

    const pageGuard = requirePageToken(ctx.config.token);
    for (const [routePath, asset] of Object.entries(ASSET_ROUTES)) {
        const handler = serveAsset(frontendDir, asset.file);
        if (asset.gated) {
            router.get(routePath, pageGuard, handler);
        } else {
            router.get(routePath, handler);
        }
    }
    return router;
}
