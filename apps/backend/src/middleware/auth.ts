import { NextFunction, Request, RequestHandler, Response } from 'express';
import { timingSafeEqual } from 'crypto';
import { isLoopbackHost } from '../config/serverConfig';
import { sendJsonError } from '../utils/jsonError';

export type ForbiddenStyle = 'json' | 'text';

export function extractBearerToken(raw: unknown): string | null {
    if (typeof raw !== 'string') {
        return null;
    }

    const trimmed = raw.trim();
    if (!trimmed) {
        return null;
    }

    if (trimmed.toLowerCase().startsWith('bearer ')) {
        const token = trimmed.slice(7).trim();
        return token.length > 0 ? token : null;
    }
    return null;
}

/** `?token=` wins over `Authorization: Bearer`. */
export function requestToken(req: Request): string | null {
    const raw = Array.isArray(req.query.token) ? req.query.token[0] : req.query.token;
    if (typeof raw === 'string' && raw.length > 0) {
        return raw;
    }
    return extractBearerToken(req.header('Authorization'));
}

export function validateSharedToken(token: string | null, expected: string): boolean {
    if (!token || !expected || expected.length === 0) {
        return false;
    }
    const leftBuffer = Buffer.from(token, 'utf8');
    const rightBuffer = Buffer.from(expected, 'utf8');
    if (leftBuffer.length !== rightBuffer.length) {
        // Keep timing profile stable for mismatch lengths.
        const maxLength = Math.max(leftBuffer.length, rightBuffer.length);
        const leftPadded = Buffer.alloc(maxLength);
        const rightPadded = Buffer.alloc(maxLength);
        leftBuffer.copy(leftPadded);
        rightBuffer.copy(rightPadded);
        timingSafeEqual(leftPadded, rightPadded);
        return false;
    }
    return timingSafeEqual(leftBuffer, rightBuffer);
}

export function sendForbidden(res: Response, style: ForbiddenStyle): void {
    if (style === 'json') {
        sendJsonError(res, 403, 'forbidden', 'Forbidden');
        return;
    }
    res.setHeader('Cache-Control', 'no-store');
    res.status(403).type('text/plain; charset=utf-8').send('Forbidden\n');
}

export function requireToken(expected: string, style: ForbiddenStyle): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!validateSharedToken(requestToken(req), expected)) {
            sendForbidden(res, style);
            return;
        }
        next();
    };
}

/**
 * Dashboard pages: a loopback browser that arrives without any token is sent
 * to the same page with `?token=` filled in; everyone else must present it.
 */
export function requirePageToken(expected: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const token = requestToken(req);
        if (token === null && isLoopbackHost(req.socket.remoteAddress || '')) {
            res.redirect(302, `${req.path}?token=${encodeURIComponent(expected)}`);
            return;
        }
        if (!validateSharedToken(token, expected)) {
            sendForbidden(res, 'text');
            return;
        }
        next();
    };
}
