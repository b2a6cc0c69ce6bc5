import type { Response } from 'express';
import type { ErrorBody } from '@nf-live/shared';

export function errorBody(code: string, message: string): ErrorBody {
    return {
        error: { code, message },
        server_time_utc: Date.now() / 1000,
    };
}

export function sendJsonError(res: Response, status: number, code: string, message: string): void {
    res.setHeader('Cache-Control', 'no-store');
    res.status(status).json(errorBody(code, message));
}
