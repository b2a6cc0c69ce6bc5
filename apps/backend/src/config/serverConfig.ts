import path from 'path';
import { randomBytes } from 'crypto';

export interface ServerConfig {
    outdir: string;
    host: string;
    port: number;
    allowRemote: boolean;
    token: string;
    maxHz: number;
    historyRows: number;
    metaIntervalMs: number;
    keepaliveMs: number;
    snapshotMaxWaitMs: number;
    tailPollMs: number;
    frontendDir: string | null;
    corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number, bounds: { min: number; max: number }): number {
    const raw = (env[name] || '').trim();
    const parsed = raw.length > 0 ? Number(raw) : fallback;
    if (!Number.isFinite(parsed)) {
        return fallback;
    }
    return Math.min(bounds.max, Math.max(bounds.min, parsed));
}

function readOptionalPath(env: Env, name: string): string | null {
    const raw = (env[name] || '').trim();
    return raw.length > 0 ? path.resolve(raw) : null;
}

export function generateToken(): string {
    return randomBytes(18).toString('base64url');
}

export function isLoopbackHost(host: string): boolean {
    const normalized = host.trim().toLowerCase().replace(/^::ffff:/, '');
    return normalized === 'localhost'
        || normalized === '::1'
        || normalized === '[::1]'
        || /^127\.\d+\.\d+\.\d+$/.test(normalized);
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
    const token = (env.RT_TOKEN || '').trim();
    return {
        outdir: path.resolve((env.RT_OUTDIR || '.').trim()),
        host: (env.RT_HOST || '127.0.0.1').trim(),
        port: Math.floor(readNumber(env, 'RT_PORT', 0, { min: 0, max: 65_535 })),
        allowRemote: env.RT_ALLOW_REMOTE === 'true',
        token: token.length > 0 ? token : generateToken(),
        maxHz: readNumber(env, 'RT_MAX_HZ', 15, { min: 0.5, max: 60 }),
        historyRows: Math.floor(readNumber(env, 'RT_HISTORY_ROWS', 1200, { min: 10, max: 100_000 })),
        metaIntervalMs: readNumber(env, 'RT_META_INTERVAL_MS', 1000, { min: 100, max: 60_000 }),
        keepaliveMs: readNumber(env, 'RT_KEEPALIVE_MS', 2000, { min: 250, max: 60_000 }),
        snapshotMaxWaitMs: readNumber(env, 'RT_SNAPSHOT_MAX_WAIT_MS', 10_000, { min: 0, max: 10_000 }),
        tailPollMs: readNumber(env, 'RT_TAIL_POLL_MS', 50, { min: 10, max: 1000 }),
        frontendDir: readOptionalPath(env, 'RT_FRONTEND_DIR'),
        corsOrigins: (env.RT_CORS_ORIGINS || '')
            .split(',')
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0),
    };
}
