import { logger } from '../utils/logger';
import { isLoopbackHost } from './serverConfig';

type ValidationIssue = {
    key: string;
    message: string;
};

type Env = Record<string, string | undefined>;

function hasNonEmptyEnv(env: Env, name: string): boolean {
    const raw = env[name];
    return typeof raw === 'string' && raw.trim().length > 0;
}

function validateNumberEnv(
    env: Env,
    issues: ValidationIssue[],
    name: string,
    bounds: { min: number; max: number },
    options: { required?: boolean; integer?: boolean } = {},
): void {
    const raw = env[name];
    if (raw === undefined || raw === null || raw.trim().length === 0) {
        if (options.required) {
            issues.push({
                key: name,
                message: `${name} is required`,
            });
        }
        return;
    }
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
        issues.push({
            key: name,
            message: `${name} must be a finite number`,
        });
        return;
    }
    if (options.integer && !Number.isInteger(parsed)) {
        issues.push({
            key: name,
            message: `${name} must be an integer (got ${parsed})`,
        });
        return;
    }
    if (parsed < bounds.min || parsed > bounds.max) {
        issues.push({
            key: name,
            message: `${name} out of range [${bounds.min}, ${bounds.max}] (got ${parsed})`,
        });
    }
}

export function validateStartupConfigOrThrow(env: Env = process.env): void {
    const issues: ValidationIssue[] = [];
    const allowRemote = env.RT_ALLOW_REMOTE === 'true';

    if (!hasNonEmptyEnv(env, 'RT_OUTDIR')) {
        issues.push({
            key: 'RT_OUTDIR',
            message: 'RT_OUTDIR is required (directory written by the acquisition process)',
        });
    }

    validateNumberEnv(env, issues, 'RT_PORT', { min: 0, max: 65_535 }, { integer: true });
    validateNumberEnv(env, issues, 'RT_MAX_HZ', { min: 0.5, max: 60 });
    validateNumberEnv(env, issues, 'RT_HISTORY_ROWS', { min: 10, max: 100_000 }, { integer: true });
    validateNumberEnv(env, issues, 'RT_META_INTERVAL_MS', { min: 100, max: 60_000 });
    validateNumberEnv(env, issues, 'RT_KEEPALIVE_MS', { min: 250, max: 60_000 });
    validateNumberEnv(env, issues, 'RT_SNAPSHOT_MAX_WAIT_MS', { min: 0, max: 10_000 });
    validateNumberEnv(env, issues, 'RT_TAIL_POLL_MS', { min: 10, max: 1000 });
    validateNumberEnv(env, issues, 'LOG_MAX_SIZE_BYTES', { min: 1_000_000, max: 1_000_000_000 });
    validateNumberEnv(env, issues, 'LOG_MAX_FILES', { min: 1, max: 1000 });

    const host = (env.RT_HOST || '127.0.0.1').trim();
    if (!allowRemote && !isLoopbackHost(host)) {
        issues.push({
            key: 'RT_HOST',
            message: `binding ${host} exposes the dashboard beyond loopback; set RT_ALLOW_REMOTE=true to confirm`,
        });
    }

    const token = env.RT_TOKEN;
    if (typeof token === 'string' && token.length > 0 && /\s/.test(token)) {
        issues.push({
            key: 'RT_TOKEN',
            message: 'must not contain whitespace',
        });
    }

    if (issues.length > 0) {
        const details = issues.map((issue) => `- ${issue.key}: ${issue.message}`).join('\n');
        throw new Error(`Startup config validation failed:\n${details}`);
    }

    logger.info(`[Config] startup validation passed (allow_remote=${allowRemote ? 'true' : 'false'})`);
}
