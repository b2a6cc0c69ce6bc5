import type { StreamTopic, Topic } from '@nf-live/shared';
import { z } from 'zod';
import { SNAPSHOT_DEFAULT_LIMIT, SNAPSHOT_MAX_LIMIT } from '../../config/constants';
import { pickPatch, UiStatePatch } from '../state/uiState';
import { parseTopics } from '../sse/topics';

type ValidationError = {
    ok: false;
    status: number;
    message: string;
};

type ValidationSuccess<T> = {
    ok: true;
    value: T;
};

export type ValidationResult<T> = ValidationSuccess<T> | ValidationError;

export type SnapshotQuery = {
    topics: Topic[];
    waitMs: number;
    limit: number;
    cursors: Record<StreamTopic, number>;
};

export type StreamQuery = {
    topics: Topic[];
    hz: number | null;
    lastEventId: string | undefined;
};

function firstValue(input: unknown): unknown {
    return Array.isArray(input) ? input[0] : input;
}

function numericText(input: unknown): number | undefined {
    const value = firstValue(input);
    if (typeof value !== 'string' || value.trim() === '') {
        return undefined;
    }
    return Number(value.trim());
}

// Malformed query values fall back to their defaults instead of failing the request.
const queryText = z.preprocess(firstValue, z.string().optional()).catch(undefined);
const queryNumber = z.preprocess(numericText, z.number().finite().optional()).catch(undefined);
const queryInt = z.preprocess(numericText, z.number().int().optional()).catch(undefined);
const queryCursor = z.preprocess(numericText, z.number().int().nonnegative().optional()).catch(undefined);

const snapshotQuerySchema = z.object({
    topics: queryText,
    wait: queryNumber,
    wait_sec: queryNumber,
    limit: queryInt,
    nf: queryCursor,
    cursor_nf: queryCursor,
    bandpower: queryCursor,
    bp: queryCursor,
    cursor_bandpower: queryCursor,
    cursor_bp: queryCursor,
    artifact: queryCursor,
    art: queryCursor,
    cursor_artifact: queryCursor,
    cursor_art: queryCursor,
    meta: queryCursor,
    cursor_meta: queryCursor,
    state: queryCursor,
    cursor_state: queryCursor,
});

const streamQuerySchema = z.object({
    topics: queryText,
    hz: queryNumber,
    last_event_id: queryText,
});

const jsonObjectSchema = z.record(z.unknown());

function firstDefined(...values: (number | undefined)[]): number {
    for (const value of values) {
        if (value !== undefined) {
            return value;
        }
    }
    return 0;
}

export function parseSnapshotQuery(query: unknown, maxWaitMs: number): ValidationResult<SnapshotQuery> {
    const parsed = snapshotQuerySchema.safeParse(query);
    if (!parsed.success) {
        return { ok: false, status: 400, message: 'Invalid query string' };
    }
    const q = parsed.data;
    const waitSec = q.wait ?? q.wait_sec ?? 0;
    const waitCapMs = Math.max(0, Math.min(10_000, maxWaitMs));
    return {
        ok: true,
        value: {
            topics: parseTopics(q.topics),
            waitMs: Math.max(0, Math.min(waitCapMs, waitSec * 1000)),
            limit: Math.max(1, Math.min(SNAPSHOT_MAX_LIMIT, q.limit || SNAPSHOT_DEFAULT_LIMIT)),
            cursors: {
                nf: firstDefined(q.nf, q.cursor_nf),
                bandpower: firstDefined(q.bandpower, q.bp, q.cursor_bandpower, q.cursor_bp),
                artifact: firstDefined(q.artifact, q.art, q.cursor_artifact, q.cursor_art),
                meta: firstDefined(q.meta, q.cursor_meta),
                state: firstDefined(q.state, q.cursor_state),
            },
        },
    };
}

export function parseStreamQuery(query: unknown, lastEventIdHeader: string | undefined): ValidationResult<StreamQuery> {
    const parsed = streamQuerySchema.safeParse(query);
    if (!parsed.success) {
        return { ok: false, status: 400, message: 'Invalid query string' };
    }
    const header = (lastEventIdHeader || '').trim();
    return {
        ok: true,
        value: {
            topics: parseTopics(parsed.data.topics),
            hz: parsed.data.hz ?? null,
            lastEventId: header || parsed.data.last_event_id,
        },
    };
}

export function validateUiStatePatchBody(body: unknown): ValidationResult<UiStatePatch> {
    const parsed = jsonObjectSchema.safeParse(body);
    if (!parsed.success) {
        return { ok: false, status: 400, message: 'Expected a JSON object' };
    }
    return { ok: true, value: pickPatch(parsed.data) };
}
