import type { LabelMode, ScaleMode, UiState, ValueTransform } from '@nf-live/shared';

const TRANSFORMS: readonly ValueTransform[] = ['linear', 'log10', 'db'];
const SCALES: readonly ScaleMode[] = ['auto', 'fixed'];
const LABELS: readonly LabelMode[] = ['on', 'off'];

export const PATCHABLE_KEYS = ['win_sec', 'paused', 'band', 'channel', 'transform', 'scale', 'labels', 'client_id'] as const;

export type UiStatePatch = Partial<Record<(typeof PATCHABLE_KEYS)[number], unknown>>;

function asRecord(input: unknown): Record<string, unknown> | null {
    if (!input || typeof input !== 'object' || Array.isArray(input)) {
        return null;
    }
    return input as Record<string, unknown>;
}

function nowSeconds(): number {
    return Date.now() / 1000;
}

function toFiniteNumber(value: unknown): number | null {
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
    const parsed = toFiniteNumber(value);
    return parsed === null ? fallback : Math.min(max, Math.max(min, parsed));
}

/** Empty strings, zero, null and empty containers are false; everything else is true. */
function isTruthy(value: unknown): boolean {
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    const record = asRecord(value);
    if (record) {
        return Object.keys(record).length > 0;
    }
    return Boolean(value);
}

function boundedString(value: unknown, maxLength: number): string | null {
    if (typeof value !== 'string') {
        return null;
    }
    const trimmed = value.trim();
    return trimmed ? trimmed.slice(0, maxLength) : null;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
    return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function defaultUiState(now = nowSeconds()): UiState {
    return {
        schema_version: 1,
        win_sec: 60,
        paused: false,
        band: null,
        channel: null,
        transform: 'linear',
        scale: 'auto',
        labels: 'on',
        updated_utc: now,
        updated_by: null,
    };
}

/**
 * Coerces an arbitrary object into a valid UI state. Unknown keys are dropped,
 * numbers are clamped and enum fields fall back to their defaults.
 */
export function sanitizeUiState(input: unknown, now = nowSeconds()): UiState {
    const source = asRecord(input) ?? {};
    const defaults = defaultUiState(now);
    const has = (key: string): boolean => Object.prototype.hasOwnProperty.call(source, key);

    const schemaVersion = Math.trunc(toFiniteNumber(source.schema_version) ?? 1);
    return {
        schema_version: schemaVersion !== 0 ? schemaVersion : 1,
        win_sec: has('win_sec') ? clampNumber(source.win_sec, 5, 3600, defaults.win_sec) : defaults.win_sec,
        paused: has('paused') ? isTruthy(source.paused) : defaults.paused,
        band: boundedString(source.band, 64),
        channel: boundedString(source.channel, 64),
        transform: oneOf(source.transform, TRANSFORMS, 'linear'),
        scale: oneOf(source.scale, SCALES, 'auto'),
        labels: oneOf(source.labels, LABELS, 'on'),
        updated_utc: has('updated_utc') ? clampNumber(source.updated_utc, 0, 1e12, now) : now,
        updated_by: boundedString(source.updated_by, 96),
    };
}

/** Keeps only the keys clients may change. */
export function pickPatch(input: Record<string, unknown>): UiStatePatch {
    const patch: UiStatePatch = {};
    for (const key of PATCHABLE_KEYS) {
        if (Object.prototype.hasOwnProperty.call(input, key)) {
            patch[key] = input[key];
        }
    }
    return patch;
}

/** Merges a patch into the current state; `client_id` becomes `updated_by`. */
export function applyPatch(current: UiState, patch: UiStatePatch, now = nowSeconds()): UiState {
    const { client_id: clientId, ...changes } = patch;
    return sanitizeUiState({
        ...current,
        ...changes,
        updated_utc: now,
        updated_by: boundedString(clientId, 96),
    }, now);
}
