import { readFile, rename, writeFile } from 'fs/promises';
import type { UiState, UiStateFrame } from '@nf-live/shared';
import { STATE_BUFFER_MAXLEN } from '../config/constants';
import { applyPatch, defaultUiState, sanitizeUiState } from '../modules/state/uiState';
import type { UiStatePatch } from '../modules/state/uiState';
import { StreamBuffer } from '../modules/stream/streamBuffer';
import { isMissingFile } from '../utils/fileStat';
import { logger } from '../utils/logger';

/**
 * Owner of the shared dashboard UI state.
 *
 * Mutations go through `update` only and are applied one at a time: merge,
 * sanitize, persist (temp file + rename), then broadcast on `updates`. Readers
 * see a new state only once its write has finished. A failed write is logged
 * and the in-memory state still advances.
 */
export class UiStateStore {
    readonly updates = new StreamBuffer<UiStateFrame>(STATE_BUFFER_MAXLEN);
    private state: UiState = defaultUiState();
    private tail: Promise<unknown> = Promise.resolve();

    constructor(readonly filePath: string) {}

    async load(): Promise<UiState> {
        let stored: unknown = null;
        try {
            stored = JSON.parse(await readFile(this.filePath, 'utf8'));
        } catch (error) {
            if (!isMissingFile(error)) {
                logger.warn(`[UiState] ignoring unreadable ${this.filePath}: ${String(error)}`);
            }
        }
        const base = defaultUiState();
        this.state = stored !== null && typeof stored === 'object' && !Array.isArray(stored)
            ? sanitizeUiState({ ...base, ...stored })
            : base;
        return this.state;
    }

    snapshot(): UiState {
        return { ...this.state };
    }

    current(): UiStateFrame {
        return { ...this.state, server_time_utc: Date.now() / 1000 };
    }

    update(patch: UiStatePatch): Promise<UiStateFrame> {
        const run = this.tail.then(() => this.applyUpdate(patch));
        this.tail = run.catch(() => undefined);
        return run;
    }

    private async applyUpdate(patch: UiStatePatch): Promise<UiStateFrame> {
        const next = applyPatch(this.state, patch);
        await this.persist(next);
        this.state = next;

        const frame: UiStateFrame = {
            ...next,
            server_time_utc: Date.now() / 1000,
            client_id: next.updated_by,
        };
        this.updates.append(frame);
        return frame;
    }

    private async persist(state: UiState): Promise<void> {
        const tmpPath = `${this.filePath}.tmp`;
        try {
            await writeFile(tmpPath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
            await rename(tmpPath, this.filePath);
        } catch (error) {
            logger.error(`[UiState] failed to persist ${this.filePath}: ${String(error)}`);
        }
    }
}
