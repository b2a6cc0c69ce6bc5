import path from 'path';
import type { ArtifactFrame, BandpowerFrame, FeedbackFrame, MetaSnapshot } from '@nf-live/shared';
import {
    ARTIFACT_CSV,
    BANDPOWER_CSV,
    BANDPOWER_HEADER_RETRY_MS,
    FEEDBACK_CSV,
    LOOP_RETRY_DELAY_MS,
    META_BUFFER_MAXLEN,
    artifactBufferMaxlen,
    feedbackBufferMaxlen,
} from '../config/constants';
import { parseBandpowerHeader } from '../modules/bandpower/bandpowerHeader';
import {
    createArtifactMapper,
    createBandpowerMapper,
    createFeedbackMapper,
} from '../modules/frames/frameMappers';
import type { RowMapper } from '../modules/frames/frameMappers';
import { MetaSnapshotBuilder, metaFingerprint } from '../modules/meta/metaSnapshot';
import { scheduleNonOverlappingTask } from '../modules/runtime/scheduler';
import type { ScheduledTaskStop } from '../modules/runtime/scheduler';
import { sleep } from '../modules/runtime/sleep';
import { StreamBuffer } from '../modules/stream/streamBuffer';
import { CsvTailer } from '../modules/tail/csvTailer';
import { logger } from '../utils/logger';

export interface LiveHubOptions {
    historyRows: number;
    metaIntervalMs: number;
    tailPollMs: number;
}

type TailedFile<T> = {
    name: string;
    filePath: string;
    buffer: StreamBuffer<T>;
    /** Null while the header cannot be mapped yet. */
    mapperFor: (header: string[]) => RowMapper<T> | null;
};

/**
 * Tails the acquisition output directory and republishes it as frames.
 *
 * One loop per CSV file plus a periodic metadata refresh. The buffers are
 * owned here; the HTTP layer only reads from them.
 */
export class LiveHub {
    readonly nf: StreamBuffer<FeedbackFrame>;
    readonly bandpower: StreamBuffer<BandpowerFrame>;
    readonly artifact: StreamBuffer<ArtifactFrame>;
    readonly meta: StreamBuffer<MetaSnapshot>;

    private readonly metaBuilder: MetaSnapshotBuilder;
    private controller: AbortController | null = null;
    private loops: Promise<void>[] = [];
    private stopMetaSchedule: ScheduledTaskStop | null = null;
    private pendingMeta: Promise<MetaSnapshot> | null = null;
    private lastMeta: MetaSnapshot | null = null;
    private lastFingerprint: string | null = null;

    constructor(readonly outdir: string, private readonly options: LiveHubOptions) {
        this.nf = new StreamBuffer<FeedbackFrame>(feedbackBufferMaxlen(options.historyRows));
        this.bandpower = new StreamBuffer<BandpowerFrame>(feedbackBufferMaxlen(options.historyRows));
        this.artifact = new StreamBuffer<ArtifactFrame>(artifactBufferMaxlen(options.historyRows));
        this.meta = new StreamBuffer<MetaSnapshot>(META_BUFFER_MAXLEN);
        this.metaBuilder = new MetaSnapshotBuilder(outdir);
    }

    get running(): boolean {
        return this.controller !== null;
    }

    runMetaPath(): string {
        return this.metaBuilder.runMetaPath();
    }

    start(): void {
        if (this.controller) {
            return;
        }
        const controller = new AbortController();
        this.controller = controller;

        this.loops = [
            this.runTailLoop({
                name: 'nf',
                filePath: path.join(this.outdir, FEEDBACK_CSV),
                buffer: this.nf,
                mapperFor: createFeedbackMapper,
            }, controller.signal),
            this.runTailLoop({
                name: 'artifact',
                filePath: path.join(this.outdir, ARTIFACT_CSV),
                buffer: this.artifact,
                mapperFor: createArtifactMapper,
            }, controller.signal),
            this.runTailLoop({
                name: 'bandpower',
                filePath: path.join(this.outdir, BANDPOWER_CSV),
                buffer: this.bandpower,
                mapperFor: (header) => {
                    const layout = parseBandpowerHeader(header);
                    return layout ? createBandpowerMapper(layout) : null;
                },
            }, controller.signal),
        ];
        this.stopMetaSchedule = scheduleNonOverlappingTask('LiveHubMeta', this.options.metaIntervalMs, async () => {
            await this.refreshMeta();
        }, { runImmediately: true });
        logger.info(`[LiveHub] watching ${this.outdir} (history_rows=${this.options.historyRows})`);
    }

    async stop(): Promise<void> {
        const controller = this.controller;
        if (!controller) {
            return;
        }
        this.controller = null;
        this.stopMetaSchedule?.();
        this.stopMetaSchedule = null;
        controller.abort();
        await Promise.allSettled([...this.loops, this.pendingMeta]);
        this.loops = [];
        logger.info('[LiveHub] stopped');
    }

    /** Last published snapshot; computed on demand before the first refresh lands. */
    async latestMeta(): Promise<MetaSnapshot> {
        return this.lastMeta ?? this.refreshMeta();
    }

    /** Rebuilds the snapshot and publishes it when anything besides the clock changed. */
    refreshMeta(): Promise<MetaSnapshot> {
        if (!this.pendingMeta) {
            this.pendingMeta = this.computeMeta().finally(() => {
                this.pendingMeta = null;
            });
        }
        return this.pendingMeta;
    }

    private async computeMeta(): Promise<MetaSnapshot> {
        const snapshot = await this.metaBuilder.build();
        const fingerprint = metaFingerprint(snapshot);
        this.lastMeta = snapshot;
        if (fingerprint !== this.lastFingerprint) {
            this.lastFingerprint = fingerprint;
            this.meta.append(snapshot);
        }
        return snapshot;
    }

    private async runTailLoop<T>(source: TailedFile<T>, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            const tailer = new CsvTailer(source.filePath, {
                maxInitialRows: this.options.historyRows,
                pollMs: this.options.tailPollMs,
            });
            try {
                const initialRows = await tailer.readInitialRows(signal);
                if (signal.aborted) {
                    break;
                }
                let header = tailer.header();
                let mapper = header ? source.mapperFor(header) : null;
                if (!mapper) {
                    logger.debug(`[LiveHub] ${source.name} header not ready yet`);
                    await sleep(BANDPOWER_HEADER_RETRY_MS, signal);
                    continue;
                }
                for (const row of initialRows) {
                    this.publish(source.buffer, mapper, row);
                }
                logger.debug(`[LiveHub] ${source.name} replayed ${initialRows.length} rows`);

                for await (const row of tailer.iterNewRows(signal)) {
                    const current = tailer.header();
                    if (current !== header) {
                        header = current;
                        mapper = current ? source.mapperFor(current) : null;
                        if (!mapper) {
                            break;
                        }
                        logger.info(`[LiveHub] ${source.name} header changed; columns remapped`);
                    }
                    this.publish(source.buffer, mapper, row);
                }
            } catch (error) {
                logger.warn(`[LiveHub] ${source.name} loop error, restarting: ${String(error)}`);
                await sleep(LOOP_RETRY_DELAY_MS, signal);
            } finally {
                await tailer.close();
            }
        }
    }

    private publish<T>(buffer: StreamBuffer<T>, mapper: RowMapper<T>, row: string[]): void {
        const frame = mapper(row);
        if (frame !== null) {
            buffer.append(frame);
        }
    }
}
