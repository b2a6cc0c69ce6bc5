import path from 'path';
import type { BandpowerMeta, MetaSnapshot, WatchedFileName } from '@nf-live/shared';
import {
    ARTIFACT_CSV,
    BANDPOWER_CSV,
    FEEDBACK_CSV,
    MONTAGE_CSV,
    RUN_META_JSON,
} from '../../config/constants';
import { statFile } from '../../utils/fileStat';
import { parseBandpowerHeader } from '../bandpower/bandpowerHeader';
import { loadMontageCsv, resolveChannelPositions } from '../montage/montage';
import { readCsvHeader } from '../tail/csvHeader';
import { RunMetaSummaryCache } from './runMetaSummary';

export class MetaSnapshotBuilder {
    private readonly files: Record<WatchedFileName, string>;
    private readonly runMeta: RunMetaSummaryCache;

    constructor(private readonly outdir: string) {
        this.files = {
            nf_feedback: path.join(outdir, FEEDBACK_CSV),
            bandpower_timeseries: path.join(outdir, BANDPOWER_CSV),
            artifact_gate_timeseries: path.join(outdir, ARTIFACT_CSV),
            nf_run_meta: path.join(outdir, RUN_META_JSON),
        };
        this.runMeta = new RunMetaSummaryCache(this.files.nf_run_meta);
    }

    runMetaPath(): string {
        return this.files.nf_run_meta;
    }

    async build(): Promise<MetaSnapshot> {
        const [feedbackStat, bandpowerStat, artifactStat, runMetaStat, runMeta, bandpower] = await Promise.all([
            statFile(this.files.nf_feedback),
            statFile(this.files.bandpower_timeseries),
            statFile(this.files.artifact_gate_timeseries),
            statFile(this.files.nf_run_meta),
            this.runMeta.info(),
            this.bandpowerMeta(),
        ]);

        return {
            schema_version: 2,
            outdir: this.outdir,
            server_time_utc: Date.now() / 1000,
            files: { ...this.files },
            files_stat: {
                nf_feedback: feedbackStat,
                bandpower_timeseries: bandpowerStat,
                artifact_gate_timeseries: artifactStat,
                nf_run_meta: runMetaStat,
            },
            run_meta: runMeta,
            bandpower,
        };
    }

    private async bandpowerMeta(): Promise<BandpowerMeta | null> {
        const header = await readCsvHeader(this.files.bandpower_timeseries);
        const layout = header ? parseBandpowerHeader(header) : null;
        if (!header || !layout) {
            return null;
        }

        const montagePath = path.join(this.outdir, MONTAGE_CSV);
        const custom = await loadMontageCsv(montagePath);
        const placed = resolveChannelPositions(layout.channels, custom);
        return {
            bands: layout.bands,
            channels: layout.channels,
            positions: placed.positions,
            positions_source: placed.sources,
            fallback_positions_count: placed.fallbackCount,
            montage_csv: custom.size > 0 ? montagePath : null,
            time_col: header[layout.timeIdx] ?? 'time',
        };
    }
}

/** Serialization used to de-duplicate consecutive snapshots; ignores the wall clock. */
export function metaFingerprint(snapshot: MetaSnapshot): string {
    const { server_time_utc: _ignored, ...rest } = snapshot;
    return JSON.stringify(rest);
}
