import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { MetaSnapshotBuilder, metaFingerprint } from './metaSnapshot';

describe('MetaSnapshotBuilder', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'meta-snapshot-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('describes an empty output directory', async () => {
        const snapshot = await new MetaSnapshotBuilder(dir).build();
        expect(snapshot.schema_version).toBe(2);
        expect(snapshot.outdir).toBe(dir);
        expect(snapshot.files.nf_feedback).toBe(path.join(dir, 'nf_feedback.csv'));
        expect(snapshot.files_stat.nf_feedback).toEqual({ exists: false });
        expect(snapshot.bandpower).toBeNull();
        expect(snapshot.run_meta.summary).toBeNull();
    });

    it('includes the bandpower layout with electrode positions', async () => {
        await writeFile(path.join(dir, 'bandpower_timeseries.csv'), 't_end_sec,alpha_Cz,alpha_Mystery,beta_Cz\n');
        await writeFile(path.join(dir, 'nf_feedback.csv'), 't_end_sec,metric\n1,2\n');

        const snapshot = await new MetaSnapshotBuilder(dir).build();
        expect(snapshot.files_stat.nf_feedback.exists).toBe(true);
        expect(snapshot.files_stat.nf_feedback.size_bytes).toBe(21);
        expect(snapshot.bandpower).toEqual({
            bands: ['alpha', 'beta'],
            channels: ['Cz', 'Mystery'],
            positions: [[0, 0], [expect.closeTo(0, 10), 0.85]],
            positions_source: ['builtin', 'fallback'],
            fallback_positions_count: 1,
            montage_csv: null,
            time_col: 't_end_sec',
        });
    });

    it('uses montage.csv overrides when present', async () => {
        await writeFile(path.join(dir, 'bandpower_timeseries.csv'), 't,alpha_Cz,alpha_Pz\n');
        await writeFile(path.join(dir, 'montage.csv'), 'name,x,y\nCz,0.2,0.3\n');

        const snapshot = await new MetaSnapshotBuilder(dir).build();
        expect(snapshot.bandpower?.positions_source).toEqual(['custom', 'builtin']);
        expect(snapshot.bandpower?.positions[0]).toEqual([0.2, 0.3]);
        expect(snapshot.bandpower?.montage_csv).toBe(path.join(dir, 'montage.csv'));
    });
});

describe('metaFingerprint', () => {
    it('ignores the server clock', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'meta-fingerprint-'));
        try {
            const builder = new MetaSnapshotBuilder(dir);
            const first = await builder.build();
            const second = { ...first, server_time_utc: first.server_time_utc + 5 };
            expect(metaFingerprint(second)).toBe(metaFingerprint(first));
            expect(metaFingerprint({ ...first, outdir: '/elsewhere' })).not.toBe(metaFingerprint(first));
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});
