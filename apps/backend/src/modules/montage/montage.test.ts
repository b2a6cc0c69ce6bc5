import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { logger } from '../../utils/logger';
import { normalizeChannelName } from './channelNames';
import { BUILTIN_MONTAGE, loadMontageCsv, resolveChannelPositions } from './montage';

describe('normalizeChannelName', () => {
    it('strips recording prefixes, reference suffixes and separators', () => {
        expect(normalizeChannelName('EEG Fp1-REF')).toBe('fp1');
        expect(normalizeChannelName('eeg_Cz')).toBe('cz');
        expect(normalizeChannelName('EEG-O2')).toBe('o2');
        expect(normalizeChannelName(' F C_z ')).toBe('fcz');
    });

    it('maps legacy 10-20 temporal names onto 10-10 names', () => {
        expect(normalizeChannelName('T3')).toBe('t7');
        expect(normalizeChannelName('T4')).toBe('t8');
        expect(normalizeChannelName('T5')).toBe('p7');
        expect(normalizeChannelName('T6')).toBe('p8');
    });

    it('returns an empty key for blank labels', () => {
        expect(normalizeChannelName('   ')).toBe('');
    });
});

describe('BUILTIN_MONTAGE', () => {
    it('covers the 61 standard sites', () => {
        expect(BUILTIN_MONTAGE.size).toBe(61);
        expect(BUILTIN_MONTAGE.get('cz')).toEqual([0, 0]);
        expect(BUILTIN_MONTAGE.get('t7')).toEqual([-1, 0]);
        expect(BUILTIN_MONTAGE.get('o2')).toEqual([0.5, -0.92]);
    });
});

describe('loadMontageCsv', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'montage-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('reads name,x,y rows and skips comments and malformed rows', async () => {
        const file = path.join(dir, 'montage.csv');
        await writeFile(file, '# custom cap\nEEG Cz,0.1,0.2\nbad,row\nPz,abc,1\nT3,-0.9,0.05\n');
        const montage = await loadMontageCsv(file);
        expect([...montage.entries()]).toEqual([
            ['cz', [0.1, 0.2]],
            ['t7', [-0.9, 0.05]],
        ]);
    });

    it('returns an empty map for a missing file without logging', async () => {
        const warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        const debug = jest.spyOn(logger, 'debug').mockImplementation(() => logger);
        try {
            await expect(loadMontageCsv(path.join(dir, 'missing.csv'))).resolves.toEqual(new Map());
            expect(warn).not.toHaveBeenCalled();
            expect(debug).not.toHaveBeenCalled();
        } finally {
            warn.mockRestore();
            debug.mockRestore();
        }
    });

    it('warns when the montage path cannot be read as a file', async () => {
        const warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        try {
            await expect(loadMontageCsv(dir)).resolves.toEqual(new Map());
            expect(warn).toHaveBeenCalledTimes(1);
        } finally {
            warn.mockRestore();
        }
    });
});

describe('resolveChannelPositions', () => {
    it('prefers custom positions, then built-in ones', () => {
        const custom = new Map<string, [number, number]>([['cz', [0.1, 0.2]]]);
        const result = resolveChannelPositions(['Cz', 'Pz'], custom);
        expect(result.positions).toEqual([[0.1, 0.2], [0, -0.75]]);
        expect(result.sources).toEqual(['custom', 'builtin']);
        expect(result.fallbackCount).toBe(0);
    });

    it('places unknown channels on a ring starting at the top', () => {
        const result = resolveChannelPositions(['X1', 'Cz', 'X2']);
        expect(result.sources).toEqual(['fallback', 'builtin', 'fallback']);
        expect(result.fallbackCount).toBe(2);
        const [first, , second] = result.positions;
        expect(first[0]).toBeCloseTo(0);
        expect(first[1]).toBeCloseTo(0.85);
        expect(second[0]).toBeCloseTo(0);
        expect(second[1]).toBeCloseTo(-0.85);
    });
});
