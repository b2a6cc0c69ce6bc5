import { parseBandpowerHeader } from './bandpowerHeader';

describe('parseBandpowerHeader', () => {
    it('discovers bands and channels in first-seen order', () => {
        const parsed = parseBandpowerHeader([
            't_end_sec', 'alpha_Pz', 'alpha_Cz', 'beta_Pz', 'beta_Cz',
        ]);
        expect(parsed).toEqual({
            timeIdx: 0,
            bands: ['alpha', 'beta'],
            channels: ['Pz', 'Cz'],
            colIndices: [1, 2, 3, 4],
        });
    });

    it('finds the time column by alias anywhere in the header', () => {
        const parsed = parseBandpowerHeader(['alpha_Fz', 'alpha_Cz', ' Time_Sec ']);
        expect(parsed?.timeIdx).toBe(2);
        expect(parsed?.channels).toEqual(['Fz', 'Cz']);
    });

    it('ignores z-score columns, blanks and names without a separator', () => {
        const parsed = parseBandpowerHeader(['time', 'alpha_Pz', 'alpha_Pz_Z', '', 'quality', 'theta_Pz']);
        expect(parsed).toEqual({
            timeIdx: 0,
            bands: ['alpha', 'theta'],
            channels: ['Pz'],
            colIndices: [1, 5],
        });
    });

    it('marks missing band/channel combinations with -1', () => {
        const parsed = parseBandpowerHeader(['t', 'alpha_Pz', 'alpha_Cz', 'beta_Cz']);
        expect(parsed?.colIndices).toEqual([1, 2, -1, 3]);
    });

    it('maps a repeated band/channel column to its last occurrence', () => {
        const parsed = parseBandpowerHeader(['t', 'alpha_Pz', 'alpha_Cz', 'alpha_Pz']);
        expect(parsed?.channels).toEqual(['Pz', 'Cz']);
        expect(parsed?.colIndices).toEqual([3, 2]);
    });

    it('splits at the first underscore only', () => {
        const parsed = parseBandpowerHeader(['t', 'alpha_EEG_Pz', 'alpha_EEG_Cz']);
        expect(parsed?.channels).toEqual(['EEG_Pz', 'EEG_Cz']);
    });

    it('returns null for short or unrecognized headers', () => {
        expect(parseBandpowerHeader(['t', 'alpha_Pz'])).toBeNull();
        expect(parseBandpowerHeader(['t', 'metric', 'threshold'])).toBeNull();
    });
});
