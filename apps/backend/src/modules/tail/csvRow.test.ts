import { parseCsvLine, stripLineEnding } from './csvRow';

describe('parseCsvLine', () => {
    it('splits plain cells', () => {
        expect(parseCsvLine('t_end_sec,metric,threshold')).toEqual(['t_end_sec', 'metric', 'threshold']);
    });

    it('keeps empty cells', () => {
        expect(parseCsvLine('1.0,,3,')).toEqual(['1.0', '', '3', '']);
    });

    it('returns no cells for an empty line', () => {
        expect(parseCsvLine('')).toEqual([]);
    });

    it('handles quoted commas and doubled quotes', () => {
        expect(parseCsvLine('"a,b",c,"say ""hi"""')).toEqual(['a,b', 'c', 'say "hi"']);
    });

    it('keeps quotes that appear mid-cell', () => {
        expect(parseCsvLine('ab"c,d')).toEqual(['ab"c', 'd']);
    });
});

describe('stripLineEnding', () => {
    it('drops a single trailing carriage return', () => {
        expect(stripLineEnding('1,2\r')).toBe('1,2');
        expect(stripLineEnding('1,2')).toBe('1,2');
    });
});
