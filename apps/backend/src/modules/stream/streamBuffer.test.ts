import { StreamBuffer, waitForAny } from './streamBuffer';

function fill(buffer: StreamBuffer<number>, count: number): void {
    for (let i = 1; i <= count; i += 1) {
        buffer.append(i * 10);
    }
}

describe('StreamBuffer', () => {
    it('rejects non-positive capacities', () => {
        expect(() => new StreamBuffer<number>(0)).toThrow(/maxlen/);
        expect(() => new StreamBuffer<number>(2.5)).toThrow(/maxlen/);
    });

    it('assigns strictly increasing sequence numbers starting at 1', () => {
        const buffer = new StreamBuffer<string>(4);
        expect(buffer.append('a')).toBe(1);
        expect(buffer.append('b')).toBe(2);
        expect(buffer.append('c')).toBe(3);
        expect(buffer.latestSeq()).toBe(3);
        expect(buffer.oldestSeq()).toBe(1);
    });

    it('returns the caller cursor unchanged for an empty buffer', () => {
        const buffer = new StreamBuffer<number>(4);
        expect(buffer.getSince(7, 10)).toEqual({ cursor: 7, frames: [], reset: false });
        expect(buffer.oldestSeq()).toBe(0);
        expect(buffer.stats()).toEqual({ oldest_seq: 0, latest_seq: 0, size: 0 });
    });

    it('keeps at most maxlen entries and evicts the oldest', () => {
        const buffer = new StreamBuffer<number>(3);
        fill(buffer, 5);
        expect(buffer.size()).toBe(3);
        expect(buffer.oldestSeq()).toBe(3);
        expect(buffer.latestSeq()).toBe(5);
        expect(buffer.snapshot()).toEqual([30, 40, 50]);
    });

    it('returns frames after the cursor, oldest first, honoring the limit', () => {
        const buffer = new StreamBuffer<number>(10);
        fill(buffer, 6);
        expect(buffer.getSince(0, 100)).toEqual({ cursor: 6, frames: [10, 20, 30, 40, 50, 60], reset: false });
        expect(buffer.getSince(2, 3)).toEqual({ cursor: 5, frames: [30, 40, 50], reset: false });
        expect(buffer.getSince(5, 3)).toEqual({ cursor: 6, frames: [60], reset: false });
    });

    it('is idempotent when nothing new was appended', () => {
        const buffer = new StreamBuffer<number>(10);
        fill(buffer, 3);
        const first = buffer.getSince(0, 100);
        expect(buffer.getSince(first.cursor, 100)).toEqual({ cursor: 3, frames: [], reset: false });
        expect(buffer.getSince(first.cursor, 100)).toEqual({ cursor: 3, frames: [], reset: false });
    });

    it('signals reset when the cursor fell behind the retained window', () => {
        const buffer = new StreamBuffer<number>(3);
        fill(buffer, 6);
        // retained seqs are 4..6
        expect(buffer.getSince(2, 10)).toEqual({ cursor: 6, frames: [40, 50, 60], reset: true });
        expect(buffer.getSince(3, 10)).toEqual({ cursor: 6, frames: [40, 50, 60], reset: false });
        expect(buffer.getSince(0, 10).reset).toBe(false);
    });

    it('delivers every frame exactly once when the consumer keeps up', () => {
        const buffer = new StreamBuffer<number>(5);
        const seen: number[] = [];
        let cursor = 0;
        for (let round = 0; round < 7; round += 1) {
            buffer.append(round * 2);
            buffer.append(round * 2 + 1);
            const batch = buffer.getSince(cursor, 3);
            expect(batch.reset).toBe(false);
            seen.push(...batch.frames);
            cursor = batch.cursor;
        }
        expect(seen).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
    });

    describe('waitForNew', () => {
        afterEach(() => {
            jest.useRealTimers();
        });

        it('resolves immediately when data past the cursor exists', async () => {
            const buffer = new StreamBuffer<number>(4);
            fill(buffer, 2);
            await expect(buffer.waitForNew(1, 1000)).resolves.toBe(2);
        });

        it('resolves as soon as a frame is appended', async () => {
            const buffer = new StreamBuffer<number>(4);
            const pending = buffer.waitForNew(0, 60_000);
            buffer.append(1);
            await expect(pending).resolves.toBe(1);
        });

        it('resolves with the unchanged seq on timeout', async () => {
            jest.useFakeTimers();
            const buffer = new StreamBuffer<number>(4);
            const pending = buffer.waitForNew(0, 500);
            jest.advanceTimersByTime(500);
            await expect(pending).resolves.toBe(0);
        });

        it('resolves when the abort signal fires', async () => {
            const buffer = new StreamBuffer<number>(4);
            const controller = new AbortController();
            const pending = buffer.waitForNew(0, 60_000, controller.signal);
            controller.abort();
            await expect(pending).resolves.toBe(0);
        });
    });

    describe('waitForAny', () => {
        it('returns true once any buffer advances', async () => {
            const first = new StreamBuffer<number>(4);
            const second = new StreamBuffer<string>(4);
            const pending = waitForAny([
                { buffer: first, cursor: 0 },
                { buffer: second, cursor: 0 },
            ], 60_000);
            second.append('x');
            await expect(pending).resolves.toBe(true);
        });

        it('returns false when nothing arrives before the timeout', async () => {
            const buffer = new StreamBuffer<number>(4);
            await expect(waitForAny([{ buffer, cursor: 0 }], 20)).resolves.toBe(false);
        });
    });
});
