export interface SinceResult<T> {
    cursor: number;
    frames: T[];
    reset: boolean;
}

export interface BufferStats {
    oldest_seq: number;
    latest_seq: number;
    size: number;
}

type Waiter = {
    lastSeq: number;
    resolve: (seq: number) => void;
};

/**
 * Bounded, sequence-numbered ring of frames.
 *
 * Sequence numbers start at 1 and are contiguous across the retained window,
 * so the entry for `seq` always sits at `seq - oldestSeq()` positions past the
 * head. Readers hold a cursor (the last seq they have seen) and call
 * `getSince`; push consumers park on `waitForNew` until `append` wakes them.
 * All calls run on the event loop, so a read never observes a half-applied
 * append.
 */
export class StreamBuffer<T> {
    private readonly slots: (T | undefined)[];
    private head = 0;
    private count = 0;
    private seq = 0;
    private readonly waiters = new Set<Waiter>();

    constructor(readonly maxlen: number) {
        if (!Number.isInteger(maxlen) || maxlen <= 0) {
            throw new Error(`StreamBuffer maxlen must be a positive integer (got ${maxlen})`);
        }
        this.slots = new Array<T | undefined>(maxlen);
    }

    append(frame: T): number {
        this.seq += 1;
        const tail = (this.head + this.count) % this.maxlen;
        this.slots[tail] = frame;
        if (this.count < this.maxlen) {
            this.count += 1;
        } else {
            this.head = (this.head + 1) % this.maxlen;
        }
        this.wake();
        return this.seq;
    }

    latestSeq(): number {
        return this.seq;
    }

    oldestSeq(): number {
        return this.count === 0 ? 0 : this.seq - this.count + 1;
    }

    size(): number {
        return this.count;
    }

    stats(): BufferStats {
        return {
            oldest_seq: this.oldestSeq(),
            latest_seq: this.latestSeq(),
            size: this.count,
        };
    }

    /** Oldest-first copy of every retained frame. */
    snapshot(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.count; i += 1) {
            out.push(this.at(i));
        }
        return out;
    }

    getSince(lastSeq: number, limit: number): SinceResult<T> {
        if (this.count === 0) {
            return { cursor: lastSeq, frames: [], reset: false };
        }
        const oldest = this.oldestSeq();
        const reset = lastSeq !== 0 && lastSeq < oldest - 1;
        const firstSeq = Math.max(oldest, Math.floor(lastSeq) + 1);
        if (firstSeq > this.seq) {
            return { cursor: lastSeq, frames: [], reset };
        }
        const take = Math.min(Math.max(1, Math.floor(limit)), this.seq - firstSeq + 1);
        const frames: T[] = [];
        const offset = firstSeq - oldest;
        for (let i = 0; i < take; i += 1) {
            frames.push(this.at(offset + i));
        }
        return { cursor: firstSeq + take - 1, frames, reset };
    }

    /**
     * Resolves with the latest seq once it exceeds `lastSeq`, when `timeoutMs`
     * elapses, or when `signal` aborts, whichever comes first.
     */
    waitForNew(lastSeq: number, timeoutMs: number, signal?: AbortSignal): Promise<number> {
        if (this.seq > lastSeq || signal?.aborted || timeoutMs <= 0) {
            return Promise.resolve(this.seq);
        }
        return new Promise<number>((resolve) => {
            let timer: NodeJS.Timeout | null = null;
            const finish = (): void => {
                if (timer) {
                    clearTimeout(timer);
                    timer = null;
                }
                this.waiters.delete(waiter);
                signal?.removeEventListener('abort', finish);
                resolve(this.seq);
            };
            const waiter: Waiter = { lastSeq, resolve: finish };
            this.waiters.add(waiter);
            timer = setTimeout(finish, timeoutMs);
            signal?.addEventListener('abort', finish, { once: true });
        });
    }

    private at(index: number): T {
        const value = this.slots[(this.head + index) % this.maxlen];
        if (value === undefined) {
            throw new Error(`StreamBuffer slot ${index} is empty`);
        }
        return value;
    }

    private wake(): void {
        for (const waiter of [...this.waiters]) {
            if (this.seq > waiter.lastSeq) {
                waiter.resolve(this.seq);
            }
        }
    }
}

export type CursorWait = {
    buffer: StreamBuffer<unknown>;
    cursor: number;
};

/**
 * Waits until any of the buffers moves past its cursor. Pending waits on the
 * other buffers are released as soon as one resolves.
 */
export async function waitForAny(waits: CursorWait[], timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (waits.some((wait) => wait.buffer.latestSeq() > wait.cursor)) {
        return true;
    }
    if (waits.length === 0 || timeoutMs <= 0 || signal?.aborted) {
        return false;
    }
    const controller = new AbortController();
    const relay = (): void => controller.abort();
    signal?.addEventListener('abort', relay, { once: true });
    try {
        await Promise.race(
            waits.map((wait) => wait.buffer.waitForNew(wait.cursor, timeoutMs, controller.signal)),
        );
    } finally {
        controller.abort();
        signal?.removeEventListener('abort', relay);
    }
    return waits.some((wait) => wait.buffer.latestSeq() > wait.cursor);
}
