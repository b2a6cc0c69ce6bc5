import type { ConnectionKind } from '@nf-live/shared';

const KINDS: readonly ConnectionKind[] = ['stream', 'nf', 'bandpower', 'artifact', 'meta', 'state'];

export type ConnectionCounts = Record<ConnectionKind, number> & { total: number };

/** Live SSE connections per endpoint, reported by `/api/stats`. */
export class ConnectionCounter {
    private readonly counts = new Map<ConnectionKind, number>();

    /** Registers a connection; the returned release is idempotent. */
    acquire(kind: ConnectionKind): () => void {
        this.counts.set(kind, (this.counts.get(kind) || 0) + 1);
        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            this.counts.set(kind, Math.max(0, (this.counts.get(kind) || 0) - 1));
        };
    }

    snapshot(): ConnectionCounts {
        const out: ConnectionCounts = {
            stream: 0,
            nf: 0,
            bandpower: 0,
            artifact: 0,
            meta: 0,
            state: 0,
            total: 0,
        };
        for (const kind of KINDS) {
            const count = this.counts.get(kind) || 0;
            out[kind] = count;
            out.total += count;
        }
        return out;
    }
}
