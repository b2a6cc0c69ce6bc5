import { logger } from '../../utils/logger';

export type SseMessageOptions = {
    event?: string;
    id?: string | number;
};

export function formatSseMessage(payload: unknown, options: SseMessageOptions = {}): string {
    let message = '';
    if (options.id !== undefined) {
        message += `id: ${String(options.id).replace(/[\r\n]/g, '')}\n`;
    }
    const event = (options.event || '').replace(/[\r\n]/g, ' ').trim();
    if (event) {
        message += `event: ${event}\n`;
    }
    return `${message}data: ${JSON.stringify(payload)}\n\n`;
}

/** The slice of an HTTP response an event stream writes to. */
export interface SseSink {
    readonly writableEnded: boolean;
    writeHead(statusCode: number, headers: Record<string, string>): unknown;
    flushHeaders(): void;
    write(chunk: string): boolean;
    end(): unknown;
    on(event: 'close' | 'drain', listener: () => void): unknown;
    off(event: 'close' | 'drain', listener: () => void): unknown;
}

/**
 * One open EventSource response. Writes respect socket back-pressure and
 * report false once the client is gone; `signal` aborts on disconnect so
 * pending waits can wake up.
 */
export class SseConnection {
    private readonly controller = new AbortController();
    private lastWriteAt = Date.now();

    constructor(private readonly res: SseSink) {
        res.on('close', () => this.controller.abort());
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    get closed(): boolean {
        return this.controller.signal.aborted;
    }

    open(retryMs: number): Promise<boolean> {
        this.res.writeHead(200, {
            'Content-Type': 'text/event-stream; charset=utf-8',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive',
            'X-Accel-Buffering': 'no',
        });
        this.res.flushHeaders();
        return this.write(`retry: ${Math.max(0, Math.floor(retryMs))}\n\n`);
    }

    send(payload: unknown, options: SseMessageOptions = {}): Promise<boolean> {
        return this.write(formatSseMessage(payload, options));
    }

    keepalive(): Promise<boolean> {
        return this.write(': keepalive\n\n');
    }

    idleMs(): number {
        return Date.now() - this.lastWriteAt;
    }

    close(): void {
        if (!this.res.writableEnded) {
            this.res.end();
        }
        this.controller.abort();
    }

    private async write(chunk: string): Promise<boolean> {
        if (this.closed) {
            return false;
        }
        try {
            const flushed = this.res.write(chunk);
            this.lastWriteAt = Date.now();
            if (!flushed) {
                await this.drain();
            }
        } catch (error) {
            logger.debug(`[SSE] write failed: ${String(error)}`);
            this.controller.abort();
        }
        return !this.closed;
    }

    private drain(): Promise<void> {
        return new Promise((resolve) => {
            const done = (): void => {
                this.res.off('drain', done);
                this.controller.signal.removeEventListener('abort', done);
                resolve();
            };
            this.res.on('drain', done);
            this.controller.signal.addEventListener('abort', done, { once: true });
        });
    }
}
