import { EventEmitter } from 'events';

/** In-memory stand-in for an HTTP response carrying an event stream. */
export class FakeSseResponse extends EventEmitter {
    readonly chunks: string[] = [];
    writableEnded = false;
    status = 0;
    headers: Record<string, string> = {};
    backpressure = false;

    writeHead(statusCode: number, headers: Record<string, string>): this {
        this.status = statusCode;
        this.headers = headers;
        return this;
    }

    flushHeaders(): void {}

    write(chunk: string): boolean {
        this.chunks.push(chunk);
        return !this.backpressure;
    }

    end(): this {
        this.writableEnded = true;
        this.emit('close');
        return this;
    }

    text(): string {
        return this.chunks.join('');
    }
}
