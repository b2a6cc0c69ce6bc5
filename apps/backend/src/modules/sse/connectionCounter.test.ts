import { ConnectionCounter } from './connectionCounter';

describe('ConnectionCounter', () => {
    it('counts open connections per kind', () => {
        const counter = new ConnectionCounter();
        const releaseStream = counter.acquire('stream');
        counter.acquire('nf');
        counter.acquire('nf');

        expect(counter.snapshot()).toEqual({
            stream: 1,
            nf: 2,
            bandpower: 0,
            artifact: 0,
            meta: 0,
            state: 0,
            total: 3,
        });

        releaseStream();
        expect(counter.snapshot().stream).toBe(0);
        expect(counter.snapshot().total).toBe(2);
    });

    it('ignores repeated releases', () => {
        const counter = new ConnectionCounter();
        const release = counter.acquire('meta');
        counter.acquire('meta');
        release();
        release();
        expect(counter.snapshot().meta).toBe(1);
    });
});
