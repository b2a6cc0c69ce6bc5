import path from 'path';
import { isLoopbackHost, loadServerConfig } from './serverConfig';

describe('loadServerConfig', () => {
    it('applies defaults', () => {
        const config = loadServerConfig({ RT_OUTDIR: '/tmp/nf-out', RT_TOKEN: 'test-secret' });
        expect(config).toEqual({
            outdir: path.resolve('/tmp/nf-out'),
            host: '127.0.0.1',
            port: 0,
            allowRemote: false,
            token: 'test-secret',
            maxHz: 15,
            historyRows: 1200,
            metaIntervalMs: 1000,
            keepaliveMs: 2000,
            snapshotMaxWaitMs: 10_000,
            tailPollMs: 50,
            frontendDir: null,
            corsOrigins: [],
        });
    });

    it('clamps numeric values and parses origin lists', () => {
        const config = loadServerConfig({
            RT_OUTDIR: '/tmp/nf-out',
            RT_MAX_HZ: '500',
            RT_HISTORY_ROWS: '2.9e1',
            RT_CORS_ORIGINS: ' http://localhost:5173 , ,http://127.0.0.1:5173',
        });
        expect(config.maxHz).toBe(60);
        expect(config.historyRows).toBe(29);
        expect(config.corsOrigins).toEqual(['http://localhost:5173', 'http://127.0.0.1:5173']);
    });

    it('generates a url-safe token when none is configured', () => {
        const first = loadServerConfig({ RT_OUTDIR: '/tmp/nf-out' }).token;
        const second = loadServerConfig({ RT_OUTDIR: '/tmp/nf-out', RT_TOKEN: '  ' }).token;
        expect(first).toMatch(/^[A-Za-z0-9_-]{24}$/);
        expect(second).toMatch(/^[A-Za-z0-9_-]{24}$/);
        expect(first).not.toBe(second);
    });
});

describe('isLoopbackHost', () => {
    it('recognizes loopback names and addresses', () => {
        expect(isLoopbackHost('127.0.0.1')).toBe(true);
        expect(isLoopbackHost('127.1.2.3')).toBe(true);
        expect(isLoopbackHost('::ffff:127.0.0.1')).toBe(true);
        expect(isLoopbackHost('LOCALHOST')).toBe(true);
        expect(isLoopbackHost('::1')).toBe(true);
        expect(isLoopbackHost('0.0.0.0')).toBe(false);
        expect(isLoopbackHost('192.168.1.20')).toBe(false);
    });
});
