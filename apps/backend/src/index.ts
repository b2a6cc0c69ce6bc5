import 'dotenv/config';
import { stat } from 'fs/promises';
import os from 'os';
import { isLoopbackHost, loadServerConfig } from './config/serverConfig';
import { validateStartupConfigOrThrow } from './config/startupValidation';
import { DashboardServer, ListenAddress } from './services/DashboardServer';
import { logger } from './utils/logger';

function lanAddress(): string | null {
    for (const entries of Object.values(os.networkInterfaces())) {
        for (const entry of entries || []) {
            if (entry.family === 'IPv4' && !entry.internal) {
                return entry.address;
            }
        }
    }
    return null;
}

export function dashboardUrls(address: ListenAddress, token: string): string[] {
    const hosts = ['0.0.0.0', '::', ''].includes(address.host)
        ? ['127.0.0.1', lanAddress()]
        : [address.host];
    const query = `?token=${encodeURIComponent(token)}`;
    return hosts
        .filter((host): host is string => typeof host === 'string')
        .map((host) => (host.includes(':') ? `[${host}]` : host))
        .flatMap((host) => [
            `http://${host}:${address.port}/${query}`,
            `http://${host}:${address.port}/kiosk${query}`,
        ]);
}

async function bootstrap(): Promise<void> {
    validateStartupConfigOrThrow();
    const config = loadServerConfig();

    const outdir = await stat(config.outdir).catch(() => null);
    if (!outdir || !outdir.isDirectory()) {
        throw new Error(`RT_OUTDIR does not exist or is not a directory: ${config.outdir}`);
    }

    const server = new DashboardServer(config);
    const address = await server.start();
    logger.info(`[Bootstrap] watching ${config.outdir} (frontend=${server.frontend})`);
    if (!isLoopbackHost(config.host)) {
        logger.warn('[Bootstrap] remote access enabled; anyone with the token can read the session');
    }
    for (const url of dashboardUrls(address, config.token)) {
        logger.info(`[Bootstrap] dashboard: ${url}`);
    }

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals): void => {
        if (stopping) {
            return;
        }
        stopping = true;
        logger.info(`[Bootstrap] ${signal} received, shutting down`);
        server.stop()
            .then(() => process.exit(0))
            .catch((error) => {
                logger.error(`[Bootstrap] shutdown failed: ${String(error)}`);
                process.exit(1);
            });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

if (require.main === module) {
    bootstrap().catch((error) => {
        logger.error(`Failed to bootstrap dashboard server: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    });
}
