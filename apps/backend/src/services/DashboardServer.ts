import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import { existsSync, statSync } from 'fs';
import helmet from 'helmet';
import { createServer, Server } from 'http';
import path from 'path';
import { randomBytes } from 'crypto';
import type { DashboardConfig, FrontendMode, ServerStats } from '@nf-live/shared';
import { UI_STATE_JSON } from '../config/constants';
import type { ServerConfig } from '../config/serverConfig';
import { ConnectionCounter } from '../modules/sse/connectionCounter';
import type { SnapshotSources } from '../modules/snapshot/snapshotBuilder';
import { createApiRouter } from '../routes/apiRoutes';
import type { DashboardContext } from '../routes/context';
import { createSseRouter } from '../routes/sseRoutes';
import { createStaticRouter } from '../routes/staticRoutes';
import { logger } from '../utils/logger';
import { LiveHub } from './LiveHub';
import { UiStateStore } from './UiStateStore';

export type ListenAddress = {
    host: string;
    port: number;
};

function resolveFrontendDir(configured: string | null): string | null {
    if (!configured || !existsSync(configured)) {
        return null;
    }
    return statSync(configured).isDirectory() ? configured : null;
}

function bodyParserErrorType(error: unknown): string | null {
    if (error && typeof error === 'object' && 'type' in error && typeof error.type === 'string') {
        return error.type;
    }
    return null;
}

/**
 * HTTP front of the live dashboard: JSON API, SSE streams, long-poll
 * snapshots and the optional static frontend, all over one LiveHub.
 */
export class DashboardServer implements DashboardContext {
    readonly instanceId = randomBytes(8).toString('hex');
    readonly hub: LiveHub;
    readonly uiState: UiStateStore;
    readonly connections = new ConnectionCounter();
    readonly frontendDir: string | null;
    readonly app: Express;

    private readonly httpServer: Server;
    private readonly startedAt = Date.now();
    private address: ListenAddress | null = null;

    constructor(readonly config: ServerConfig) {
        this.hub = new LiveHub(config.outdir, {
            historyRows: config.historyRows,
            metaIntervalMs: config.metaIntervalMs,
            tailPollMs: config.tailPollMs,
        });
        this.uiState = new UiStateStore(path.join(config.outdir, UI_STATE_JSON));
        this.frontendDir = resolveFrontendDir(config.frontendDir);
        this.app = this.createApp();
        this.httpServer = createServer(this.app);
    }

    get frontend(): FrontendMode {
        return this.frontendDir ? 'external' : 'none';
    }

    listenAddress(): ListenAddress | null {
        return this.address;
    }

    buildConfig(): DashboardConfig {
        return {
            schema_version: 2,
            api_version: 1,
            outdir: this.config.outdir,
            max_hz: this.config.maxHz,
            history_rows: this.config.historyRows,
            meta_interval_sec: this.config.metaIntervalMs / 1000,
            frontend: this.frontend,
            server_time_utc: Date.now() / 1000,
            server_instance_id: this.instanceId,
            supports: {
                ui_state: true,
                sse_stream: true,
                snapshot: true,
                run_meta: true,
                stats: true,
                asset_etag: true,
                last_event_id: true,
                health: true,
            },
        };
    }

    buildStats(): ServerStats {
        return {
            schema_version: 1,
            server_time_utc: Date.now() / 1000,
            server_instance_id: this.instanceId,
            uptime_sec: (Date.now() - this.startedAt) / 1000,
            frontend: this.frontend,
            connections: this.connections.snapshot(),
            buffers: {
                nf: this.hub.nf.stats(),
                bandpower: this.hub.bandpower.stats(),
                artifact: this.hub.artifact.stats(),
                meta: this.hub.meta.stats(),
                state: this.uiState.updates.stats(),
            },
        };
    }

    snapshotSources(): SnapshotSources {
        return {
            instanceId: this.instanceId,
            buffers: {
                nf: this.hub.nf,
                bandpower: this.hub.bandpower,
                artifact: this.hub.artifact,
                meta: this.hub.meta,
                state: this.uiState.updates,
            },
            config: () => this.buildConfig(),
            currentMeta: () => this.hub.latestMeta(),
            currentState: () => this.uiState.current(),
        };
    }

    async start(): Promise<ListenAddress> {
        if (this.address) {
            return this.address;
        }
        await this.uiState.load();
        this.hub.start();
        try {
            await new Promise<void>((resolve, reject) => {
                this.httpServer.once('error', reject);
                this.httpServer.listen(this.config.port, this.config.host, () => {
                    this.httpServer.off('error', reject);
                    resolve();
                });
            });
        } catch (error) {
            await this.hub.stop();
            throw error;
        }

        const bound = this.httpServer.address();
        if (!bound || typeof bound === 'string') {
            throw new Error(`[Server] unexpected listen address: ${String(bound)}`);
        }
        this.address = { host: this.config.host, port: bound.port };
        logger.info(`[Server] listening on http://${this.config.host}:${bound.port} (instance ${this.instanceId})`);
        return this.address;
    }

    async stop(): Promise<void> {
        if (this.httpServer.listening) {
            const closed = new Promise<void>((resolve, reject) => {
                this.httpServer.close((error) => (error ? reject(error) : resolve()));
            });
            this.httpServer.closeAllConnections();
            await closed;
        }
        await this.hub.stop();
        this.address = null;
        logger.info('[Server] stopped');
    }

    private createApp(): Express {
        const app = express();
        app.set('etag', false);
        app.use(helmet({ contentSecurityPolicy: false }));

        const origins = this.config.corsOrigins;
        if (origins.length > 0) {
            app.use(cors({
                origin: (requestOrigin, callback) => {
                    if (!requestOrigin || origins.includes(requestOrigin)) {
                        callback(null, true);
                    } else {
                        logger.debug(`[CORS] Blocked origin: ${requestOrigin}`);
                        callback(null, false);
                    }
                },
                methods: ['GET', 'PUT', 'POST'],
            }));
        }

        app.use('/api/sse', createSseRouter(this));
        app.use('/api', createApiRouter(this));
        app.use(createStaticRouter(this));

        app.use((_req: Request, res: Response) => {
            res.status(404).type('text/plain; charset=utf-8').send('Not found\n');
        });

        app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
            if (res.headersSent) {
                next(error);
                return;
            }
            const type = bodyParserErrorType(error);
            if (type === 'entity.too.large') {
                res.status(413).type('text/plain; charset=utf-8').send('Body too large\n');
                return;
            }
            if (type === 'entity.parse.failed' || type === 'encoding.unsupported' || type === 'charset.unsupported') {
                res.status(400).type('text/plain; charset=utf-8').send('Invalid JSON\n');
                return;
            }
            const trace = error instanceof Error ? error.stack || error.message : String(error);
            logger.error(`[Server] ${req.method} ${req.path} failed: ${trace}`);
            res.status(500).type('text/plain; charset=utf-8').send(`${trace}\n`);
        });

        return app;
    }
}
