import type { DashboardConfig, ServerStats } from '@nf-live/shared';
import type { ServerConfig } from '../config/serverConfig';
import type { ConnectionCounter } from '../modules/sse/connectionCounter';
import type { SnapshotSources } from '../modules/snapshot/snapshotBuilder';
import type { LiveHub } from '../services/LiveHub';
import type { UiStateStore } from '../services/UiStateStore';

/** What the route modules need from the running server. */
export interface DashboardContext {
    readonly config: ServerConfig;
    readonly instanceId: string;
    readonly hub: LiveHub;
    readonly uiState: UiStateStore;
    readonly connections: ConnectionCounter;
    readonly frontendDir: string | null;
    buildConfig(): DashboardConfig;
    buildStats(): ServerStats;
    snapshotSources(): SnapshotSources;
}
