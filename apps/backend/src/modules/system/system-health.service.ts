import type { IDatabaseService, IMusicLookupClient, IStorageProvider } from '@keepsake/types';

export type DependencyStatus = 'connected' | 'error' | 'disabled';

export interface HealthReport {
    /**
     * `ok` when every configured dependency answers, `degraded` otherwise.
     */
    status: 'ok' | 'degraded';
    timestamp: string;
    database: DependencyStatus;
    assetStore: DependencyStatus;
    music: DependencyStatus;
}

export interface SystemHealthDependencies {
    database: IDatabaseService;
    storage: IStorageProvider;
    music: IMusicLookupClient;
}

/**
 * Reachability of the document store and the two external collaborators.
 */
export class SystemHealthService {
    constructor(private readonly dependencies: SystemHealthDependencies) {}

    async report(now: Date = new Date()): Promise<HealthReport> {
        const { database, storage, music } = this.dependencies;

        const [databaseUp, storageUp, musicStatus] = await Promise.all([
            database.ping(),
            storage.checkHealth(),
            music.isConfigured()
                ? music.checkConnectivity().then((up): DependencyStatus => (up ? 'connected' : 'error'))
                : Promise.resolve<DependencyStatus>('disabled')
        ]);

        const report: HealthReport = {
            status: 'ok',
            timestamp: now.toISOString(),
            database: databaseUp ? 'connected' : 'error',
            assetStore: storageUp ? 'connected' : 'error',
            music: musicStatus
        };

        if (report.database === 'error' || report.assetStore === 'error' || report.music === 'error') {
            report.status = 'degraded';
        }
        return report;
    }
}
