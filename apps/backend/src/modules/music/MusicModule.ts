import type { Express } from 'express';
import type { ILogger, IModule, IModuleMetadata, IMusicLookupClient } from '@keepsake/types';
import type { AppConfig } from '../../config/env.js';
import { MusicLookupClient } from './services/music-lookup.client.js';
import { MusicController } from './api/music.controller.js';
import { createMusicRouter } from './music.routes.js';

export interface IMusicModuleDependencies {
    config: AppConfig;
    logger: ILogger;
    app: Express;

    /**
     * Client override, mainly for tests.
     */
    client?: IMusicLookupClient;
}

/**
 * Music module: read-only track search. Never touches page state.
 */
export class MusicModule implements IModule<IMusicModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'music',
        name: 'Music',
        version: '1.0.0',
        description: 'Track search for the page music player'
    };

    private state?: { app: Express; logger: ILogger; client: IMusicLookupClient; controller: MusicController };

    async init(dependencies: IMusicModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'music' });
        const client = dependencies.client ?? new MusicLookupClient(dependencies.config.music, logger);
        if (!client.isConfigured()) {
            logger.warn('Music credentials missing, search will return no results');
        }
        this.state = { app: dependencies.app, logger, client, controller: new MusicController(client) };
    }

    async run(): Promise<void> {
        const { app, logger, controller } = this.requireState();
        app.use('/api/music', createMusicRouter(controller));
        logger.info('Music router mounted at /api/music');
    }

    private requireState() {
        if (!this.state) {
            throw new Error('MusicModule not initialized - call init() first');
        }
        return this.state;
    }

    getClient(): IMusicLookupClient {
        return this.requireState().client;
    }
}
