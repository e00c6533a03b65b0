/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Orchestrates startup using a strict init/run separation pattern. All modules
 * complete their init() phase before any starts run(), ensuring predictable
 * startup and fail-fast behavior.
 *
 * @module index
 */

import http from 'node:http';
import type { Express } from 'express';
import type { MongoClient } from 'mongodb';
import type { IDatabaseService, ILogger } from '@keepsake/types';
import { loadConfig, reportMissingConfig, type AppConfig } from './config/env.js';
import { createLogger } from './lib/logger.js';
import { attachErrorHandling, createExpressApp } from './loaders/express.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { createApiRouter } from './api/routes/index.js';
import { DatabaseModule } from './modules/database/index.js';
import { PagesModule } from './modules/pages/index.js';
import { MusicModule } from './modules/music/index.js';
import { OverridesModule } from './modules/overrides/index.js';
import { SystemHealthController, SystemHealthService } from './modules/system/index.js';

/**
 * Everything the init phase produces for the run phase.
 */
interface BootstrapContext {
    config: AppConfig;
    logger: ILogger;
    app: Express;
    server: http.Server;
    client: MongoClient;
    coreDatabase: IDatabaseService;
    modules: {
        database: DatabaseModule;
        overrides: OverridesModule;
        pages: PagesModule;
        music: MusicModule;
    };
}

/**
 * Init Phase: load configuration, connect, create services.
 *
 * No routes are mounted here. If any init() fails, the application exits
 * before exposing partial state.
 *
 * @throws If configuration is invalid, the database is unreachable, or any module init() fails
 */
async function bootstrapInit(config: AppConfig, logger: ILogger): Promise<BootstrapContext> {
    reportMissingConfig(config, logger);

    const client = await connectDatabase(config, logger);
    const app = createExpressApp(config, logger);
    const server = http.createServer(app);

    // Database module first (others depend on it)
    const databaseModule = new DatabaseModule();
    await databaseModule.init({ logger, client });
    const coreDatabase = databaseModule.getDatabaseService();

    const sharedDeps = { database: coreDatabase, config, logger, app };

    // Overrides before pages: the pages router runs the override middleware first
    const overridesModule = new OverridesModule();
    await overridesModule.init(sharedDeps);

    const pagesModule = new PagesModule();
    await pagesModule.init({ ...sharedDeps, beforeView: [overridesModule.getViewMiddleware()] });

    const musicModule = new MusicModule();
    await musicModule.init({ config, logger, app });

    return {
        config,
        logger,
        app,
        server,
        client,
        coreDatabase,
        modules: {
            database: databaseModule,
            overrides: overridesModule,
            pages: pagesModule,
            music: musicModule
        }
    };
}

/**
 * Run Phase: mount routes.
 *
 * @param ctx - Bootstrap context from init phase containing all components
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    const { app, modules, coreDatabase, logger } = ctx;

    await modules.database.run();
    await modules.overrides.run();
    await modules.pages.run();
    await modules.music.run();

    const health = new SystemHealthService({
        database: coreDatabase,
        storage: modules.pages.getStorageProvider(),
        music: modules.music.getClient()
    });
    app.use('/api', createApiRouter(new SystemHealthController(health)));

    attachErrorHandling(app, logger);
    logger.info({}, 'All modules initialized');
}

/**
 * Main application entry point.
 *
 * Registers SIGINT/SIGTERM handlers for graceful shutdown.
 */
async function bootstrap(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger(config);

    try {
        const ctx = await bootstrapInit(config, logger);
        await bootstrapRun(ctx);

        ctx.server.listen(config.port, () => {
            logger.info({ port: config.port }, 'Server listening');
        });

        const shutdown = (signal: string) => {
            logger.info({ signal }, 'Shutting down');
            ctx.server.close(() => {
                disconnectDatabase(ctx.client)
                    .then(() => process.exit(0))
                    .catch(error => {
                        logger.error({ error }, 'Failed to close database connection');
                        process.exit(1);
                    });
            });
        };
        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();
