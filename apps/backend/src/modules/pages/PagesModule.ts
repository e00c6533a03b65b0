/**
 * Pages module implementation.
 *
 * Provides tenant pages: signup, public view, per-page admin session and the
 * edit reconciliation with photo uploads to the asset store. The module follows
 * the two-phase initialization pattern with dependency injection.
 */

import express from 'express';
import type { Express, RequestHandler } from 'express';
import fs from 'fs/promises';
import path from 'path';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata, IStorageProvider } from '@keepsake/types';
import type { AppConfig } from '../../config/env.js';
import { requireAdmin } from '../../api/middleware/admin-auth.js';
import { PageRepository } from './services/page.repository.js';
import { PageReconciler } from './services/page-reconciler.service.js';
import { AccessGate } from './services/access-gate.service.js';
import { LocalStorageProvider } from './services/storage/LocalStorageProvider.js';
import { RemoteAssetStoreProvider } from './services/storage/RemoteAssetStoreProvider.js';
import { PagesController } from './api/pages.controller.js';
import { createAdminPagesRouter, createPagesRouter } from './pages.routes.js';

/**
 * Pages module dependencies for initialization.
 */
export interface IPagesModuleDependencies {
    database: IDatabaseService;
    config: AppConfig;
    logger: ILogger;

    /**
     * Express application instance for mounting routers.
     * The module attaches its own routers using IoC pattern.
     */
    app: Express;

    /**
     * Handlers run before the public page view, such as the slug override router.
     */
    beforeView?: RequestHandler[];

    /**
     * Storage provider override. By default the remote asset store is used when
     * configured, local disk otherwise.
     */
    storageProvider?: IStorageProvider;
}

/**
 * Pages module.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Selects the storage provider from configuration
 * - Creates repository, reconciler, access gate and controller
 * - Ensures collection indexes
 *
 * ### run() phase:
 * - Mounts the public router at /api/pages
 * - Mounts the admin-token router at /api/admin/pages
 * - Serves /uploads when files are stored on local disk
 *
 * @example
 * ```typescript
 * const pagesModule = new PagesModule();
 * await pagesModule.init({ database, config, logger, app, beforeView: [overrideMiddleware] });
 * await pagesModule.run();
 * ```
 */
export class PagesModule implements IModule<IPagesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'pages',
        name: 'Pages',
        version: '1.0.0',
        description: 'Tenant pages with galleries, music and timelines'
    };

    private state?: {
        dependencies: IPagesModuleDependencies;
        logger: ILogger;
        storageProvider: IStorageProvider;
        localUploadDir?: string;
        gate: AccessGate;
        controller: PagesController;
    };

    async init(dependencies: IPagesModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'pages' });
        logger.info('Initializing pages module...');

        const { config } = dependencies;
        let localUploadDir: string | undefined;
        let storageProvider = dependencies.storageProvider;

        if (!storageProvider) {
            if (config.assetStore.url) {
                storageProvider = new RemoteAssetStoreProvider(
                    { url: config.assetStore.url, token: config.assetStore.token, publicUrl: config.assetStore.publicUrl },
                    logger.child({ component: 'asset-store' })
                );
            } else {
                localUploadDir = path.resolve(process.cwd(), config.assetStore.localDirectory);
                await this.ensureUploadsDirectoryExists(localUploadDir, logger);
                storageProvider = new LocalStorageProvider(localUploadDir);
                logger.warn({ localUploadDir }, 'Asset store not configured, storing uploads on local disk');
            }
        }

        const repository = new PageRepository(dependencies.database, logger);
        await repository.ensureIndexes();

        const reconciler = new PageReconciler(repository, storageProvider, logger, {
            maxUploadBytes: config.maxUploadBytes
        });
        const gate = new AccessGate(repository, config, logger);
        const controller = new PagesController(repository, reconciler, gate, logger);

        this.state = { dependencies, logger, storageProvider, localUploadDir, gate, controller };
        logger.info('Pages module initialized');
    }

    /**
     * Create the uploads directory before static middleware serves from it.
     *
     * @throws {Error} If directory creation fails due to permissions or disk issues
     */
    private async ensureUploadsDirectoryExists(uploadsDir: string, logger: ILogger): Promise<void> {
        try {
            await fs.mkdir(uploadsDir, { recursive: true });
        } catch (error) {
            logger.error({ error, uploadsDir }, 'Failed to create uploads directory');
            throw new Error(
                `Failed to create uploads directory: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }

    async run(): Promise<void> {
        const { dependencies, logger, localUploadDir, gate, controller } = this.requireState();
        const { app, config } = dependencies;

        if (localUploadDir) {
            app.use('/uploads', express.static(localUploadDir));
        }

        app.use('/api/pages', createPagesRouter(controller, gate, dependencies.beforeView ?? []));
        logger.info('Pages router mounted at /api/pages');

        app.use('/api/admin/pages', requireAdmin(config.adminTokens), createAdminPagesRouter(controller));
        logger.info('Admin pages router mounted at /api/admin/pages');
    }

    private requireState() {
        if (!this.state) {
            throw new Error('PagesModule not initialized - call init() first');
        }
        return this.state;
    }

    /**
     * Storage provider in use, for health reporting.
     *
     * @throws {Error} If called before init() completes
     */
    getStorageProvider(): IStorageProvider {
        return this.requireState().storageProvider;
    }
}
