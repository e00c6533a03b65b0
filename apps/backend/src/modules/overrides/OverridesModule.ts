import type { Express, RequestHandler } from 'express';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata } from '@keepsake/types';
import type { AppConfig } from '../../config/env.js';
import { requireAdmin } from '../../api/middleware/admin-auth.js';
import { SlugOverrideService } from './services/slug-override.service.js';
import { createSlugOverrideMiddleware } from './api/slug-override.middleware.js';
import { OverridesController } from './api/overrides.controller.js';
import { createOverridesRouter } from './overrides.routes.js';

export interface IOverridesModuleDependencies {
    database: IDatabaseService;
    config: AppConfig;
    logger: ILogger;
    app: Express;
}

/**
 * Slug overrides module.
 *
 * Its middleware is handed to the pages module during bootstrap, so the
 * override decision runs before page resolution without the pages module
 * knowing about overrides.
 */
export class OverridesModule implements IModule<IOverridesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'overrides',
        name: 'Slug overrides',
        version: '1.0.0',
        description: 'Redirects and notices decided before page resolution'
    };

    private state?: {
        dependencies: IOverridesModuleDependencies;
        logger: ILogger;
        middleware: RequestHandler;
        controller: OverridesController;
    };

    async init(dependencies: IOverridesModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'overrides' });
        const service = new SlugOverrideService(dependencies.database, logger);
        this.state = {
            dependencies,
            logger,
            middleware: createSlugOverrideMiddleware(service, logger),
            controller: new OverridesController(service)
        };
    }

    async run(): Promise<void> {
        const { dependencies, logger, controller } = this.requireState();
        dependencies.app.use(
            '/api/admin/overrides',
            requireAdmin(dependencies.config.adminTokens),
            createOverridesRouter(controller)
        );
        logger.info('Overrides router mounted at /api/admin/overrides');
    }

    private requireState() {
        if (!this.state) {
            throw new Error('OverridesModule not initialized - call init() first');
        }
        return this.state;
    }

    /**
     * Middleware to place ahead of the public page view.
     *
     * @throws {Error} If called before init() completes
     */
    getViewMiddleware(): RequestHandler {
        return this.requireState().middleware;
    }
}
