import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend system components.
 *
 * Modules initialize during application bootstrap and stay active for the
 * application's lifetime. They follow a two-phase lifecycle:
 *
 * ### Phase 1: init(dependencies)
 * - Store injected dependencies, create service instances, validate configuration
 * - Must NOT mount routes or assume other modules are initialized
 *
 * ### Phase 2: run()
 * - Mount routes on the Express app (modules attach themselves, inversion of control)
 * - All dependencies are guaranteed to be initialized
 *
 * Failures in either phase are fatal: the bootstrap logs the error with the module
 * metadata and exits. There is no degraded mode.
 *
 * @example
 * ```typescript
 * const pagesModule = new PagesModule();
 * await pagesModule.init({ database, config, logger, app });
 * await pagesModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata used for logging and introspection.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * @param dependencies - Module-specific dependencies
     * @throws Error if initialization fails (causes application shutdown)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after every module has completed init().
     *
     * @throws Error if activation fails (causes application shutdown)
     */
    run(): Promise<void>;
}
