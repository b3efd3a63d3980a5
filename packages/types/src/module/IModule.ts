import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend system components.
 *
 * Modules are permanent components that initialize during application bootstrap
 * and stay active for the lifetime of the process. They follow a two-phase
 * lifecycle so that dependency wiring and activation never interleave.
 *
 * ## Phase 1: init(dependencies)
 * - Store injected dependencies and create service instances
 * - Validate configuration
 * - Must NOT start background work or register scheduled jobs
 *
 * ## Phase 2: run()
 * - Register scheduled jobs and start background work
 * - All dependencies are guaranteed to be initialized
 *
 * Failures in either phase are fatal: bootstrap logs the error with the module
 * metadata and exits. There is no degraded mode.
 *
 * ```typescript
 * const actionsModule = new ActionsModule();
 * await actionsModule.init({ scheduler, logger });
 * await actionsModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata for introspection.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * Throw with a descriptive message when a dependency or configuration value
     * is unusable; bootstrap turns the error into a shutdown.
     *
     * @param dependencies - Services and settings the module needs
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after every module has completed init().
     */
    run(): Promise<void>;
}
