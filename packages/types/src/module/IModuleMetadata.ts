/**
 * Module metadata for introspection and log attribution.
 *
 * Modules are permanent backend components that initialize during bootstrap.
 * Their metadata identifies them in startup logs and failure reports.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module.
     *
     * Lowercase kebab-case matching the module directory name.
     *
     * @example 'actions'
     */
    id: string;

    /**
     * Human-readable module name used in logs and error messages.
     *
     * @example 'Actions'
     */
    name: string;

    /**
     * Semantic version string tracked independently from the application version.
     */
    version: string;

    /**
     * Optional description of what the module does.
     */
    description?: string;
}
