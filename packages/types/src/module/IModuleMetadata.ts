/**
 * Module metadata for introspection and log attribution.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module, kebab-case, matching its directory name.
     * @example 'plugin-catalog', 'database'
     */
    id: string;

    /**
     * Human-readable module name used in logs and error messages.
     * @example 'Plugin Catalog'
     */
    name: string;

    /**
     * Semantic version string tracked independently from the application version.
     * @example '1.0.0'
     */
    version: string;

    /**
     * Optional description of the module's purpose.
     */
    description?: string;
}
