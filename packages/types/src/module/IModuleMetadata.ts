/**
 * Identifying information for a backend module.
 */
export interface IModuleMetadata {
    /**
     * Stable identifier, also used as the `module` binding on child loggers.
     */
    id: string;

    /**
     * Human-readable name.
     */
    name: string;

    version: string;

    description?: string;
}
