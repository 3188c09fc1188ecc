/**
 * Plugin types the catalog accepts.
 *
 * Only step and stage plugin manifests are cataloged; every other manifest
 * kind or type is rejected during parsing.
 */
export type PluginType = 'step' | 'stage';

/**
 * Catalog entry describing a single plugin.
 *
 * Built transiently for every matching archive entry during a synchronization
 * pass and persisted only when it is new or its content identity changed.
 * Content identity is the tuple (type, description, spec, logo); any difference
 * in those fields requires an update.
 */
export interface IPluginDescriptor {
    /**
     * Unique catalog identifier, taken from the manifest's declared name.
     * @example 'docker'
     */
    uid: string;

    /**
     * Declared plugin type from the manifest.
     */
    type: PluginType;

    /**
     * Human-readable description from the matched manifest variant.
     */
    description: string;

    /**
     * Raw manifest text exactly as it appeared in the archive.
     *
     * This is the source of truth for lookups and the change-detection payload,
     * so it is never re-serialized.
     */
    spec: string;

    /**
     * SVG markup of the plugin logo, or an empty string when the plugin
     * directory ships no logo.svg.
     */
    logo: string;
}
