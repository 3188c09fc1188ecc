import type { PluginType } from '@plugcat/types';

/**
 * MongoDB document interface for the plugin catalog.
 *
 * One document per plugin identifier. The descriptor fields are written
 * verbatim from the archive; `version` is reserved for per-version manifests
 * and is always stored as an empty string today.
 */
export interface IPluginDocument {
    /**
     * Catalog identifier (manifest name). Unique index.
     * @example 'docker'
     */
    uid: string;

    /**
     * Declared plugin type.
     */
    type: PluginType;

    /**
     * Description from the manifest's variant spec.
     */
    description: string;

    /**
     * Raw manifest text as read from the archive.
     */
    spec: string;

    /**
     * SVG logo markup, empty when the plugin ships none.
     */
    logo: string;

    /**
     * Reserved manifest version.
     */
    version: string;

    /**
     * Timestamp of the first synchronization that created the entry.
     */
    createdAt: Date;

    /**
     * Timestamp of the last content change.
     */
    updatedAt: Date;
}
