import { parse } from 'yaml';
import type { ZodError } from 'zod';
import type { ILogger, IPluginDescriptor, ManifestConfig } from '@plugcat/types';
import { SchemaError } from '../../../lib/errors.js';
import {
    ManifestEnvelopeSchema,
    StagePluginManifestSchema,
    StepPluginManifestSchema
} from '../validators/manifest.schema.js';
import type { IExtractedManifest } from './manifest-extractor.js';

// Keeps a leading byte order mark so the stored spec is the exact entry text.
const decoder = new TextDecoder('utf-8', { ignoreBOM: true });

function schemaError(message: string, error: ZodError): SchemaError {
    return new SchemaError(message, { issues: error.issues }, { cause: error });
}

/**
 * Parse manifest text into its structured, variant-tagged form.
 *
 * Manifests of a kind or type the catalog does not store come back as the
 * `unrecognized` variant; only text that is not a valid config document throws.
 *
 * @param text - Manifest YAML
 * @returns Parsed manifest config
 * @throws SchemaError if the YAML is invalid, the document is not a config
 * mapping, or a step/stage plugin spec fails validation
 */
export function parseManifest(text: string): ManifestConfig {
    let document: unknown;
    try {
        document = parse(text);
    } catch (error) {
        throw new SchemaError('could not parse manifest YAML', undefined, { cause: error });
    }

    const envelope = ManifestEnvelopeSchema.safeParse(document);
    if (!envelope.success) {
        throw schemaError('manifest is not a valid config document', envelope.error);
    }

    const { kind, type } = envelope.data;

    if (kind === 'plugin' && type === 'step') {
        const step = StepPluginManifestSchema.safeParse(document);
        if (!step.success) {
            throw schemaError('invalid step plugin manifest', step.error);
        }
        return { variant: 'step-plugin', ...step.data };
    }

    if (kind === 'plugin' && type === 'stage') {
        const stage = StagePluginManifestSchema.safeParse(document);
        if (!stage.success) {
            throw schemaError('invalid stage plugin manifest', stage.error);
        }
        return { variant: 'stage-plugin', ...stage.data };
    }

    return { variant: 'unrecognized', ...envelope.data };
}

function assertNever(value: never): never {
    throw new Error(`Unhandled manifest variant: ${JSON.stringify(value)}`);
}

/**
 * Build a catalog descriptor from a parsed manifest.
 *
 * @param config - Parsed manifest
 * @param spec - Raw manifest text to store verbatim
 * @param logo - Logo markup, empty when none was shipped
 * @returns Descriptor, or null when the manifest is not a step or stage plugin
 */
export function toPluginDescriptor(config: ManifestConfig, spec: string, logo = ''): IPluginDescriptor | null {
    switch (config.variant) {
        case 'step-plugin':
        case 'stage-plugin':
            return {
                uid: config.name,
                type: config.type,
                description: config.spec.description,
                spec,
                logo
            };
        case 'unrecognized':
            return null;
        default:
            return assertNever(config);
    }
}

/**
 * Turn one extracted archive entry into a descriptor.
 *
 * Invalid or unsupported manifests are logged and skipped, never thrown, so a
 * bad entry cannot abort a synchronization pass.
 *
 * @param entry - Manifest bytes and optional logo bytes read from the archive
 * @param logger - Logger for skip warnings
 * @returns Descriptor, or null when the entry is skipped
 */
export function parseManifestEntry(entry: IExtractedManifest, logger: ILogger): IPluginDescriptor | null {
    const spec = decoder.decode(entry.manifest);

    let config: ManifestConfig;
    try {
        config = parseManifest(spec);
    } catch (error) {
        if (error instanceof SchemaError) {
            logger.warn({ error, name: entry.entryName }, 'could not parse schema into valid config');
            return null;
        }
        throw error;
    }

    const logo = entry.logo ? decoder.decode(entry.logo) : '';
    const descriptor = toPluginDescriptor(config, spec, logo);
    if (!descriptor) {
        logger.warn(
            { name: entry.entryName, kind: config.kind, type: config.type },
            'schema did not match a valid plugin schema'
        );
    }
    return descriptor;
}
