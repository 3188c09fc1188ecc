import path from 'node:path';
import { Minimatch } from 'minimatch';
import type { ILogger } from '@plugcat/types';
import { ConfigurationError } from '../../../lib/errors.js';
import type { ZipArchive } from './zip-archive.js';

/**
 * Manifests live at any depth under `plugins/<pluginDir>/`.
 */
export const MANIFEST_PATTERN = '**/plugins/*/*.yaml';

/**
 * Optional logo shipped next to a manifest.
 */
export const LOGO_FILE_NAME = 'logo.svg';

export interface IExtractedManifest {
    /**
     * Path of the manifest inside the archive.
     */
    entryName: string;
    manifest: Uint8Array;
    logo?: Uint8Array;
}

export interface IExtractOptions {
    matches: (entryName: string) => boolean;
    logger: ILogger;
    /**
     * Called for every matching entry that could not be read.
     */
    onSkip?: (entryName: string) => void;
}

/**
 * Compile the glob that selects manifest entries.
 *
 * @throws ConfigurationError if minimatch cannot compile the pattern
 */
export function createEntryMatcher(pattern: string = MANIFEST_PATTERN): (entryName: string) => boolean {
    // Dot-named directories are ordinary path segments inside an archive.
    const matcher = new Minimatch(pattern, { dot: true });
    if (matcher.makeRe() === false) {
        throw new ConfigurationError(`could not glob pattern "${pattern}"`, { pattern });
    }
    return entryName => matcher.match(entryName);
}

/**
 * Lazily yield every readable manifest entry of an archive.
 *
 * Unreadable entries are logged and skipped; a missing logo is silent, an
 * unreadable one is logged and the manifest is yielded without it.
 *
 * @param archive - Open archive
 * @param options - Entry matcher, logger and skip callback
 */
export function* extractManifests(archive: ZipArchive, options: IExtractOptions): Generator<IExtractedManifest> {
    const { matches, logger, onSkip } = options;

    for (const entryName of archive.entries) {
        if (!matches(entryName)) {
            continue;
        }

        let manifest: Uint8Array;
        try {
            manifest = archive.read(entryName);
        } catch (error) {
            logger.warn({ error, name: entryName }, 'could not read file contents');
            onSkip?.(entryName);
            continue;
        }

        yield { entryName, manifest, logo: readLogo(archive, entryName, logger) };
    }
}

function readLogo(archive: ZipArchive, entryName: string, logger: ILogger): Uint8Array | undefined {
    const logoName = path.posix.join(path.posix.dirname(entryName), LOGO_FILE_NAME);
    if (!archive.has(logoName)) {
        return undefined;
    }

    try {
        return archive.read(logoName);
    } catch (error) {
        logger.warn({ error, name: entryName }, 'could not copy logo file');
        return undefined;
    }
}
