import { createWriteStream } from 'node:fs';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import type { ILogger } from '@plugcat/types';
import { ConfigurationError, IOError, TransportError } from '../../../lib/errors.js';

const TEMP_DIR_PREFIX = 'plugins-';
const ARCHIVE_FILE_NAME = 'plugins.zip';

/**
 * A locally readable archive plus the means to discard it.
 */
export interface IResolvedArchive {
    path: string;

    /**
     * True when the archive was downloaded into a temporary directory.
     */
    temporary: boolean;

    /**
     * Remove the temporary download. No-op for archives that already existed locally.
     */
    cleanup(): Promise<void>;
}

export interface IArchiveSourceOptions {
    http: AxiosInstance;
    logger: ILogger;
    signal?: AbortSignal;
}

/**
 * Produce a local path for the plugin archive.
 *
 * An existing local path is returned unchanged. Anything else is treated as a
 * URL and downloaded into a fresh temporary directory that the caller must
 * release through `cleanup()`; prefer withArchiveSource(), which always does.
 *
 * @param location - Local path or remote URL
 * @throws ConfigurationError if no location is supplied
 * @throws TransportError if the request fails, answers outside 2xx, or the body is unreadable
 * @throws IOError if the temporary file cannot be created or written
 */
export async function resolveArchiveSource(
    location: string | undefined,
    options: IArchiveSourceOptions
): Promise<IResolvedArchive> {
    if (!location) {
        throw new ConfigurationError('plugins path not provided to read schemas from');
    }

    if (await isLocalPath(location)) {
        return { path: location, temporary: false, cleanup: async () => undefined };
    }

    let directory: string;
    try {
        directory = await mkdtemp(path.join(tmpdir(), TEMP_DIR_PREFIX));
    } catch (error) {
        throw new IOError('could not create temp file', { location }, { cause: error });
    }

    const cleanup = async (): Promise<void> => {
        await rm(directory, { recursive: true, force: true });
    };

    const target = path.join(directory, ARCHIVE_FILE_NAME);
    try {
        await downloadZip(location, target, options);
    } catch (error) {
        await cleanup().catch(cleanupError => {
            options.logger.warn({ error: cleanupError, directory }, 'could not remove temporary plugin archive');
        });
        throw error;
    }

    options.logger.info({ url: location, path: target }, 'Downloaded remote plugin archive');
    return { path: target, temporary: true, cleanup };
}

/**
 * Run `fn` against a locally readable archive, releasing any temporary download
 * afterwards whether `fn` resolves or throws.
 */
export async function withArchiveSource<T>(
    location: string | undefined,
    fn: (archivePath: string) => Promise<T>,
    options: IArchiveSourceOptions
): Promise<T> {
    const archive = await resolveArchiveSource(location, options);
    try {
        return await fn(archive.path);
    } finally {
        await archive.cleanup();
    }
}

async function isLocalPath(location: string): Promise<boolean> {
    try {
        await stat(location);
        return true;
    } catch {
        return false;
    }
}

/**
 * Stream a zip from a URL into a local file.
 */
async function downloadZip(url: string, target: string, options: IArchiveSourceOptions): Promise<void> {
    let response: AxiosResponse<unknown>;
    try {
        response = await options.http.get<unknown>(url, { responseType: 'stream', signal: options.signal });
    } catch (error) {
        let status: number | undefined;
        if (axios.isAxiosError(error) && error.response) {
            status = error.response.status;
            // Rejected stream responses still hold their socket until the body is released.
            const rejectedBody: unknown = error.response.data;
            if (rejectedBody instanceof Readable) {
                rejectedBody.destroy();
            }
        }
        throw new TransportError('could not get zip from url', { url, status }, { cause: error });
    }

    const body = response.data;
    if (!(body instanceof Readable)) {
        throw new TransportError('response body is not a readable stream', { url, status: response.status });
    }

    if (response.status < 200 || response.status >= 300) {
        body.destroy();
        throw new TransportError(`could not get zip from url: HTTP ${response.status}`, { url, status: response.status });
    }

    // pipeline() destroys both streams with the first error, so the side that
    // failed is recorded before it does.
    const failure: { side?: 'read' | 'write' } = {};
    const output = createWriteStream(target);
    body.once('error', () => {
        failure.side ??= 'read';
    });
    output.once('error', () => {
        failure.side ??= 'write';
    });

    try {
        await pipeline(body, output);
    } catch (error) {
        if (failure.side === 'write') {
            throw new IOError('could not copy response body output to file', { url, path: target }, { cause: error });
        }
        throw new TransportError('could not read response body', { url }, { cause: error });
    }
}
