/// <reference types="vitest" />

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { resolveArchiveSource, withArchiveSource } from '../services/archive-source.js';
import { ConfigurationError, IOError, TransportError } from '../../../lib/errors.js';
import { ZipFixtureDirectory } from '../../../tests/vitest/helpers/zip-fixtures.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import type { IMockLogger } from '../../../tests/vitest/mocks/logger.js';

const ARCHIVE_URL = 'https://plugins.example.test/plugins.zip';

function response(status: number, data: unknown): AxiosResponse<unknown> {
    return { status, statusText: '', headers: {}, config: { headers: new AxiosHeaders() }, data };
}

describe('archive source', () => {
    let fixtures: ZipFixtureDirectory;
    let logger: IMockLogger;
    let get: ReturnType<typeof vi.fn>;
    let http: AxiosInstance;

    beforeAll(async () => {
        fixtures = await ZipFixtureDirectory.create();
    });

    afterAll(async () => {
        await fixtures.remove();
    });

    beforeEach(() => {
        logger = createMockLogger();
        get = vi.fn();
        http = { get } as unknown as AxiosInstance;
    });

    describe('resolveArchiveSource', () => {
        it.each([undefined, ''])('should reject a missing location (%s)', async location => {
            await expect(resolveArchiveSource(location, { http, logger })).rejects.toThrow(
                new ConfigurationError('plugins path not provided to read schemas from')
            );
            expect(get).not.toHaveBeenCalled();
        });

        it('should use an existing local path as is', async () => {
            const local = path.join(fixtures.root, 'local.zip');
            await writeFile(local, 'zip bytes');

            const archive = await resolveArchiveSource(local, { http, logger });
            await archive.cleanup();

            expect(archive.path).toBe(local);
            expect(archive.temporary).toBe(false);
            expect(existsSync(local)).toBe(true);
            expect(get).not.toHaveBeenCalled();
        });

        it('should download a remote archive into a temporary file', async () => {
            const controller = new AbortController();
            get.mockResolvedValueOnce(response(200, Readable.from([Buffer.from('remote zip bytes')])));

            const archive = await resolveArchiveSource(ARCHIVE_URL, { http, logger, signal: controller.signal });

            expect(get).toHaveBeenCalledWith(ARCHIVE_URL, { responseType: 'stream', signal: controller.signal });
            expect(archive.temporary).toBe(true);
            expect(path.basename(archive.path)).toBe('plugins.zip');
            expect(await readFile(archive.path, 'utf8')).toBe('remote zip bytes');

            await archive.cleanup();
            expect(existsSync(path.dirname(archive.path))).toBe(false);
        });

        it('should wrap request failures in TransportError with the status', async () => {
            const notFound = new AxiosError('HTTP 404: Not Found', 'ERR_BAD_REQUEST', undefined, undefined, response(404, null));
            get.mockRejectedValueOnce(notFound);

            const error = await resolveArchiveSource(ARCHIVE_URL, { http, logger }).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(TransportError);
            expect(error).toMatchObject({
                message: 'could not get zip from url',
                details: { url: ARCHIVE_URL, status: 404 },
                cause: notFound
            });
        });

        /**
         * Test: A rejected stream response has its body released.
         */
        it('should release the body of a rejected response', async () => {
            const body = Readable.from([Buffer.from('<html>not found</html>')]);
            get.mockRejectedValueOnce(
                new AxiosError('HTTP 404: Not Found', 'ERR_BAD_REQUEST', undefined, undefined, response(404, body))
            );

            await expect(resolveArchiveSource(ARCHIVE_URL, { http, logger })).rejects.toBeInstanceOf(TransportError);
            expect(body.destroyed).toBe(true);
        });

        it('should reject responses outside 2xx and release the body', async () => {
            const body = Readable.from([Buffer.from('<html>moved</html>')]);
            get.mockResolvedValueOnce(response(302, body));

            await expect(resolveArchiveSource(ARCHIVE_URL, { http, logger })).rejects.toThrow(
                'could not get zip from url: HTTP 302'
            );
            expect(body.destroyed).toBe(true);
        });

        it('should reject a body that is not a stream', async () => {
            get.mockResolvedValueOnce(response(200, 'not a stream'));

            await expect(resolveArchiveSource(ARCHIVE_URL, { http, logger })).rejects.toBeInstanceOf(TransportError);
        });

        it('should reject a body that fails mid-stream', async () => {
            const body = new Readable({
                read() {
                    this.destroy(new Error('connection reset'));
                }
            });
            get.mockResolvedValueOnce(response(200, body));

            const error = await resolveArchiveSource(ARCHIVE_URL, { http, logger }).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(TransportError);
            expect(error).not.toBeInstanceOf(IOError);
            expect(error).toMatchObject({ message: 'could not read response body' });
        });
    });

    describe('withArchiveSource', () => {
        it('should return the callback result', async () => {
            const local = path.join(fixtures.root, 'callback.zip');
            await writeFile(local, 'zip bytes');

            const result = await withArchiveSource(local, async archivePath => `read ${path.basename(archivePath)}`, {
                http,
                logger
            });

            expect(result).toBe('read callback.zip');
        });

        /**
         * Test: The temporary download is removed even when the callback throws.
         */
        it('should remove the temporary download when the callback throws', async () => {
            get.mockResolvedValueOnce(response(200, Readable.from([Buffer.from('remote zip bytes')])));
            let downloaded = '';

            await expect(
                withArchiveSource(
                    ARCHIVE_URL,
                    async archivePath => {
                        downloaded = archivePath;
                        throw new Error('callback failed');
                    },
                    { http, logger }
                )
            ).rejects.toThrow('callback failed');

            expect(downloaded).not.toBe('');
            expect(existsSync(path.dirname(downloaded))).toBe(false);
        });
    });
});
