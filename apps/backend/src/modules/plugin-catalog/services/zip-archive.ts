import { readFile } from 'node:fs/promises';
import { unzipSync } from 'fflate';
import { IOError } from '../../../lib/errors.js';

/**
 * Read-only view of a zip archive on local storage.
 *
 * Opening reads the archive once and lists its central directory; entries are
 * decompressed one at a time on demand, so a corrupt entry fails only its own
 * read. Call close() when the pass is done to release the archive buffer.
 */
export class ZipArchive {
    private data: Uint8Array | null;
    private readonly names: ReadonlySet<string>;

    private constructor(
        public readonly path: string,
        data: Uint8Array,
        public readonly entries: readonly string[]
    ) {
        this.data = data;
        this.names = new Set(entries);
    }

    /**
     * Open an archive and list its entries in central directory order.
     *
     * @param path - Local path to the zip file
     * @throws IOError if the file cannot be read or is not a zip archive
     */
    static async open(path: string): Promise<ZipArchive> {
        let data: Uint8Array;
        try {
            data = await readFile(path);
        } catch (error) {
            throw new IOError('could not open zip for reading', { path }, { cause: error });
        }

        const entries: string[] = [];
        try {
            unzipSync(data, {
                filter: file => {
                    entries.push(file.name);
                    return false;
                }
            });
        } catch (error) {
            throw new IOError('could not open zip for reading', { path }, { cause: error });
        }

        return new ZipArchive(path, data, entries);
    }

    has(name: string): boolean {
        return this.names.has(name);
    }

    /**
     * Decompress a single entry.
     *
     * @throws IOError if the archive is closed, the entry is missing, or its data
     * cannot be decompressed
     */
    read(name: string): Uint8Array {
        if (!this.data) {
            throw new IOError('zip archive is closed', { path: this.path, name });
        }

        let files: Record<string, Uint8Array>;
        try {
            files = unzipSync(this.data, { filter: file => file.name === name });
        } catch (error) {
            throw new IOError(`could not read zip entry "${name}"`, { path: this.path, name }, { cause: error });
        }

        const content = files[name];
        if (!content) {
            throw new IOError(`zip entry "${name}" not found`, { path: this.path, name });
        }
        return content;
    }

    close(): void {
        this.data = null;
    }
}
