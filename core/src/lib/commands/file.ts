import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Readable } from 'node:stream';

export type FileSource = string | URL | Buffer | Uint8Array | Readable;

export interface FileInit {
    /** Defaults to the basename of a path source. Required for buffer and stream sources. */
    filename?: string;
    description?: string;
    spoiler?: boolean;
}

/**
 * A file to upload with a response. Contents are read lazily, once; a stream
 * source is drained on first read and the bytes are kept for later reads.
 */
export class File {
    readonly filename: string;
    readonly description?: string;
    readonly spoiler: boolean;

    private readonly source: FileSource;
    private data?: Buffer;

    constructor(source: FileSource, init: FileInit = {}) {
        const filename = init.filename ?? File.defaultName(source);
        if (!filename) {
            throw new TypeError('File: a filename is required for buffer and stream sources');
        }
        this.source = source;
        this.filename = filename;
        this.description = init.description;
        this.spoiler = init.spoiler ?? false;
    }

    private static defaultName(source: FileSource): string | undefined {
        if (typeof source === 'string') return basename(source);
        if (source instanceof URL) return basename(source.pathname);
        return undefined;
    }

    async read(): Promise<Buffer> {
        if (this.data) return this.data;

        const source = this.source;
        if (typeof source === 'string' || source instanceof URL) {
            this.data = await readFile(source);
        } else if (source instanceof Readable) {
            const chunks: Buffer[] = [];
            for await (const chunk of source) {
                chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
            }
            this.data = Buffer.concat(chunks);
        } else {
            this.data = Buffer.isBuffer(source) ? source : Buffer.from(source);
        }
        return this.data;
    }
}
