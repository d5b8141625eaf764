import { randomUUID } from 'node:crypto';
import type { File } from '../commands/file.js';
import { RequestFailedError } from '../errors/errors.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('Rest');

export const DEFAULT_API_BASE_URL = 'https://discord.com/api/v10';

/** Abort outbound calls well before the interaction token's patience runs out. */
const REQUEST_TIMEOUT_MS = 25_000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RestRequest {
    method: HttpMethod;
    /** Path below the API base, e.g. `Routes.interactionCallback(id, token)`. */
    path: string;
    body?: unknown;
    /** With at least one file the request goes out as multipart/form-data. */
    files?: readonly File[];
}

export interface RestClientOptions {
    token?: string;
    baseUrl?: string;
    fetch?: FetchLike;
    timeoutMs?: number;
}

/**
 * Encode a request body: JSON when there are no files, otherwise multipart
 * with the JSON under `payload_json` and each file under `files[i]`.
 */
export async function encodeBody(body: unknown, files: readonly File[] = []): Promise<{ body?: string | FormData; contentType?: string }> {
    if (files.length === 0) {
        return body === undefined ? {} : { body: JSON.stringify(body), contentType: 'application/json' };
    }

    const form = new FormData();
    if (body !== undefined) {
        form.append('payload_json', JSON.stringify(body));
    }
    for (const [index, file] of files.entries()) {
        const data = await file.read();
        form.append(`files[${index}]`, new Blob([data]), file.filename);
    }
    // fetch writes the multipart boundary into the content-type itself.
    return { body: form };
}

interface PlatformError {
    code?: number;
    message?: string;
}

function readPlatformError(data: unknown): PlatformError {
    if (typeof data !== 'object' || data === null) return {};
    const code = 'code' in data && typeof data.code === 'number' ? data.code : undefined;
    const message = 'message' in data && typeof data.message === 'string' ? data.message : undefined;
    return { code, message };
}

async function readBody(res: Response): Promise<unknown> {
    const text = await res.text();
    if (!text) return undefined;
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

/**
 * Thin Discord REST client. Stateless apart from the bot token, so one
 * instance is shared by every request. No retries: failures surface as
 * RequestFailedError.
 */
export class RestClient {
    readonly baseUrl: string;
    private token?: string;
    private readonly fetchImpl: FetchLike;
    private readonly timeoutMs: number;

    constructor(options: RestClientOptions = {}) {
        this.token = options.token;
        this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
        this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    }

    setToken(token: string): this {
        this.token = token;
        return this;
    }

    async request(req: RestRequest): Promise<unknown> {
        const requestId = randomUUID().slice(0, 8);
        const url = `${this.baseUrl}${req.path}`;
        const start = Date.now();

        const encoded = await encodeBody(req.body, req.files);
        const headers: Record<string, string> = {};
        if (encoded.contentType) headers['content-type'] = encoded.contentType;
        if (this.token) headers.authorization = `Bot ${this.token}`;

        logger.debug({ requestId, method: req.method, path: req.path, files: req.files?.length ?? 0 }, 'Outbound request starting');

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

        let res: Response;
        try {
            res = await this.fetchImpl(url, {
                method: req.method,
                headers,
                body: encoded.body,
                signal: controller.signal,
            });
        } catch (err) {
            const timedOut = err instanceof Error && err.name === 'AbortError';
            logger.error({ requestId, method: req.method, path: req.path, duration: Date.now() - start, err }, 'Outbound request failed');
            throw new RequestFailedError(
                timedOut
                    ? `${req.method} ${req.path} timed out after ${this.timeoutMs}ms`
                    : `${req.method} ${req.path} failed: ${err instanceof Error ? err.message : String(err)}`,
                { method: req.method, url },
            );
        } finally {
            clearTimeout(timeoutId);
        }

        const data = await readBody(res);
        const duration = Date.now() - start;

        if (!res.ok) {
            const platform = readPlatformError(data);
            logger.error({ requestId, method: req.method, path: req.path, status: res.status, code: platform.code, duration }, 'Outbound request rejected');
            throw new RequestFailedError(
                `${req.method} ${req.path} returned ${res.status}${platform.message ? `: ${platform.message}` : ''}`,
                { method: req.method, url, upstreamStatus: res.status, platformCode: platform.code },
            );
        }

        logger.debug({ requestId, method: req.method, path: req.path, status: res.status, duration }, 'Outbound request completed');
        return data;
    }

    post(path: string, body?: unknown, files?: readonly File[]): Promise<unknown> {
        return this.request({ method: 'POST', path, body, files });
    }

    put(path: string, body?: unknown): Promise<unknown> {
        return this.request({ method: 'PUT', path, body });
    }

    patch(path: string, body?: unknown, files?: readonly File[]): Promise<unknown> {
        return this.request({ method: 'PATCH', path, body, files });
    }
}
