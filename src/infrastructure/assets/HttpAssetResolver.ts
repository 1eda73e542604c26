import axios, { AxiosResponse } from 'axios';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { AssetRef } from '../../domain/entities/RenderPlan';
import { AssetKind, IAssetResolver } from '../../domain/ports/IAssetResolver';
import { CancelledError, FetchError, errorMessage } from '../../domain/errors/RenderErrors';
import { isRetryableStatus, withRetry } from '../http/RetryUtils';

export interface HttpAssetResolverOptions {
    /** Per-attempt timeout for images */
    timeoutMs: number;
    /** Audio files are larger; they get a longer timeout */
    audioTimeoutMs: number;
    maxAttempts: number;
    initialBackoffMs?: number;
}

const EXTENSIONS: Record<string, string> = {
    'image/png': '.png',
    'image/jpeg': '.jpg',
    'image/jpg': '.jpg',
    'image/webp': '.webp',
    'audio/mpeg': '.mp3',
    'audio/mp3': '.mp3',
    'audio/wav': '.wav',
    'audio/x-wav': '.wav',
    'audio/wave': '.wav',
    'audio/mp4': '.m4a',
    'audio/x-m4a': '.m4a',
    'audio/aac': '.aac',
    'audio/ogg': '.ogg',
};

const GENERIC_BINARY = 'application/octet-stream';

/**
 * Downloads request inputs over HTTP into the request workspace.
 * Streams to disk, then checks the body against the response headers.
 */
export class HttpAssetResolver implements IAssetResolver {
    constructor(private readonly options: HttpAssetResolverOptions) { }

    async fetch(url: string, destinationPath: string, kind: AssetKind, signal?: AbortSignal): Promise<AssetRef> {
        return withRetry(() => this.fetchOnce(url, destinationPath, kind, signal), {
            maxAttempts: this.options.maxAttempts,
            initialDelayMs: this.options.initialBackoffMs ?? 1000,
            signal,
            isRetryable: (error) => error instanceof FetchError && error.retryable,
            onRetry: (attempt, error, nextDelayMs) => {
                console.warn(
                    `[Assets] Attempt ${attempt} for ${url} failed: ${errorMessage(error)}. ` +
                    `Retrying in ${Math.round(nextDelayMs)}ms`
                );
            },
        });
    }

    private async fetchOnce(
        url: string,
        destinationPath: string,
        kind: AssetKind,
        signal?: AbortSignal
    ): Promise<AssetRef> {
        let response: AxiosResponse<Readable>;
        try {
            response = await axios.get<Readable>(url, {
                responseType: 'stream',
                timeout: kind === 'audio' ? this.options.audioTimeoutMs : this.options.timeoutMs,
                signal,
                validateStatus: () => true,
            });
        } catch (error) {
            throw this.transportError(url, error, signal);
        }

        const { status } = response;
        if (status < 200 || status >= 300) {
            response.data.destroy();
            throw new FetchError(`HTTP ${status} fetching ${url}`, url, {
                statusCode: status,
                retryable: isRetryableStatus(status),
            });
        }

        const contentType = normalizeContentType(headerString(response.headers['content-type']));
        if (!isAcceptedContentType(contentType, kind)) {
            response.data.destroy();
            throw new FetchError(`Unexpected content type "${contentType}" for ${kind} ${url}`, url, {
                statusCode: status,
            });
        }

        const localPath = `${destinationPath}${extensionFor(contentType, url, kind)}`;
        try {
            await pipeline(response.data, fs.createWriteStream(localPath));
        } catch (error) {
            throw this.transportError(url, error, signal);
        }

        const byteSize = (await fs.promises.stat(localPath)).size;
        if (byteSize === 0) {
            throw new FetchError(`Empty body fetching ${url}`, url, { statusCode: status, retryable: true });
        }

        const expectedBytes = parseContentLength(headerString(response.headers['content-length']));
        if (expectedBytes !== undefined && expectedBytes !== byteSize) {
            throw new FetchError(
                `Incomplete body fetching ${url}: expected ${expectedBytes} bytes, got ${byteSize}`,
                url,
                { statusCode: status, retryable: true }
            );
        }

        console.log(`[Assets] Downloaded ${url} -> ${path.basename(localPath)} (${byteSize} bytes)`);

        return { sourceUrl: url, localPath, byteSize, contentType };
    }

    private transportError(url: string, error: unknown, signal?: AbortSignal): Error {
        if (signal?.aborted) {
            return new CancelledError(`Download cancelled: ${url}`);
        }
        if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
            return new FetchError(`Timed out fetching ${url}`, url, { retryable: true, cause: error });
        }
        return new FetchError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, {
            retryable: true,
            cause: error,
        });
    }
}

function headerString(value: unknown): string | undefined {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return String(value);
    }
    return undefined;
}

function normalizeContentType(header: string | undefined): string {
    if (!header) {
        return GENERIC_BINARY;
    }
    return header.split(';')[0].trim().toLowerCase();
}

function isAcceptedContentType(contentType: string, kind: AssetKind): boolean {
    return contentType === GENERIC_BINARY || contentType.startsWith(`${kind}/`);
}

function parseContentLength(header: string | undefined): number | undefined {
    if (header === undefined) {
        return undefined;
    }
    const parsed = Number.parseInt(header, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
}

function extensionFor(contentType: string, url: string, kind: AssetKind): string {
    const known = EXTENSIONS[contentType];
    if (known) {
        return known;
    }

    let fromUrl = '';
    try {
        fromUrl = path.extname(new URL(url).pathname).toLowerCase();
    } catch {
        fromUrl = '';
    }
    if (/^\.[a-z0-9]{2,4}$/.test(fromUrl)) {
        return fromUrl;
    }
    return kind === 'image' ? '.jpg' : '.audio';
}
