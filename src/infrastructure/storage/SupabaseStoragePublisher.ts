import axios from 'axios';
import fs from 'fs';
import { StorageDestination } from '../../domain/entities/RenderRequest';
import { IPublisher } from '../../domain/ports/IPublisher';
import { CancelledError, UploadError, errorMessage } from '../../domain/errors/RenderErrors';

/**
 * Uploads rendered videos to Supabase Storage over its REST API.
 * The body is streamed from disk, so large renders never sit in memory.
 */
export class SupabaseStoragePublisher implements IPublisher {
    private readonly projectUrl: string;

    constructor(
        private readonly destination: StorageDestination,
        private readonly timeoutMs: number = 600000 // 10 minutes
    ) {
        if (!destination.projectUrl || !destination.serviceKey) {
            throw new Error('Storage credentials are required (projectUrl, serviceKey)');
        }
        if (!destination.bucket) {
            throw new Error('Storage bucket is required');
        }
        this.projectUrl = destination.projectUrl.replace(/\/+$/, '');
    }

    async upload(localPath: string, destinationKey: string, signal?: AbortSignal): Promise<string> {
        const { bucket, serviceKey } = this.destination;
        const key = encodeKey(destinationKey);
        const fileSize = (await fs.promises.stat(localPath)).size;

        console.log(`[Publisher] Uploading ${bucket}/${destinationKey} (${(fileSize / 1024 / 1024).toFixed(1)} MB)`);

        let status: number;
        let body: unknown;
        try {
            const response = await axios.post(
                `${this.projectUrl}/storage/v1/object/${bucket}/${key}`,
                fs.createReadStream(localPath),
                {
                    headers: {
                        'Authorization': `Bearer ${serviceKey}`,
                        'Content-Type': 'video/mp4',
                        'Content-Length': String(fileSize),
                        'x-upsert': 'true',
                    },
                    maxBodyLength: Infinity,
                    maxContentLength: Infinity,
                    timeout: this.timeoutMs,
                    signal,
                    validateStatus: () => true,
                }
            );
            status = response.status;
            body = response.data;
        } catch (error) {
            if (signal?.aborted) {
                throw new CancelledError('Upload cancelled');
            }
            throw new UploadError(`Upload failed: ${errorMessage(error)}`, undefined, { cause: error });
        }

        if (status !== 200 && status !== 201) {
            throw new UploadError(describeRejection(status, body), status);
        }

        const publicUrl = `${this.projectUrl}/storage/v1/object/public/${bucket}/${key}`;
        console.log(`[Publisher] Uploaded: ${publicUrl}`);
        return publicUrl;
    }
}

function encodeKey(key: string): string {
    return key.split('/').map(encodeURIComponent).join('/');
}

function describeRejection(status: number, body: unknown): string {
    const detail = extractMessage(body);
    if (status === 401 || status === 403) {
        return `Storage rejected credentials (${status})${detail}`;
    }
    if (status === 413) {
        return `Storage rejected upload: file exceeds size or quota limits (${status})${detail}`;
    }
    return `Upload failed: ${status}${detail}`;
}

function extractMessage(body: unknown): string {
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
        return ` - ${body.message}`;
    }
    if (typeof body === 'string' && body.length > 0) {
        return ` - ${body.slice(0, 200)}`;
    }
    return '';
}
