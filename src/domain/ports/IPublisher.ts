import { StorageDestination } from '../entities/RenderRequest';

/**
 * IPublisher - Port for uploading the finished artifact.
 * Implementations: SupabaseStoragePublisher
 */
export interface IPublisher {
    /**
     * Uploads a local file and returns its public URL.
     * @throws UploadError on authentication failure, quota rejection or transport failure
     */
    upload(localPath: string, destinationKey: string, signal?: AbortSignal): Promise<string>;
}

export type PublisherFactory = (destination: StorageDestination) => IPublisher;
