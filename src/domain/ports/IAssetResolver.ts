import { AssetRef } from '../entities/RenderPlan';

export type AssetKind = 'image' | 'audio';

/**
 * IAssetResolver - Port for retrieving request inputs into local storage.
 * Implementations: HttpAssetResolver
 */
export interface IAssetResolver {
    /**
     * Downloads a remote asset and verifies its size and content type.
     * @param destinationPath Path without extension; the resolver appends one from the content type
     * @throws FetchError on non-2xx, timeout, empty or short body, or wrong content type
     */
    fetch(url: string, destinationPath: string, kind: AssetKind, signal?: AbortSignal): Promise<AssetRef>;
}
