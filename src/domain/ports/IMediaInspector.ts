/**
 * IMediaInspector - Reads container metadata from local media files.
 * Implementations: FFprobeMediaInspector
 */
export interface IMediaInspector {
    probeDurationSeconds(filePath: string): Promise<number>;
}
