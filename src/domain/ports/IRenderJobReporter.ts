import { StorageDestination } from '../entities/RenderRequest';

export type RenderJobStatus = 'rendering' | 'complete' | 'failed';

export interface RenderJobUpdate {
    status: RenderJobStatus;
    progress: number;
    message: string;
    videoUrl?: string;
    error?: string;
}

/**
 * IRenderJobReporter - Keeps the caller's job record up to date.
 * Reporting is best effort: implementations log failures and resolve.
 */
export interface IRenderJobReporter {
    report(jobId: string, update: RenderJobUpdate): Promise<boolean>;
}

export type RenderJobReporterFactory = (destination: StorageDestination) => IRenderJobReporter;
