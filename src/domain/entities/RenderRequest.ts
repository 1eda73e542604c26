import { TimingSpec } from './RenderPlan';

/**
 * Object storage destination supplied with each request.
 */
export interface StorageDestination {
    projectUrl: string;
    serviceKey: string;
    bucket: string;
}

/**
 * Typed render request, produced by boundary validation.
 */
export interface RenderRequest {
    imageUrls: string[];
    timings: TimingSpec[];
    audioUrl: string;
    projectId: string;
    applyEffects: boolean;
    storage: StorageDestination;
    /** Row in the render_jobs table to keep up to date */
    renderJobId?: string;
}

export interface RenderResponse {
    videoUrl: string;
    renderTimeSeconds: number;
}
