import axios from 'axios';
import { StorageDestination } from '../../domain/entities/RenderRequest';
import { IRenderJobReporter, RenderJobUpdate } from '../../domain/ports/IRenderJobReporter';
import { errorMessage } from '../../domain/errors/RenderErrors';

/**
 * Writes render progress to the caller's `render_jobs` table so a frontend can
 * see the outcome even if the process that queued the render went away.
 */
export class SupabaseRenderJobReporter implements IRenderJobReporter {
    private readonly projectUrl: string;

    constructor(private readonly destination: StorageDestination) {
        this.projectUrl = destination.projectUrl.replace(/\/+$/, '');
    }

    async report(jobId: string, update: RenderJobUpdate): Promise<boolean> {
        if (!jobId) {
            return false;
        }

        console.log(`[RenderJob] Updating ${jobId}: ${update.status} (${update.progress}%)`);

        const payload: Record<string, unknown> = {
            status: update.status,
            progress: update.progress,
            message: update.message,
            updated_at: new Date().toISOString(),
        };
        if (update.videoUrl) {
            payload.video_url = update.videoUrl;
        }
        if (update.error) {
            payload.error = update.error;
        }

        try {
            const response = await axios.patch(
                `${this.projectUrl}/rest/v1/render_jobs?id=eq.${encodeURIComponent(jobId)}`,
                payload,
                {
                    headers: {
                        'Authorization': `Bearer ${this.destination.serviceKey}`,
                        'apikey': this.destination.serviceKey,
                        'Content-Type': 'application/json',
                        'Prefer': 'return=minimal',
                    },
                    timeout: 30000,
                    validateStatus: () => true,
                }
            );

            if (response.status !== 200 && response.status !== 204) {
                console.warn(`[RenderJob] Failed to update ${jobId}: ${response.status}`);
                return false;
            }
            return true;
        } catch (error) {
            console.warn(`[RenderJob] Failed to update ${jobId}: ${errorMessage(error)}`);
            return false;
        }
    }
}
