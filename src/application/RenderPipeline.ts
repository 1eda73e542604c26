import { AssetRef, AudioAsset } from '../domain/entities/RenderPlan';
import { RenderRequest, RenderResponse } from '../domain/entities/RenderRequest';
import { IAssetResolver } from '../domain/ports/IAssetResolver';
import { IMediaInspector } from '../domain/ports/IMediaInspector';
import { PublisherFactory } from '../domain/ports/IPublisher';
import { IRenderJobReporter, RenderJobReporterFactory, RenderJobUpdate } from '../domain/ports/IRenderJobReporter';
import { CancelledError, FetchError, RenderError, errorMessage } from '../domain/errors/RenderErrors';
import { TimelinePlanner } from '../domain/services/TimelinePlanner';
import { EffectCompositor } from '../domain/services/EffectCompositor';
import { ScratchWorkspace } from '../infrastructure/workspace/ScratchWorkspace';
import { EncodeOrchestrator } from './EncodeOrchestrator';
import { Semaphore } from './Semaphore';

export interface RenderPipelineDependencies {
    assetResolver: IAssetResolver;
    mediaInspector: IMediaInspector;
    planner: TimelinePlanner;
    compositor: EffectCompositor;
    orchestrator: EncodeOrchestrator;
    createPublisher: PublisherFactory;
    createJobReporter: RenderJobReporterFactory;
}

export interface RenderPipelineOptions {
    scratchRoot: string;
    /** Parallel image downloads per request */
    fetchConcurrency: number;
}

/**
 * Runs one render request end to end:
 * validate → fetch audio → check timeline against audio → fetch images →
 * plan → compose effects → encode → upload.
 *
 * Everything the request downloads or produces lives in one workspace that is
 * removed on every exit path.
 */
export class RenderPipeline {
    constructor(
        private readonly deps: RenderPipelineDependencies,
        private readonly options: RenderPipelineOptions
    ) { }

    async run(request: RenderRequest, signal?: AbortSignal): Promise<RenderResponse> {
        const startedAt = Date.now();
        const { planner, compositor } = this.deps;
        const reporter = request.renderJobId ? this.deps.createJobReporter(request.storage) : null;
        const tag = `[Pipeline ${request.projectId}]`;

        console.log(`${tag} Starting render: ${request.imageUrls.length} images, effects=${request.applyEffects}`);

        // Nothing is downloaded until the request is known to be renderable.
        planner.validateTimeline(request.imageUrls.length, request.timings);
        if (request.applyEffects) {
            compositor.assertAvailable();
        }

        const workspace = await ScratchWorkspace.create(this.options.scratchRoot, 'render');
        try {
            await this.report(reporter, request, { status: 'rendering', progress: 10, message: 'Downloading assets' });

            const audio = await this.fetchAudio(request, workspace, signal);
            planner.assertWithinAudio(request.timings, audio.durationSeconds);

            const images = await this.fetchImages(request, workspace, signal);
            throwIfCancelled(signal);

            const plan = planner.plan(images, request.timings, audio);
            const layers = compositor.compose(plan, request.applyEffects);

            await this.report(reporter, request, { status: 'rendering', progress: 40, message: 'Encoding video' });

            const result = await this.deps.orchestrator.render(plan, layers, {
                outputPath: workspace.path('output.mp4'),
                signal,
            });
            if (result.status === 'failed') {
                console.warn(`${tag} Encode failed after ${result.transitions.join(' → ')}`);
                throw result.error;
            }
            throwIfCancelled(signal);

            const publisher = this.deps.createPublisher(request.storage);
            const videoUrl = await publisher.upload(result.outputPath, `${request.projectId}/video.mp4`, signal);

            const renderTimeSeconds = Math.round((Date.now() - startedAt) / 100) / 10;
            console.log(`${tag} Total time: ${renderTimeSeconds}s (encoder: ${result.encoderUsed})`);

            await this.report(reporter, request, {
                status: 'complete',
                progress: 100,
                message: `Video rendered successfully (${result.encoderUsed}: ${renderTimeSeconds}s)`,
                videoUrl,
            });

            return { videoUrl, renderTimeSeconds };
        } catch (error) {
            console.error(`${tag} Render failed: ${errorMessage(error)}`);
            await this.report(reporter, request, {
                status: 'failed',
                progress: 0,
                message: 'Render failed',
                error: errorMessage(error),
            });
            throw error;
        } finally {
            await workspace.dispose();
        }
    }

    private async fetchAudio(request: RenderRequest, workspace: ScratchWorkspace, signal?: AbortSignal): Promise<AudioAsset> {
        throwIfCancelled(signal);
        const asset = await this.deps.assetResolver.fetch(request.audioUrl, workspace.path('audio'), 'audio', signal);

        let durationSeconds: number;
        try {
            durationSeconds = await this.deps.mediaInspector.probeDurationSeconds(asset.localPath);
        } catch (error) {
            throw new FetchError(`Audio is not readable media: ${errorMessage(error)}`, request.audioUrl, { cause: error });
        }

        return { ...asset, durationSeconds };
    }

    /**
     * Downloads every image concurrently. The first failure cancels the rest.
     */
    private async fetchImages(request: RenderRequest, workspace: ScratchWorkspace, signal?: AbortSignal): Promise<AssetRef[]> {
        throwIfCancelled(signal);
        const batch = new AbortController();
        const onAbort = () => batch.abort();
        signal?.addEventListener('abort', onAbort, { once: true });
        const limiter = new Semaphore(this.options.fetchConcurrency);
        const downloadStart = Date.now();

        try {
            const downloads = request.imageUrls.map((url, i) =>
                limiter.use(
                    () => this.deps.assetResolver.fetch(
                        url,
                        workspace.path(`image_${String(i).padStart(3, '0')}`),
                        'image',
                        batch.signal
                    ),
                    batch.signal
                ).catch((error: unknown) => {
                    batch.abort();
                    throw error;
                })
            );

            const settled = await Promise.allSettled(downloads);
            throwIfCancelled(signal);

            const images: AssetRef[] = [];
            const failures: RenderError[] = [];
            for (const outcome of settled) {
                if (outcome.status === 'fulfilled') {
                    images.push(outcome.value);
                } else if (outcome.reason instanceof RenderError && !(outcome.reason instanceof CancelledError)) {
                    failures.push(outcome.reason);
                } else if (!(outcome.reason instanceof CancelledError)) {
                    throw outcome.reason;
                }
            }
            if (failures.length > 0) {
                throw failures[0];
            }

            console.log(`[Assets] Downloaded ${images.length} images in ${((Date.now() - downloadStart) / 1000).toFixed(1)}s`);
            return images;
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private async report(
        reporter: IRenderJobReporter | null,
        request: RenderRequest,
        update: RenderJobUpdate
    ): Promise<void> {
        if (!reporter || !request.renderJobId) {
            return;
        }
        await reporter.report(request.renderJobId, update);
    }
}

function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}
