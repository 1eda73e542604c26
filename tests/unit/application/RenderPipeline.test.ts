import fs from 'fs';
import os from 'os';
import path from 'path';
import { RenderPipeline } from '../../../src/application/RenderPipeline';
import { EncodeOrchestrator } from '../../../src/application/EncodeOrchestrator';
import { HardwareCapabilityCache } from '../../../src/application/HardwareCapabilityCache';
import { EffectCompositor } from '../../../src/domain/services/EffectCompositor';
import { AssetRef } from '../../../src/domain/entities/RenderPlan';
import { EncodeJob } from '../../../src/domain/entities/EncodeJob';
import { RenderRequest } from '../../../src/domain/entities/RenderRequest';
import { AssetKind, IAssetResolver } from '../../../src/domain/ports/IAssetResolver';
import { EncodeOutcome, IEncoder } from '../../../src/domain/ports/IEncoder';
import { IMediaInspector } from '../../../src/domain/ports/IMediaInspector';
import { IPublisher } from '../../../src/domain/ports/IPublisher';
import { IRenderJobReporter, RenderJobUpdate } from '../../../src/domain/ports/IRenderJobReporter';
import {
    CancelledError,
    EffectAssetMissingError,
    EncodeError,
    FetchError,
    UploadError,
    ValidationError,
} from '../../../src/domain/errors/RenderErrors';
import { FakeOverlayLibrary, makePlanner } from '../../helpers/renderFixtures';

class FakeAssetResolver implements IAssetResolver {
    readonly requested: string[] = [];
    readonly failures = new Map<string, Error>();
    active = 0;
    peak = 0;

    async fetch(url: string, destinationPath: string, kind: AssetKind, signal?: AbortSignal): Promise<AssetRef> {
        this.requested.push(url);
        this.active++;
        this.peak = Math.max(this.peak, this.active);
        try {
            await new Promise(resolve => setTimeout(resolve, 2));
            if (signal?.aborted) {
                throw new CancelledError(`Download cancelled: ${url}`);
            }
            const failure = this.failures.get(url);
            if (failure) {
                throw failure;
            }
            const localPath = `${destinationPath}${kind === 'audio' ? '.mp3' : '.png'}`;
            await fs.promises.writeFile(localPath, `${kind}:${url}`);
            return { sourceUrl: url, localPath, byteSize: 10, contentType: kind === 'audio' ? 'audio/mpeg' : 'image/png' };
        } finally {
            this.active--;
        }
    }
}

class FakeEncoder implements IEncoder {
    readonly jobs: EncodeJob[] = [];
    outcome: EncodeOutcome = { ok: true, elapsedSeconds: 1 };

    async encode(job: EncodeJob): Promise<EncodeOutcome> {
        this.jobs.push(job);
        if (this.outcome.ok) {
            await fs.promises.writeFile(job.outputPath, 'mp4-bytes');
        }
        return this.outcome;
    }
}

class FakePublisher implements IPublisher {
    readonly uploads: Array<{ key: string; content: string }> = [];
    failure: Error | null = null;

    async upload(localPath: string, destinationKey: string): Promise<string> {
        if (this.failure) {
            throw this.failure;
        }
        this.uploads.push({ key: destinationKey, content: await fs.promises.readFile(localPath, 'utf-8') });
        return `https://storage.example.com/public/${destinationKey}`;
    }
}

class FakeReporter implements IRenderJobReporter {
    readonly updates: Array<{ jobId: string; update: RenderJobUpdate }> = [];

    async report(jobId: string, update: RenderJobUpdate): Promise<boolean> {
        this.updates.push({ jobId, update });
        return true;
    }
}

describe('RenderPipeline', () => {
    let scratchRoot: string;
    let resolver: FakeAssetResolver;
    let encoder: FakeEncoder;
    let publisher: FakePublisher;
    let reporter: FakeReporter;
    let overlays: FakeOverlayLibrary;
    let inspector: jest.Mocked<IMediaInspector>;
    let createJobReporter: jest.Mock<IRenderJobReporter, []>;
    let audioDuration: number;
    let pipeline: RenderPipeline;

    const baseRequest = (overrides: Partial<RenderRequest> = {}): RenderRequest => ({
        imageUrls: ['https://cdn.example.com/a.png', 'https://cdn.example.com/b.png'],
        timings: [
            { startSeconds: 0, endSeconds: 5 },
            { startSeconds: 5, endSeconds: 10 },
        ],
        audioUrl: 'https://cdn.example.com/voice.mp3',
        projectId: 'proj-1',
        applyEffects: false,
        storage: { projectUrl: 'https://storage.example.com', serviceKey: 'test-secret', bucket: 'generated-assets' },
        ...overrides,
    });

    const createPipeline = (fetchConcurrency: number = 20) => {
        const capability = new HardwareCapabilityCache({ isHardwareEncoderAvailable: async () => true });
        const orchestrator = new EncodeOrchestrator(encoder, capability, inspector, {
            scratchRoot,
            encodeTimeoutMs: 60000,
            outputDurationToleranceSeconds: 1,
        });
        return new RenderPipeline(
            {
                assetResolver: resolver,
                mediaInspector: inspector,
                planner: makePlanner(),
                compositor: new EffectCompositor(overlays),
                orchestrator,
                createPublisher: () => publisher,
                createJobReporter,
            },
            { scratchRoot, fetchConcurrency }
        );
    };

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });

        scratchRoot = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'render-pipeline-'));
        resolver = new FakeAssetResolver();
        encoder = new FakeEncoder();
        publisher = new FakePublisher();
        reporter = new FakeReporter();
        overlays = new FakeOverlayLibrary();
        audioDuration = 10;
        inspector = {
            probeDurationSeconds: jest.fn(async (filePath: string) => (filePath.endsWith('.mp3') ? audioDuration : 10)),
        };
        createJobReporter = jest.fn((): IRenderJobReporter => reporter);
        pipeline = createPipeline();
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.promises.rm(scratchRoot, { recursive: true, force: true });
    });

    describe('successful render', () => {
        it('should render, upload under the project key and return the public URL', async () => {
            const response = await pipeline.run(baseRequest());

            expect(response).toEqual({
                videoUrl: 'https://storage.example.com/public/proj-1/video.mp4',
                renderTimeSeconds: expect.any(Number),
            });
            expect(publisher.uploads).toEqual([{ key: 'proj-1/video.mp4', content: 'mp4-bytes' }]);
        });

        it('should fetch audio first, then every image', async () => {
            await pipeline.run(baseRequest());

            expect(resolver.requested).toEqual([
                'https://cdn.example.com/voice.mp3',
                'https://cdn.example.com/a.png',
                'https://cdn.example.com/b.png',
            ]);
        });

        it('should plan images in display order', async () => {
            await pipeline.run(baseRequest());

            const plan = encoder.jobs[0].plan;
            expect(plan.entries.map(e => e.asset.sourceUrl)).toEqual([
                'https://cdn.example.com/a.png',
                'https://cdn.example.com/b.png',
            ]);
            expect(plan.totalDurationSeconds).toBe(10);
            expect(plan.audio.durationSeconds).toBe(10);
        });

        it('should pass overlay layers through when effects are on', async () => {
            await pipeline.run(baseRequest({ applyEffects: true }));

            expect(encoder.jobs[0].effectLayers.map(layer => layer.kind)).toEqual(['smoke', 'embers']);
        });

        it('should leave no scratch files behind', async () => {
            await pipeline.run(baseRequest());

            expect(await fs.promises.readdir(scratchRoot)).toEqual([]);
        });

        it('should keep the job record up to date', async () => {
            await pipeline.run(baseRequest({ renderJobId: 'job-9' }));

            expect(reporter.updates.map(u => [u.jobId, u.update.status, u.update.progress])).toEqual([
                ['job-9', 'rendering', 10],
                ['job-9', 'rendering', 40],
                ['job-9', 'complete', 100],
            ]);
            expect(reporter.updates[2].update.videoUrl).toBe('https://storage.example.com/public/proj-1/video.mp4');
        });

        it('should not report without a job id', async () => {
            await pipeline.run(baseRequest());

            expect(createJobReporter).not.toHaveBeenCalled();
        });

        it('should limit concurrent image downloads', async () => {
            pipeline = createPipeline(2);
            const urls = [0, 1, 2, 3, 4].map(i => `https://cdn.example.com/${i}.png`);

            await pipeline.run(baseRequest({
                imageUrls: urls,
                timings: urls.map((_, i) => ({ startSeconds: i * 2, endSeconds: i * 2 + 2 })),
            }));

            expect(resolver.peak).toBe(2);
        });
    });

    describe('failures', () => {
        it('should reject a malformed timeline before downloading anything', async () => {
            await expect(pipeline.run(baseRequest({ timings: [{ startSeconds: 0, endSeconds: 5 }] })))
                .rejects.toThrow('Image and timing counts differ: 2 images, 1 timings');

            expect(resolver.requested).toEqual([]);
        });

        it('should fail fast when a bundled overlay is missing', async () => {
            overlays.missing.add('/overlays/smoke.mp4');

            await expect(pipeline.run(baseRequest({ applyEffects: true }))).rejects.toBeInstanceOf(EffectAssetMissingError);

            expect(resolver.requested).toEqual([]);
        });

        it('should reject timings that outrun the audio without fetching images', async () => {
            audioDuration = 6;

            await expect(pipeline.run(baseRequest())).rejects.toBeInstanceOf(ValidationError);

            expect(resolver.requested).toEqual(['https://cdn.example.com/voice.mp3']);
            expect(encoder.jobs).toHaveLength(0);
        });

        it('should report audio that cannot be probed as a fetch failure', async () => {
            inspector.probeDurationSeconds.mockRejectedValueOnce(new Error('ffprobe failed'));

            const run = pipeline.run(baseRequest());

            await expect(run).rejects.toBeInstanceOf(FetchError);
            await expect(run).rejects.toThrow('Audio is not readable media: ffprobe failed');
        });

        it('should surface the first image fetch failure and clean up', async () => {
            resolver.failures.set(
                'https://cdn.example.com/b.png',
                new FetchError('HTTP 404 fetching https://cdn.example.com/b.png', 'https://cdn.example.com/b.png', { statusCode: 404 })
            );

            await expect(pipeline.run(baseRequest({ renderJobId: 'job-9' })))
                .rejects.toThrow('HTTP 404 fetching https://cdn.example.com/b.png');

            expect(encoder.jobs).toHaveLength(0);
            expect(await fs.promises.readdir(scratchRoot)).toEqual([]);
            expect(reporter.updates[reporter.updates.length - 1].update).toEqual({
                status: 'failed',
                progress: 0,
                message: 'Render failed',
                error: 'HTTP 404 fetching https://cdn.example.com/b.png',
            });
        });

        it('should raise the encode error when both encoders fail', async () => {
            encoder.outcome = { ok: false, exitCode: 1, detail: 'bad input', deviceUnavailable: false, aborted: false, elapsedSeconds: 1 };

            await expect(pipeline.run(baseRequest())).rejects.toBeInstanceOf(EncodeError);

            expect(encoder.jobs.map(job => job.encoderChoice)).toEqual(['hardware', 'software']);
            expect(publisher.uploads).toEqual([]);
        });

        it('should raise upload errors and clean up', async () => {
            publisher.failure = new UploadError('Storage rejected credentials (401)', 401);

            await expect(pipeline.run(baseRequest())).rejects.toBeInstanceOf(UploadError);

            expect(await fs.promises.readdir(scratchRoot)).toEqual([]);
        });

        it('should not start a cancelled request', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(pipeline.run(baseRequest(), controller.signal)).rejects.toBeInstanceOf(CancelledError);

            expect(resolver.requested).toEqual([]);
            expect(await fs.promises.readdir(scratchRoot)).toEqual([]);
        });

        it('should stop downloading when cancelled mid-fetch', async () => {
            const controller = new AbortController();
            const urls = [0, 1, 2, 3].map(i => `https://cdn.example.com/${i}.png`);
            pipeline = createPipeline(1);
            inspector.probeDurationSeconds.mockImplementationOnce(async () => {
                setTimeout(() => controller.abort(), 1);
                return 10;
            });

            await expect(pipeline.run(baseRequest({
                imageUrls: urls,
                timings: urls.map((_, i) => ({ startSeconds: i * 2, endSeconds: i * 2 + 2 })),
            }), controller.signal)).rejects.toBeInstanceOf(CancelledError);

            expect(resolver.requested.length).toBeLessThan(1 + urls.length);
            expect(encoder.jobs).toHaveLength(0);
        });
    });
});
