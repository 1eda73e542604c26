import express, { Application, NextFunction, Request, Response } from 'express';
import ffmpeg from 'fluent-ffmpeg';
import { Config } from '../config';
import { RenderPipeline } from '../application/RenderPipeline';
import { EncodeOrchestrator } from '../application/EncodeOrchestrator';
import { HardwareCapabilityCache } from '../application/HardwareCapabilityCache';
import { TimelinePlanner } from '../domain/services/TimelinePlanner';
import { EffectCompositor } from '../domain/services/EffectCompositor';

// Infrastructure imports
import { HttpAssetResolver } from '../infrastructure/assets/HttpAssetResolver';
import { BundledOverlayLibrary } from '../infrastructure/overlays/BundledOverlayLibrary';
import { FFmpegEncoder } from '../infrastructure/video/FFmpegEncoder';
import { FFmpegHardwareProbe } from '../infrastructure/video/FFmpegHardwareProbe';
import { FFprobeMediaInspector } from '../infrastructure/video/FFprobeMediaInspector';
import { SupabaseStoragePublisher } from '../infrastructure/storage/SupabaseStoragePublisher';
import { SupabaseRenderJobReporter } from '../infrastructure/jobs/SupabaseRenderJobReporter';

// Route imports
import { createRenderRoutes } from './routes/renderRoutes';
import { RenderRequestValidator } from './validation/RenderRequestValidator';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
    pipeline: RenderPipeline;
    validator: RenderRequestValidator;
    capability: HardwareCapabilityCache;
    /** Fires when the process is going down; in-flight renders are cancelled */
    shutdownSignal?: AbortSignal;
}

/**
 * Production wiring, plus what the bootstrap checks before listening.
 */
export interface ServiceDependencies extends AppDependencies {
    overlays: BundledOverlayLibrary;
}

/**
 * Creates and configures the Express application.
 * Tests pass their own dependencies; production wiring comes from createDependencies.
 */
export function createApp(config: Config, dependencies: AppDependencies = createDependencies(config)): Application {
    const app = express();
    const { pipeline, validator, capability, shutdownSignal } = dependencies;

    // Middleware
    app.use(express.json({ limit: '1mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: SERVICE_VERSION,
            encoder: {
                hardwareAvailable: config.forceSoftwareEncode ? false : capability.peek(),
                forceSoftware: config.forceSoftwareEncode,
            },
        });
    });

    // Routes
    app.use(createRenderRoutes(pipeline, validator, capability, shutdownSignal));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): ServiceDependencies {
    if (config.ffmpegPath) {
        ffmpeg.setFfmpegPath(config.ffmpegPath);
    }
    if (config.ffprobePath) {
        ffmpeg.setFfprobePath(config.ffprobePath);
    }

    const resolution = { width: config.outputWidth, height: config.outputHeight };
    const inspector = new FFprobeMediaInspector();
    const overlays = new BundledOverlayLibrary(config.overlayDir, inspector);
    const capability = new HardwareCapabilityCache(new FFmpegHardwareProbe(config.hardwareEncoder));

    const encoder = new FFmpegEncoder({
        hardwareEncoder: config.hardwareEncoder,
        softwareEncoder: config.softwareEncoder,
        nvencPreset: config.nvencPreset,
        softwarePreset: config.softwarePreset,
        constantQuality: config.constantQuality,
        audioBitrate: config.audioBitrate,
    });

    const orchestrator = new EncodeOrchestrator(encoder, capability, inspector, {
        scratchRoot: config.scratchRoot,
        encodeTimeoutMs: config.encodeTimeoutMs,
        outputDurationToleranceSeconds: config.outputDurationToleranceSeconds,
        forceSoftware: config.forceSoftwareEncode,
    });

    const pipeline = new RenderPipeline(
        {
            assetResolver: new HttpAssetResolver({
                timeoutMs: config.fetchTimeoutMs,
                audioTimeoutMs: config.audioFetchTimeoutMs,
                maxAttempts: config.fetchMaxAttempts,
            }),
            mediaInspector: inspector,
            planner: new TimelinePlanner({
                resolution,
                fps: config.outputFps,
                audioToleranceSeconds: config.audioDurationToleranceSeconds,
            }),
            compositor: new EffectCompositor(overlays),
            orchestrator,
            createPublisher: (destination) => new SupabaseStoragePublisher(destination),
            createJobReporter: (destination) => new SupabaseRenderJobReporter(destination),
        },
        {
            scratchRoot: config.scratchRoot,
            fetchConcurrency: config.fetchConcurrency,
        }
    );

    if (config.forceSoftwareEncode) {
        console.log('🖥️ Software encoding forced (FORCE_SOFTWARE_ENCODE)');
    } else {
        console.log(`⚡ Hardware encoder: ${config.hardwareEncoder} (probed on first render)`);
    }

    return {
        pipeline,
        validator: new RenderRequestValidator(config.defaultStorageBucket),
        capability,
        overlays,
    };
}
