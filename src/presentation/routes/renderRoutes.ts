import { Router, Request, Response } from 'express';
import { RenderPipeline } from '../../application/RenderPipeline';
import { HardwareCapabilityCache } from '../../application/HardwareCapabilityCache';
import { RenderRequestValidator } from '../validation/RenderRequestValidator';
import { AppError, asyncHandler } from '../middleware/errorHandler';

/**
 * Creates render routes with dependency injection.
 */
export function createRenderRoutes(
    pipeline: RenderPipeline,
    validator: RenderRequestValidator,
    capability: HardwareCapabilityCache,
    shutdownSignal?: AbortSignal
): Router {
    const router = Router();

    /**
     * POST /render
     *
     * Renders synchronously and answers with the public video URL.
     * If the caller hangs up first, or the process is shutting down, the render
     * is cancelled.
     */
    router.post(
        '/render',
        asyncHandler(async (req: Request, res: Response) => {
            if (shutdownSignal?.aborted) {
                throw new AppError(503, 'Server is shutting down', 'SHUTTING_DOWN');
            }
            const request = validator.validate(req.body);

            const controller = new AbortController();
            const onClose = () => {
                if (!res.writableEnded) {
                    console.warn(`[Render] Client disconnected, cancelling project ${request.projectId}`);
                    controller.abort();
                }
            };
            const onShutdown = () => {
                console.warn(`[Render] Shutting down, cancelling project ${request.projectId}`);
                controller.abort();
            };
            res.on('close', onClose);
            shutdownSignal?.addEventListener('abort', onShutdown, { once: true });

            try {
                const result = await pipeline.run(request, controller.signal);
                res.json(result);
            } finally {
                res.off('close', onClose);
                shutdownSignal?.removeEventListener('abort', onShutdown);
            }
        })
    );

    /**
     * POST /encoder/reprobe
     *
     * Forgets the cached hardware capability and probes again,
     * e.g. after a driver restart.
     */
    router.post(
        '/encoder/reprobe',
        asyncHandler(async (_req: Request, res: Response) => {
            capability.invalidate();
            const hardwareAvailable = await capability.isAvailable();
            res.json({ hardwareAvailable });
        })
    );

    return router;
}
