import fs from 'fs';
import { EffectLayer } from '../domain/entities/EffectLayer';
import { EncodeJob, EncoderChoice } from '../domain/entities/EncodeJob';
import { RenderPlan, roundSeconds } from '../domain/entities/RenderPlan';
import { RenderResult, RenderState } from '../domain/entities/RenderResult';
import { IEncoder } from '../domain/ports/IEncoder';
import { IMediaInspector } from '../domain/ports/IMediaInspector';
import {
    CancelledError,
    EncodeError,
    OutputIntegrityError,
    RenderError,
    TimeoutError,
    errorMessage,
} from '../domain/errors/RenderErrors';
import { ScratchWorkspace } from '../infrastructure/workspace/ScratchWorkspace';
import { HardwareCapabilityCache } from './HardwareCapabilityCache';
import { Semaphore } from './Semaphore';

export interface EncodeOrchestratorOptions {
    scratchRoot: string;
    /** Ceiling for the whole encode stage, hardware attempt and fallback together */
    encodeTimeoutMs: number;
    outputDurationToleranceSeconds: number;
    forceSoftware?: boolean;
}

export interface RenderOptions {
    outputPath: string;
    signal?: AbortSignal;
}

/**
 * Drives one render through
 * INIT → PROBE_HARDWARE → HARDWARE_ENCODE | SOFTWARE_ENCODE → VERIFY → DONE,
 * with FAILED reachable from every step.
 *
 * A failed hardware encode falls back to software exactly once; software
 * failures are terminal. Renders are serialised through a single encode slot
 * because the hardware encoder cannot be shared between concurrent jobs.
 */
export class EncodeOrchestrator {
    private readonly encodeSlot = new Semaphore(1);

    constructor(
        private readonly encoder: IEncoder,
        private readonly capability: HardwareCapabilityCache,
        private readonly inspector: IMediaInspector,
        private readonly options: EncodeOrchestratorOptions
    ) { }

    async render(plan: RenderPlan, layers: readonly EffectLayer[], options: RenderOptions): Promise<RenderResult> {
        const startedAt = Date.now();
        const transitions: RenderState[] = [];
        const enter = (state: RenderState, note?: string) => {
            transitions.push(state);
            console.log(`[Encode] → ${state}${note ? ` (${note})` : ''}`);
        };
        const wallClockSeconds = () => roundSeconds((Date.now() - startedAt) / 1000);

        let encoderUsed: EncoderChoice | null = null;
        let encodeSeconds = 0;
        let workspace: ScratchWorkspace | null = null;
        let stage: EncodeStage | null = null;
        let slotHeld = false;

        enter('INIT');
        try {
            workspace = await ScratchWorkspace.create(this.options.scratchRoot, 'encode');

            await this.encodeSlot.acquire(options.signal);
            slotHeld = true;
            stage = new EncodeStage(options.signal, this.options.encodeTimeoutMs);

            enter('PROBE_HARDWARE');
            let choice: EncoderChoice = (await this.shouldUseHardware()) ? 'hardware' : 'software';
            stage.throwIfAborted();

            if (choice === 'hardware') {
                enter('HARDWARE_ENCODE');
                encoderUsed = 'hardware';
                const outcome = await this.encoder.encode(
                    this.createJob(plan, layers, 'hardware', options.outputPath, workspace.dir),
                    stage.signal
                );
                // A clean exit after the deadline or a cancel is still a failure.
                stage.throwIfAborted();
                encodeSeconds = outcome.elapsedSeconds;
                if (!outcome.ok) {
                    if (outcome.aborted) {
                        throw stage.reason();
                    }
                    console.warn(
                        `[Encode] Hardware encode failed after ${outcome.elapsedSeconds.toFixed(1)}s ` +
                        `(exit ${outcome.exitCode ?? 'unknown'}): ${outcome.detail}. Falling back to software...`
                    );
                    if (outcome.deviceUnavailable) {
                        this.capability.invalidate();
                    }
                    await removeFile(options.outputPath);
                    choice = 'software';
                }
            }

            if (choice === 'software') {
                enter('SOFTWARE_ENCODE');
                encoderUsed = 'software';
                const outcome = await this.encoder.encode(
                    this.createJob(plan, layers, 'software', options.outputPath, workspace.dir),
                    stage.signal
                );
                stage.throwIfAborted();
                encodeSeconds = outcome.elapsedSeconds;
                if (!outcome.ok) {
                    if (outcome.aborted) {
                        throw stage.reason();
                    }
                    throw new EncodeError(
                        `Software encode failed (exit ${outcome.exitCode ?? 'unknown'}): ${outcome.detail}`,
                        'software'
                    );
                }
            }

            stage.dispose();

            enter('VERIFY', `${choice} encode took ${encodeSeconds.toFixed(1)}s`);
            await this.verify(plan, options.outputPath);

            enter('DONE', `${encoderUsed ?? 'software'} in ${wallClockSeconds()}s`);
            return {
                status: 'succeeded',
                outputPath: options.outputPath,
                wallClockSeconds: wallClockSeconds(),
                encoderUsed: choice,
                transitions,
            };
        } catch (error) {
            const renderError = toRenderError(error, encoderUsed);
            enter('FAILED', `${renderError.code}: ${renderError.message}`);
            await removeFile(options.outputPath);
            return {
                status: 'failed',
                error: renderError,
                wallClockSeconds: wallClockSeconds(),
                encoderUsed,
                transitions,
            };
        } finally {
            stage?.dispose();
            if (slotHeld) {
                this.encodeSlot.release();
            }
            await workspace?.dispose();
        }
    }

    private async shouldUseHardware(): Promise<boolean> {
        if (this.options.forceSoftware) {
            console.log('[Encode] Software encoding forced by configuration');
            return false;
        }
        try {
            return await this.capability.isAvailable();
        } catch (error) {
            console.warn(`[Encode] Hardware probe failed, using software: ${errorMessage(error)}`);
            return false;
        }
    }

    private createJob(
        plan: RenderPlan,
        effectLayers: readonly EffectLayer[],
        encoderChoice: EncoderChoice,
        outputPath: string,
        workspaceDir: string
    ): EncodeJob {
        return Object.freeze({ plan, effectLayers, encoderChoice, outputPath, workspaceDir });
    }

    /**
     * A clean encoder exit is not enough: the file must exist, have content and
     * run for the planned duration.
     */
    private async verify(plan: RenderPlan, outputPath: string): Promise<void> {
        let size: number;
        try {
            size = (await fs.promises.stat(outputPath)).size;
        } catch {
            throw new OutputIntegrityError(`Encoder reported success but no output exists at ${outputPath}`);
        }
        if (size === 0) {
            throw new OutputIntegrityError(`Encoder reported success but the output is empty: ${outputPath}`);
        }

        let duration: number;
        try {
            duration = await this.inspector.probeDurationSeconds(outputPath);
        } catch (error) {
            throw new OutputIntegrityError(`Output could not be probed: ${errorMessage(error)}`);
        }

        const tolerance = this.options.outputDurationToleranceSeconds;
        if (Math.abs(duration - plan.totalDurationSeconds) > tolerance) {
            throw new OutputIntegrityError(
                `Output runs ${duration}s, expected ${plan.totalDurationSeconds}s (±${tolerance}s)`
            );
        }

        console.log(`[Encode] Verified output: ${(size / 1024 / 1024).toFixed(1)} MB, ${duration}s`);
    }
}

/**
 * Abort scope for the encode stage: fires on the caller's signal (cancel) or
 * when the stage deadline passes (timeout), and remembers which.
 */
class EncodeStage {
    private readonly controller = new AbortController();
    private readonly timer: NodeJS.Timeout;
    private readonly onParentAbort = () => this.controller.abort(new CancelledError());

    constructor(private readonly parent: AbortSignal | undefined, timeoutMs: number) {
        if (parent?.aborted) {
            this.controller.abort(new CancelledError());
        } else {
            parent?.addEventListener('abort', this.onParentAbort, { once: true });
        }
        this.timer = setTimeout(() => {
            this.controller.abort(new TimeoutError(`Encode exceeded ${timeoutMs}ms`));
        }, timeoutMs);
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    reason(): RenderError {
        const reason: unknown = this.controller.signal.reason;
        return reason instanceof RenderError ? reason : new CancelledError();
    }

    throwIfAborted(): void {
        if (this.controller.signal.aborted) {
            throw this.reason();
        }
    }

    dispose(): void {
        clearTimeout(this.timer);
        this.parent?.removeEventListener('abort', this.onParentAbort);
    }
}

function toRenderError(error: unknown, encoder: EncoderChoice | null): RenderError {
    if (error instanceof RenderError) {
        return error;
    }
    return new EncodeError(`Render failed: ${errorMessage(error)}`, encoder ?? 'software', { cause: error });
}

async function removeFile(filePath: string): Promise<void> {
    await fs.promises.rm(filePath, { force: true });
}
