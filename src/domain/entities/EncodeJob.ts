import { EffectLayer } from './EffectLayer';
import { RenderPlan } from './RenderPlan';

export type EncoderChoice = 'hardware' | 'software';

/**
 * One encode attempt. Owned by the orchestrator for its lifetime.
 */
export interface EncodeJob {
    readonly plan: RenderPlan;
    readonly effectLayers: readonly EffectLayer[];
    readonly encoderChoice: EncoderChoice;
    readonly outputPath: string;
    /** Scratch directory for the attempt's intermediate files */
    readonly workspaceDir: string;
}
