import { Resolution } from './RenderPlan';

export type EffectKind = 'smoke' | 'embers';

export type BlendMode = 'screen' | 'addition';

/**
 * One looping overlay composited above the base image sequence.
 */
export interface EffectLayer {
    readonly kind: EffectKind;
    readonly loopSourcePath: string;
    readonly opacity: number;
    readonly blendMode: BlendMode;
    /** Frame the overlay is cover-scaled and centre-cropped to */
    readonly scaleToOutput: Resolution;
    readonly sourceDurationSeconds: number;
    /** Whole plays of the source needed to cover the render */
    readonly loopCount: number;
    readonly libraryVersion: string;
}
