import { EffectAssetMissingError } from '../errors/RenderErrors';
import { EffectLayer } from '../entities/EffectLayer';
import { RenderPlan } from '../entities/RenderPlan';
import { IOverlayLibrary } from '../ports/IOverlayLibrary';

/**
 * Derives the overlay layers for a plan.
 *
 * Output depends only on the overlay library, the plan's resolution and its
 * total duration, so identical plans always produce identical layers.
 */
export class EffectCompositor {
    constructor(private readonly library: IOverlayLibrary) { }

    /**
     * Fails fast when any bundled overlay is absent.
     */
    assertAvailable(): void {
        for (const source of this.library.sources()) {
            if (!this.library.exists(source.path)) {
                throw new EffectAssetMissingError(source.path);
            }
        }
    }

    compose(plan: RenderPlan, applyEffects: boolean): readonly EffectLayer[] {
        if (!applyEffects) {
            return Object.freeze([]);
        }

        this.assertAvailable();

        const layers = this.library.sources().map((source): EffectLayer => {
            if (!(source.durationSeconds > 0)) {
                throw new Error(`Overlay ${source.kind} has no usable source duration`);
            }
            return Object.freeze({
                kind: source.kind,
                loopSourcePath: source.path,
                opacity: source.opacity,
                blendMode: source.blendMode,
                scaleToOutput: Object.freeze({ ...plan.resolution }),
                sourceDurationSeconds: source.durationSeconds,
                loopCount: loopsToCover(plan.totalDurationSeconds, source.durationSeconds),
                libraryVersion: this.library.version,
            });
        });

        return Object.freeze(layers);
    }
}

/**
 * Whole plays of a clip needed to cover a duration. Looping restarts only at
 * the end of a full play, and the excess is trimmed off the final one.
 */
export function loopsToCover(totalSeconds: number, sourceSeconds: number): number {
    // Millisecond grid so 10 / 2.5 is 4 plays, not 5.
    const totalMs = Math.round(totalSeconds * 1000);
    const sourceMs = Math.round(sourceSeconds * 1000);
    return Math.max(1, Math.ceil(totalMs / sourceMs));
}
