/**
 * A downloaded input file in the request workspace.
 */
export interface AssetRef {
    readonly sourceUrl: string;
    readonly localPath: string;
    readonly byteSize: number;
    readonly contentType: string;
}

export interface AudioAsset extends AssetRef {
    /** Length reported by the media inspector */
    readonly durationSeconds: number;
}

/**
 * Caller-supplied display window for one image.
 */
export interface TimingSpec {
    readonly startSeconds: number;
    readonly endSeconds: number;
}

export interface Resolution {
    readonly width: number;
    readonly height: number;
}

export interface RenderPlanEntry {
    readonly asset: AssetRef;
    readonly timing: TimingSpec;
    readonly displayIndex: number;
    /** endSeconds - startSeconds; the time this image is on screen */
    readonly displayDurationSeconds: number;
}

/**
 * Validated, immutable description of what to render.
 * Consumed by both the effect compositor and the encode orchestrator.
 */
export interface RenderPlan {
    readonly entries: readonly RenderPlanEntry[];
    readonly audio: AudioAsset;
    /** Nominal output length: the last endSeconds of the timeline */
    readonly totalDurationSeconds: number;
    /** Sum of display durations; shorter than the total when the timeline has gaps */
    readonly timelineDurationSeconds: number;
    readonly resolution: Resolution;
    readonly fps: number;
}

/**
 * Seconds the final image is held so the contiguous timeline reaches the total.
 */
export function holdSecondsOf(plan: RenderPlan): number {
    const hold = plan.totalDurationSeconds - plan.timelineDurationSeconds;
    return hold > 0 ? roundSeconds(hold) : 0;
}

/**
 * Millisecond rounding keeps derived durations stable across float noise.
 */
export function roundSeconds(value: number): number {
    return Math.round(value * 1000) / 1000;
}
