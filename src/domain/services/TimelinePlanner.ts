import { ValidationError } from '../errors/RenderErrors';
import {
    AssetRef,
    AudioAsset,
    RenderPlan,
    RenderPlanEntry,
    Resolution,
    TimingSpec,
    roundSeconds,
} from '../entities/RenderPlan';

export interface TimelinePlannerOptions {
    resolution: Resolution;
    fps: number;
    /** How far the last image may run past the end of the audio */
    audioToleranceSeconds: number;
}

/**
 * Validates caller timings against the audio track and builds the render plan.
 *
 * Display order is index order. Absolute start times are only checked, never
 * used for placement: the rendered timeline is the images concatenated by
 * their display durations.
 */
export class TimelinePlanner {
    constructor(private readonly options: TimelinePlannerOptions) {
        if (options.resolution.width <= 0 || options.resolution.height <= 0) {
            throw new Error('Output resolution must be positive');
        }
        if (options.fps <= 0) {
            throw new Error('Output fps must be positive');
        }
    }

    /**
     * Shape and ordering checks that need no downloaded asset.
     */
    validateTimeline(imageCount: number, timings: readonly TimingSpec[]): void {
        if (imageCount !== timings.length) {
            throw new ValidationError(
                `Image and timing counts differ: ${imageCount} images, ${timings.length} timings`
            );
        }
        if (timings.length === 0) {
            throw new ValidationError('At least one image is required');
        }

        const problems: string[] = [];
        timings.forEach((timing, index) => {
            const { startSeconds, endSeconds } = timing;
            if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds)) {
                problems.push(`timings[${index}] must be finite numbers`);
                return;
            }
            if (startSeconds < 0) {
                problems.push(`timings[${index}].startSeconds must not be negative`);
            }
            // Compared on the millisecond grid the plan is built on.
            const start = roundSeconds(startSeconds);
            if (start >= roundSeconds(endSeconds)) {
                problems.push(`timings[${index}] must start before it ends (${startSeconds} >= ${endSeconds})`);
            }
            if (index > 0) {
                const previous = timings[index - 1];
                if (start < roundSeconds(previous.startSeconds)) {
                    problems.push(`timings[${index}] starts before timings[${index - 1}]; timelines must be in display order`);
                } else if (start < roundSeconds(previous.endSeconds)) {
                    problems.push(`timings[${index}] overlaps timings[${index - 1}]`);
                }
            }
        });

        if (problems.length > 0) {
            throw new ValidationError(`Invalid timeline: ${problems[0]}`, problems);
        }
    }

    /**
     * Rejects timelines that run past the audio by more than the tolerance.
     */
    assertWithinAudio(timings: readonly TimingSpec[], audioDurationSeconds: number): void {
        const limit = audioDurationSeconds + this.options.audioToleranceSeconds;
        const index = timings.findIndex(t => t.endSeconds > limit);
        if (index !== -1) {
            throw new ValidationError(
                `timings[${index}].endSeconds (${timings[index].endSeconds}s) exceeds audio duration ` +
                `(${audioDurationSeconds}s) by more than ${this.options.audioToleranceSeconds}s`
            );
        }
    }

    plan(images: readonly AssetRef[], timings: readonly TimingSpec[], audio: AudioAsset): RenderPlan {
        this.validateTimeline(images.length, timings);
        this.assertWithinAudio(timings, audio.durationSeconds);

        const entries: RenderPlanEntry[] = images.map((asset, displayIndex) => {
            const timing = timings[displayIndex];
            return Object.freeze({
                asset: Object.freeze({ ...asset }),
                timing: Object.freeze({ startSeconds: timing.startSeconds, endSeconds: timing.endSeconds }),
                displayIndex,
                displayDurationSeconds: roundSeconds(timing.endSeconds - timing.startSeconds),
            });
        });

        const totalDurationSeconds = roundSeconds(timings[timings.length - 1].endSeconds);
        const timelineDurationSeconds = roundSeconds(
            entries.reduce((sum, entry) => sum + entry.displayDurationSeconds, 0)
        );

        console.log(
            `[Planner] ${entries.length} images, timeline ${timelineDurationSeconds}s, ` +
            `total ${totalDurationSeconds}s, audio ${audio.durationSeconds}s`
        );

        return Object.freeze({
            entries: Object.freeze(entries),
            audio: Object.freeze({ ...audio }),
            totalDurationSeconds,
            timelineDurationSeconds,
            resolution: Object.freeze({ ...this.options.resolution }),
            fps: this.options.fps,
        });
    }
}
