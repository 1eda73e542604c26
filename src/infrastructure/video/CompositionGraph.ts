import { EffectLayer } from '../../domain/entities/EffectLayer';
import { RenderPlan, holdSecondsOf } from '../../domain/entities/RenderPlan';

export interface CompositionGraph {
    filters: string[];
    videoLabel: string;
    audioLabel: string;
    /** Index of the audio input; overlays occupy 1..layers.length */
    audioInputIndex: number;
}

/**
 * Formats seconds for FFmpeg arguments with at most millisecond precision.
 */
export function formatSeconds(value: number): string {
    return String(Math.round(value * 1000) / 1000);
}

function quoteConcatPath(filePath: string): string {
    return `'${filePath.replace(/'/g, "'\\''")}'`;
}

/**
 * Concat demuxer script: each image for its display duration, in display order.
 * The demuxer ignores the duration of the final entry, so the last image is
 * listed once more.
 */
export function buildConcatList(plan: RenderPlan): string {
    const lines = ['ffconcat version 1.0'];
    for (const entry of plan.entries) {
        lines.push(`file ${quoteConcatPath(entry.asset.localPath)}`);
        lines.push(`duration ${formatSeconds(entry.displayDurationSeconds)}`);
    }
    const last = plan.entries[plan.entries.length - 1];
    if (last) {
        lines.push(`file ${quoteConcatPath(last.asset.localPath)}`);
    }
    return lines.join('\n') + '\n';
}

/**
 * Filter graph for the full composition.
 *
 * Input 0 is the concat list, inputs 1..n the overlay loops, n+1 the audio.
 * The base is letterboxed into the output frame, held on its final image when
 * the timeline has gaps, and trimmed to the total. Overlays are cover-scaled
 * and blended in RGB; audio is padded with silence and trimmed to the same
 * length, so every stream ends at the total duration.
 */
export function buildCompositionGraph(plan: RenderPlan, layers: readonly EffectLayer[]): CompositionGraph {
    const { width, height } = plan.resolution;
    const total = formatSeconds(plan.totalDurationSeconds);
    const hold = holdSecondsOf(plan);
    const filters: string[] = [];

    const base = [
        `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black`,
        'setsar=1',
        `fps=${plan.fps}`,
    ];
    if (hold > 0) {
        base.push(`tpad=stop_mode=clone:stop_duration=${formatSeconds(hold)}`);
    }
    base.push(`trim=duration=${total}`, 'setpts=PTS-STARTPTS');

    if (layers.length === 0) {
        filters.push(`[0:v]${[...base, 'format=yuv420p'].join(',')}[vout]`);
    } else {
        filters.push(`[0:v]${[...base, 'format=gbrp'].join(',')}[base]`);

        layers.forEach((layer, i) => {
            const { width: lw, height: lh } = layer.scaleToOutput;
            filters.push(
                `[${i + 1}:v]` + [
                    `scale=${lw}:${lh}:force_original_aspect_ratio=increase`,
                    `crop=${lw}:${lh}`,
                    'setsar=1',
                    `fps=${plan.fps}`,
                    `trim=duration=${total}`,
                    'setpts=PTS-STARTPTS',
                    'format=gbrp',
                ].join(',') + `[fx${i}]`
            );
        });

        let previous = 'base';
        layers.forEach((layer, i) => {
            const label = `mix${i}`;
            filters.push(
                `[${previous}][fx${i}]blend=all_mode=${layer.blendMode}:all_opacity=${layer.opacity}[${label}]`
            );
            previous = label;
        });
        filters.push(`[${previous}]format=yuv420p[vout]`);
    }

    const audioInputIndex = layers.length + 1;
    filters.push(`[${audioInputIndex}:a]apad,atrim=duration=${total}[aout]`);

    return { filters, videoLabel: 'vout', audioLabel: 'aout', audioInputIndex };
}
