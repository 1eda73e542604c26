import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { EncodeJob, EncoderChoice } from '../../domain/entities/EncodeJob';
import { EncodeOutcome, IEncoder } from '../../domain/ports/IEncoder';
import { buildCompositionGraph, buildConcatList, formatSeconds } from './CompositionGraph';

export interface EncoderSettings {
    hardwareEncoder: string;
    softwareEncoder: string;
    nvencPreset: string;
    softwarePreset: string;
    constantQuality: number;
    audioBitrate: string;
}

/**
 * Encoder output that means the GPU encoder cannot be used at all,
 * as opposed to a problem with this particular job.
 */
const DEVICE_UNAVAILABLE_PATTERNS: RegExp[] = [
    /no nvenc capable devices found/i,
    /openencodesessionex failed/i,
    /cannot load libnvidia-encode/i,
    /cannot load libcuda/i,
    /driver does not support the required nvenc api version/i,
    /cuda_error_[a-z_]+/i,
    /no capable devices found/i,
];

const STDERR_TAIL_CHARS = 500;

/**
 * Runs one composition through the ffmpeg binary via fluent-ffmpeg.
 * Requires 'ffmpeg' to be installed in the system.
 */
export class FFmpegEncoder implements IEncoder {
    constructor(private readonly settings: EncoderSettings) { }

    async encode(job: EncodeJob, signal: AbortSignal): Promise<EncodeOutcome> {
        const startedAt = Date.now();
        const elapsed = () => (Date.now() - startedAt) / 1000;

        if (signal.aborted) {
            return { ok: false, exitCode: null, detail: 'aborted before start', deviceUnavailable: false, aborted: true, elapsedSeconds: 0 };
        }

        const listPath = path.join(job.workspaceDir, `concat_${job.encoderChoice}.txt`);
        await fs.promises.writeFile(listPath, buildConcatList(job.plan), 'utf-8');

        const graph = buildCompositionGraph(job.plan, job.effectLayers);
        const cmd = ffmpeg();

        cmd.input(listPath).inputOptions(['-f concat', '-safe 0']);
        for (const layer of job.effectLayers) {
            cmd.input(layer.loopSourcePath).inputOptions([`-stream_loop ${layer.loopCount - 1}`]);
        }
        cmd.input(job.plan.audio.localPath);

        cmd.complexFilter(graph.filters, [graph.videoLabel, graph.audioLabel]);
        cmd.outputOptions([
            ...this.videoCodecOptions(job.encoderChoice),
            '-pix_fmt yuv420p',
            `-r ${job.plan.fps}`,
            '-c:a aac',
            `-b:a ${this.settings.audioBitrate}`,
            `-t ${formatSeconds(job.plan.totalDurationSeconds)}`,
            '-movflags +faststart',
        ]);

        return new Promise<EncodeOutcome>((resolve) => {
            let killed = false;
            const onAbort = () => {
                killed = true;
                console.warn(`[Encode] Killing ${job.encoderChoice} encoder: ${String(signal.reason)}`);
                cmd.kill('SIGKILL');
            };
            signal.addEventListener('abort', onAbort, { once: true });

            // kill() is a no-op until the process has spawned, so an abort that
            // lands between save() and 'start' is replayed here.
            cmd.on('start', (commandLine: string) => {
                console.log(`[Encode] ${job.encoderChoice} encode started: ${commandLine}`);
                if (signal.aborted) {
                    killed = true;
                    console.warn(`[Encode] Signal fired before ${job.encoderChoice} encoder spawned, killing it`);
                    cmd.kill('SIGKILL');
                }
            });

            cmd.on('end', () => {
                signal.removeEventListener('abort', onAbort);
                if (killed || signal.aborted) {
                    resolve({
                        ok: false,
                        exitCode: null,
                        detail: 'encoder finished after the signal fired',
                        deviceUnavailable: false,
                        aborted: true,
                        elapsedSeconds: elapsed(),
                    });
                    return;
                }
                resolve({ ok: true, elapsedSeconds: elapsed() });
            });

            cmd.on('error', (err: Error, _stdout: unknown, stderr: unknown) => {
                signal.removeEventListener('abort', onAbort);
                const output = typeof stderr === 'string' ? stderr : '';
                const detail = (output || err.message).slice(-STDERR_TAIL_CHARS);
                resolve({
                    ok: false,
                    exitCode: parseExitCode(err.message),
                    detail,
                    deviceUnavailable: job.encoderChoice === 'hardware' && isDeviceUnavailable(`${err.message}\n${output}`),
                    aborted: killed || signal.aborted,
                    elapsedSeconds: elapsed(),
                });
            });

            cmd.save(job.outputPath);
        });
    }

    private videoCodecOptions(choice: EncoderChoice): string[] {
        const quality = String(this.settings.constantQuality);
        if (choice === 'hardware') {
            return [`-c:v ${this.settings.hardwareEncoder}`, `-preset ${this.settings.nvencPreset}`, `-cq ${quality}`];
        }
        return [`-c:v ${this.settings.softwareEncoder}`, `-preset ${this.settings.softwarePreset}`, `-crf ${quality}`];
    }
}

export function isDeviceUnavailable(output: string): boolean {
    return DEVICE_UNAVAILABLE_PATTERNS.some(pattern => pattern.test(output));
}

function parseExitCode(message: string): number | null {
    const match = message.match(/exited with code (\d+)/);
    return match ? Number.parseInt(match[1], 10) : null;
}
