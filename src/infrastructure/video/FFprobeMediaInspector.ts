import ffmpeg from 'fluent-ffmpeg';
import { IMediaInspector } from '../../domain/ports/IMediaInspector';

/**
 * Reads media durations with ffprobe.
 */
export class FFprobeMediaInspector implements IMediaInspector {
    probeDurationSeconds(filePath: string): Promise<number> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err, data) => {
                if (err) {
                    reject(new Error(`ffprobe failed for ${filePath}: ${err.message}`));
                    return;
                }

                const duration = Number(data.format.duration);
                if (!Number.isFinite(duration) || duration <= 0) {
                    reject(new Error(`ffprobe reported no duration for ${filePath}`));
                    return;
                }
                resolve(duration);
            });
        });
    }
}
