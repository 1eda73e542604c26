import ffmpeg from 'fluent-ffmpeg';
import { IHardwareProbe } from '../../domain/ports/IHardwareProbe';
import { errorMessage } from '../../domain/errors/RenderErrors';

/**
 * Checks that ffmpeg was built with the hardware encoder and that the encoder
 * can actually open a session on this machine.
 *
 * Being listed by `ffmpeg -encoders` only proves the build; a one-frame test
 * encode to the null muxer proves the device and driver.
 */
export class FFmpegHardwareProbe implements IHardwareProbe {
    constructor(
        private readonly encoderName: string = 'h264_nvenc',
        private readonly timeoutMs: number = 10000
    ) { }

    async isHardwareEncoderAvailable(): Promise<boolean> {
        try {
            const listed = await this.isEncoderListed();
            if (!listed) {
                console.warn(`[HardwareProbe] ✗ ${this.encoderName} not found in ffmpeg build, using software encoding`);
                return false;
            }

            await this.testEncode();
            console.log(`[HardwareProbe] ✓ ${this.encoderName} support confirmed`);
            return true;
        } catch (error) {
            console.warn(`[HardwareProbe] ✗ ${this.encoderName} unusable: ${errorMessage(error)}`);
            return false;
        }
    }

    private isEncoderListed(): Promise<boolean> {
        return new Promise((resolve, reject) => {
            ffmpeg.getAvailableEncoders((err, encoders) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve(Object.prototype.hasOwnProperty.call(encoders, this.encoderName));
            });
        });
    }

    private testEncode(): Promise<void> {
        return new Promise((resolve, reject) => {
            const cmd = ffmpeg()
                .input('color=c=black:s=256x256:d=0.1')
                .inputFormat('lavfi')
                .outputOptions([`-c:v ${this.encoderName}`, '-frames:v 1', '-f null']);

            const timer = setTimeout(() => {
                cmd.kill('SIGKILL');
                reject(new Error(`test encode timed out after ${this.timeoutMs}ms`));
            }, this.timeoutMs);

            cmd.on('end', () => {
                clearTimeout(timer);
                resolve();
            });
            cmd.on('error', (err: Error) => {
                clearTimeout(timer);
                reject(err);
            });

            cmd.save('-');
        });
    }
}
