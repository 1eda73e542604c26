import { EncodeJob } from '../entities/EncodeJob';

export interface EncodeSuccess {
    ok: true;
    elapsedSeconds: number;
}

export interface EncodeFailure {
    ok: false;
    exitCode: number | null;
    /** Tail of the encoder's error output */
    detail: string;
    /** The output indicates the hardware device is gone or unusable */
    deviceUnavailable: boolean;
    /** The process was killed because the signal fired */
    aborted: boolean;
    elapsedSeconds: number;
}

export type EncodeOutcome = EncodeSuccess | EncodeFailure;

/**
 * IEncoder - Port for one invocation of the external encoding engine.
 * Failures are reported in the outcome rather than thrown.
 * Implementations: FFmpegEncoder
 */
export interface IEncoder {
    encode(job: EncodeJob, signal: AbortSignal): Promise<EncodeOutcome>;
}
