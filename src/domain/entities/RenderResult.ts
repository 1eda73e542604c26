import { RenderError } from '../errors/RenderErrors';
import { EncoderChoice } from './EncodeJob';

export type RenderState =
    | 'INIT'
    | 'PROBE_HARDWARE'
    | 'HARDWARE_ENCODE'
    | 'SOFTWARE_ENCODE'
    | 'VERIFY'
    | 'DONE'
    | 'FAILED';

export interface RenderSuccess {
    status: 'succeeded';
    outputPath: string;
    wallClockSeconds: number;
    encoderUsed: EncoderChoice;
    transitions: RenderState[];
}

export interface RenderFailure {
    status: 'failed';
    error: RenderError;
    wallClockSeconds: number;
    /** Last encoder attempted, null when the job failed before encoding */
    encoderUsed: EncoderChoice | null;
    transitions: RenderState[];
}

/**
 * Outcome of one orchestrator run. Produced exactly once per call.
 */
export type RenderResult = RenderSuccess | RenderFailure;
