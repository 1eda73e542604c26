/**
 * IHardwareProbe - Checks whether the hardware encoder works in this environment.
 * Implementations: FFmpegHardwareProbe
 */
export interface IHardwareProbe {
    isHardwareEncoderAvailable(): Promise<boolean>;
}
