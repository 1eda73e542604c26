import { IHardwareProbe } from '../domain/ports/IHardwareProbe';

/**
 * Process-scoped record of whether the hardware encoder works.
 *
 * The probe runs once, on first use; every caller after that reads the
 * cached answer. `invalidate()` is the only way to make it probe again.
 * Concurrent first callers share one in-flight probe.
 */
export class HardwareCapabilityCache {
    private pending: Promise<boolean> | null = null;
    private known: boolean | null = null;

    constructor(private readonly probe: IHardwareProbe) { }

    isAvailable(): Promise<boolean> {
        if (this.known !== null) {
            return Promise.resolve(this.known);
        }
        if (!this.pending) {
            const probing = this.probe.isHardwareEncoderAvailable().then(
                (available) => {
                    if (this.pending === probing) {
                        this.known = available;
                        this.pending = null;
                    }
                    return available;
                },
                (error: unknown) => {
                    if (this.pending === probing) {
                        this.pending = null;
                    }
                    throw error;
                }
            );
            this.pending = probing;
        }
        return this.pending;
    }

    /**
     * Last probe result without probing; null before the first probe completes.
     */
    peek(): boolean | null {
        return this.known;
    }

    invalidate(): void {
        console.log('[HardwareProbe] Capability cache invalidated; next render will re-probe');
        this.known = null;
        this.pending = null;
    }
}
