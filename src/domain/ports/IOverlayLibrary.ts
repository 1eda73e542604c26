import { BlendMode, EffectKind } from '../entities/EffectLayer';

export interface OverlaySource {
    kind: EffectKind;
    path: string;
    durationSeconds: number;
    opacity: number;
    blendMode: BlendMode;
}

/**
 * IOverlayLibrary - The versioned set of overlay clips bundled with the service.
 * Implementations: BundledOverlayLibrary
 */
export interface IOverlayLibrary {
    readonly version: string;
    /** Sources in composition order, bottom layer first */
    sources(): readonly OverlaySource[];
    exists(filePath: string): boolean;
}
