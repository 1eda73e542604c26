import fs from 'fs';
import path from 'path';
import { BlendMode, EffectKind } from '../../domain/entities/EffectLayer';
import { IOverlayLibrary, OverlaySource } from '../../domain/ports/IOverlayLibrary';
import { IMediaInspector } from '../../domain/ports/IMediaInspector';
import { EffectAssetMissingError, errorMessage } from '../../domain/errors/RenderErrors';

interface OverlayManifest {
    version: string;
    layers: OverlayManifestEntry[];
}

interface OverlayManifestEntry {
    kind: EffectKind;
    file: string;
    durationSeconds: number;
    opacity: number;
    blendMode: BlendMode;
}

export const OVERLAY_MANIFEST_FILE = 'manifest.json';

/** Manifest durations further than this from the probed clip are replaced */
const DURATION_DRIFT_SECONDS = 0.05;

/**
 * Overlay clips shipped with the service, described by `manifest.json` in the
 * overlay directory. The manifest is read once and kept for the process.
 */
export class BundledOverlayLibrary implements IOverlayLibrary {
    private manifest: OverlayManifest | null = null;
    /** Probed clip lengths that disagree with the manifest, by path */
    private readonly measured = new Map<string, number>();

    constructor(
        private readonly overlayDir: string,
        private readonly inspector?: IMediaInspector
    ) { }

    get version(): string {
        return this.load().version;
    }

    sources(): readonly OverlaySource[] {
        return this.load().layers.map(entry => {
            const sourcePath = path.join(this.overlayDir, entry.file);
            return {
                kind: entry.kind,
                path: sourcePath,
                durationSeconds: this.measured.get(sourcePath) ?? entry.durationSeconds,
                opacity: entry.opacity,
                blendMode: entry.blendMode,
            };
        });
    }

    exists(filePath: string): boolean {
        return fs.existsSync(filePath) && fs.statSync(filePath).size > 0;
    }

    /**
     * Startup check. Logs what is installed and, given an inspector, probes each
     * clip: loop counts are computed from the clip length, so a manifest value
     * that has drifted from the file is replaced by the measured one.
     */
    async describe(): Promise<void> {
        let sources: readonly OverlaySource[];
        try {
            sources = this.sources();
        } catch (error) {
            console.warn(`[Overlays] ✗ ${errorMessage(error)}; effects unavailable`);
            return;
        }
        for (const source of sources) {
            if (!this.exists(source.path)) {
                console.warn(`[Overlays] ✗ ${source.kind}: ${source.path} missing`);
                continue;
            }
            const sizeKb = fs.statSync(source.path).size / 1024;
            console.log(`[Overlays] ✓ ${source.kind}: ${source.path} (${sizeKb.toFixed(1)} KB)`);
            if (this.inspector) {
                await this.checkDuration(source, this.inspector);
            }
        }
    }

    private async checkDuration(source: OverlaySource, inspector: IMediaInspector): Promise<void> {
        let actual: number;
        try {
            actual = await inspector.probeDurationSeconds(source.path);
        } catch (error) {
            console.warn(
                `[Overlays] ✗ ${source.kind}: could not probe duration (${errorMessage(error)}); ` +
                `keeping manifest value ${source.durationSeconds}s`
            );
            return;
        }
        if (Math.abs(actual - source.durationSeconds) > DURATION_DRIFT_SECONDS) {
            console.warn(
                `[Overlays] ${source.kind}: manifest says ${source.durationSeconds}s but the clip runs ${actual}s; ` +
                'looping by the measured length'
            );
            this.measured.set(source.path, actual);
        }
    }

    private load(): OverlayManifest {
        if (this.manifest) {
            return this.manifest;
        }

        const manifestPath = path.join(this.overlayDir, OVERLAY_MANIFEST_FILE);
        if (!fs.existsSync(manifestPath)) {
            throw new EffectAssetMissingError(manifestPath);
        }

        const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
        this.manifest = parseManifest(parsed, manifestPath);
        return this.manifest;
    }
}

function parseManifest(value: unknown, source: string): OverlayManifest {
    if (!isRecord(value) || typeof value.version !== 'string' || !Array.isArray(value.layers)) {
        throw new Error(`Invalid overlay manifest ${source}: expected { version, layers[] }`);
    }

    const layers = value.layers.map((entry: unknown, index: number): OverlayManifestEntry => {
        if (
            !isRecord(entry) ||
            (entry.kind !== 'smoke' && entry.kind !== 'embers') ||
            typeof entry.file !== 'string' ||
            typeof entry.durationSeconds !== 'number' || entry.durationSeconds <= 0 ||
            typeof entry.opacity !== 'number' || entry.opacity < 0 || entry.opacity > 1 ||
            (entry.blendMode !== 'screen' && entry.blendMode !== 'addition')
        ) {
            throw new Error(`Invalid overlay manifest ${source}: layers[${index}] is malformed`);
        }
        return {
            kind: entry.kind,
            file: entry.file,
            durationSeconds: entry.durationSeconds,
            opacity: entry.opacity,
            blendMode: entry.blendMode,
        };
    });

    return { version: value.version, layers };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
