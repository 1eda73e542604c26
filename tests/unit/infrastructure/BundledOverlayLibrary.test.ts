import fs from 'fs';
import os from 'os';
import path from 'path';
import { BundledOverlayLibrary, OVERLAY_MANIFEST_FILE } from '../../../src/infrastructure/overlays/BundledOverlayLibrary';
import { EffectAssetMissingError } from '../../../src/domain/errors/RenderErrors';
import { IMediaInspector } from '../../../src/domain/ports/IMediaInspector';

const manifest = {
    version: '2024.1',
    layers: [
        { kind: 'smoke', file: 'smoke_gray.mp4', durationSeconds: 10, opacity: 0.35, blendMode: 'screen' },
        { kind: 'embers', file: 'embers.mp4', durationSeconds: 8, opacity: 0.6, blendMode: 'addition' },
    ],
};

describe('BundledOverlayLibrary', () => {
    let dir: string;

    const writeManifest = (value: unknown) =>
        fs.writeFileSync(path.join(dir, OVERLAY_MANIFEST_FILE), JSON.stringify(value));

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'overlays-'));
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('should resolve manifest entries against the overlay directory', () => {
        writeManifest(manifest);
        const library = new BundledOverlayLibrary(dir);

        expect(library.version).toBe('2024.1');
        expect(library.sources()).toEqual([
            { kind: 'smoke', path: path.join(dir, 'smoke_gray.mp4'), durationSeconds: 10, opacity: 0.35, blendMode: 'screen' },
            { kind: 'embers', path: path.join(dir, 'embers.mp4'), durationSeconds: 8, opacity: 0.6, blendMode: 'addition' },
        ]);
    });

    it('should treat a missing manifest as a missing asset', () => {
        const library = new BundledOverlayLibrary(dir);

        expect(() => library.sources()).toThrow(EffectAssetMissingError);
        expect(() => library.sources()).toThrow(`Overlay asset missing: ${path.join(dir, OVERLAY_MANIFEST_FILE)}`);
    });

    it('should reject a malformed layer', () => {
        writeManifest({ version: '1', layers: [{ kind: 'fog', file: 'fog.mp4', durationSeconds: 5, opacity: 0.5, blendMode: 'screen' }] });
        const library = new BundledOverlayLibrary(dir);

        expect(() => library.sources()).toThrow(
            `Invalid overlay manifest ${path.join(dir, OVERLAY_MANIFEST_FILE)}: layers[0] is malformed`
        );
    });

    it('should only count non-empty files as present', () => {
        writeManifest(manifest);
        fs.writeFileSync(path.join(dir, 'smoke_gray.mp4'), 'video');
        fs.writeFileSync(path.join(dir, 'embers.mp4'), '');
        const library = new BundledOverlayLibrary(dir);

        expect(library.exists(path.join(dir, 'smoke_gray.mp4'))).toBe(true);
        expect(library.exists(path.join(dir, 'embers.mp4'))).toBe(false);
        expect(library.exists(path.join(dir, 'absent.mp4'))).toBe(false);
    });

    it('should warn instead of throwing when describing a library without a manifest', async () => {
        const library = new BundledOverlayLibrary(dir);

        await expect(library.describe()).resolves.toBeUndefined();
        expect(console.warn).toHaveBeenCalledWith(
            `[Overlays] ✗ Overlay asset missing: ${path.join(dir, OVERLAY_MANIFEST_FILE)}; effects unavailable`
        );
    });

    describe('duration check at startup', () => {
        let inspector: jest.Mocked<IMediaInspector>;

        beforeEach(() => {
            writeManifest(manifest);
            fs.writeFileSync(path.join(dir, 'smoke_gray.mp4'), 'video');
            fs.writeFileSync(path.join(dir, 'embers.mp4'), 'video');
            inspector = { probeDurationSeconds: jest.fn() };
        });

        it('should loop by the measured length when a clip is shorter than the manifest says', async () => {
            inspector.probeDurationSeconds.mockImplementation(async (filePath) =>
                filePath.endsWith('embers.mp4') ? 3.2 : 10.01
            );
            const library = new BundledOverlayLibrary(dir, inspector);

            await library.describe();

            expect(library.sources().map(source => source.durationSeconds)).toEqual([10, 3.2]);
            expect(console.warn).toHaveBeenCalledWith(
                '[Overlays] embers: manifest says 8s but the clip runs 3.2s; looping by the measured length'
            );
        });

        it('should keep the manifest value when the clip cannot be probed', async () => {
            inspector.probeDurationSeconds.mockRejectedValue(new Error('moov atom not found'));
            const library = new BundledOverlayLibrary(dir, inspector);

            await library.describe();

            expect(library.sources().map(source => source.durationSeconds)).toEqual([10, 8]);
            expect(console.warn).toHaveBeenCalledWith(
                '[Overlays] ✗ smoke: could not probe duration (moov atom not found); keeping manifest value 10s'
            );
        });

        it('should not probe clips that are missing', async () => {
            fs.rmSync(path.join(dir, 'embers.mp4'));
            inspector.probeDurationSeconds.mockResolvedValue(10);
            const library = new BundledOverlayLibrary(dir, inspector);

            await library.describe();

            expect(inspector.probeDurationSeconds).toHaveBeenCalledTimes(1);
            expect(inspector.probeDurationSeconds).toHaveBeenCalledWith(path.join(dir, 'smoke_gray.mp4'));
        });
    });

    it('should ship a manifest that describes smoke under embers', () => {
        const library = new BundledOverlayLibrary(path.resolve(__dirname, '../../../overlays'));

        expect(library.sources().map(source => [source.kind, source.blendMode, source.opacity])).toEqual([
            ['smoke', 'screen', 0.35],
            ['embers', 'addition', 0.6],
        ]);
    });
});
