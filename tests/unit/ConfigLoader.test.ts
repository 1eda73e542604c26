import os from 'os';
import path from 'path';
import { getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';

const CONFIG_KEYS = [
    'PORT', 'NODE_ENV', 'OUTPUT_WIDTH', 'OUTPUT_HEIGHT', 'OUTPUT_FPS',
    'AUDIO_DURATION_TOLERANCE_SECONDS', 'OUTPUT_DURATION_TOLERANCE_SECONDS',
    'SCRATCH_ROOT', 'OVERLAY_DIR', 'ENCODE_TIMEOUT_MS', 'HARDWARE_ENCODER', 'SOFTWARE_ENCODER',
    'NVENC_PRESET', 'SOFTWARE_PRESET', 'CONSTANT_QUALITY', 'AUDIO_BITRATE', 'FORCE_SOFTWARE_ENCODE',
    'FFMPEG_PATH', 'FFPROBE_PATH', 'FETCH_TIMEOUT_MS', 'AUDIO_FETCH_TIMEOUT_MS', 'FETCH_MAX_ATTEMPTS',
    'FETCH_CONCURRENCY', 'DEFAULT_STORAGE_BUCKET',
];

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        for (const key of CONFIG_KEYS) {
            delete process.env[key];
        }
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    describe('defaults', () => {
        it('should render 1080p at 24fps with NVENC preferred', () => {
            const config = loadConfig();

            expect(config.outputWidth).toBe(1920);
            expect(config.outputHeight).toBe(1080);
            expect(config.outputFps).toBe(24);
            expect(config.hardwareEncoder).toBe('h264_nvenc');
            expect(config.softwareEncoder).toBe('libx264');
            expect(config.forceSoftwareEncode).toBe(false);
            expect(config.encodeTimeoutMs).toBe(3600000);
            expect(config.defaultStorageBucket).toBe('generated-assets');
        });

        it('should put scratch space under the system temp directory', () => {
            expect(loadConfig().scratchRoot).toBe(path.join(os.tmpdir(), 'slideshow-renders'));
        });

        it('should leave binary paths unset', () => {
            const config = loadConfig();

            expect(config.ffmpegPath).toBeUndefined();
            expect(config.ffprobePath).toBeUndefined();
        });
    });

    describe('environment cleanup', () => {
        it('should strip double quotes from environment variables', () => {
            process.env.HARDWARE_ENCODER = '"hevc_nvenc"';

            expect(loadConfig().hardwareEncoder).toBe('hevc_nvenc');
        });

        it('should strip single quotes from environment variables', () => {
            process.env.SOFTWARE_PRESET = "'medium'";

            expect(loadConfig().softwarePreset).toBe('medium');
        });

        it('should trim whitespace from environment variables', () => {
            process.env.FFMPEG_PATH = '  /opt/ffmpeg/bin/ffmpeg  ';

            expect(loadConfig().ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
        });

        it('should handle numeric variables with quotes', () => {
            process.env.PORT = '"4000"';

            expect(loadConfig().port).toBe(4000);
        });

        it('should parse booleans case-insensitively', () => {
            process.env.FORCE_SOFTWARE_ENCODE = 'TRUE';

            expect(loadConfig().forceSoftwareEncode).toBe(true);
        });

        it('should reject non-numeric numbers', () => {
            process.env.OUTPUT_FPS = 'fast';

            expect(() => loadConfig()).toThrow('Environment variable OUTPUT_FPS must be a number, got: fast');
        });
    });

    describe('validateConfig', () => {
        it('should accept the defaults', () => {
            expect(validateConfig(loadConfig())).toEqual([]);
        });

        it('should reject odd frame dimensions', () => {
            process.env.OUTPUT_WIDTH = '1081';

            expect(validateConfig(loadConfig())).toEqual([
                'OUTPUT_WIDTH must be a positive even integer (yuv420p needs even dimensions)',
            ]);
        });

        it('should reject a fetch concurrency below one', () => {
            process.env.FETCH_CONCURRENCY = '0';

            expect(validateConfig(loadConfig())).toEqual(['FETCH_CONCURRENCY must be an integer of at least 1']);
        });
    });

    describe('getConfig', () => {
        it('should cache until reset', () => {
            const first = getConfig();
            process.env.PORT = '5000';

            expect(getConfig()).toBe(first);

            resetConfig();
            expect(getConfig().port).toBe(5000);
        });
    });
});
