import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Output frame
    outputWidth: number;
    outputHeight: number;
    outputFps: number;

    // Tolerances
    audioDurationToleranceSeconds: number;
    outputDurationToleranceSeconds: number;

    // Workspace and bundled overlays
    scratchRoot: string;
    overlayDir: string;

    // Encoding
    encodeTimeoutMs: number;
    hardwareEncoder: string;
    softwareEncoder: string;
    nvencPreset: string;
    softwarePreset: string;
    constantQuality: number;
    audioBitrate: string;
    forceSoftwareEncode: boolean;
    ffmpegPath?: string;
    ffprobePath?: string;

    // Asset downloads
    fetchTimeoutMs: number;
    audioFetchTimeoutMs: number;
    fetchMaxAttempts: number;
    fetchConcurrency: number;

    // Storage
    defaultStorageBucket: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value === '' ? undefined : value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Output frame
        outputWidth: getEnvVarNumber('OUTPUT_WIDTH', 1920),
        outputHeight: getEnvVarNumber('OUTPUT_HEIGHT', 1080),
        outputFps: getEnvVarNumber('OUTPUT_FPS', 24),

        // Tolerances
        audioDurationToleranceSeconds: getEnvVarNumber('AUDIO_DURATION_TOLERANCE_SECONDS', 0.5),
        outputDurationToleranceSeconds: getEnvVarNumber('OUTPUT_DURATION_TOLERANCE_SECONDS', 1.0),

        // Workspace and bundled overlays
        scratchRoot: getOptionalEnvVar('SCRATCH_ROOT') ?? path.join(os.tmpdir(), 'slideshow-renders'),
        overlayDir: path.resolve(getEnvVar('OVERLAY_DIR', './overlays')),

        // Encoding (60 minutes covers the hardware attempt and the fallback)
        encodeTimeoutMs: getEnvVarNumber('ENCODE_TIMEOUT_MS', 3600000),
        hardwareEncoder: getEnvVar('HARDWARE_ENCODER', 'h264_nvenc'),
        softwareEncoder: getEnvVar('SOFTWARE_ENCODER', 'libx264'),
        nvencPreset: getEnvVar('NVENC_PRESET', 'p2'),
        softwarePreset: getEnvVar('SOFTWARE_PRESET', 'fast'),
        constantQuality: getEnvVarNumber('CONSTANT_QUALITY', 24),
        audioBitrate: getEnvVar('AUDIO_BITRATE', '192k'),
        forceSoftwareEncode: getEnvVarBoolean('FORCE_SOFTWARE_ENCODE', false),
        ffmpegPath: getOptionalEnvVar('FFMPEG_PATH'),
        ffprobePath: getOptionalEnvVar('FFPROBE_PATH'),

        // Asset downloads
        fetchTimeoutMs: getEnvVarNumber('FETCH_TIMEOUT_MS', 60000),
        audioFetchTimeoutMs: getEnvVarNumber('AUDIO_FETCH_TIMEOUT_MS', 300000),
        fetchMaxAttempts: getEnvVarNumber('FETCH_MAX_ATTEMPTS', 3),
        fetchConcurrency: getEnvVarNumber('FETCH_CONCURRENCY', 20),

        // Storage
        defaultStorageBucket: getEnvVar('DEFAULT_STORAGE_BUCKET', 'generated-assets'),
    };
}

/**
 * Validates value ranges that the render path relies on.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.outputWidth) || config.outputWidth <= 0 || config.outputWidth % 2 !== 0) {
        errors.push('OUTPUT_WIDTH must be a positive even integer (yuv420p needs even dimensions)');
    }
    if (!Number.isInteger(config.outputHeight) || config.outputHeight <= 0 || config.outputHeight % 2 !== 0) {
        errors.push('OUTPUT_HEIGHT must be a positive even integer (yuv420p needs even dimensions)');
    }
    if (config.outputFps <= 0) {
        errors.push('OUTPUT_FPS must be positive');
    }
    if (config.audioDurationToleranceSeconds < 0 || config.outputDurationToleranceSeconds < 0) {
        errors.push('Duration tolerances must not be negative');
    }
    if (config.encodeTimeoutMs <= 0) {
        errors.push('ENCODE_TIMEOUT_MS must be positive');
    }
    if (!Number.isInteger(config.fetchMaxAttempts) || config.fetchMaxAttempts < 1) {
        errors.push('FETCH_MAX_ATTEMPTS must be an integer of at least 1');
    }
    if (!Number.isInteger(config.fetchConcurrency) || config.fetchConcurrency < 1) {
        errors.push('FETCH_CONCURRENCY must be an integer of at least 1');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
