/**
 * Client Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 */

import { config as loadEnv } from 'dotenv';
import { ClientConfig, TurnDetectionMode } from './types.js';

// Load .env file in development
loadEnv();

type Env = NodeJS.ProcessEnv;

const DEFAULT_INSTRUCTIONS = 'You are a helpful, witty, and friendly AI. Act like a human, but remember that you aren\'t a human and that you can\'t do human things in the real world. Your voice and personality should be warm and engaging, with a lively and playful tone. When the user asks about the indexed documents, use the lookup tool and answer only from what it returns.';

function getEnvString(env: Env, key: string, defaultValue: string): string {
    return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
    const value = env[key];
    if (!value) return defaultValue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
        return defaultValue;
    }
    return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
    const value = env[key];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

function getTurnDetection(env: Env): TurnDetectionMode {
    const mode = env.TURN_DETECTION?.toLowerCase();
    if (mode === 'manual') return 'manual';
    if (mode && mode !== 'server_vad') {
        console.warn(`[Config] Unknown TURN_DETECTION "${mode}", using server_vad`);
    }
    return 'server_vad';
}

/**
 * ffmpeg input format/device for the default microphone on this platform
 */
function getMicInput(env: Env): { format: string; device: string } {
    switch (process.platform) {
        case 'darwin':
            return {
                format: getEnvString(env, 'MIC_INPUT_FORMAT', 'avfoundation'),
                device: getEnvString(env, 'MIC_INPUT_DEVICE', ':0'),
            };
        case 'win32':
            return {
                format: getEnvString(env, 'MIC_INPUT_FORMAT', 'dshow'),
                device: getEnvString(env, 'MIC_INPUT_DEVICE', 'audio=Microphone'),
            };
        default:
            return {
                format: getEnvString(env, 'MIC_INPUT_FORMAT', 'pulse'),
                device: getEnvString(env, 'MIC_INPUT_DEVICE', 'default'),
            };
    }
}

export function loadConfig(env: Env = process.env): ClientConfig {
    const mic = getMicInput(env);

    return {
        openaiApiKey: env.OPENAI_API_KEY || '',
        realtimeUrl: getEnvString(env, 'REALTIME_URL', 'wss://api.openai.com/v1/realtime'),
        model: getEnvString(env, 'REALTIME_MODEL', 'gpt-4o-realtime-preview-2024-10-01'),
        voice: getEnvString(env, 'REALTIME_VOICE', 'alloy'),
        instructions: getEnvString(env, 'REALTIME_INSTRUCTIONS', DEFAULT_INSTRUCTIONS),
        turnDetection: getTurnDetection(env),
        vadSilenceThreshold: getEnvNumber(env, 'VAD_SILENCE_THRESHOLD', 250),
        vadSilenceDurationMs: getEnvNumber(env, 'VAD_SILENCE_DURATION_MS', 300),
        audioMinChunkBytes: getEnvNumber(env, 'AUDIO_MIN_CHUNK_BYTES', 3200),
        audioPlaybackRate: getEnvNumber(env, 'AUDIO_PLAYBACK_RATE', 0.95),
        audioJitterDelayFactor: getEnvNumber(env, 'AUDIO_JITTER_DELAY_FACTOR', 0.1),
        micInputFormat: mic.format,
        micInputDevice: mic.device,
        micChunkMs: getEnvNumber(env, 'MIC_CHUNK_MS', 40),
        chromaUrl: getEnvString(env, 'CHROMA_URL', 'http://localhost:8000'),
        chromaCollection: getEnvString(env, 'CHROMA_COLLECTION', 'pdf_collection'),
        embeddingModel: getEnvString(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
        retrievalResults: getEnvNumber(env, 'RETRIEVAL_RESULTS', 5),
        lookupToolName: getEnvString(env, 'LOOKUP_TOOL_NAME', 'lookup'),
        lookupToolDescription: getEnvString(
            env,
            'LOOKUP_TOOL_DESCRIPTION',
            'Search the indexed PDF documents and return the passages most relevant to the query.',
        ),
        debug: getEnvBoolean(env, 'DEBUG', false),
    };
}

export function validateConfig(config: ClientConfig): void {
    const errors: string[] = [];

    if (!config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required');
    }

    if (!Number.isInteger(config.audioMinChunkBytes) || config.audioMinChunkBytes <= 0 || config.audioMinChunkBytes % 2 !== 0) {
        errors.push('AUDIO_MIN_CHUNK_BYTES must be a positive even integer');
    }

    if (config.audioPlaybackRate <= 0 || config.audioPlaybackRate > 2) {
        errors.push('AUDIO_PLAYBACK_RATE must be in (0, 2]');
    }

    if (config.audioJitterDelayFactor < 0 || config.audioJitterDelayFactor > 1) {
        errors.push('AUDIO_JITTER_DELAY_FACTOR must be in [0, 1]');
    }

    if (config.vadSilenceThreshold < 0 || config.vadSilenceDurationMs < 0) {
        errors.push('VAD_SILENCE_THRESHOLD and VAD_SILENCE_DURATION_MS must not be negative');
    }

    if (config.micChunkMs < 10 || config.micChunkMs > 2000) {
        errors.push('MIC_CHUNK_MS must be between 10 and 2000');
    }

    if (!Number.isInteger(config.retrievalResults) || config.retrievalResults < 1) {
        errors.push('RETRIEVAL_RESULTS must be a positive integer');
    }

    if (errors.length > 0) {
        throw new Error(`Configuration errors:\n${errors.join('\n')}`);
    }
}
