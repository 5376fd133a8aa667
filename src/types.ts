/**
 * Core types for the Realtime Voice Client
 */

export type TurnDetectionMode = 'server_vad' | 'manual';

export type VoiceState = 'idle' | 'listening' | 'processing' | 'speaking';

export type Modality = 'text' | 'audio';

// ── Audio ────────────────────────────────────────────────────────────

export const SAMPLE_RATE = 24000;
export const BYTES_PER_SAMPLE = 2; // pcm16 mono

export interface AudioChunk {
    data: Buffer;            // Raw PCM16 LE, mono, 24 kHz
    sampleRate: number;
    generationId: number;    // Monotonic counter for interrupt staleness detection
}

/**
 * Playback device. `play` resolves once the chunk has been handed to the device,
 * `stop` silences it immediately and discards anything it still holds.
 */
export interface IAudioPlayer {
    play(chunk: Buffer): Promise<void>;
    stop(): void;
    close(): Promise<void>;
}

export interface RealtimeStreamOptions {
    chunkDurationMs: number;
    onChunk: (chunk: Buffer) => void;
}

export interface AudioRecorder {
    isRecording(): boolean;
    startStreaming(options: RealtimeStreamOptions): Promise<void>;
    stop(): Promise<void>;
}

// ── Session ──────────────────────────────────────────────────────────

export interface Session {
    currentResponseId: string | null;
    currentItemId: string | null;
    isResponding: boolean;
    currentContentIndex: number;
    playedSampleCount: number;
}

export interface TurnDetectionConfig {
    type: 'server_vad';
    threshold: number;
    prefix_padding_ms: number;
    silence_duration_ms: number;
}

export interface ToolDefinition {
    type: 'function';
    name: string;
    description: string;
    parameters: {
        type: 'object';
        properties: Record<string, { type: string; description?: string }>;
        required?: string[];
    };
}

export interface SessionConfig {
    modalities: Modality[];
    instructions: string;
    voice: string;
    input_audio_format: 'pcm16';
    output_audio_format: 'pcm16';
    input_audio_transcription: { model: string } | null;
    turn_detection: TurnDetectionConfig | null;
    tools: ToolDefinition[];
    tool_choice: 'auto' | 'none' | 'required';
    temperature: number;
}

// ── Client events ────────────────────────────────────────────────────

export interface TranscriptEvent {
    type: 'user' | 'assistant';
    content: string;
    isFinal: boolean;
    timestamp: number;
}

export interface ToolStatusEvent {
    name: string;
    callId: string;
    status: 'running' | 'completed' | 'error';
    message: string;
    timestamp: number;
}

export interface UnhandledServerEvent {
    type: string;
    payload: Record<string, unknown>;
}

export type RealtimeClientEvents = {
    'state-change': [state: VoiceState];
    'text': [delta: string];
    'transcript': [event: TranscriptEvent];
    'audio': [chunk: AudioChunk];
    'interrupt': [];
    'speech-started': [];
    'speech-stopped': [];
    'response-done': [responseId: string | null];
    'tool-status': [event: ToolStatusEvent];
    'server-event': [event: UnhandledServerEvent];
    'error': [error: Error];
    'connected': [];
    'disconnected': [];
};

/**
 * What the microphone path needs from the client
 */
export interface RealtimeInput {
    readonly isConnected: boolean;
    appendInputAudio(frame: Buffer): void;
    sendUtterance(audio: Buffer): void;
    interrupt(): Promise<boolean>;
}

// ── Retrieval ────────────────────────────────────────────────────────

export interface IRetriever {
    lookup(query: string): Promise<string>;
}

export interface IEmbedder {
    embed(texts: string[]): Promise<number[][]>;
}

export interface VectorDocument {
    id: string;
    content: string;
    embedding: number[];
    metadata: Record<string, string | number | boolean>;
}

export interface VectorSearchResult {
    id: string;
    content: string;
    score: number;
}

export interface IVectorStore {
    upsert(documents: VectorDocument[]): Promise<void>;
    query(embedding: number[], topK: number): Promise<VectorSearchResult[]>;
    count(): Promise<number>;
}

// ── Configuration ────────────────────────────────────────────────────

export interface ClientConfig {
    openaiApiKey: string;
    realtimeUrl: string;
    model: string;
    voice: string;
    instructions: string;
    turnDetection: TurnDetectionMode;
    vadSilenceThreshold: number;
    vadSilenceDurationMs: number;
    audioMinChunkBytes: number;
    audioPlaybackRate: number;
    audioJitterDelayFactor: number;
    micInputFormat: string;
    micInputDevice: string;
    micChunkMs: number;
    chromaUrl: string;
    chromaCollection: string;
    embeddingModel: string;
    retrievalResults: number;
    lookupToolName: string;
    lookupToolDescription: string;
    debug: boolean;
}
