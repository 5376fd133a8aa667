/**
 * Microphone streamer
 *
 * server_vad: every frame goes straight into the remote input buffer and the
 * service decides when a turn ends.
 * manual: frames pass through the local VAD gate; speech start interrupts the
 * assistant, speech end sends the whole utterance and asks for a reply.
 */

import { AudioRecorder, RealtimeInput, TurnDetectionMode } from '../types.js';
import { VadGate } from './VadGate.js';

export interface MicrophoneStreamerOptions {
    mode: TurnDetectionMode;
    chunkDurationMs: number;
    gate?: VadGate;
}

export class MicrophoneStreamer {
    private readonly gate: VadGate | null;
    private frames: number = 0;
    private utterances: number = 0;

    constructor(
        private readonly recorder: AudioRecorder,
        private readonly input: RealtimeInput,
        private readonly options: MicrophoneStreamerOptions,
    ) {
        this.gate = options.mode === 'manual' ? (options.gate ?? new VadGate()) : null;
    }

    get frameCount(): number {
        return this.frames;
    }

    get utteranceCount(): number {
        return this.utterances;
    }

    async start(): Promise<void> {
        await this.recorder.startStreaming({
            chunkDurationMs: this.options.chunkDurationMs,
            onChunk: (frame) => this.handleFrame(frame),
        });
        console.log(`[MicrophoneStreamer] Listening (${this.options.mode === 'manual' ? 'local VAD' : 'server VAD'})`);
    }

    async stop(): Promise<void> {
        await this.recorder.stop();
        this.gate?.reset();
    }

    handleFrame(frame: Buffer): void {
        if (!this.input.isConnected) {
            return;
        }
        this.frames++;

        if (!this.gate) {
            this.input.appendInputAudio(frame);
            return;
        }

        const result = this.gate.process(frame);
        if (!result) {
            return;
        }

        if (result.type === 'speech-start') {
            console.log('[MicrophoneStreamer] Speech detected, listening...');
            this.input.interrupt().catch((error: unknown) => {
                console.error('[MicrophoneStreamer] Interrupt failed:', error);
            });
            return;
        }

        this.utterances++;
        console.log(`[MicrophoneStreamer] Utterance ended (${result.utterance.length} bytes), sending`);
        this.input.sendUtterance(result.utterance);
    }
}
