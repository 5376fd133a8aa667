/**
 * Audio Pacer
 *
 * Collects the small audio deltas of a streamed response and releases them as
 * playback-sized chunks no faster than real time. A released chunk is delivered
 * to the sink after a short jitter delay on a separate promise chain, so the
 * caller's event loop is never held up and chunks arrive in release order.
 */

import { BYTES_PER_SAMPLE, SAMPLE_RATE } from '../types.js';

export interface AudioPacerOptions {
    /** Smallest chunk worth handing to playback (bytes) */
    minChunkBytes?: number;
    /** < 1 keeps playback slightly ahead of generation */
    playbackRate?: number;
    /** Fraction of the chunk's target interval to wait before delivery */
    jitterDelayFactor?: number;
    sampleRate?: number;
    /** Clock in milliseconds */
    now?: () => number;
}

export type AudioSink = (chunk: Buffer, generation: number) => void;

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class AudioPacer {
    private readonly minChunkBytes: number;
    private readonly playbackRate: number;
    private readonly jitterDelayFactor: number;
    private readonly bytesPerSecond: number;
    private readonly now: () => number;

    private chunks: Buffer[] = [];
    private buffered: number = 0;
    private lastReleaseAt: number = Number.NEGATIVE_INFINITY;
    private released: number = 0;
    private generation: number = 0;
    private delivery: Promise<void> = Promise.resolve();

    constructor(private readonly sink: AudioSink, options: AudioPacerOptions = {}) {
        this.minChunkBytes = options.minChunkBytes ?? 3200;
        this.playbackRate = options.playbackRate ?? 0.95;
        this.jitterDelayFactor = options.jitterDelayFactor ?? 0.1;
        this.bytesPerSecond = (options.sampleRate ?? SAMPLE_RATE) * BYTES_PER_SAMPLE;
        this.now = options.now ?? (() => performance.now());
    }

    get bufferedBytes(): number {
        return this.buffered;
    }

    /** Bytes released since the last reset */
    get releasedBytes(): number {
        return this.released;
    }

    get currentGeneration(): number {
        return this.generation;
    }

    /**
     * Add a decoded delta. Returns the number of bytes released by this call (0 if
     * the buffer is still below threshold or the pacing interval has not elapsed).
     */
    push(delta: Buffer): number {
        if (delta.length === 0) {
            return 0;
        }

        this.chunks.push(delta);
        this.buffered += delta.length;

        if (this.buffered < this.minChunkBytes) {
            return 0;
        }

        const targetIntervalMs = this.targetIntervalMs(this.buffered);
        const now = this.now();
        if (now - this.lastReleaseAt < targetIntervalMs) {
            return 0;
        }

        this.lastReleaseAt = now;
        return this.release(targetIntervalMs * this.jitterDelayFactor);
    }

    /**
     * Release whatever is buffered, below threshold or not. Used at end of response.
     */
    flush(): number {
        if (this.buffered === 0) {
            return 0;
        }
        this.lastReleaseAt = this.now();
        return this.release(0);
    }

    /**
     * Start of a new response: empty the buffer. Chunks already released keep playing.
     */
    reset(): void {
        this.chunks = [];
        this.buffered = 0;
        this.released = 0;
        this.lastReleaseAt = Number.NEGATIVE_INFINITY;
    }

    /**
     * Interruption: empty the buffer and drop released chunks still waiting for delivery.
     */
    cancel(): void {
        this.reset();
        this.generation++;
    }

    /**
     * Resolves once every chunk released so far has been delivered (or dropped)
     */
    drained(): Promise<void> {
        return this.delivery;
    }

    private targetIntervalMs(bytes: number): number {
        return (bytes / this.bytesPerSecond) * 1000 * this.playbackRate;
    }

    private release(delayMs: number): number {
        const chunk = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
        const size = this.buffered;
        const generation = this.generation;

        this.chunks = [];
        this.buffered = 0;
        this.released += size;

        this.delivery = this.delivery
            .then(() => (delayMs > 0 ? delay(delayMs) : undefined))
            .then(() => {
                if (generation !== this.generation) {
                    return;
                }
                try {
                    this.sink(chunk, generation);
                } catch (error) {
                    console.error('[AudioPacer] Playback sink failed:', error);
                }
            });

        return size;
    }
}
