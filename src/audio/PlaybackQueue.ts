/**
 * Playback queue
 *
 * Any number of producers push released chunks; one drain loop plays them through
 * the audio player one at a time, in push order.
 */

import { IAudioPlayer } from '../types.js';

export class PlaybackQueue {
    private queue: Buffer[] = [];
    private wake: (() => void) | null = null;
    private running: boolean = false;
    private loop: Promise<void> | null = null;

    constructor(private readonly player: IAudioPlayer) {}

    get length(): number {
        return this.queue.length;
    }

    get isRunning(): boolean {
        return this.running;
    }

    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.loop = this.drain();
    }

    push(chunk: Buffer): void {
        if (!this.running || chunk.length === 0) {
            return;
        }
        this.queue.push(chunk);
        this.notify();
    }

    /**
     * Drop everything queued and silence the player immediately
     */
    clear(): void {
        this.queue = [];
        this.player.stop();
    }

    /**
     * End the drain loop. Queued audio is discarded.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }
        this.running = false;
        this.queue = [];
        this.notify();
        await this.loop;
        this.loop = null;
        this.player.stop();
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }

    private async drain(): Promise<void> {
        while (this.running) {
            const chunk = this.queue.shift();
            if (!chunk) {
                await new Promise<void>(resolve => {
                    this.wake = resolve;
                });
                continue;
            }

            try {
                await this.player.play(chunk);
            } catch (error) {
                console.error('[PlaybackQueue] Error playing chunk:', error);
            }
        }
    }
}
