/**
 * Local voice-activity gate
 *
 * Energy-based speech detection for manual turn mode. Speech starts on the first
 * loud frame; it only ends after silence has lasted longer than the hysteresis
 * window, at which point the accumulated utterance is handed back.
 */

import { computeRms } from './pcm.js';

export interface VadGateOptions {
    /** RMS below this is silence */
    silenceThreshold?: number;
    /** Silence must last longer than this to end an utterance */
    silenceDurationMs?: number;
    /** Clock in milliseconds */
    now?: () => number;
}

export type VadResult =
    | { type: 'speech-start' }
    | { type: 'speech-end'; utterance: Buffer }
    | null;

export class VadGate {
    private readonly silenceThreshold: number;
    private readonly silenceDurationMs: number;
    private readonly now: () => number;

    private _speaking: boolean = false;
    private silenceStartTime: number | null = null;
    private utterance: Buffer[] = [];

    constructor(options: VadGateOptions = {}) {
        this.silenceThreshold = options.silenceThreshold ?? 250;
        this.silenceDurationMs = options.silenceDurationMs ?? 300;
        this.now = options.now ?? Date.now;
    }

    get speaking(): boolean {
        return this._speaking;
    }

    /** Bytes held for the utterance in progress */
    get bufferedBytes(): number {
        return this.utterance.reduce((total, frame) => total + frame.length, 0);
    }

    isSilent(frame: Buffer): boolean {
        return computeRms(frame) < this.silenceThreshold;
    }

    process(frame: Buffer): VadResult {
        let result: VadResult = null;

        if (this.isSilent(frame)) {
            if (this._speaking) {
                const now = this.now();
                if (this.silenceStartTime === null) {
                    this.silenceStartTime = now;
                } else if (now - this.silenceStartTime > this.silenceDurationMs) {
                    return this.endUtterance();
                }
            }
        } else {
            this.silenceStartTime = null;
            if (!this._speaking) {
                this._speaking = true;
                result = { type: 'speech-start' };
            }
        }

        if (this._speaking) {
            this.utterance.push(frame);
        }

        return result;
    }

    reset(): void {
        this._speaking = false;
        this.silenceStartTime = null;
        this.utterance = [];
    }

    private endUtterance(): VadResult {
        const utterance = Buffer.concat(this.utterance);
        this.reset();
        return { type: 'speech-end', utterance };
    }
}
