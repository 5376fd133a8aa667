import { BYTES_PER_SAMPLE, SAMPLE_RATE } from '../types.js';

/**
 * Root-mean-square amplitude of a little-endian int16 frame
 */
export function computeRms(frame: Buffer): number {
    const sampleCount = Math.floor(frame.length / BYTES_PER_SAMPLE);
    if (sampleCount === 0) {
        return 0;
    }

    let sumSq = 0;
    for (let i = 0; i < sampleCount * BYTES_PER_SAMPLE; i += BYTES_PER_SAMPLE) {
        const sample = frame.readInt16LE(i);
        sumSq += sample * sample;
    }
    return Math.sqrt(sumSq / sampleCount);
}

export function bytesToSamples(byteCount: number): number {
    return Math.floor(byteCount / BYTES_PER_SAMPLE);
}

export function bytesForDuration(durationMs: number, sampleRate: number = SAMPLE_RATE): number {
    const samples = Math.floor((sampleRate * durationMs) / 1000);
    return samples * BYTES_PER_SAMPLE;
}
