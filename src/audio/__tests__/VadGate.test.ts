import { describe, expect, it } from 'vitest';
import { computeRms } from '../pcm.js';
import { VadGate } from '../VadGate.js';

/** 20 ms of 24 kHz mono pcm16 at a constant amplitude */
function frame(amplitude: number): Buffer {
    const buffer = Buffer.alloc(960);
    for (let i = 0; i < buffer.length; i += 2) {
        buffer.writeInt16LE(amplitude, i);
    }
    return buffer;
}

const loud = frame(1000);
const quiet = frame(0);

describe('computeRms', () => {
    it('returns the amplitude of a constant signal', () => {
        expect(computeRms(frame(500))).toBe(500);
        expect(computeRms(frame(-500))).toBe(500);
    });

    it('ignores a trailing odd byte', () => {
        const buffer = Buffer.alloc(3);
        buffer.writeInt16LE(300, 0);
        buffer[2] = 0xff;
        expect(computeRms(buffer)).toBe(300);
    });

    it('is zero for an empty frame', () => {
        expect(computeRms(Buffer.alloc(0))).toBe(0);
    });
});

describe('VadGate', () => {
    function createGate() {
        const clock = { now: 0 };
        const gate = new VadGate({ silenceThreshold: 250, silenceDurationMs: 300, now: () => clock.now });
        return { gate, clock };
    }

    it('starts speech on the first loud frame', () => {
        const { gate } = createGate();

        expect(gate.process(quiet)).toBeNull();
        expect(gate.speaking).toBe(false);
        expect(gate.bufferedBytes).toBe(0);

        expect(gate.process(loud)).toEqual({ type: 'speech-start' });
        expect(gate.speaking).toBe(true);
        expect(gate.process(loud)).toBeNull();
        expect(gate.bufferedBytes).toBe(1920);
    });

    it('ends speech only after silence outlasts the hysteresis window', () => {
        const { gate, clock } = createGate();

        gate.process(loud);
        clock.now = 40;
        expect(gate.process(quiet)).toBeNull();
        clock.now = 200;
        expect(gate.process(quiet)).toBeNull();
        clock.now = 340;
        expect(gate.process(quiet)).toBeNull();
        expect(gate.speaking).toBe(true);

        clock.now = 341;
        const result = gate.process(quiet);
        expect(result).toEqual({ type: 'speech-end', utterance: expect.any(Buffer) });
        if (result?.type !== 'speech-end') {
            throw new Error('expected speech-end');
        }
        // loud + three silent frames; the closing frame is not part of the utterance
        expect(result.utterance.length).toBe(4 * 960);
        expect(result.utterance.readInt16LE(0)).toBe(1000);
        expect(gate.speaking).toBe(false);
        expect(gate.bufferedBytes).toBe(0);
    });

    it('restarts the silence window when speech resumes', () => {
        const { gate, clock } = createGate();

        gate.process(loud);
        clock.now = 10;
        gate.process(quiet);
        clock.now = 200;
        expect(gate.process(loud)).toBeNull();
        clock.now = 400;
        gate.process(quiet);
        clock.now = 650;
        expect(gate.process(quiet)).toBeNull();
        expect(gate.speaking).toBe(true);

        clock.now = 701;
        expect(gate.process(quiet)?.type).toBe('speech-end');
    });

    it('can be reset mid-utterance', () => {
        const { gate } = createGate();

        gate.process(loud);
        gate.reset();
        expect(gate.speaking).toBe(false);
        expect(gate.bufferedBytes).toBe(0);
        expect(gate.process(loud)).toEqual({ type: 'speech-start' });
    });
});
