import { describe, expect, it } from 'vitest';
import { splitTextIntoChunks } from '../chunking.js';

describe('splitTextIntoChunks', () => {
    it('produces overlapping word windows', () => {
        expect(splitTextIntoChunks('a b c d e f g', 3, 1)).toEqual(['a b c', 'c d e', 'e f g', 'g']);
    });

    it('uses 500-word windows with 50 words of overlap by default', () => {
        const words = Array.from({ length: 1200 }, (_, i) => `w${i}`);
        const chunks = splitTextIntoChunks(words.join(' '));

        expect(chunks).toHaveLength(3);
        expect(chunks[0].split(' ')).toHaveLength(500);
        expect(chunks[1].split(' ')[0]).toBe('w450');
        expect(chunks[2].split(' ')).toHaveLength(300);
        expect(chunks[2].split(' ')[0]).toBe('w900');
    });

    it('collapses whitespace between words', () => {
        expect(splitTextIntoChunks('one\n\n two\tthree  ', 2, 0)).toEqual(['one two', 'three']);
    });

    it('returns no chunks for blank text', () => {
        expect(splitTextIntoChunks('  \n ')).toEqual([]);
    });

    it('rejects an overlap that would not advance', () => {
        expect(() => splitTextIntoChunks('a b', 2, 2)).toThrow('overlap must be between 0 and wordsPerChunk - 1');
        expect(() => splitTextIntoChunks('a b', 0, 0)).toThrow('wordsPerChunk must be positive');
    });
});
