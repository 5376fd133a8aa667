/**
 * Split text into overlapping word windows for embedding.
 *
 * A window starts every `wordsPerChunk - overlap` words, so consecutive chunks
 * share `overlap` words.
 */
export function splitTextIntoChunks(text: string, wordsPerChunk: number = 500, overlap: number = 50): string[] {
    if (wordsPerChunk <= 0) {
        throw new Error('wordsPerChunk must be positive');
    }
    if (overlap < 0 || overlap >= wordsPerChunk) {
        throw new Error('overlap must be between 0 and wordsPerChunk - 1');
    }

    const words = text.match(/\S+/g) ?? [];
    const step = wordsPerChunk - overlap;
    const chunks: string[] = [];

    for (let i = 0; i < words.length; i += step) {
        chunks.push(words.slice(i, i + wordsPerChunk).join(' '));
    }
    return chunks;
}
