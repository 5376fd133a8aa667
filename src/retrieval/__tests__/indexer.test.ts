import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { chunkId, indexDocument, indexPdfFolder, listPdfFiles } from '../indexer.js';
import { FakeEmbedder, InMemoryVectorStore } from './helpers.js';

const texts: Record<string, string> = {
    'a.pdf': 'one two three',
    'B.PDF': '',
};

async function extractText(path: string): Promise<string> {
    return texts[basename(path)] ?? '';
}

describe('indexer', () => {
    let folder: string;

    beforeEach(async () => {
        folder = await mkdtemp(join(tmpdir(), 'pdf-index-'));
        await writeFile(join(folder, 'a.pdf'), 'placeholder');
        await writeFile(join(folder, 'B.PDF'), 'placeholder');
        await writeFile(join(folder, 'notes.txt'), 'not a pdf');
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(folder, { recursive: true, force: true });
    });

    it('lists PDFs regardless of extension case', async () => {
        expect(await listPdfFiles(folder)).toEqual(['B.PDF', 'a.pdf']);
    });

    it('names chunks after their file and position', () => {
        expect(chunkId('report.pdf', 3)).toBe('report.pdf_chunk_3');
    });

    it('embeds and stores every chunk with its source', async () => {
        const embedder = new FakeEmbedder();
        const store = new InMemoryVectorStore();

        const count = await indexDocument('a.pdf', 'one two three', { embedder, store }, { wordsPerChunk: 2, overlap: 1 });

        expect(count).toBe(3);
        expect(embedder.calls).toEqual([['one two', 'two three', 'three']]);
        expect([...store.documents.values()]).toEqual([
            { id: 'a.pdf_chunk_0', content: 'one two', embedding: [7, 2], metadata: { source: 'a.pdf', chunk: 0 } },
            { id: 'a.pdf_chunk_1', content: 'two three', embedding: [9, 2], metadata: { source: 'a.pdf', chunk: 1 } },
            { id: 'a.pdf_chunk_2', content: 'three', embedding: [5, 1], metadata: { source: 'a.pdf', chunk: 2 } },
        ]);
    });

    it('fails when the embedder returns the wrong number of vectors', async () => {
        const store = new InMemoryVectorStore();
        const embedder = { embed: async (): Promise<number[][]> => [] };

        await expect(indexDocument('a.pdf', 'one two three', { embedder, store }, { wordsPerChunk: 2, overlap: 1 }))
            .rejects.toThrow('a.pdf: expected 3 embeddings, received 0');
        expect(store.documents.size).toBe(0);
    });

    it('indexes a folder and can be re-run without duplicating chunks', async () => {
        const embedder = new FakeEmbedder();
        const store = new InMemoryVectorStore();
        const deps = { extractText, embedder, store };

        const first = await indexPdfFolder(folder, deps, { wordsPerChunk: 2, overlap: 1 });

        expect(first).toEqual({
            files: [
                { file: 'B.PDF', chunks: 0 },
                { file: 'a.pdf', chunks: 3 },
            ],
            totalChunks: 3,
            collectionCount: 3,
        });
        // Empty documents are not sent for embedding
        expect(embedder.calls).toHaveLength(1);

        const second = await indexPdfFolder(folder, deps, { wordsPerChunk: 2, overlap: 1 });
        expect(second.collectionCount).toBe(3);
    });

    it('reports an empty folder', async () => {
        const empty = await mkdtemp(join(tmpdir(), 'pdf-index-empty-'));
        try {
            const result = await indexPdfFolder(empty, {
                extractText,
                embedder: new FakeEmbedder(),
                store: new InMemoryVectorStore(),
            });
            expect(result).toEqual({ files: [], totalChunks: 0, collectionCount: 0 });
        } finally {
            await rm(empty, { recursive: true, force: true });
        }
    });
});
