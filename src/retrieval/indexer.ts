/**
 * PDF index builder
 *
 * For every PDF in a folder: extract text, cut it into overlapping word chunks,
 * embed the chunks and upsert them into the vector store. Chunk ids are stable,
 * so indexing the same folder twice replaces rather than duplicates.
 */

import { readdir } from 'fs/promises';
import { basename, join } from 'path';
import { IEmbedder, IVectorStore, VectorDocument } from '../types.js';
import { splitTextIntoChunks } from './chunking.js';

export interface IndexerDeps {
    extractText: (path: string) => Promise<string>;
    embedder: IEmbedder;
    store: IVectorStore;
}

export interface IndexerOptions {
    wordsPerChunk?: number;
    overlap?: number;
}

export interface IndexedFile {
    file: string;
    chunks: number;
}

export interface IndexSummary {
    files: IndexedFile[];
    totalChunks: number;
    collectionCount: number;
}

export function chunkId(file: string, index: number): string {
    return `${file}_chunk_${index}`;
}

export async function listPdfFiles(folder: string): Promise<string[]> {
    const entries = await readdir(folder, { withFileTypes: true });
    return entries
        .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
        .map(entry => entry.name)
        .sort();
}

export async function indexDocument(
    source: string,
    text: string,
    deps: Pick<IndexerDeps, 'embedder' | 'store'>,
    options: IndexerOptions = {},
): Promise<number> {
    const chunks = splitTextIntoChunks(text, options.wordsPerChunk, options.overlap);
    if (chunks.length === 0) {
        return 0;
    }

    const embeddings = await deps.embedder.embed(chunks);
    if (embeddings.length !== chunks.length) {
        throw new Error(`${source}: expected ${chunks.length} embeddings, received ${embeddings.length}`);
    }

    const documents: VectorDocument[] = chunks.map((content, i) => ({
        id: chunkId(source, i),
        content,
        embedding: embeddings[i],
        metadata: { source, chunk: i },
    }));

    await deps.store.upsert(documents);
    return documents.length;
}

export async function indexPdfFolder(
    folder: string,
    deps: IndexerDeps,
    options: IndexerOptions = {},
): Promise<IndexSummary> {
    const files = await listPdfFiles(folder);
    if (files.length === 0) {
        console.warn(`[Indexer] No PDF files found in ${folder}`);
    }

    const indexed: IndexedFile[] = [];
    for (const file of files) {
        const path = join(folder, file);
        console.log(`[Indexer] file: ${basename(path)}`);

        const text = await deps.extractText(path);
        const chunks = await indexDocument(file, text, deps, options);
        console.log(`[Indexer] ${file}: ${chunks} chunks`);

        indexed.push({ file, chunks });
    }

    const totalChunks = indexed.reduce((sum, entry) => sum + entry.chunks, 0);
    const collectionCount = await deps.store.count();
    console.log(`[Indexer] Processed ${files.length} files, ${totalChunks} chunks; collection now holds ${collectionCount}`);

    return { files: indexed, totalChunks, collectionCount };
}
