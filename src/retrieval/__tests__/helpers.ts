import { IEmbedder, IVectorStore, VectorDocument, VectorSearchResult } from '../../types.js';

/** Embeds a text as [length, word count] */
export class FakeEmbedder implements IEmbedder {
    calls: string[][] = [];

    async embed(texts: string[]): Promise<number[][]> {
        this.calls.push(texts);
        return texts.map(text => [text.length, text.split(' ').length]);
    }
}

export class InMemoryVectorStore implements IVectorStore {
    documents: Map<string, VectorDocument> = new Map();
    queries: Array<{ embedding: number[]; topK: number }> = [];
    results: VectorSearchResult[] = [];

    async upsert(documents: VectorDocument[]): Promise<void> {
        for (const document of documents) {
            this.documents.set(document.id, document);
        }
    }

    async query(embedding: number[], topK: number): Promise<VectorSearchResult[]> {
        this.queries.push({ embedding, topK });
        return this.results.slice(0, topK);
    }

    async count(): Promise<number> {
        return this.documents.size;
    }
}
