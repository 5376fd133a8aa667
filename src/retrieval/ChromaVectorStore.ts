/**
 * Chroma vector store
 *
 * Talks to a Chroma server collection. Embeddings are always supplied by the
 * caller, never computed by Chroma.
 */

import { ChromaClient } from 'chromadb';
import { IVectorStore, VectorDocument, VectorSearchResult } from '../types.js';

type Collection = Awaited<ReturnType<ChromaClient['getOrCreateCollection']>>;

export interface ChromaVectorStoreOptions {
    url: string;
    collectionName: string;
}

export class ChromaVectorStore implements IVectorStore {
    private client: ChromaClient;
    private collection: Promise<Collection> | null = null;

    constructor(private readonly options: ChromaVectorStoreOptions) {
        this.client = new ChromaClient({ path: options.url });
    }

    private getCollection(): Promise<Collection> {
        if (!this.collection) {
            this.collection = this.client.getOrCreateCollection({
                name: this.options.collectionName,
                metadata: { 'hnsw:space': 'cosine' },
            });
            // Let a later call retry after a failed connection
            this.collection.catch(() => {
                this.collection = null;
            });
        }
        return this.collection;
    }

    async upsert(documents: VectorDocument[]): Promise<void> {
        if (documents.length === 0) return;

        const collection = await this.getCollection();
        await collection.upsert({
            ids: documents.map(d => d.id),
            embeddings: documents.map(d => d.embedding),
            documents: documents.map(d => d.content),
            metadatas: documents.map(d => d.metadata),
        });
    }

    async query(embedding: number[], topK: number): Promise<VectorSearchResult[]> {
        const collection = await this.getCollection();
        const response = await collection.query({
            queryEmbeddings: [embedding],
            nResults: topK,
        });

        const ids = response.ids?.[0] ?? [];
        const documents = response.documents?.[0] ?? [];
        const distances = response.distances?.[0] ?? [];

        const results: VectorSearchResult[] = [];
        ids.forEach((id, i) => {
            const content = documents[i];
            if (typeof content !== 'string') return;
            const distance = distances[i] ?? 1;
            results.push({ id, content, score: 1 - distance });
        });
        return results;
    }

    async count(): Promise<number> {
        const collection = await this.getCollection();
        return collection.count();
    }
}
