/**
 * Retriever
 *
 * Answers a free-text query with the most similar indexed passages.
 */

import { IEmbedder, IRetriever, IVectorStore } from '../types.js';

export const NO_RESULTS_MESSAGE = 'No relevant information was found in the indexed documents.';

export class Retriever implements IRetriever {
    constructor(
        private readonly embedder: IEmbedder,
        private readonly store: IVectorStore,
        private readonly topK: number = 5,
    ) {}

    async lookup(query: string): Promise<string> {
        const trimmed = query.trim();
        if (!trimmed) {
            throw new Error('Query must not be empty');
        }

        const [embedding] = await this.embedder.embed([trimmed]);
        if (!embedding) {
            throw new Error('Embedder returned no vector for the query');
        }

        const results = await this.store.query(embedding, this.topK);
        console.log(`[Retriever] "${trimmed.substring(0, 50)}" -> ${results.length} passages`);

        if (results.length === 0) {
            return NO_RESULTS_MESSAGE;
        }
        return results.map(result => result.content).join('\n\n');
    }
}
