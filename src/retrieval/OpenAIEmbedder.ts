/**
 * OpenAI embeddings
 */

import OpenAI from 'openai';
import { IEmbedder } from '../types.js';

export interface OpenAIEmbedderOptions {
    apiKey: string;
    model?: string;
    /** Inputs per embeddings request */
    batchSize?: number;
}

export class OpenAIEmbedder implements IEmbedder {
    private client: OpenAI;
    private model: string;
    private batchSize: number;

    constructor(options: OpenAIEmbedderOptions) {
        this.client = new OpenAI({ apiKey: options.apiKey });
        this.model = options.model || 'text-embedding-3-small';
        this.batchSize = options.batchSize ?? 64;
    }

    async embed(texts: string[]): Promise<number[][]> {
        const embeddings: number[][] = [];

        for (let start = 0; start < texts.length; start += this.batchSize) {
            const batch = texts.slice(start, start + this.batchSize);
            const response = await this.client.embeddings.create({
                model: this.model,
                input: batch,
            });

            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            if (ordered.length !== batch.length) {
                throw new Error(`Expected ${batch.length} embeddings, received ${ordered.length}`);
            }
            for (const item of ordered) {
                embeddings.push(item.embedding);
            }
        }

        return embeddings;
    }
}
