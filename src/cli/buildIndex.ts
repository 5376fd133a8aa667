#!/usr/bin/env node
/**
 * Build the document index used by the lookup tool.
 *
 * Usage: npm run index -- [folder]   (defaults to ./data)
 */

import { resolve } from 'path';
import { loadConfig, validateConfig } from '../config.js';
import { toError } from '../errors.js';
import { ChromaVectorStore } from '../retrieval/ChromaVectorStore.js';
import { indexPdfFolder } from '../retrieval/indexer.js';
import { OpenAIEmbedder } from '../retrieval/OpenAIEmbedder.js';
import { extractPdfText } from '../retrieval/pdf.js';

async function main(): Promise<void> {
    const folder = resolve(process.argv[2] ?? './data');
    const config = loadConfig();

    try {
        validateConfig(config);
    } catch (error) {
        console.error('\n❌ Configuration Error:');
        console.error(toError(error).message);
        process.exit(1);
    }

    console.log(`[Indexer] Indexing PDFs in ${folder} into ${config.chromaUrl}/${config.chromaCollection}`);

    const summary = await indexPdfFolder(folder, {
        extractText: extractPdfText,
        embedder: new OpenAIEmbedder({ apiKey: config.openaiApiKey, model: config.embeddingModel }),
        store: new ChromaVectorStore({ url: config.chromaUrl, collectionName: config.chromaCollection }),
    });

    console.log(`\n✅ Indexed ${summary.totalChunks} chunks from ${summary.files.length} files`);
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
