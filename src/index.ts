#!/usr/bin/env node
/**
 * Realtime Voice Client
 *
 * Talk to the realtime API from a terminal: microphone in, speaker out, with
 * barge-in and a document lookup tool backed by the PDF index.
 */

import { createInterface } from 'readline';
import { FfmpegRecorder } from './audio/FfmpegRecorder.js';
import { FfplayPlayer } from './audio/FfplayPlayer.js';
import { MicrophoneStreamer } from './audio/MicrophoneStreamer.js';
import { PlaybackQueue } from './audio/PlaybackQueue.js';
import { VadGate } from './audio/VadGate.js';
import { loadConfig, validateConfig } from './config.js';
import { RealtimeError, toError } from './errors.js';
import { RealtimeClient } from './realtime/RealtimeClient.js';
import { RealtimeTransport } from './realtime/RealtimeTransport.js';
import { ToolDispatcher } from './realtime/ToolDispatcher.js';
import { ChromaVectorStore } from './retrieval/ChromaVectorStore.js';
import { OpenAIEmbedder } from './retrieval/OpenAIEmbedder.js';
import { Retriever } from './retrieval/Retriever.js';
import { createLookupTool } from './tools/lookup.js';

async function main(): Promise<void> {
    console.log('┌─────────────────────────────────────────────┐');
    console.log('│       Realtime Voice Client v1.0.0          │');
    console.log('└─────────────────────────────────────────────┘');

    const config = loadConfig();

    try {
        validateConfig(config);
    } catch (error) {
        console.error('\n❌ Configuration Error:');
        console.error(toError(error).message);
        process.exit(1);
    }

    // Document lookup backed by the PDF index
    const retriever = new Retriever(
        new OpenAIEmbedder({ apiKey: config.openaiApiKey, model: config.embeddingModel }),
        new ChromaVectorStore({ url: config.chromaUrl, collectionName: config.chromaCollection }),
        config.retrievalResults,
    );
    const tools = new ToolDispatcher([
        createLookupTool(retriever, config.lookupToolName, config.lookupToolDescription),
    ]);

    const player = new FfplayPlayer();
    const playback = new PlaybackQueue(player);

    const client = new RealtimeClient({
        transport: new RealtimeTransport({
            url: config.realtimeUrl,
            model: config.model,
            apiKey: config.openaiApiKey,
        }),
        session: {
            instructions: config.instructions,
            voice: config.voice,
            turnDetection: config.turnDetection,
        },
        tools,
        pacer: {
            minChunkBytes: config.audioMinChunkBytes,
            playbackRate: config.audioPlaybackRate,
            jitterDelayFactor: config.audioJitterDelayFactor,
        },
        onInterrupt: () => playback.clear(),
        debug: config.debug,
    });

    const microphone = new MicrophoneStreamer(
        new FfmpegRecorder(config.micInputFormat, config.micInputDevice),
        client,
        {
            mode: config.turnDetection,
            chunkDurationMs: config.micChunkMs,
            gate: new VadGate({
                silenceThreshold: config.vadSilenceThreshold,
                silenceDurationMs: config.vadSilenceDurationMs,
            }),
        },
    );

    const input = createInterface({ input: process.stdin });

    // Graceful shutdown
    let shuttingDown = false;
    const shutdown = async (exitCode: number): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log('\n\n👋 Shutting down...');

        // Force close after 5 seconds
        setTimeout(() => {
            console.log('⚠️ Forcing shutdown');
            process.exit(1);
        }, 5000).unref();

        input.close();
        const steps: Array<[string, () => Promise<void>]> = [
            ['microphone', () => microphone.stop()],
            ['playback', () => playback.stop()],
            ['player', () => player.close()],
            ['client', () => client.disconnect()],
        ];
        for (const [name, step] of steps) {
            try {
                await step();
            } catch (error) {
                console.error(`[Shutdown] Error stopping ${name}:`, error);
            }
        }

        console.log('✅ Closed');
        process.exit(exitCode);
    };

    client.on('audio', (chunk) => playback.push(chunk.data));
    // User started talking: whatever is still queued is stale
    client.on('speech-started', () => playback.clear());
    client.on('text', (delta) => process.stdout.write(delta));
    client.on('transcript', (event) => {
        if (!event.isFinal) return;
        console.log(`\n${event.type === 'user' ? 'You' : 'Assistant'}: ${event.content}`);
    });
    client.on('tool-status', (event) => {
        console.log(`[Tool] ${event.name} ${event.status}: ${event.message}`);
    });
    client.on('error', (error) => {
        if (error instanceof RealtimeError && !error.recoverable) {
            console.error(`\n❌ ${error.message}`);
            void shutdown(1);
            return;
        }
        console.error(`[Client] ${error.message}`);
    });

    process.on('SIGINT', () => void shutdown(0));
    process.on('SIGTERM', () => void shutdown(0));

    await client.connect();
    playback.start();
    await microphone.start();

    console.log('\n✅ Connected to the realtime API');
    console.log(`   • Model: ${config.model}`);
    console.log(`   • Turn detection: ${config.turnDetection === 'manual' ? 'local VAD' : 'server VAD'}`);
    console.log(`   • Lookup tool: ${config.lookupToolName} (Chroma ${config.chromaUrl}/${config.chromaCollection})`);
    console.log('\n🎤 Speak, or type a message and press Enter. Type "q" to quit.\n');

    input.on('line', (line) => {
        const text = line.trim();
        if (!text) return;
        if (text === 'q') {
            void shutdown(0);
            return;
        }
        try {
            client.sendText(text);
        } catch (error) {
            console.error('[Client] Could not send message:', toError(error).message);
        }
    });
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
