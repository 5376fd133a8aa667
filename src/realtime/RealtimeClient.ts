/**
 * Realtime Client
 *
 * Drives one session against the realtime API: configures it, streams microphone
 * audio up, and turns the inbound event stream into paced audio, text and
 * transcripts. Users can talk over a response; the response is cancelled and the
 * remote history truncated to the audio that was actually played.
 *
 * Inbound messages are handled strictly one after another on a promise chain.
 * Session state is only touched from that chain, except when the transport
 * closes: the session is torn down at once. Tool calls run beside the chain and
 * rejoin it to send their result.
 */

import { AudioPacer, AudioPacerOptions } from '../audio/AudioPacer.js';
import { bytesToSamples } from '../audio/pcm.js';
import { ProtocolError, TransportClosedError, toError } from '../errors.js';
import {
    Modality,
    RealtimeInput,
    SAMPLE_RATE,
    Session,
    SessionConfig,
    TurnDetectionMode,
} from '../types.js';
import { BaseRealtimeClient } from './BaseRealtimeClient.js';
import { ClientEvent, ServerEvent, clientEvents, parseServerMessage } from './events.js';
import { IRealtimeTransport } from './RealtimeTransport.js';
import { PendingToolCall, ToolCallResult, ToolDispatcher } from './ToolDispatcher.js';
import { TurnStateMachine } from './TurnStateMachine.js';

export interface RealtimeSessionOptions {
    instructions: string;
    voice: string;
    turnDetection: TurnDetectionMode;
    modalities?: Modality[];
    temperature?: number;
    transcriptionModel?: string | null;
}

export interface RealtimeClientOptions {
    transport: IRealtimeTransport;
    session: RealtimeSessionOptions;
    tools?: ToolDispatcher;
    pacer?: AudioPacerOptions;
    /** Called once a response has been cut off, before the session returns to idle */
    onInterrupt?: () => void;
    debug?: boolean;
}

const SERVER_VAD = {
    type: 'server_vad',
    threshold: 0.5,
    prefix_padding_ms: 500,
    silence_duration_ms: 200,
} as const;

export class RealtimeClient extends BaseRealtimeClient implements RealtimeInput {
    private readonly transport: IRealtimeTransport;
    private readonly tools: ToolDispatcher;
    private readonly turns: TurnStateMachine = new TurnStateMachine();
    private readonly pacer: AudioPacer;
    private readonly sessionOptions: RealtimeSessionOptions;
    private readonly onInterrupt?: () => void;
    private readonly debug: boolean;

    private inbound: Promise<void> = Promise.resolve();
    private toolCalls: Set<Promise<void>> = new Set();
    private assistantTranscript: string = '';

    constructor(options: RealtimeClientOptions) {
        super();
        this.transport = options.transport;
        this.tools = options.tools ?? new ToolDispatcher();
        this.sessionOptions = options.session;
        this.onInterrupt = options.onInterrupt;
        this.debug = options.debug ?? false;

        this.pacer = new AudioPacer((chunk, generation) => {
            // The tail flushed by response.done lands after the session went idle
            if (this.turns.isResponding) {
                this.setState('speaking');
            }
            this.emit('audio', {
                data: chunk,
                sampleRate: SAMPLE_RATE,
                generationId: generation,
            });
        }, options.pacer);
    }

    get session(): Readonly<Session> {
        return this.turns.snapshot();
    }

    get turnDetection(): TurnDetectionMode {
        return this.sessionOptions.turnDetection;
    }

    // ── Connection ────────────────────────────────────────────────

    async connect(): Promise<void> {
        if (this._isConnected) {
            return;
        }

        try {
            await this.transport.connect({
                onMessage: (data) => {
                    void this.enqueue(() => this.handleMessage(data));
                },
                onClose: (code, reason) => {
                    this.handleTransportClosed(code, reason);
                },
                onError: (error) => {
                    this.emitError(error);
                },
            });

            this.setConnected(true);
            this.setState('idle');
            this.updateSession(this.buildSessionConfig());

            console.log(`[RealtimeClient] Connected (turn detection: ${this.sessionOptions.turnDetection}, tools: ${this.tools.definitions.map(t => t.name).join(', ') || 'none'})`);
        } catch (error) {
            this.emitError(toError(error));
            throw error;
        }
    }

    async disconnect(): Promise<void> {
        this.pacer.cancel();
        this.turns.reset();

        try {
            await this.transport.close();
        } catch (error) {
            console.error('[RealtimeClient] Error disconnecting:', error);
        }

        await this.inbound;
        this.setConnected(false);
        this.setState('idle');
        this.assistantTranscript = '';
    }

    /**
     * Resolves once every message received so far has been handled, every tool
     * call has answered and every released audio chunk has been delivered.
     */
    async settled(): Promise<void> {
        let inbound: Promise<void>;
        do {
            inbound = this.inbound;
            await inbound;
            await Promise.all(this.toolCalls);
        } while (inbound !== this.inbound || this.toolCalls.size > 0);
        await this.pacer.drained();
    }

    buildSessionConfig(): SessionConfig {
        const { turnDetection, transcriptionModel } = this.sessionOptions;
        const transcription = transcriptionModel === undefined ? 'whisper-1' : transcriptionModel;

        return {
            modalities: this.sessionOptions.modalities ?? ['text', 'audio'],
            instructions: this.sessionOptions.instructions,
            voice: this.sessionOptions.voice,
            input_audio_format: 'pcm16',
            output_audio_format: 'pcm16',
            input_audio_transcription: transcription ? { model: transcription } : null,
            turn_detection: turnDetection === 'server_vad' ? { ...SERVER_VAD } : null,
            tools: this.tools.definitions,
            tool_choice: 'auto',
            temperature: this.sessionOptions.temperature ?? 0.7,
        };
    }

    // ── Outbound ──────────────────────────────────────────────────

    updateSession(session: Partial<SessionConfig>): void {
        this.send(clientEvents.sessionUpdate(session));
    }

    sendText(text: string): void {
        if (!this._isConnected) {
            throw new Error('Not connected');
        }

        this.emit('transcript', {
            type: 'user',
            content: text,
            isFinal: true,
            timestamp: Date.now(),
        });
        this.send(clientEvents.userText(text));
        this.createResponse();
    }

    /**
     * Stream a microphone frame into the remote input buffer
     */
    appendInputAudio(frame: Buffer): void {
        if (!this._isConnected || frame.length === 0) {
            return;
        }

        try {
            this.send(clientEvents.appendAudio(frame));
        } catch (error) {
            console.error('[RealtimeClient] Error sending audio:', toError(error).message);
        }
    }

    commitInputAudio(): void {
        this.send(clientEvents.commitAudio());
    }

    /**
     * Send a complete utterance detected locally and ask for a reply
     */
    sendUtterance(audio: Buffer): void {
        if (!this._isConnected || audio.length === 0) {
            return;
        }

        try {
            this.send(clientEvents.appendAudio(audio));
            this.commitInputAudio();
            this.createResponse();
            this.setState('processing');
        } catch (error) {
            this.emitError(toError(error));
        }
    }

    createResponse(): void {
        this.send(clientEvents.createResponse(this.sessionOptions.modalities));
    }

    /**
     * Interrupt the active response from outside the inbound stream (local VAD,
     * keyboard). Runs after the messages already received. Resolves to false when
     * there was nothing to interrupt.
     */
    interrupt(): Promise<boolean> {
        return this.enqueue(() => this.interruptActiveResponse());
    }

    private send(event: ClientEvent): void {
        if (this.debug && event.type !== 'input_audio_buffer.append') {
            console.log(`[RealtimeClient] -> ${event.type}`);
        }
        this.transport.send(event);
    }

    // ── Inbound ───────────────────────────────────────────────────

    private enqueue<T>(task: () => T | Promise<T>): Promise<T> {
        const run = this.inbound.then(task);
        this.inbound = run.then(
            () => undefined,
            (error: unknown) => this.emitError(toError(error)),
        );
        return run;
    }

    private handleMessage(data: string): void {
        if (!this._isConnected) {
            // Queued before the transport closed
            return;
        }

        const message = parseServerMessage(data);

        switch (message.kind) {
            case 'invalid':
                this.emitError(new ProtocolError(message.reason));
                return;

            case 'unhandled':
                if (this.debug) {
                    console.log(`[RealtimeClient] <- ${message.type} (unhandled)`);
                }
                this.emit('server-event', { type: message.type, payload: message.payload });
                return;

            case 'event':
                if (this.debug && message.event.type !== 'response.audio.delta') {
                    console.log(`[RealtimeClient] <- ${message.event.type}`);
                }
                this.handleServerEvent(message.event);
                return;
        }
    }

    private handleServerEvent(event: ServerEvent): void {
        switch (event.type) {
            case 'error': {
                const { message, code, event_id: eventId } = event.error;
                console.error(`[RealtimeClient] Server error: ${message ?? 'Unknown error'} (code: ${code ?? 'none'}, event: ${eventId ?? 'none'})`);
                this.emitError(new ProtocolError(message || 'Unknown realtime error', code ?? null, eventId ?? null));
                return;
            }

            case 'session.created':
            case 'session.updated':
                console.log(`[RealtimeClient] ${event.type === 'session.created' ? 'Session created' : 'Session updated'}${event.session.id ? `: ${event.session.id}` : ''}`);
                return;

            case 'response.created':
                this.turns.responseStarted(event.response.id);
                this.pacer.reset();
                this.assistantTranscript = '';
                this.setState('processing');
                return;

            case 'response.output_item.added':
                this.turns.outputItemAdded(event.item.id);
                return;

            case 'response.done':
                this.completeResponse(event.response?.id ?? null);
                return;

            case 'input_audio_buffer.speech_started':
                console.log('[RealtimeClient] Speech detected');
                this.emit('speech-started');
                this.interruptActiveResponse();
                this.setState('listening');
                return;

            case 'input_audio_buffer.speech_stopped':
                console.log('[RealtimeClient] Speech ended');
                this.emit('speech-stopped');
                this.setState('processing');
                return;

            case 'response.text.delta':
                this.emit('text', event.delta);
                return;

            case 'response.audio_transcript.delta':
                this.assistantTranscript += event.delta;
                this.emit('transcript', {
                    type: 'assistant',
                    content: this.assistantTranscript,
                    isFinal: false,
                    timestamp: Date.now(),
                });
                return;

            case 'conversation.item.input_audio_transcription.completed':
                this.emit('transcript', {
                    type: 'user',
                    content: event.transcript.trim(),
                    isFinal: true,
                    timestamp: Date.now(),
                });
                return;

            case 'response.audio.delta':
                this.handleAudioDelta(event.delta, event.item_id, event.content_index);
                return;

            case 'response.function_call_arguments.done':
                this.startToolCall({
                    callId: event.call_id,
                    name: event.name,
                    arguments: event.arguments,
                });
                return;
        }
    }

    private handleAudioDelta(delta: string, itemId: string | undefined, contentIndex: number | undefined): void {
        if (!this.turns.isResponding) {
            // Leftovers of a cancelled response
            return;
        }

        this.turns.audioContentPart(itemId, contentIndex);
        const released = this.pacer.push(Buffer.from(delta, 'base64'));
        if (released > 0) {
            this.turns.recordPlayedSamples(bytesToSamples(released));
        }
    }

    private completeResponse(responseId: string | null): void {
        const session = this.turns.snapshot();
        if (responseId && session.currentResponseId && responseId !== session.currentResponseId) {
            // A cancelled response finishing after its successor started
            return;
        }

        if (session.isResponding) {
            const released = this.pacer.flush();
            if (released > 0) {
                this.turns.recordPlayedSamples(bytesToSamples(released));
            }
        }

        if (this.assistantTranscript) {
            this.emit('transcript', {
                type: 'assistant',
                content: this.assistantTranscript,
                isFinal: true,
                timestamp: Date.now(),
            });
            this.assistantTranscript = '';
        }

        this.turns.responseCompleted();
        this.emit('response-done', responseId);
        if (session.isResponding) {
            this.setState('idle');
        }
    }

    /**
     * Cancel the active response and truncate the item being spoken to what was
     * played. No-op when nothing is responding.
     */
    private interruptActiveResponse(): boolean {
        const plan = this.turns.interruptionPlan();
        if (!plan) {
            return false;
        }

        console.log(`[RealtimeClient] Interrupting response ${plan.responseId}`);

        try {
            this.send(clientEvents.cancelResponse(plan.responseId));
            if (plan.truncate) {
                const { itemId, contentIndex, audioEndMs } = plan.truncate;
                this.send(clientEvents.truncateItem(itemId, contentIndex, audioEndMs));
            }
        } catch (error) {
            this.emitError(toError(error));
        }

        this.pacer.cancel();

        if (this.onInterrupt) {
            try {
                this.onInterrupt();
            } catch (error) {
                console.error('[RealtimeClient] Interrupt callback failed:', error);
            }
        }
        this.emit('interrupt');

        this.turns.reset();
        this.assistantTranscript = '';
        return true;
    }

    /**
     * Run a tool without holding up the inbound chain; the result is sent from
     * the chain once the tool answers.
     */
    private startToolCall(call: PendingToolCall): void {
        console.log(`[RealtimeClient] Tool call ${call.name} (${call.callId})`);
        this.emit('tool-status', {
            name: call.name,
            callId: call.callId,
            status: 'running',
            message: 'Processing your request...',
            timestamp: Date.now(),
        });

        const task: Promise<void> = this.tools.dispatch(call)
            .then(result => this.enqueue(() => this.finishToolCall(call, result)))
            .catch((error: unknown) => this.emitError(toError(error)))
            .finally(() => {
                this.toolCalls.delete(task);
            });
        this.toolCalls.add(task);
    }

    private finishToolCall(call: PendingToolCall, result: ToolCallResult): void {
        if (result.ok) {
            this.emit('tool-status', {
                name: call.name,
                callId: call.callId,
                status: 'completed',
                message: 'Done',
                timestamp: Date.now(),
            });
        } else {
            console.warn(`[RealtimeClient] Tool call ${call.callId} failed: ${result.error.message}`);
            this.emit('tool-status', {
                name: call.name,
                callId: call.callId,
                status: 'error',
                message: result.error.message,
                timestamp: Date.now(),
            });
            this.emitError(result.error);
        }

        if (!this._isConnected) {
            console.warn(`[RealtimeClient] Dropping result of ${call.callId}: disconnected`);
            return;
        }

        try {
            this.send(clientEvents.functionCallOutput(call.callId, result.output));
            // The model does not continue on its own after a tool result
            this.createResponse();
        } catch (error) {
            this.emitError(toError(error));
        }
    }

    private handleTransportClosed(code: number, reason: string): void {
        if (!this._isConnected) {
            return;
        }
        this.pacer.cancel();
        this.turns.reset();
        this.assistantTranscript = '';
        this.setConnected(false);
        this.setState('idle');
        this.emitError(new TransportClosedError(code, reason));
    }
}
