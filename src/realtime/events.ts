/**
 * Realtime protocol events
 *
 * Outbound events are built by small typed constructors. Inbound messages are
 * validated with zod into a closed union of the event kinds the client handles;
 * anything else is passed through as an unhandled event.
 */

import { z } from 'zod';
import { toError } from '../errors.js';
import { Modality, SessionConfig } from '../types.js';

// ── Outbound ─────────────────────────────────────────────────────────

export type ConversationItem =
    | {
        type: 'message';
        role: 'user';
        content: Array<{ type: 'input_text'; text: string }>;
    }
    | {
        type: 'function_call_output';
        call_id: string;
        output: string;
    };

export type ClientEvent =
    | { type: 'session.update'; session: Partial<SessionConfig> }
    | { type: 'conversation.item.create'; item: ConversationItem }
    | { type: 'input_audio_buffer.append'; audio: string }
    | { type: 'input_audio_buffer.commit' }
    | { type: 'response.create'; response: { modalities: Modality[]; instructions?: string } }
    | { type: 'response.cancel'; response_id?: string }
    | { type: 'conversation.item.truncate'; item_id: string; content_index: number; audio_end_ms: number };

export const clientEvents = {
    sessionUpdate: (session: Partial<SessionConfig>): ClientEvent => ({
        type: 'session.update',
        session,
    }),

    userText: (text: string): ClientEvent => ({
        type: 'conversation.item.create',
        item: {
            type: 'message',
            role: 'user',
            content: [{ type: 'input_text', text }],
        },
    }),

    functionCallOutput: (callId: string, output: string): ClientEvent => ({
        type: 'conversation.item.create',
        item: {
            type: 'function_call_output',
            call_id: callId,
            output,
        },
    }),

    appendAudio: (audio: Buffer): ClientEvent => ({
        type: 'input_audio_buffer.append',
        audio: audio.toString('base64'),
    }),

    commitAudio: (): ClientEvent => ({ type: 'input_audio_buffer.commit' }),

    createResponse: (modalities: Modality[] = ['text', 'audio']): ClientEvent => ({
        type: 'response.create',
        response: { modalities },
    }),

    cancelResponse: (responseId: string | null): ClientEvent =>
        responseId ? { type: 'response.cancel', response_id: responseId } : { type: 'response.cancel' },

    truncateItem: (itemId: string, contentIndex: number, audioEndMs: number): ClientEvent => ({
        type: 'conversation.item.truncate',
        item_id: itemId,
        content_index: contentIndex,
        audio_end_ms: audioEndMs,
    }),
};

// ── Inbound ──────────────────────────────────────────────────────────

const errorEvent = z.object({
    type: z.literal('error'),
    error: z.object({
        type: z.string().optional(),
        code: z.string().nullish(),
        message: z.string().nullish(),
        event_id: z.string().nullish(),
    }),
});

const sessionEvent = z.object({
    type: z.enum(['session.created', 'session.updated']),
    session: z.object({ id: z.string().optional() }).passthrough(),
});

const responseCreated = z.object({
    type: z.literal('response.created'),
    response: z.object({ id: z.string() }).passthrough(),
});

const outputItemAdded = z.object({
    type: z.literal('response.output_item.added'),
    output_index: z.number().optional(),
    item: z.object({ id: z.string(), type: z.string().optional() }).passthrough(),
});

const responseDone = z.object({
    type: z.literal('response.done'),
    response: z.object({
        id: z.string().optional(),
        status: z.string().optional(),
    }).passthrough().optional(),
});

const speechStarted = z.object({
    type: z.literal('input_audio_buffer.speech_started'),
    audio_start_ms: z.number().optional(),
    item_id: z.string().optional(),
});

const speechStopped = z.object({
    type: z.literal('input_audio_buffer.speech_stopped'),
    audio_end_ms: z.number().optional(),
    item_id: z.string().optional(),
});

const textDelta = z.object({
    type: z.literal('response.text.delta'),
    delta: z.string(),
});

const audioDelta = z.object({
    type: z.literal('response.audio.delta'),
    delta: z.string(),
    item_id: z.string().optional(),
    content_index: z.number().int().nonnegative().optional(),
});

const audioTranscriptDelta = z.object({
    type: z.literal('response.audio_transcript.delta'),
    delta: z.string(),
});

const inputTranscriptionCompleted = z.object({
    type: z.literal('conversation.item.input_audio_transcription.completed'),
    item_id: z.string().optional(),
    transcript: z.string(),
});

const functionCallArgumentsDone = z.object({
    type: z.literal('response.function_call_arguments.done'),
    call_id: z.string(),
    name: z.string(),
    arguments: z.string(),
});

const serverEventSchema = z.discriminatedUnion('type', [
    errorEvent,
    sessionEvent,
    responseCreated,
    outputItemAdded,
    responseDone,
    speechStarted,
    speechStopped,
    textDelta,
    audioDelta,
    audioTranscriptDelta,
    inputTranscriptionCompleted,
    functionCallArgumentsDone,
]);

export type ServerEvent = z.infer<typeof serverEventSchema>;
export type ServerEventType = ServerEvent['type'];

export function isKnownServerEventType(type: string): boolean {
    return serverEventSchema.optionsMap.has(type);
}

export type ParsedServerMessage =
    | { kind: 'event'; event: ServerEvent }
    | { kind: 'unhandled'; type: string; payload: Record<string, unknown> }
    | { kind: 'invalid'; type: string | null; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode one transport message into a handled event, an unhandled event or a
 * description of why it could not be used.
 */
export function parseServerMessage(raw: string): ParsedServerMessage {
    let payload: unknown;
    try {
        payload = JSON.parse(raw);
    } catch (error) {
        return { kind: 'invalid', type: null, reason: `Message is not JSON: ${toError(error).message}` };
    }

    if (!isRecord(payload) || typeof payload.type !== 'string') {
        return { kind: 'invalid', type: null, reason: 'Message has no string "type" field' };
    }

    const type = payload.type;
    if (!isKnownServerEventType(type)) {
        return { kind: 'unhandled', type, payload };
    }

    const result = serverEventSchema.safeParse(payload);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
        return { kind: 'invalid', type, reason: `Malformed ${type} event${where}: ${issue?.message ?? 'invalid payload'}` };
    }

    return { kind: 'event', event: result.data };
}
