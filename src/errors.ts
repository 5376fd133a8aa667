/**
 * Error taxonomy for realtime sessions.
 *
 * Everything except TransportClosedError is recoverable: the session keeps running
 * and the error is only reported.
 */

export type RealtimeErrorKind =
    | 'transport-closed'
    | 'protocol'
    | 'malformed-tool-arguments'
    | 'unknown-tool'
    | 'tool-execution';

export abstract class RealtimeError extends Error {
    abstract readonly kind: RealtimeErrorKind;

    get recoverable(): boolean {
        return true;
    }
}

export class TransportClosedError extends RealtimeError {
    readonly kind = 'transport-closed';

    constructor(readonly code: number, readonly reason: string) {
        super(`Realtime connection closed (${code}${reason ? `: ${reason}` : ''})`);
        this.name = 'TransportClosedError';
    }

    override get recoverable(): boolean {
        return false;
    }
}

export class ProtocolError extends RealtimeError {
    readonly kind = 'protocol';

    constructor(
        message: string,
        readonly code: string | null = null,
        readonly eventId: string | null = null,
    ) {
        super(message);
        this.name = 'ProtocolError';
    }
}

export class MalformedToolArgumentsError extends RealtimeError {
    readonly kind = 'malformed-tool-arguments';

    constructor(readonly toolName: string, readonly callId: string, detail: string) {
        super(`Invalid arguments for tool "${toolName}": ${detail}`);
        this.name = 'MalformedToolArgumentsError';
    }
}

export class UnknownToolNameError extends RealtimeError {
    readonly kind = 'unknown-tool';

    constructor(readonly toolName: string, readonly callId: string) {
        super(`Unknown tool "${toolName}"`);
        this.name = 'UnknownToolNameError';
    }
}

export class ToolExecutionError extends RealtimeError {
    readonly kind = 'tool-execution';

    constructor(readonly toolName: string, readonly callId: string, cause: unknown) {
        super(`Tool "${toolName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'ToolExecutionError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
