/**
 * WebSocket transport for the realtime API
 *
 * One JSON event per text frame in each direction. The transport only moves
 * messages; decoding and session logic live in RealtimeClient.
 */

import WebSocket from 'ws';
import { ClientEvent } from './events.js';

export interface TransportHandlers {
    onMessage(data: string): void;
    onClose(code: number, reason: string): void;
    onError(error: Error): void;
}

export interface IRealtimeTransport {
    readonly isOpen: boolean;
    connect(handlers: TransportHandlers): Promise<void>;
    send(event: ClientEvent): void;
    close(): Promise<void>;
}

export interface RealtimeTransportOptions {
    url: string;
    model: string;
    apiKey: string;
    connectTimeoutMs?: number;
}

export class RealtimeTransport implements IRealtimeTransport {
    private ws: WebSocket | null = null;
    private closing: boolean = false;

    constructor(private readonly options: RealtimeTransportOptions) {}

    get isOpen(): boolean {
        return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
    }

    private getEndpoint(): string {
        const params = new URLSearchParams({ model: this.options.model });
        return `${this.options.url}?${params.toString()}`;
    }

    async connect(handlers: TransportHandlers): Promise<void> {
        if (this.ws) {
            throw new Error('Transport is already connected');
        }

        this.closing = false;
        const endpoint = this.getEndpoint();
        console.log('[RealtimeTransport] Connecting to:', endpoint);

        const ws = new WebSocket(endpoint, {
            headers: {
                Authorization: `Bearer ${this.options.apiKey}`,
                'OpenAI-Beta': 'realtime=v1',
            },
            handshakeTimeout: this.options.connectTimeoutMs ?? 10000,
        });
        this.ws = ws;

        await new Promise<void>((resolve, reject) => {
            let opened = false;

            ws.on('open', () => {
                opened = true;
                console.log('[RealtimeTransport] Connected');
                resolve();
            });

            ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
                if (isBinary) {
                    console.warn('[RealtimeTransport] Ignoring binary frame');
                    return;
                }
                handlers.onMessage(data.toString());
            });

            ws.on('error', (error: Error) => {
                console.error('[RealtimeTransport] WebSocket error:', error.message);
                if (!opened) {
                    this.ws = null;
                    reject(error);
                    return;
                }
                handlers.onError(error);
            });

            ws.on('close', (code: number, reason: Buffer) => {
                const text = reason.toString();
                console.log('[RealtimeTransport] Connection closed:', code, text);
                this.ws = null;
                if (!opened) {
                    reject(new Error(`Connection closed before open (${code}${text ? `: ${text}` : ''})`));
                    return;
                }
                if (!this.closing) {
                    handlers.onClose(code, text);
                }
            });
        });
    }

    send(event: ClientEvent): void {
        if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
            throw new Error(`Cannot send ${event.type}: transport is not open`);
        }
        this.ws.send(JSON.stringify(event));
    }

    async close(): Promise<void> {
        const ws = this.ws;
        if (!ws) {
            return;
        }
        this.closing = true;

        if (ws.readyState === WebSocket.CLOSED) {
            this.ws = null;
            return;
        }

        await new Promise<void>((resolve) => {
            const timer = setTimeout(() => {
                ws.terminate();
                resolve();
            }, 2000);
            ws.once('close', () => {
                clearTimeout(timer);
                resolve();
            });
            if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
                ws.close(1000, 'Client closing');
            }
        });
        this.ws = null;
    }
}
