/**
 * Base class for realtime clients with common event handling
 */

import { RealtimeClientEvents, VoiceState } from '../types.js';

type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerMap = {
    [K in keyof RealtimeClientEvents]: Set<Listener<RealtimeClientEvents[K]>>;
};

function createListenerMap(): ListenerMap {
    return {
        'state-change': new Set(),
        'text': new Set(),
        'transcript': new Set(),
        'audio': new Set(),
        'interrupt': new Set(),
        'speech-started': new Set(),
        'speech-stopped': new Set(),
        'response-done': new Set(),
        'tool-status': new Set(),
        'server-event': new Set(),
        'error': new Set(),
        'connected': new Set(),
        'disconnected': new Set(),
    };
}

export abstract class BaseRealtimeClient {
    protected _isConnected: boolean = false;
    protected _state: VoiceState = 'idle';

    private listeners: ListenerMap = createListenerMap();

    get isConnected(): boolean {
        return this._isConnected;
    }

    get state(): VoiceState {
        return this._state;
    }

    protected setState(state: VoiceState): void {
        if (this._state !== state) {
            this._state = state;
            this.emit('state-change', state);
        }
    }

    protected setConnected(connected: boolean): void {
        if (this._isConnected !== connected) {
            this._isConnected = connected;
            if (connected) {
                this.emit('connected');
            } else {
                this.emit('disconnected');
            }
        }
    }

    on<K extends keyof RealtimeClientEvents>(
        event: K,
        listener: Listener<RealtimeClientEvents[K]>
    ): void {
        this.listeners[event].add(listener);
    }

    off<K extends keyof RealtimeClientEvents>(
        event: K,
        listener: Listener<RealtimeClientEvents[K]>
    ): void {
        this.listeners[event].delete(listener);
    }

    listenerCount(event: keyof RealtimeClientEvents): number {
        return this.listeners[event].size;
    }

    protected emit<K extends keyof RealtimeClientEvents>(
        event: K,
        ...args: RealtimeClientEvents[K]
    ): void {
        for (const listener of this.listeners[event]) {
            try {
                listener(...args);
            } catch (error) {
                console.error(`Error in ${event} listener:`, error);
            }
        }
    }

    protected emitError(error: Error): void {
        if (this.listenerCount('error') === 0) {
            console.error('[RealtimeClient] Error:', error);
            return;
        }
        this.emit('error', error);
    }
}
