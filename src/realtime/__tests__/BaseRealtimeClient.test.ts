import { afterEach, describe, expect, it, vi } from 'vitest';
import { BaseRealtimeClient } from '../BaseRealtimeClient.js';

class TestClient extends BaseRealtimeClient {
    sendText(text: string): void {
        this.emit('text', text);
    }

    fail(error: Error): void {
        this.emitError(error);
    }
}

describe('BaseRealtimeClient', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('delivers events to every listener until removed', () => {
        const client = new TestClient();
        const first = vi.fn();
        const second = vi.fn();

        client.on('text', first);
        client.on('text', second);
        client.sendText('hello');
        client.off('text', first);
        client.sendText('again');

        expect(first.mock.calls).toEqual([['hello']]);
        expect(second.mock.calls).toEqual([['hello'], ['again']]);
        expect(client.listenerCount('text')).toBe(1);
        expect(client.listenerCount('audio')).toBe(0);
    });

    it('keeps notifying after a listener throws', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const client = new TestClient();
        const after = vi.fn();

        client.on('text', () => {
            throw new Error('listener broke');
        });
        client.on('text', after);
        client.sendText('hello');

        expect(after).toHaveBeenCalledWith('hello');
    });

    it('logs errors when nobody listens for them', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const client = new TestClient();
        const error = new Error('lost');

        client.fail(error);
        expect(errorSpy).toHaveBeenCalledWith('[RealtimeClient] Error:', error);

        const listener = vi.fn();
        client.on('error', listener);
        client.fail(error);
        expect(listener).toHaveBeenCalledWith(error);
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });
});
