/**
 * Turn / interruption state machine
 *
 * Owns the Session record for one connection. Idle until the remote side starts
 * a response, Responding until it completes or the user talks over it.
 */

import { SAMPLE_RATE, Session } from '../types.js';

export type TurnState = 'Idle' | 'Responding';

/**
 * What must be sent upstream, in order, to cut off the current response
 */
export interface InterruptionPlan {
    responseId: string;
    /** null when no output item has been announced yet; nothing to truncate */
    truncate: {
        itemId: string;
        contentIndex: number;
        audioEndMs: number;
    } | null;
}

function createSession(): Session {
    return {
        currentResponseId: null,
        currentItemId: null,
        isResponding: false,
        currentContentIndex: 0,
        playedSampleCount: 0,
    };
}

export function playedDurationMs(sampleCount: number, sampleRate: number = SAMPLE_RATE): number {
    return Math.floor((sampleCount * 1000) / sampleRate);
}

export class TurnStateMachine {
    private session: Session = createSession();

    get state(): TurnState {
        return this.session.isResponding ? 'Responding' : 'Idle';
    }

    get isResponding(): boolean {
        return this.session.isResponding;
    }

    /**
     * Read-only copy of the current session fields
     */
    snapshot(): Readonly<Session> {
        return { ...this.session };
    }

    responseStarted(responseId: string): void {
        if (this.session.isResponding && this.session.currentResponseId !== responseId) {
            console.warn(`[TurnStateMachine] Response ${responseId} started while ${this.session.currentResponseId} still active`);
        }

        this.session.currentResponseId = responseId;
        this.session.currentItemId = null;
        this.session.currentContentIndex = 0;
        this.session.playedSampleCount = 0;
        this.session.isResponding = true;
    }

    outputItemAdded(itemId: string): void {
        if (!this.session.isResponding) {
            return;
        }
        this.session.currentItemId = itemId;
        this.session.currentContentIndex = 0;
    }

    /**
     * Audio deltas name the content part they belong to; follow it for the current item
     */
    audioContentPart(itemId: string | undefined, contentIndex: number | undefined): void {
        if (!this.session.isResponding || contentIndex === undefined) {
            return;
        }
        if (itemId === undefined || itemId === this.session.currentItemId) {
            this.session.currentContentIndex = contentIndex;
        }
    }

    recordPlayedSamples(sampleCount: number): void {
        if (!this.session.isResponding || sampleCount <= 0) {
            return;
        }
        this.session.playedSampleCount += sampleCount;
    }

    responseCompleted(): void {
        this.session = createSession();
    }

    /**
     * The messages needed to cut off the active response, or null when no response
     * is active. Does not change state: the caller resets once the plan is carried out.
     */
    interruptionPlan(): InterruptionPlan | null {
        const { isResponding, currentResponseId, currentItemId, currentContentIndex, playedSampleCount } = this.session;

        if (!isResponding || currentResponseId === null) {
            return null;
        }

        return {
            responseId: currentResponseId,
            truncate: currentItemId === null
                ? null
                : {
                    itemId: currentItemId,
                    contentIndex: currentContentIndex,
                    audioEndMs: playedDurationMs(playedSampleCount),
                },
        };
    }

    reset(): void {
        this.session = createSession();
    }
}
