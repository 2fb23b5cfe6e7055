/**
 * DeltaInbox
 *
 * Handoff between a transport callback and the coordinator. Callbacks
 * only push; merging happens when the inbox drains on a later turn of
 * the event loop (or when the coordinator drains it before a poll
 * merge). Deltas drain in arrival order.
 *
 * The queue is bounded. Once full, a new delta is folded into the last
 * queued one field by field, so every write survives and the later value
 * still wins.
 *
 * @module server/telemetry/DeltaInbox
 */

import logger from '../utils/logger';
import { extractErrorMessage } from '../errors';
import type { FieldMap } from './types';

export const DEFAULT_INBOX_CAPACITY = 256;

export class DeltaInbox {
    private queue: FieldMap[] = [];
    private scheduled: NodeJS.Immediate | null = null;
    private closed = false;
    private _coalesced = 0;

    constructor(
        private readonly deviceId: string,
        private readonly onDelta: (delta: FieldMap) => void,
        private readonly capacity: number = DEFAULT_INBOX_CAPACITY
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error('DeltaInbox capacity must be a positive integer');
        }
    }

    push(delta: FieldMap): void {
        if (this.closed) return;

        if (this.queue.length >= this.capacity) {
            const lastIndex = this.queue.length - 1;
            this.queue[lastIndex] = { ...this.queue[lastIndex], ...delta };
            this._coalesced++;
            if (this._coalesced === 1 || this._coalesced % 100 === 0) {
                logger.debug(`[DeltaInbox] Queue full, coalescing: device=${this.deviceId} coalesced=${this._coalesced}`);
            }
        } else {
            this.queue.push({ ...delta });
        }

        this.schedule();
    }

    /**
     * Hand every queued delta to the consumer, oldest first.
     * @returns number of deltas delivered
     */
    drain(): number {
        if (this.scheduled) {
            clearImmediate(this.scheduled);
            this.scheduled = null;
        }

        const batch = this.queue;
        this.queue = [];

        for (const delta of batch) {
            if (this.closed) break;
            try {
                this.onDelta(delta);
            } catch (error) {
                logger.error(`[DeltaInbox] Delta handler failed: device=${this.deviceId} error="${extractErrorMessage(error)}"`);
            }
        }

        return batch.length;
    }

    /** Drop anything pending and ignore further pushes. */
    close(): void {
        this.closed = true;
        this.queue = [];
        if (this.scheduled) {
            clearImmediate(this.scheduled);
            this.scheduled = null;
        }
    }

    get pending(): number {
        return this.queue.length;
    }

    get coalesced(): number {
        return this._coalesced;
    }

    private schedule(): void {
        if (this.scheduled) return;
        this.scheduled = setImmediate(() => {
            this.scheduled = null;
            this.drain();
        });
    }
}
