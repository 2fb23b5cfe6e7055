/**
 * FieldStore
 *
 * In-memory view of one device: field name → latest value, plus the
 * source that last wrote each field. Every write replaces a whole field
 * value; nothing is ever partially updated or removed by a refresh.
 *
 * Only the owning HybridCoordinator mutates a store. Readers get frozen
 * snapshots.
 *
 * @module server/telemetry/FieldStore
 */

import { fieldValuesEqual, freezeFieldValue } from './equality';
import type { FieldMap, FieldSource, FieldValue, UpdateRecord } from './types';

export class FieldStore {
    private fields: Map<string, FieldValue> = new Map();
    private sources: Map<string, FieldSource> = new Map();
    private _lastPollAt: Date | null = null;
    private _lastStreamAt: Date | null = null;

    constructor(private readonly deviceId: string) { }

    /**
     * Merge a complete snapshot from the polling source. Fields the
     * snapshot does not carry keep their current value.
     */
    mergePollSnapshot(fields: FieldMap): UpdateRecord {
        return this.merge(fields, 'poll');
    }

    /**
     * Merge a partial update from the streaming source. The record only
     * covers the delta's own fields.
     */
    mergeStreamDelta(fields: FieldMap): UpdateRecord {
        return this.merge(fields, 'stream');
    }

    snapshot(): Readonly<FieldMap> {
        // Stored values are already frozen copies
        const view: FieldMap = {};
        for (const [name, value] of this.fields) {
            Object.defineProperty(view, name, { value, enumerable: true });
        }
        return Object.freeze(view);
    }

    get(name: string): FieldValue | undefined {
        return this.fields.get(name);
    }

    sourceOf(name: string): FieldSource | null {
        return this.sources.get(name) ?? null;
    }

    /** Field → last writer, for diagnostics. */
    provenance(): Record<string, FieldSource> {
        return Object.fromEntries(this.sources);
    }

    get size(): number {
        return this.fields.size;
    }

    get lastPollAt(): Date | null {
        return this._lastPollAt;
    }

    get lastStreamAt(): Date | null {
        return this._lastStreamAt;
    }

    clear(): void {
        this.fields.clear();
        this.sources.clear();
        this._lastPollAt = null;
        this._lastStreamAt = null;
    }

    private merge(incoming: FieldMap, source: FieldSource): UpdateRecord {
        const fieldCountBefore = this.fields.size;
        const changedFields: string[] = [];

        for (const [name, value] of Object.entries(incoming)) {
            const prior = this.fields.get(name);
            if (prior === undefined || !fieldValuesEqual(prior, value)) {
                changedFields.push(name);
            }
            this.fields.set(name, freezeFieldValue(value));
            this.sources.set(name, source);
        }

        const timestamp = new Date();
        if (source === 'poll') {
            this._lastPollAt = timestamp;
        } else {
            this._lastStreamAt = timestamp;
        }

        return {
            deviceId: this.deviceId,
            changedFields: changedFields.sort(),
            fieldCountBefore,
            fieldCountAfter: this.fields.size,
            timestamp,
            source,
        };
    }
}
