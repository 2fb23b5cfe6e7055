/**
 * Tests for FieldStore merges and value equality
 */

import { describe, it, expect } from 'vitest';
import { FieldStore } from '../telemetry/FieldStore';
import { fieldValuesEqual, isFieldMap, isFieldValue } from '../telemetry/equality';

describe('fieldValuesEqual', () => {
    it('treats integer and float forms of a number as equal', () => {
        expect(fieldValuesEqual(85, JSON.parse('85.0'))).toBe(true);
        expect(fieldValuesEqual(-0, 0)).toBe(true);
        expect(fieldValuesEqual(NaN, NaN)).toBe(true);
    });

    it('never coerces strings to numbers', () => {
        expect(fieldValuesEqual('85', 85)).toBe(false);
        expect(fieldValuesEqual('', 0)).toBe(false);
        expect(fieldValuesEqual(null, 0)).toBe(false);
    });

    it('compares arrays element-wise', () => {
        expect(fieldValuesEqual([1, 2, 3], [1, 2, 3])).toBe(true);
        expect(fieldValuesEqual([1, 2, 3], [1, 3, 2])).toBe(false);
        expect(fieldValuesEqual([1, 2], [1, 2, 3])).toBe(false);
    });

    it('compares objects key-wise regardless of key order', () => {
        expect(fieldValuesEqual({ a: 1, b: { c: [true] } }, { b: { c: [true] }, a: 1 })).toBe(true);
        expect(fieldValuesEqual({ a: 1 }, { a: 1, b: null })).toBe(false);
        expect(fieldValuesEqual({ a: 1 }, [1])).toBe(false);
    });
});

describe('isFieldValue / isFieldMap', () => {
    it('accepts JSON values and rejects everything else', () => {
        expect(isFieldValue({ a: [1, 'x', null, { b: false }] })).toBe(true);
        expect(isFieldValue(undefined)).toBe(false);
        expect(isFieldValue(() => 1)).toBe(false);
        expect(isFieldValue(new Date())).toBe(false);
        expect(isFieldValue({ a: undefined })).toBe(false);
    });

    it('requires a plain object for a field map', () => {
        expect(isFieldMap({ soc: 85 })).toBe(true);
        expect(isFieldMap([85])).toBe(false);
        expect(isFieldMap(null)).toBe(false);
    });
});

describe('FieldStore', () => {
    it('reports every field of the first snapshot as changed', () => {
        const store = new FieldStore('dev-1');
        const record = store.mergePollSnapshot({ soc: 85, watts: 120 });

        expect(record.deviceId).toBe('dev-1');
        expect(record.source).toBe('poll');
        expect(record.changedFields).toEqual(['soc', 'watts']);
        expect(record.fieldCountBefore).toBe(0);
        expect(record.fieldCountAfter).toBe(2);
        expect(store.lastPollAt).toBeInstanceOf(Date);
        expect(store.lastStreamAt).toBeNull();
    });

    it('is idempotent: the same snapshot twice changes nothing the second time', () => {
        const store = new FieldStore('dev-1');
        store.mergePollSnapshot({ soc: 85, info: { mode: 1 } });
        const record = store.mergePollSnapshot({ soc: 85, info: { mode: 1 } });

        expect(record.changedFields).toEqual([]);
        expect(record.fieldCountBefore).toBe(2);
        expect(record.fieldCountAfter).toBe(2);
    });

    it('does not report 85 vs 85.0 as a change', () => {
        const store = new FieldStore('dev-1');
        store.mergePollSnapshot({ soc: 85 });
        const record = store.mergeStreamDelta(JSON.parse('{"soc": 85.0}'));

        expect(record.changedFields).toEqual([]);
    });

    it('keeps fields a later snapshot omits', () => {
        const store = new FieldStore('dev-1');
        store.mergePollSnapshot({ soc: 85, watts: 120 });
        store.mergePollSnapshot({ soc: 80 });

        expect(store.snapshot()).toEqual({ soc: 80, watts: 120 });
    });

    it('lets the later call win regardless of source', () => {
        const store = new FieldStore('dev-1');
        store.mergeStreamDelta({ soc: 90 });
        store.mergePollSnapshot({ soc: 85 });
        expect(store.get('soc')).toBe(85);
        expect(store.sourceOf('soc')).toBe('poll');

        store.mergeStreamDelta({ soc: 84 });
        expect(store.get('soc')).toBe(84);
        expect(store.sourceOf('soc')).toBe('stream');
    });

    it('scopes a stream record to the delta', () => {
        const store = new FieldStore('dev-1');
        store.mergePollSnapshot({ a: 1, b: 2 });
        const record = store.mergeStreamDelta({ b: 3, c: 4 });

        expect(record.source).toBe('stream');
        expect(record.changedFields).toEqual(['b', 'c']);
        expect(record.fieldCountBefore).toBe(2);
        expect(record.fieldCountAfter).toBe(3);
    });

    it('returns a record even for an empty merge', () => {
        const store = new FieldStore('dev-1');
        const record = store.mergePollSnapshot({});

        expect(record.changedFields).toEqual([]);
        expect(record.fieldCountAfter).toBe(0);
        expect(store.lastPollAt).not.toBeNull();
    });

    it('hands out frozen snapshots that later merges do not touch', () => {
        const store = new FieldStore('dev-1');
        store.mergePollSnapshot({ soc: 85, info: { mode: 1, list: [1, 2] } });
        const before = store.snapshot();

        store.mergePollSnapshot({ soc: 70 });

        expect(before.soc).toBe(85);
        expect(Object.isFrozen(before)).toBe(true);
        expect(Object.isFrozen(before.info)).toBe(true);
        expect(() => {
            Object.assign(before, { soc: 1 });
        }).toThrow(TypeError);
    });

    it('copies incoming values so callers cannot mutate stored state', () => {
        const store = new FieldStore('dev-1');
        const incoming = { info: { mode: 1 } };
        store.mergePollSnapshot(incoming);
        incoming.info.mode = 2;

        expect(store.get('info')).toEqual({ mode: 1 });
    });

    it('exposes provenance and clears everything', () => {
        const store = new FieldStore('dev-1');
        store.mergePollSnapshot({ a: 1 });
        store.mergeStreamDelta({ b: 2 });

        expect(store.provenance()).toEqual({ a: 'poll', b: 'stream' });
        expect(store.size).toBe(2);

        store.clear();
        expect(store.size).toBe(0);
        expect(store.snapshot()).toEqual({});
        expect(store.lastPollAt).toBeNull();
        expect(store.lastStreamAt).toBeNull();
    });
});
