/**
 * Field value comparison and copying.
 *
 * Equality is structural: objects key-wise, arrays element-wise. Numbers
 * compare by value, so 85 and 85.0 are the same reading, -0 equals 0 and
 * NaN equals NaN. Strings are never coerced to numbers.
 *
 * @module server/telemetry/equality
 */

import type { FieldMap, FieldValue } from './types';

function isRecord(value: FieldValue): value is { [key: string]: FieldValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
    if (typeof a === 'number' && typeof b === 'number') {
        return a === b || (Number.isNaN(a) && Number.isNaN(b));
    }

    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
            return false;
        }
        return a.every((item, index) => fieldValuesEqual(item, b[index]));
    }

    if (isRecord(a) && isRecord(b)) {
        const keys = Object.keys(a);
        if (keys.length !== Object.keys(b).length) {
            return false;
        }
        return keys.every(key =>
            Object.prototype.hasOwnProperty.call(b, key) && fieldValuesEqual(a[key], b[key])
        );
    }

    return a === b;
}

/**
 * Narrow an unknown value (usually parsed JSON) to a FieldValue.
 * Rejects undefined, functions, symbols, bigints and non-plain objects.
 */
export function isFieldValue(value: unknown): value is FieldValue {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return true;
    }
    if (Array.isArray(value)) {
        return value.every(isFieldValue);
    }
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
        return false;
    }
    return Object.values(value).every(isFieldValue);
}

export function isFieldMap(value: unknown): value is FieldMap {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && isFieldValue(value);
}

/**
 * Deep copy a value and freeze every level of the copy.
 */
export function freezeFieldValue(value: FieldValue): FieldValue {
    if (Array.isArray(value)) {
        const items = value.map(freezeFieldValue);
        Object.freeze(items);
        return items;
    }
    if (isRecord(value)) {
        const copy: { [key: string]: FieldValue } = {};
        for (const [key, item] of Object.entries(value)) {
            // defineProperty keeps a literal "__proto__" key as data
            Object.defineProperty(copy, key, { value: freezeFieldValue(item), enumerable: true });
        }
        Object.freeze(copy);
        return copy;
    }
    return value;
}
