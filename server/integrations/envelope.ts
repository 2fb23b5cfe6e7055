/**
 * Stream payload normalization
 *
 * Devices and brokers wrap field updates differently:
 *
 *   { "params": { "soc": 85 } }
 *   { "param":  { "soc": 85 } }
 *   { "data":   { "soc": 85 } }
 *   { "soc": 85 }
 *
 * All four normalize to `{ soc: 85 }`. The first envelope key holding an
 * object wins; without one the top level is the delta. Anything that is
 * not a non-empty object of JSON values yields null.
 */

import { isFieldMap } from '../telemetry/equality';
import type { FieldMap } from '../telemetry/types';

export const ENVELOPE_KEYS = ['params', 'param', 'data'] as const;

function isObj(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeStreamPayload(payload: unknown): FieldMap | null {
    if (!isObj(payload)) return null;

    let candidate: Record<string, unknown> = payload;
    for (const key of ENVELOPE_KEYS) {
        const inner = payload[key];
        if (isObj(inner)) {
            candidate = inner;
            break;
        }
    }

    if (!isFieldMap(candidate) || Object.keys(candidate).length === 0) {
        return null;
    }
    return candidate;
}

/**
 * Parse a raw transport frame (Buffer or string) as JSON.
 * @returns the parsed value, or undefined when the frame is not JSON
 */
export function parseFrame(frame: Buffer | string): unknown {
    try {
        const parsed: unknown = JSON.parse(frame.toString());
        return parsed;
    } catch {
        return undefined;
    }
}
