/**
 * Cloud API request signing
 *
 * Every request carries accessKey, timestamp, nonce and sign headers.
 * The signed string is the canonical form of the request's params
 * (query params for GET, body for PUT/POST) followed by the auth params:
 *
 *   a.b=1&list[0]=x&z=true&accessKey=...&nonce=...&timestamp=...
 *
 * Nested objects flatten to dotted keys, arrays to indexed keys, and the
 * pairs are sorted by key. The signature is HMAC-SHA256, hex encoded.
 */

import crypto from 'crypto';
import type { FieldMap, FieldValue } from '../../telemetry/types';

export interface SignedHeaders {
    accessKey: string;
    timestamp: string;
    nonce: string;
    sign: string;
}

function flattenInto(pairs: Array<[string, string]>, key: string, value: FieldValue): void {
    if (Array.isArray(value)) {
        value.forEach((item, index) => flattenInto(pairs, `${key}[${index}]`, item));
        return;
    }
    if (typeof value === 'object' && value !== null) {
        for (const [childKey, child] of Object.entries(value)) {
            flattenInto(pairs, key ? `${key}.${childKey}` : childKey, child);
        }
        return;
    }
    pairs.push([key, String(value)]);
}

export function flattenParams(params: FieldMap): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    for (const [key, value] of Object.entries(params)) {
        flattenInto(pairs, key, value);
    }
    return pairs;
}

/**
 * Sorted `k=v&k=v` form of the params; empty string when there are none.
 * Values are not URL-encoded.
 */
export function canonicalQuery(params: FieldMap | undefined): string {
    if (!params) return '';
    return flattenParams(params)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, value]) => `${key}=${value}`)
        .join('&');
}

/** Six random digits. */
export function generateNonce(): string {
    return crypto.randomInt(0, 1_000_000).toString().padStart(6, '0');
}

export function signRequest(
    accessKey: string,
    secretKey: string,
    query: string,
    timestamp: string = Date.now().toString(),
    nonce: string = generateNonce()
): SignedHeaders {
    const auth = `accessKey=${accessKey}&nonce=${nonce}&timestamp=${timestamp}`;
    const payload = query ? `${query}&${auth}` : auth;
    const sign = crypto.createHmac('sha256', secretKey).update(payload, 'utf8').digest('hex');

    return { accessKey, timestamp, nonce, sign };
}
