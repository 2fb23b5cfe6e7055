/**
 * Diagnostics Redaction
 *
 * Replaces serial numbers and API credentials with a sentinel before
 * anything recorded for diagnostics leaves the process. Matching is by
 * key name at any depth.
 */

/** Fixed-length sentinel that replaces real values */
export const REDACTED_SENTINEL = '••••••••';

export const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
    'sn',
    'serialNumber',
    'serial_number',
    'deviceSn',
    'accessKey',
    'secretKey',
    'sign',
    'certificateAccount',
    'certificatePassword',
    'password',
]);

/**
 * Deep copy with sensitive keys replaced. Empty and null values are kept
 * so the shape stays readable.
 */
export function redactValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(redactValue);
    }
    if (typeof value === 'object' && value !== null) {
        const redacted: Record<string, unknown> = {};
        for (const [key, item] of Object.entries(value)) {
            const hidden = SENSITIVE_KEYS.has(key) && item !== null && item !== '';
            Object.defineProperty(redacted, key, {
                value: hidden ? REDACTED_SENTINEL : redactValue(item),
                enumerable: true,
                writable: true,
                configurable: true,
            });
        }
        return redacted;
    }
    return value;
}

/**
 * Mask an identifier for log lines and diagnostics, keeping the last four
 * characters so devices stay distinguishable.
 */
export function maskIdentifier(id: string): string {
    return id.length <= 4 ? REDACTED_SENTINEL : `${REDACTED_SENTINEL}${id.slice(-4)}`;
}
