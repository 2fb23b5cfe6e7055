/**
 * Telemetry Error Types
 *
 * Structured error classification for every failure the coordinator and
 * its collaborators can raise. Each error carries a machine-readable
 * `code` so callers (coordinator, routes, diagnostics) can switch on it:
 *
 * - TransportError → poll fetch or command round trip failed
 * - AuthError → credentials rejected by the cloud API
 * - EncodingError → command encoder rejected a field/value pair
 * - CommandError → dispatch failed (wraps encoding or transport failure)
 * - SubscriptionError → streaming connect/reconnect failure
 * - ConfigError → invalid configuration or unknown device
 *
 * @module server/errors
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export type TransportErrorCode =
    | 'CONFIG_INVALID'       // Missing base URL / keys
    | 'SERVICE_UNREACHABLE'  // ECONNREFUSED, ETIMEDOUT
    | 'SERVICE_ERROR'        // 5xx
    | 'REQUEST_ERROR'        // Other HTTP errors (404, 400, ...)
    | 'NETWORK_ERROR'        // DNS failure, TLS error, ...
    | 'API_ERROR'            // 200 with a non-success envelope code
    | 'MALFORMED_RESPONSE';  // Body is not the expected JSON shape

export type EncodingErrorCode =
    | 'UNKNOWN_FIELD'
    | 'INVALID_VALUE'
    | 'OUT_OF_RANGE'
    | 'INVALID_OPTION'
    | 'MISSING_ROUTING';

export type CommandErrorCode = 'ENCODING_FAILED' | 'TRANSPORT_FAILED';

export type SubscriptionErrorCode = 'CONNECT_FAILED' | 'RECONNECT_EXHAUSTED';

export type ConfigErrorCode = 'CONFIG_INVALID' | 'UNKNOWN_DEVICE' | 'UNKNOWN_PROFILE';

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class TelemetryError<C extends string = string> extends Error {
    public readonly name: string = 'TelemetryError';

    constructor(
        public readonly code: C,
        message: string,
        public readonly context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class TransportError extends TelemetryError<TransportErrorCode> {
    public readonly name = 'TransportError';
}

export class AuthError extends TelemetryError<'AUTH_FAILED'> {
    public readonly name = 'AuthError';

    constructor(message: string, context?: Record<string, unknown>) {
        super('AUTH_FAILED', message, context);
    }
}

export class EncodingError extends TelemetryError<EncodingErrorCode> {
    public readonly name = 'EncodingError';
}

export class CommandError extends TelemetryError<CommandErrorCode> {
    public readonly name = 'CommandError';
}

export class SubscriptionError extends TelemetryError<SubscriptionErrorCode> {
    public readonly name = 'SubscriptionError';
}

export class ConfigError extends TelemetryError<ConfigErrorCode> {
    public readonly name = 'ConfigError';
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

interface AxiosLikeError {
    response?: { status: number; data?: unknown };
    code?: string;
    message?: string;
}

function isAxiosLike(error: unknown): error is AxiosLikeError {
    return typeof error === 'object' && error !== null;
}

/**
 * Classify a raw error (typically from axios) into a TransportError or
 * AuthError. Errors that are already classified pass through unchanged.
 */
export function classifyError(error: unknown, serviceName: string): TransportError | AuthError {
    if (error instanceof TransportError || error instanceof AuthError) {
        return error;
    }

    const raw: AxiosLikeError = isAxiosLike(error) ? error : { message: String(error) };

    // HTTP response errors (server responded)
    if (raw.response) {
        const status = raw.response.status;

        if (status === 401 || status === 403) {
            return new AuthError(
                `Authentication failed for ${serviceName} (HTTP ${status}) - check API credentials`,
                { status, serviceName }
            );
        }

        if (status >= 500) {
            return new TransportError('SERVICE_ERROR',
                `${serviceName} returned server error (HTTP ${status})`,
                { status, serviceName }
            );
        }

        return new TransportError('REQUEST_ERROR',
            `${serviceName} request failed (HTTP ${status})`,
            { status, serviceName }
        );
    }

    // Network-level errors (no response received)
    if (raw.code === 'ECONNREFUSED' || raw.code === 'ETIMEDOUT' || raw.code === 'ECONNABORTED') {
        return new TransportError('SERVICE_UNREACHABLE',
            `Cannot reach ${serviceName}: ${raw.code}`,
            { code: raw.code, serviceName }
        );
    }

    return new TransportError('NETWORK_ERROR',
        `Network error for ${serviceName}: ${raw.message || 'Unknown error'}`,
        { serviceName }
    );
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract a human-readable error message from any error type.
 */
export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
