/**
 * Telemetry Types
 *
 * Shared shapes for the field store, the coordinator and the sources
 * that feed them.
 *
 * @module server/telemetry/types
 */

// ============================================================================
// FIELD VALUES
// ============================================================================

/** Any JSON value as received from a source. */
export type FieldValue =
    | string
    | number
    | boolean
    | null
    | FieldValue[]
    | { [key: string]: FieldValue };

export type FieldMap = Record<string, FieldValue>;

export type FieldSource = 'poll' | 'stream';

// ============================================================================
// UPDATE RECORDS
// ============================================================================

/**
 * Produced by every merge, including merges that change nothing.
 */
export interface UpdateRecord {
    deviceId: string;
    /** Sorted names of fields that are new or whose value changed */
    changedFields: string[];
    fieldCountBefore: number;
    fieldCountAfter: number;
    timestamp: Date;
    source: FieldSource;
}

// ============================================================================
// COORDINATOR
// ============================================================================

export type CoordinatorMode = 'hybrid' | 'poll_only' | 'stream_degraded';

export interface RefreshFailedEvent {
    deviceId: string;
    error: Error;
    consecutiveFailures: number;
    timestamp: Date;
}

export interface ModeChangeEvent {
    deviceId: string;
    mode: CoordinatorMode;
    previous: CoordinatorMode;
    timestamp: Date;
}

export type UpdateListener = (record: UpdateRecord) => void;
export type RefreshFailedListener = (event: RefreshFailedEvent) => void;
export type ModeListener = (event: ModeChangeEvent) => void;

export interface CoordinatorHealth {
    deviceId: string;
    profile: string;
    mode: CoordinatorMode;
    streaming: boolean;
    streamConnected: boolean;
    pollIntervalSeconds: number;
    lastPollAt: string | null;
    lastStreamAt: string | null;
    consecutiveFailures: number;
    lastError: string | null;
    fieldCount: number;
    status: 'healthy' | 'warning' | 'degraded';
}
