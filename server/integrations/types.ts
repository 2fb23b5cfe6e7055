/**
 * Telemetry Source Interfaces
 *
 * The coordinator talks to exactly two kinds of collaborators:
 *
 * - PollingSource: request/response. One call = one complete snapshot.
 *   Also the only channel commands are sent through.
 * - StreamingSource: persistent push subscription delivering partial
 *   field updates at arbitrary times.
 */

import type { CommandPayload } from '../commands/types';
import type { FieldMap } from '../telemetry/types';

// ============================================================================
// POLLING
// ============================================================================

export interface PollingSource {
    /**
     * Fetch every field the device currently reports.
     * @throws TransportError | AuthError
     */
    fetchSnapshot(deviceId: string): Promise<FieldMap>;

    /**
     * Execute an encoded command. Resolves with the API's reply body.
     * @throws TransportError | AuthError
     */
    sendCommand(deviceId: string, payload: CommandPayload): Promise<unknown>;
}

// ============================================================================
// STREAMING
// ============================================================================

export type StreamStatus =
    | 'idle'          // never connected
    | 'connecting'    // explicit connect() in progress
    | 'connected'
    | 'reconnecting'  // lost, backoff running
    | 'exhausted'     // gave up after max attempts
    | 'closed';       // disconnect() called

export type DeltaHandler = (delta: FieldMap) => void;
export type StatusListener = (status: StreamStatus) => void;

export interface StreamHealth {
    transport: string;
    status: StreamStatus;
    reconnectAttempts: number;
    lastConnected: string | null;
    lastMessageAt: string | null;
    lastError: string | null;
    subscriptions: number;
}

export interface StreamingSource {
    readonly transport: string;

    /**
     * Open the connection.
     * @throws SubscriptionError when the first attempt fails
     */
    connect(): Promise<void>;

    /** Close the connection and stop reconnecting. Idempotent. */
    disconnect(): Promise<void>;

    isConnected(): boolean;

    /**
     * Register a handler for one device's deltas. The subscription
     * survives reconnects.
     * @returns unsubscribe function
     */
    subscribe(deviceId: string, onDelta: DeltaHandler): () => void;

    /** @returns unregister function */
    onStatusChange(listener: StatusListener): () => void;

    getHealth(): StreamHealth;
}
