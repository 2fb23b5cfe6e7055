/**
 * BaseStreamingSource: connection lifecycle shared by every push transport
 *
 * Subclasses implement four transport hooks (open, close, subscribe,
 * unsubscribe) and call deliver() for each inbound frame and
 * handleTransportLost() when an established connection drops. This class
 * owns everything else:
 *
 * - Status tracking and status listeners
 * - Exponential backoff reconnection: 1s → 2s → 4s ... capped at 2 min
 * - Giving up after maxReconnectAttempts ('exhausted'); connect() resets
 * - Resubscribing every device after a reconnect
 * - Envelope normalization and handler isolation on delivery
 *
 * @module server/integrations/BaseStreamingSource
 */

import logger from '../utils/logger';
import { extractErrorMessage, SubscriptionError } from '../errors';
import { normalizeStreamPayload } from './envelope';
import type {
    DeltaHandler,
    StatusListener,
    StreamHealth,
    StreamingSource,
    StreamStatus,
} from './types';

// ============================================================================
// OPTIONS
// ============================================================================

export interface StreamingOptions {
    /** Attempts after a lost connection before giving up (default 10) */
    maxReconnectAttempts?: number;
    /** First backoff delay (default 1s) */
    initialBackoffMs?: number;
    /** Backoff ceiling (default 2 min) */
    maxBackoffMs?: number;
    /** Keep retrying in the background when the first connect() fails */
    retryInitialConnect?: boolean;
}

const DEFAULT_MAX_RECONNECT_ATTEMPTS = 10;
const RECONNECT_INITIAL = 1_000;
const RECONNECT_MAX = 120_000;

// ============================================================================
// BASE STREAMING SOURCE
// ============================================================================

export abstract class BaseStreamingSource implements StreamingSource {
    abstract readonly transport: string;

    // --- Transport hooks ---

    /** Resolve once the transport is ready to subscribe; reject on failure. */
    protected abstract openTransport(): Promise<void>;

    /** Tear the transport down. Must not trigger handleTransportLost. */
    protected abstract closeTransport(): Promise<void>;

    protected abstract subscribeDevice(deviceId: string): void;

    protected abstract unsubscribeDevice(deviceId: string): void;

    // --- State ---

    private status: StreamStatus = 'idle';
    private handlers: Map<string, Set<DeltaHandler>> = new Map();
    private statusListeners: Set<StatusListener> = new Set();
    private reconnectTimer: NodeJS.Timeout | null = null;
    private reconnectAttempts = 0;
    private lastConnected: Date | null = null;
    private lastMessageAt: Date | null = null;
    private lastError: string | null = null;

    private readonly maxReconnectAttempts: number;
    private readonly initialBackoffMs: number;
    private readonly maxBackoffMs: number;
    private readonly retryInitialConnect: boolean;

    constructor(options: StreamingOptions = {}) {
        this.maxReconnectAttempts = options.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
        this.initialBackoffMs = options.initialBackoffMs ?? RECONNECT_INITIAL;
        this.maxBackoffMs = options.maxBackoffMs ?? RECONNECT_MAX;
        this.retryInitialConnect = options.retryInitialConnect ?? false;
    }

    // ========================================================================
    // PUBLIC API
    // ========================================================================

    async connect(): Promise<void> {
        const current = this.status;
        if (current === 'connected' || current === 'connecting') return;

        this.clearReconnectTimer();
        this.reconnectAttempts = 0;
        this.setStatus('connecting');

        try {
            await this.openTransport();
        } catch (error) {
            this.lastError = extractErrorMessage(error);
            logger.warn(`[Stream:${this.transport}] Connect failed: error="${this.lastError}"`);

            if (this.getStatus() === 'connecting') {
                if (this.retryInitialConnect) {
                    this.scheduleReconnect();
                } else {
                    this.setStatus('idle');
                }
            }

            throw new SubscriptionError('CONNECT_FAILED',
                `${this.transport} connection failed: ${this.lastError}`,
                { transport: this.transport },
                { cause: error }
            );
        }

        // disconnect() ran while the handshake was in flight
        if (this.getStatus() !== 'connecting') {
            await this.safeCloseTransport();
            return;
        }

        this.markConnected();
        logger.info(`[Stream:${this.transport}] Connected`);
    }

    async disconnect(): Promise<void> {
        if (this.status === 'closed') return;

        this.clearReconnectTimer();
        this.setStatus('closed');
        await this.safeCloseTransport();

        logger.info(`[Stream:${this.transport}] Disconnected`);
    }

    isConnected(): boolean {
        return this.status === 'connected';
    }

    getStatus(): StreamStatus {
        return this.status;
    }

    subscribe(deviceId: string, onDelta: DeltaHandler): () => void {
        let set = this.handlers.get(deviceId);
        const isNewDevice = !set;
        if (!set) {
            set = new Set();
            this.handlers.set(deviceId, set);
        }
        set.add(onDelta);

        if (isNewDevice && this.isConnected()) {
            this.safeSubscribe(deviceId);
        }

        return () => {
            const current = this.handlers.get(deviceId);
            if (!current || !current.delete(onDelta)) return;
            if (current.size === 0) {
                this.handlers.delete(deviceId);
                if (this.isConnected()) {
                    try {
                        this.unsubscribeDevice(deviceId);
                    } catch (error) {
                        logger.debug(`[Stream:${this.transport}] Unsubscribe failed: error="${extractErrorMessage(error)}"`);
                    }
                }
            }
        };
    }

    onStatusChange(listener: StatusListener): () => void {
        this.statusListeners.add(listener);
        return () => {
            this.statusListeners.delete(listener);
        };
    }

    getHealth(): StreamHealth {
        return {
            transport: this.transport,
            status: this.status,
            reconnectAttempts: this.reconnectAttempts,
            lastConnected: this.lastConnected?.toISOString() || null,
            lastMessageAt: this.lastMessageAt?.toISOString() || null,
            lastError: this.lastError,
            subscriptions: this.handlers.size,
        };
    }

    // ========================================================================
    // FOR SUBCLASSES
    // ========================================================================

    /** Device ids with at least one handler. */
    protected subscribedDevices(): string[] {
        return Array.from(this.handlers.keys());
    }

    /**
     * Hand one inbound payload to a device's handlers.
     * @returns false when the payload was dropped
     */
    protected deliver(deviceId: string, payload: unknown): boolean {
        this.lastMessageAt = new Date();

        const delta = normalizeStreamPayload(payload);
        if (!delta) {
            logger.debug(`[Stream:${this.transport}] Dropped payload without fields`);
            return false;
        }

        const set = this.handlers.get(deviceId);
        if (!set) return false;

        for (const handler of set) {
            try {
                handler(delta);
            } catch (error) {
                logger.error(`[Stream:${this.transport}] Delta handler failed: error="${extractErrorMessage(error)}"`);
            }
        }
        return true;
    }

    protected recordError(message: string): void {
        this.lastError = message;
    }

    /**
     * Report an unexpected drop of an established connection. Ignored in
     * any state but 'connected', so close events caused by disconnect()
     * or by a failing reconnect attempt do nothing.
     */
    protected handleTransportLost(reason: string): void {
        if (this.status !== 'connected') return;

        this.lastError = reason;
        logger.warn(`[Stream:${this.transport}] Connection lost: reason="${reason}"`);
        this.scheduleReconnect();
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    private markConnected(): void {
        this.reconnectAttempts = 0;
        this.lastConnected = new Date();
        this.setStatus('connected');

        for (const deviceId of this.handlers.keys()) {
            this.safeSubscribe(deviceId);
        }
    }

    private scheduleReconnect(): void {
        if (this.reconnectAttempts >= this.maxReconnectAttempts) {
            this.setStatus('exhausted');
            logger.error(`[Stream:${this.transport}] Giving up after ${this.reconnectAttempts} reconnect attempts`);
            return;
        }

        this.reconnectAttempts++;
        const delay = Math.min(
            this.initialBackoffMs * Math.pow(2, this.reconnectAttempts - 1),
            this.maxBackoffMs
        );

        this.setStatus('reconnecting');
        logger.debug(`[Stream:${this.transport}] Reconnect scheduled: attempt=${this.reconnectAttempts} delay=${delay}ms`);

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            void this.attemptReconnect();
        }, delay);
    }

    /** Never rejects. */
    private async attemptReconnect(): Promise<void> {
        if (this.status !== 'reconnecting') return;

        try {
            await this.openTransport();
        } catch (error) {
            this.lastError = extractErrorMessage(error);
            logger.debug(`[Stream:${this.transport}] Reconnect failed: attempt=${this.reconnectAttempts} error="${this.lastError}"`);
            if (this.status === 'reconnecting') {
                this.scheduleReconnect();
            }
            return;
        }

        if (this.status !== 'reconnecting') {
            await this.safeCloseTransport();
            return;
        }

        const attempts = this.reconnectAttempts;
        this.markConnected();
        logger.info(`[Stream:${this.transport}] Reconnected after ${attempts} attempt(s)`);
    }

    private safeSubscribe(deviceId: string): void {
        try {
            this.subscribeDevice(deviceId);
        } catch (error) {
            logger.warn(`[Stream:${this.transport}] Subscribe failed: error="${extractErrorMessage(error)}"`);
        }
    }

    private async safeCloseTransport(): Promise<void> {
        try {
            await this.closeTransport();
        } catch (error) {
            logger.debug(`[Stream:${this.transport}] Close failed: error="${extractErrorMessage(error)}"`);
        }
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    private setStatus(status: StreamStatus): void {
        if (this.status === status) return;
        this.status = status;

        for (const listener of this.statusListeners) {
            try {
                listener(status);
            } catch (error) {
                logger.error(`[Stream:${this.transport}] Status listener failed: error="${extractErrorMessage(error)}"`);
            }
        }
    }
}
