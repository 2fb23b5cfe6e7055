/**
 * HybridCoordinator
 *
 * One instance per device. Owns the device's FieldStore and is the only
 * code that writes to it. Two inputs feed the store:
 *
 * - Poll loop: a setTimeout chain on a fixed interval. The next tick is
 *   armed only after the current attempt settles, success or failure.
 *   Fresh stream data never skips a tick.
 * - Stream: transport callbacks push deltas into a DeltaInbox, which
 *   drains on a later turn. A poll drains the inbox before merging, so
 *   merges apply in the order their data arrived.
 *
 * Polls for the same device never overlap: the scheduled tick, a manual
 * refresh and the post-command confirmatory poll share a one-permit
 * semaphore.
 *
 * Mode is derived on read:
 * - poll_only        streaming off, not attached, or source disconnected
 * - hybrid           last delta within K × interval of the last poll
 * - stream_degraded  connected but silent for longer than that
 *
 * Silence is counted from the later of the last delta and the moment the
 * source last became connected.
 *
 * @module server/telemetry/HybridCoordinator
 */

import logger from '../utils/logger';
import { maskIdentifier } from '../utils/redact';
import { Semaphore } from '../utils/semaphore';
import { ConfigError, CommandError, extractErrorMessage } from '../errors';
import { getProfile } from '../profiles';
import type { DeviceProfile } from '../profiles/types';
import { ProfileCommandEncoder } from '../commands/ProfileCommandEncoder';
import type { CommandEncoder } from '../commands/types';
import type { PollingSource, StreamingSource } from '../integrations/types';
import { CommandDispatcher } from './CommandDispatcher';
import { DeltaInbox } from './DeltaInbox';
import { DiagnosticsRecorder, type DiagnosticsSnapshot } from './DiagnosticsRecorder';
import { FieldStore } from './FieldStore';
import type {
    CoordinatorHealth,
    CoordinatorMode,
    FieldMap,
    FieldSource,
    ModeListener,
    RefreshFailedListener,
    UpdateListener,
    UpdateRecord,
} from './types';

// ============================================================================
// CONSTANTS
// ============================================================================

export const POLL_INTERVAL_MIN_S = 5;
export const POLL_INTERVAL_MAX_S = 60;
export const DEFAULT_POLL_INTERVAL_S = 15;
export const DEFAULT_DEGRADED_MULTIPLIER = 4;
export const DEFAULT_CONFIRM_DELAY_MS = 2_000;

/** Consecutive failures logged at debug before a single error line */
const FAILURE_LOG_THRESHOLD = 3;

// ============================================================================
// TYPES
// ============================================================================

export interface CoordinatorOptions {
    deviceId: string;
    /** Profile id from the catalog, resolved at construction */
    profile: string;
    pollingSource: PollingSource;
    streamingSource?: StreamingSource | null;
    /** Overrides the profile's encoder */
    encoder?: CommandEncoder;
    pollIntervalSeconds?: number;
    streaming?: boolean;
    degradedMultiplier?: number;
    confirmDelayMs?: number;
    diagnostics?: boolean;
    inboxCapacity?: number;
}

export type PollReason = 'startup' | 'scheduled' | 'manual' | 'confirm';

export type PollOutcome =
    | { status: 'merged'; record: UpdateRecord }
    | { status: 'failed'; error: Error }
    | { status: 'skipped' };

export function validatePollInterval(seconds: unknown): number {
    if (typeof seconds !== 'number' || !Number.isFinite(seconds)
        || seconds < POLL_INTERVAL_MIN_S || seconds > POLL_INTERVAL_MAX_S) {
        throw new ConfigError('CONFIG_INVALID',
            `Poll interval must be between ${POLL_INTERVAL_MIN_S} and ${POLL_INTERVAL_MAX_S} seconds`,
            { value: seconds }
        );
    }
    return seconds;
}

// ============================================================================
// HYBRID COORDINATOR
// ============================================================================

export class HybridCoordinator {
    readonly deviceId: string;
    readonly profile: DeviceProfile;

    private readonly store: FieldStore;
    private readonly inbox: DeltaInbox;
    private readonly gate = new Semaphore(1);
    private readonly dispatcher: CommandDispatcher;
    private readonly recorder: DiagnosticsRecorder;

    private readonly pollingSource: PollingSource;
    private readonly streamingSource: StreamingSource | null;
    private readonly streamingEnabled: boolean;
    private readonly degradedMultiplier: number;
    private readonly confirmDelayMs: number;
    private pollIntervalSeconds: number;

    private started = false;
    private stopped = false;
    private pollTimer: NodeJS.Timeout | null = null;
    private confirmTimer: NodeJS.Timeout | null = null;
    private detachStream: (() => void) | null = null;
    private detachStatus: (() => void) | null = null;
    /** Start of the current connection's silence window */
    private streamSince: Date | null = null;
    private lastPollAttemptAt: Date | null = null;
    private consecutiveFailures = 0;
    private lastError: string | null = null;
    private lastMode: CoordinatorMode = 'poll_only';

    private updateListeners: Set<UpdateListener> = new Set();
    private refreshFailedListeners: Set<RefreshFailedListener> = new Set();
    private modeListeners: Set<ModeListener> = new Set();

    constructor(options: CoordinatorOptions) {
        this.deviceId = options.deviceId;
        this.profile = getProfile(options.profile);
        this.pollingSource = options.pollingSource;
        this.streamingSource = options.streamingSource ?? null;
        this.streamingEnabled = options.streaming ?? true;
        this.pollIntervalSeconds = validatePollInterval(options.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_S);
        this.degradedMultiplier = options.degradedMultiplier ?? DEFAULT_DEGRADED_MULTIPLIER;
        this.confirmDelayMs = options.confirmDelayMs ?? DEFAULT_CONFIRM_DELAY_MS;

        if (!(this.degradedMultiplier > 0)) {
            throw new ConfigError('CONFIG_INVALID', 'degradedMultiplier must be positive', { deviceId: this.deviceId });
        }
        if (!Number.isFinite(this.confirmDelayMs) || this.confirmDelayMs < 0) {
            throw new ConfigError('CONFIG_INVALID', 'confirmDelayMs must be zero or more', { deviceId: this.deviceId });
        }

        this.store = new FieldStore(this.deviceId);
        this.inbox = new DeltaInbox(this.deviceId, delta => this.applyDelta(delta), options.inboxCapacity);
        this.recorder = new DiagnosticsRecorder(options.diagnostics ?? false);

        const encoder = options.encoder ?? new ProfileCommandEncoder(this.profile, this.deviceId);
        this.dispatcher = new CommandDispatcher(this.deviceId, encoder, this.pollingSource, this.recorder);
    }

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    /**
     * Baseline poll, then stream subscription, then the poll timer.
     * A failed baseline poll is reported like any other failed refresh.
     */
    async start(): Promise<void> {
        if (this.started || this.stopped) return;
        this.started = true;

        await this.pollOnce('startup');
        if (this.stopped) return;

        this.attachStream();
        this.scheduleNextPoll();
        this.refreshMode();

        logger.info(`[Coordinator] Started: device=${this.label} profile=${this.profile.id} interval=${this.pollIntervalSeconds}s mode=${this.lastMode}`);
    }

    /**
     * Cancel timers, drop the stream subscription and clear the store.
     * Fetches already in flight finish but their results are discarded.
     */
    shutdown(): void {
        if (this.stopped) return;
        this.stopped = true;

        if (this.pollTimer) {
            clearTimeout(this.pollTimer);
            this.pollTimer = null;
        }
        if (this.confirmTimer) {
            clearTimeout(this.confirmTimer);
            this.confirmTimer = null;
        }

        this.detachStream?.();
        this.detachStream = null;
        this.detachStatus?.();
        this.detachStatus = null;

        this.inbox.close();
        this.store.clear();
        this.updateListeners.clear();
        this.refreshFailedListeners.clear();
        this.modeListeners.clear();

        logger.info(`[Coordinator] Shut down: device=${this.label}`);
    }

    get isRunning(): boolean {
        return this.started && !this.stopped;
    }

    // ========================================================================
    // READS
    // ========================================================================

    snapshot(): Readonly<FieldMap> {
        return this.store.snapshot();
    }

    provenance(): Record<string, FieldSource> {
        return this.store.provenance();
    }

    mode(): CoordinatorMode {
        const source = this.streamingSource;
        if (!this.streamingEnabled || !source || !this.detachStream || !source.isConnected()) {
            return 'poll_only';
        }

        // A (re)connect restarts the window even when older deltas exist
        const lastDelta = this.store.lastStreamAt;
        const since = this.streamSince;
        const lastStream = lastDelta && since
            ? (lastDelta.getTime() > since.getTime() ? lastDelta : since)
            : lastDelta ?? since;
        if (!lastStream) return 'stream_degraded';

        const reference = this.lastPollAttemptAt ?? new Date();
        const windowMs = this.degradedMultiplier * this.pollIntervalSeconds * 1000;
        return reference.getTime() - lastStream.getTime() <= windowMs ? 'hybrid' : 'stream_degraded';
    }

    get pollInterval(): number {
        return this.pollIntervalSeconds;
    }

    diagnostics(): DiagnosticsSnapshot {
        return this.recorder.snapshot();
    }

    get diagnosticsEnabled(): boolean {
        return this.recorder.enabled;
    }

    getHealth(): CoordinatorHealth {
        const failures = this.consecutiveFailures;
        return {
            deviceId: this.deviceId,
            profile: this.profile.id,
            mode: this.mode(),
            streaming: this.streamingEnabled && this.streamingSource !== null,
            streamConnected: this.streamingSource?.isConnected() ?? false,
            pollIntervalSeconds: this.pollIntervalSeconds,
            lastPollAt: this.store.lastPollAt?.toISOString() || null,
            lastStreamAt: this.store.lastStreamAt?.toISOString() || null,
            consecutiveFailures: failures,
            lastError: this.lastError,
            fieldCount: this.store.size,
            status: failures === 0 ? 'healthy'
                : failures < FAILURE_LOG_THRESHOLD ? 'warning'
                    : 'degraded',
        };
    }

    // ========================================================================
    // LISTENERS
    // ========================================================================

    onUpdate(listener: UpdateListener): () => void {
        this.updateListeners.add(listener);
        return () => {
            this.updateListeners.delete(listener);
        };
    }

    onRefreshFailed(listener: RefreshFailedListener): () => void {
        this.refreshFailedListeners.add(listener);
        return () => {
            this.refreshFailedListeners.delete(listener);
        };
    }

    onModeChange(listener: ModeListener): () => void {
        this.modeListeners.add(listener);
        return () => {
            this.modeListeners.delete(listener);
        };
    }

    // ========================================================================
    // COMMANDS & CONTROL
    // ========================================================================

    /**
     * Encode and send a command, then schedule one confirmatory poll.
     * Another command before that poll fires pushes it back.
     * @throws CommandError
     */
    async dispatchCommand(field: string, value: unknown): Promise<void> {
        if (this.stopped) {
            throw new CommandError('TRANSPORT_FAILED', 'Coordinator is shut down', { deviceId: this.deviceId });
        }

        await this.dispatcher.dispatch(field, value);
        this.armConfirmatoryPoll();
    }

    /** Out-of-band poll, queued behind any poll already running. */
    refreshNow(): Promise<PollOutcome> {
        return this.pollOnce('manual');
    }

    /**
     * Re-arms a pending tick on the new interval and polls once right away.
     * Before start() the value is only stored.
     */
    setPollInterval(seconds: number): void {
        this.pollIntervalSeconds = validatePollInterval(seconds);
        logger.info(`[Coordinator] Poll interval changed: device=${this.label} interval=${seconds}s`);

        if (!this.isRunning) return;

        // A tick in flight re-arms itself with the new value when it finishes
        if (this.pollTimer) {
            clearTimeout(this.pollTimer);
            this.pollTimer = null;
            this.scheduleNextPoll();
        }

        this.pollOnce('manual').catch((error: unknown) => {
            logger.error(`[Coordinator] Refresh after interval change failed: device=${this.label} error="${extractErrorMessage(error)}"`);
        });
    }

    // ========================================================================
    // POLLING
    // ========================================================================

    /** Never rejects. */
    private pollOnce(reason: PollReason): Promise<PollOutcome> {
        return this.gate.use(async (): Promise<PollOutcome> => {
            if (this.stopped) return { status: 'skipped' };
            this.lastPollAttemptAt = new Date();

            let fields: FieldMap;
            try {
                fields = await this.pollingSource.fetchSnapshot(this.deviceId);
            } catch (error) {
                if (this.stopped) return { status: 'skipped' };
                return { status: 'failed', error: this.handlePollFailure(error, reason) };
            }

            if (this.stopped) return { status: 'skipped' };

            // Deltas received during the fetch go first
            this.inbox.drain();

            const record = this.store.mergePollSnapshot(fields);
            this.recorder.record('poll', { reason, fields });

            if (this.consecutiveFailures > 0) {
                logger.info(`[Coordinator] Poll recovered: device=${this.label} after=${this.consecutiveFailures} failures`);
                this.consecutiveFailures = 0;
                this.lastError = null;
            }

            logger.debug(`[Coordinator] Poll merged: device=${this.label} reason=${reason} changed=${record.changedFields.length} fields=${record.fieldCountAfter}`);
            this.emitUpdate(record);
            this.refreshMode();
            return { status: 'merged', record };
        });
    }

    private handlePollFailure(error: unknown, reason: PollReason): Error {
        const err = error instanceof Error ? error : new Error(String(error));
        this.consecutiveFailures++;
        this.lastError = err.message;
        this.recorder.record('poll', { reason, ok: false, error: err.message });

        // Smart logging: debug while transient, one error at the threshold
        if (this.consecutiveFailures < FAILURE_LOG_THRESHOLD) {
            logger.debug(`[Coordinator] Poll failed (${this.consecutiveFailures}/${FAILURE_LOG_THRESHOLD}): device=${this.label} reason=${reason} error="${err.message}"`);
        } else if (this.consecutiveFailures === FAILURE_LOG_THRESHOLD) {
            logger.error(`[Coordinator] Polling unavailable: device=${this.label} error="${err.message}"`);
        }

        const event = {
            deviceId: this.deviceId,
            error: err,
            consecutiveFailures: this.consecutiveFailures,
            timestamp: new Date(),
        };
        for (const listener of this.refreshFailedListeners) {
            try {
                listener(event);
            } catch (listenerError) {
                logger.error(`[Coordinator] refreshFailed listener threw: device=${this.label} error="${extractErrorMessage(listenerError)}"`);
            }
        }

        this.refreshMode();
        return err;
    }

    private scheduleNextPoll(): void {
        if (this.stopped) return;

        this.pollTimer = setTimeout(() => {
            this.pollTimer = null;
            this.pollOnce('scheduled').then(
                () => this.scheduleNextPoll(),
                (error: unknown) => {
                    logger.error(`[Coordinator] Poll tick failed: device=${this.label} error="${extractErrorMessage(error)}"`);
                    this.scheduleNextPoll();
                }
            );
        }, this.pollIntervalSeconds * 1000);
    }

    private armConfirmatoryPoll(): void {
        if (this.confirmTimer) {
            clearTimeout(this.confirmTimer);
        }

        this.confirmTimer = setTimeout(() => {
            this.confirmTimer = null;
            this.pollOnce('confirm').catch((error: unknown) => {
                logger.error(`[Coordinator] Confirmatory poll failed: device=${this.label} error="${extractErrorMessage(error)}"`);
            });
        }, this.confirmDelayMs);
    }

    // ========================================================================
    // STREAMING
    // ========================================================================

    private attachStream(): void {
        const source = this.streamingSource;
        if (!this.streamingEnabled || !source) return;

        this.detachStream = source.subscribe(this.deviceId, delta => this.inbox.push(delta));
        this.detachStatus = source.onStatusChange(status => {
            logger.debug(`[Coordinator] Stream status: device=${this.label} status=${status}`);
            if (status === 'connected') {
                this.streamSince = new Date();
            }
            this.refreshMode();
        });
        this.streamSince = new Date();
    }

    private applyDelta(delta: FieldMap): void {
        if (this.stopped) return;

        const record = this.store.mergeStreamDelta(delta);
        this.recorder.record('stream', delta);
        this.emitUpdate(record);
        this.refreshMode();
    }

    // ========================================================================
    // EVENTS
    // ========================================================================

    private emitUpdate(record: UpdateRecord): void {
        for (const listener of this.updateListeners) {
            try {
                listener(record);
            } catch (error) {
                logger.error(`[Coordinator] Update listener threw: device=${this.label} error="${extractErrorMessage(error)}"`);
            }
        }
    }

    private refreshMode(): void {
        if (this.stopped) return;

        const mode = this.mode();
        const previous = this.lastMode;
        if (mode === previous) return;
        this.lastMode = mode;

        logger.info(`[Coordinator] Mode changed: device=${this.label} ${previous} -> ${mode}`);
        const event = { deviceId: this.deviceId, mode, previous, timestamp: new Date() };
        for (const listener of this.modeListeners) {
            try {
                listener(event);
            } catch (error) {
                logger.error(`[Coordinator] Mode listener threw: device=${this.label} error="${extractErrorMessage(error)}"`);
            }
        }
    }

    private get label(): string {
        return maskIdentifier(this.deviceId);
    }
}
