/**
 * DeviceManager
 *
 * Owns one HybridCoordinator per configured device plus the shared
 * streaming source, and is the only surface routes talk to.
 * - start(): connect the stream (failure is not fatal) while every
 *   coordinator starts polling
 * - shutdown(): stop coordinators, then close the stream
 */

import logger from '../utils/logger';
import { ConfigError, extractErrorMessage } from '../errors';
import { redactValue } from '../utils/redact';
import type { DeviceConfig } from '../config/devices';
import type { PollingSource, StreamHealth, StreamingSource } from '../integrations/types';
import type { DeviceProfile } from '../profiles/types';
import { HybridCoordinator, type PollOutcome } from '../telemetry/HybridCoordinator';
import type { DiagnosticsSnapshot } from '../telemetry/DiagnosticsRecorder';
import type {
    CoordinatorHealth,
    CoordinatorMode,
    FieldMap,
    FieldSource,
    ModeChangeEvent,
    RefreshFailedEvent,
    UpdateRecord,
} from '../telemetry/types';

// ============================================================================
// TYPES
// ============================================================================

export type DeviceChange =
    | { type: 'update'; record: UpdateRecord }
    | { type: 'mode'; event: ModeChangeEvent }
    | { type: 'refresh-failed'; event: RefreshFailedEvent };

export type DeviceChangeListener = (change: DeviceChange) => void;

export interface DeviceSummary {
    deviceId: string;
    name: string;
    profile: string;
    mode: CoordinatorMode;
    pollIntervalSeconds: number;
    streaming: boolean;
}

export interface ManagerHealth {
    running: boolean;
    devices: CoordinatorHealth[];
    stream: StreamHealth | null;
}

export interface DeviceDiagnostics {
    deviceId: string;
    health: CoordinatorHealth;
    state: unknown;
    provenance: Record<string, FieldSource>;
    history: DiagnosticsSnapshot | null;
}

export interface DeviceManagerOptions {
    devices: DeviceConfig[];
    pollingSource: PollingSource;
    streamingSource?: StreamingSource | null;
}

interface ManagedDevice {
    config: DeviceConfig;
    coordinator: HybridCoordinator;
}

// ============================================================================
// DEVICE MANAGER
// ============================================================================

export class DeviceManager {
    private devices: Map<string, ManagedDevice> = new Map();
    private readonly streamingSource: StreamingSource | null;
    private running = false;
    private stopped = false;

    constructor(options: DeviceManagerOptions) {
        this.streamingSource = options.streamingSource ?? null;

        for (const config of options.devices) {
            const coordinator = new HybridCoordinator({
                deviceId: config.deviceId,
                profile: config.profile,
                pollingSource: options.pollingSource,
                streamingSource: this.streamingSource,
                pollIntervalSeconds: config.pollIntervalSeconds,
                streaming: config.streaming,
                degradedMultiplier: config.degradedMultiplier,
                confirmDelayMs: config.confirmDelayMs,
                diagnostics: config.diagnostics,
            });
            this.devices.set(config.deviceId, { config, coordinator });
        }
    }

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    async start(): Promise<void> {
        if (this.running || this.stopped) return;
        this.running = true;

        // Coordinators poll while the stream connects; a late connect flips them to hybrid
        await Promise.all([
            this.connectStream(),
            ...Array.from(this.devices.values()).map(({ coordinator }) => coordinator.start()),
        ]);

        logger.info(`[DeviceManager] Started: devices=${this.devices.size} stream=${this.streamingSource?.transport ?? 'none'}`);
    }

    async shutdown(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;
        this.running = false;

        for (const { coordinator } of this.devices.values()) {
            coordinator.shutdown();
        }

        if (this.streamingSource) {
            try {
                await this.streamingSource.disconnect();
            } catch (error) {
                logger.warn(`[DeviceManager] Stream disconnect failed: error="${extractErrorMessage(error)}"`);
            }
        }

        logger.info('[DeviceManager] Shut down');
    }

    // ========================================================================
    // QUERIES
    // ========================================================================

    has(deviceId: string): boolean {
        return this.devices.has(deviceId);
    }

    listDevices(): DeviceSummary[] {
        return Array.from(this.devices.values()).map(({ config, coordinator }) => ({
            deviceId: config.deviceId,
            name: config.name,
            profile: config.profile,
            mode: coordinator.mode(),
            pollIntervalSeconds: coordinator.pollInterval,
            streaming: config.streaming,
        }));
    }

    currentState(deviceId: string): Readonly<FieldMap> {
        return this.get(deviceId).coordinator.snapshot();
    }

    mode(deviceId: string): CoordinatorMode {
        return this.get(deviceId).coordinator.mode();
    }

    profile(deviceId: string): DeviceProfile {
        return this.get(deviceId).coordinator.profile;
    }

    getHealth(): ManagerHealth {
        return {
            running: this.running,
            devices: Array.from(this.devices.values()).map(({ coordinator }) => coordinator.getHealth()),
            stream: this.streamingSource?.getHealth() ?? null,
        };
    }

    /** Redacted state plus recent history (when enabled for the device). */
    diagnostics(deviceId: string): DeviceDiagnostics {
        const { coordinator } = this.get(deviceId);
        return {
            deviceId,
            health: coordinator.getHealth(),
            state: redactValue(coordinator.snapshot()),
            provenance: coordinator.provenance(),
            history: coordinator.diagnosticsEnabled ? coordinator.diagnostics() : null,
        };
    }

    // ========================================================================
    // CHANGES & CONTROL
    // ========================================================================

    /**
     * Listen for merges, mode changes and failed refreshes of one device.
     * @returns unsubscribe function
     */
    subscribeChanges(deviceId: string, listener: DeviceChangeListener): () => void {
        const { coordinator } = this.get(deviceId);
        const offUpdate = coordinator.onUpdate(record => listener({ type: 'update', record }));
        const offMode = coordinator.onModeChange(event => listener({ type: 'mode', event }));
        const offFailed = coordinator.onRefreshFailed(event => listener({ type: 'refresh-failed', event }));
        return () => {
            offUpdate();
            offMode();
            offFailed();
        };
    }

    /** @throws CommandError */
    dispatchCommand(deviceId: string, field: string, value: unknown): Promise<void> {
        return this.get(deviceId).coordinator.dispatchCommand(field, value);
    }

    refresh(deviceId: string): Promise<PollOutcome> {
        return this.get(deviceId).coordinator.refreshNow();
    }

    /** @throws ConfigError when out of bounds */
    setPollInterval(deviceId: string, seconds: number): void {
        this.get(deviceId).coordinator.setPollInterval(seconds);
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    private async connectStream(): Promise<void> {
        if (!this.streamingSource) return;
        try {
            await this.streamingSource.connect();
        } catch (error) {
            // The source keeps retrying in the background; devices run poll-only meanwhile
            logger.warn(`[DeviceManager] Stream unavailable at startup: error="${extractErrorMessage(error)}"`);
        }
    }

    private get(deviceId: string): ManagedDevice {
        const device = this.devices.get(deviceId);
        if (!device) {
            throw new ConfigError('UNKNOWN_DEVICE', `Unknown device: ${deviceId}`, { deviceId });
        }
        return device;
    }
}
