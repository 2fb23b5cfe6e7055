/**
 * Tests for DeviceManager startup against in-process sources
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import logger from '../utils/logger';
import { DeviceManager } from '../services/DeviceManager';
import { parseDeviceConfigs } from '../config/devices';
import { FakePollingSource, FakeStreamingSource, deferred } from './fakes';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const DEVICES = parseDeviceConfigs([
    { deviceId: 'D2-01', profile: 'delta_2' },
    { deviceId: 'D2-02', profile: 'delta_2' },
]);

describe('DeviceManager.start', () => {
    let poller: FakePollingSource;
    let stream: FakeStreamingSource;
    let manager: DeviceManager;

    beforeEach(() => {
        vi.clearAllMocks();
        poller = new FakePollingSource();
        poller.snapshot = { soc: 60 };
        stream = new FakeStreamingSource([], false);
        manager = new DeviceManager({ devices: DEVICES, pollingSource: poller, streamingSource: stream });
    });

    afterEach(async () => {
        await manager.shutdown();
    });

    it('polls every device while the stream is still connecting', async () => {
        const gate = deferred();
        stream.connectGate = gate.promise;

        const starting = manager.start();

        await vi.waitFor(() => expect(manager.currentState('D2-02')).toEqual({ soc: 60 }));
        expect(poller.calls).toBe(2);
        expect(manager.mode('D2-01')).toBe('poll_only');

        gate.resolve();
        await starting;

        expect(manager.mode('D2-01')).toBe('hybrid');
        expect(manager.mode('D2-02')).toBe('hybrid');
    });

    it('starts devices poll-only when the stream cannot connect', async () => {
        stream.connectError = new Error('Not authorized');

        await manager.start();

        expect(poller.calls).toBe(2);
        expect(manager.getHealth().running).toBe(true);
        expect(manager.mode('D2-01')).toBe('poll_only');
        expect(logger.warn).toHaveBeenCalledWith('[DeviceManager] Stream unavailable at startup: error="Not authorized"');
    });

    it('runs poll-only without a streaming source', async () => {
        const pollOnly = new DeviceManager({ devices: DEVICES, pollingSource: poller, streamingSource: null });

        await pollOnly.start();

        expect(poller.calls).toBe(2);
        expect(pollOnly.listDevices().map(d => d.mode)).toEqual(['poll_only', 'poll_only']);
        expect(pollOnly.getHealth().stream).toBeNull();
        await pollOnly.shutdown();
    });
});
