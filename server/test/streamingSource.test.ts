/**
 * Tests for the streaming layer: connection lifecycle and backoff in
 * BaseStreamingSource, payload normalization, and the MQTT and
 * WebSocket transports.
 */

import { EventEmitter, once } from 'events';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocketServer, type WebSocket as ServerSocket } from 'ws';
import { BaseStreamingSource, type StreamingOptions } from '../integrations/BaseStreamingSource';
import { normalizeStreamPayload, parseFrame } from '../integrations/envelope';
import { MqttStreamingSource, quotaTopic } from '../integrations/mqtt/realtime';
import { WebSocketStreamingSource } from '../integrations/websocket/realtime';
import { SubscriptionError } from '../errors';
import type { StreamStatus } from '../integrations/types';
import type { FieldMap } from '../telemetry/types';
import { deferred } from './fakes';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// ============================================================================
// MQTT client mock
// ============================================================================

class FakeMqttClient extends EventEmitter {
    subscribe = vi.fn((_topic: string, _opts: unknown, callback?: (error?: Error | null) => void) => {
        callback?.(null);
        return this;
    });
    unsubscribe = vi.fn();
    end = vi.fn((_force?: boolean, _opts?: unknown, callback?: () => void) => {
        callback?.();
        return this;
    });
}

const mqttClients: FakeMqttClient[] = [];
let mqttConnectBehaviour: 'accept' | 'reject' = 'accept';
const mockMqttConnect = vi.fn((_url: string, _opts: unknown) => {
    const client = new FakeMqttClient();
    mqttClients.push(client);
    queueMicrotask(() => {
        if (mqttConnectBehaviour === 'accept') {
            client.emit('connect');
        } else {
            client.emit('error', new Error('Not authorized'));
        }
    });
    return client;
});

vi.mock('mqtt', () => ({
    connect: (url: string, opts: unknown) => mockMqttConnect(url, opts),
}));

// ============================================================================
// Scripted transport
// ============================================================================

class ScriptedSource extends BaseStreamingSource {
    readonly transport = 'scripted';

    opens = 0;
    closes = 0;
    /** Number of upcoming openTransport() calls that fail. */
    failures = 0;
    /** While set, openTransport() waits on it. */
    gate: Promise<void> | null = null;
    subscribed: string[] = [];
    unsubscribed: string[] = [];

    constructor(options: StreamingOptions = {}) {
        super(options);
    }

    protected async openTransport(): Promise<void> {
        this.opens++;
        if (this.gate) await this.gate;
        if (this.failures > 0) {
            this.failures--;
            throw new Error('connection refused');
        }
    }

    protected async closeTransport(): Promise<void> {
        this.closes++;
    }

    protected subscribeDevice(deviceId: string): void {
        this.subscribed.push(deviceId);
    }

    protected unsubscribeDevice(deviceId: string): void {
        this.unsubscribed.push(deviceId);
    }

    push(deviceId: string, payload: unknown): boolean {
        return this.deliver(deviceId, payload);
    }

    drop(reason = 'peer reset'): void {
        this.handleTransportLost(reason);
    }
}

function collect(source: BaseStreamingSource): FieldMap[] {
    const received: FieldMap[] = [];
    source.subscribe('DEV1', delta => {
        received.push(delta);
    });
    return received;
}

// ============================================================================
// Envelope
// ============================================================================

describe('normalizeStreamPayload', () => {
    it('unwraps params, param and data envelopes', () => {
        expect(normalizeStreamPayload({ params: { soc: 85 } })).toEqual({ soc: 85 });
        expect(normalizeStreamPayload({ param: { soc: 85 } })).toEqual({ soc: 85 });
        expect(normalizeStreamPayload({ data: { soc: 85 } })).toEqual({ soc: 85 });
    });

    it('prefers params over data when both are present', () => {
        expect(normalizeStreamPayload({ data: { a: 1 }, params: { b: 2 } })).toEqual({ b: 2 });
    });

    it('treats an unwrapped object as the delta', () => {
        expect(normalizeStreamPayload({ soc: 85, 'pd.wattsOut': 10 })).toEqual({ soc: 85, 'pd.wattsOut': 10 });
        expect(normalizeStreamPayload({ params: 5, soc: 1 })).toEqual({ params: 5, soc: 1 });
    });

    it('returns null for empty or non-object payloads', () => {
        expect(normalizeStreamPayload({ params: {} })).toBeNull();
        expect(normalizeStreamPayload({})).toBeNull();
        expect(normalizeStreamPayload(null)).toBeNull();
        expect(normalizeStreamPayload([{ soc: 1 }])).toBeNull();
        expect(normalizeStreamPayload('soc=85')).toBeNull();
    });

    it('parses JSON frames and rejects the rest', () => {
        expect(parseFrame(Buffer.from('{"soc":85}'))).toEqual({ soc: 85 });
        expect(parseFrame('not json')).toBeUndefined();
    });
});

// ============================================================================
// Lifecycle
// ============================================================================

describe('BaseStreamingSource', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('subscribes pending devices on connect and new ones immediately', async () => {
        const source = new ScriptedSource();
        source.subscribe('DEV1', () => undefined);
        expect(source.subscribed).toEqual([]);

        await source.connect();
        expect(source.getStatus()).toBe('connected');
        expect(source.subscribed).toEqual(['DEV1']);

        source.subscribe('DEV1', () => undefined);
        source.subscribe('DEV2', () => undefined);
        expect(source.subscribed).toEqual(['DEV1', 'DEV2']);
        expect(source.getHealth().subscriptions).toBe(2);
    });

    it('unsubscribes a device when its last handler goes', async () => {
        const source = new ScriptedSource();
        await source.connect();
        const first = source.subscribe('DEV1', () => undefined);
        const second = source.subscribe('DEV1', () => undefined);

        first();
        expect(source.unsubscribed).toEqual([]);
        second();
        expect(source.unsubscribed).toEqual(['DEV1']);
        second();
        expect(source.unsubscribed).toEqual(['DEV1']);
    });

    it('raises CONNECT_FAILED and returns to idle when the first connect fails', async () => {
        const source = new ScriptedSource();
        source.failures = 1;

        const error = await source.connect().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SubscriptionError);
        if (error instanceof SubscriptionError) {
            expect(error.code).toBe('CONNECT_FAILED');
            expect(error.message).toBe('scripted connection failed: connection refused');
        }
        expect(source.getStatus()).toBe('idle');
        await vi.advanceTimersByTimeAsync(60_000);
        expect(source.opens).toBe(1);
    });

    it('keeps retrying a failed first connect when asked to', async () => {
        const source = new ScriptedSource({ retryInitialConnect: true });
        source.failures = 1;

        await expect(source.connect()).rejects.toBeInstanceOf(SubscriptionError);
        expect(source.getStatus()).toBe('reconnecting');

        await vi.advanceTimersByTimeAsync(1_000);
        expect(source.opens).toBe(2);
        expect(source.getStatus()).toBe('connected');
    });

    it('backs off exponentially and resubscribes after reconnecting', async () => {
        const source = new ScriptedSource();
        source.subscribe('DEV1', () => undefined);
        await source.connect();

        source.failures = 3;
        source.drop();
        expect(source.getStatus()).toBe('reconnecting');
        expect(source.getHealth().lastError).toBe('peer reset');

        await vi.advanceTimersByTimeAsync(999);
        expect(source.opens).toBe(1);
        await vi.advanceTimersByTimeAsync(1);
        expect(source.opens).toBe(2);

        await vi.advanceTimersByTimeAsync(1_999);
        expect(source.opens).toBe(2);
        await vi.advanceTimersByTimeAsync(1);
        expect(source.opens).toBe(3);

        await vi.advanceTimersByTimeAsync(4_000);
        expect(source.opens).toBe(4);

        await vi.advanceTimersByTimeAsync(8_000);
        expect(source.opens).toBe(5);
        expect(source.getStatus()).toBe('connected');
        expect(source.getHealth().reconnectAttempts).toBe(0);
        expect(source.subscribed).toEqual(['DEV1', 'DEV1']);
    });

    it('caps the delay and gives up after the attempt limit', async () => {
        const source = new ScriptedSource({ maxReconnectAttempts: 3, maxBackoffMs: 1_500 });
        const statuses: StreamStatus[] = [];
        source.onStatusChange(status => statuses.push(status));
        await source.connect();

        source.failures = 100;
        source.drop();

        await vi.advanceTimersByTimeAsync(1_000);
        expect(source.opens).toBe(2);
        await vi.advanceTimersByTimeAsync(1_500);
        expect(source.opens).toBe(3);
        await vi.advanceTimersByTimeAsync(1_500);
        expect(source.opens).toBe(4);

        expect(source.getStatus()).toBe('exhausted');
        expect(source.getHealth().reconnectAttempts).toBe(3);
        expect(statuses).toEqual(['connecting', 'connected', 'reconnecting', 'exhausted']);

        await vi.advanceTimersByTimeAsync(60_000);
        expect(source.opens).toBe(4);

        source.failures = 0;
        await source.connect();
        expect(source.getStatus()).toBe('connected');
    });

    it('ignores transport loss outside the connected state', async () => {
        const source = new ScriptedSource();
        await source.connect();
        await source.disconnect();

        source.drop();
        await vi.advanceTimersByTimeAsync(60_000);

        expect(source.getStatus()).toBe('closed');
        expect(source.opens).toBe(1);
        expect(source.closes).toBe(1);
    });

    it('stays closed when disconnected during the handshake', async () => {
        const source = new ScriptedSource();
        const gate = deferred();
        source.gate = gate.promise;

        const connecting = source.connect();
        await source.disconnect();
        gate.resolve();
        await connecting;

        expect(source.getStatus()).toBe('closed');
        expect(source.closes).toBe(2);
    });

    it('delivers normalized deltas and isolates handler failures', async () => {
        const source = new ScriptedSource();
        source.subscribe('DEV1', () => {
            throw new Error('handler bug');
        });
        const received = collect(source);
        await source.connect();

        expect(source.push('DEV1', { params: { soc: 70 } })).toBe(true);
        expect(source.push('DEV1', { params: {} })).toBe(false);
        expect(source.push('DEV9', { soc: 1 })).toBe(false);

        expect(received).toEqual([{ soc: 70 }]);
        expect(source.getHealth().lastMessageAt).not.toBeNull();
    });
});

// ============================================================================
// MQTT
// ============================================================================

describe('MqttStreamingSource', () => {
    beforeEach(() => {
        mqttClients.length = 0;
        mqttConnectBehaviour = 'accept';
        mockMqttConnect.mockClear();
    });

    function latestClient(): FakeMqttClient {
        const client = mqttClients[mqttClients.length - 1];
        if (!client) throw new Error('no client created');
        return client;
    }

    it('connects with credentials and its own reconnect disabled', async () => {
        const source = new MqttStreamingSource({
            url: 'mqtts://broker.test.local:8883',
            username: 'open-test',
            password: 'test-password',
        });

        await source.connect();

        expect(mockMqttConnect).toHaveBeenCalledWith('mqtts://broker.test.local:8883', expect.objectContaining({
            username: 'open-test',
            password: 'test-password',
            clean: true,
            reconnectPeriod: 0,
            clientId: expect.stringMatching(/^voltsync-/),
        }));
        expect(source.isConnected()).toBe(true);
        await source.disconnect();
    });

    it('subscribes to the quota topic and delivers matching messages', async () => {
        const source = new MqttStreamingSource({ url: 'mqtt://broker.test.local', username: 'open-test', password: 'test-password' });
        const received = collect(source);
        await source.connect();
        const client = latestClient();

        expect(client.subscribe).toHaveBeenCalledWith('/open/open-test/DEV1/quota', { qos: 1 }, expect.any(Function));

        client.emit('message', quotaTopic('open-test', 'DEV1'), Buffer.from(JSON.stringify({ params: { soc: 77 } })));
        client.emit('message', '/open/open-test/DEV1/status', Buffer.from('{"soc":1}'));
        client.emit('message', quotaTopic('open-test', 'DEV1'), Buffer.from('garbage'));

        expect(received).toEqual([{ soc: 77 }]);
        await source.disconnect();
    });

    it('uses an explicit account for topics', async () => {
        const source = new MqttStreamingSource({ url: 'mqtt://broker.test.local', username: 'user', password: 'test-password', account: 'acct' });
        source.subscribe('DEV2', () => undefined);
        await source.connect();

        expect(latestClient().subscribe).toHaveBeenCalledWith('/open/acct/DEV2/quota', { qos: 1 }, expect.any(Function));
        await source.disconnect();
    });

    it('rejects connect when the broker refuses', async () => {
        mqttConnectBehaviour = 'reject';
        const source = new MqttStreamingSource({ url: 'mqtt://broker.test.local' });

        await expect(source.connect()).rejects.toMatchObject({
            code: 'CONNECT_FAILED',
            message: 'mqtt connection failed: Not authorized',
        });
        expect(source.getStatus()).toBe('idle');
    });

    it('reports a dropped connection as reconnecting', async () => {
        const source = new MqttStreamingSource({ url: 'mqtt://broker.test.local' });
        await source.connect();

        latestClient().emit('close');

        expect(source.getStatus()).toBe('reconnecting');
        expect(source.getHealth().lastError).toBe('connection closed');
        await source.disconnect();
        expect(source.getStatus()).toBe('closed');
    });
});

// ============================================================================
// WebSocket
// ============================================================================

describe('WebSocketStreamingSource', () => {
    let server: WebSocketServer;
    let url: string;

    beforeEach(async () => {
        server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
        await once(server, 'listening');
        const address = server.address();
        if (typeof address === 'string') throw new Error('expected a TCP address');
        url = `ws://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        for (const client of server.clients) {
            client.terminate();
        }
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('subscribes every device and routes frames by deviceId', async () => {
        const frames: unknown[] = [];
        const sockets: ServerSocket[] = [];
        const headers: Array<string | undefined> = [];
        server.on('connection', (socket, request) => {
            sockets.push(socket);
            headers.push(request.headers.authorization);
            socket.on('message', data => frames.push(JSON.parse(data.toString())));
        });

        const source = new WebSocketStreamingSource({ url, headers: { Authorization: 'Bearer test-token' } });
        const received = collect(source);
        await source.connect();

        await vi.waitFor(() => expect(frames).toEqual([{ type: 'subscribe', deviceId: 'DEV1' }]));
        expect(headers).toEqual(['Bearer test-token']);

        sockets[0].send(JSON.stringify({ deviceId: 'DEV2', params: { soc: 1 } }));
        sockets[0].send(JSON.stringify({ params: { soc: 2 } }));
        sockets[0].send(JSON.stringify({ deviceId: 'DEV1', params: { soc: 50 } }));

        await vi.waitFor(() => expect(received).toEqual([{ soc: 50 }]));
        await source.disconnect();
        expect(source.getStatus()).toBe('closed');
    });

    it('schedules a reconnect when the server drops the socket', async () => {
        server.on('connection', socket => {
            setTimeout(() => socket.close(1011), 20);
        });

        const source = new WebSocketStreamingSource({ url, initialBackoffMs: 60_000 });
        await source.connect();

        await vi.waitFor(() => expect(source.getStatus()).toBe('reconnecting'));
        expect(source.getHealth().lastError).toBe('socket closed (code 1011)');
        await source.disconnect();
    });
});
