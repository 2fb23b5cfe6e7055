/**
 * Tests for building the streaming source from STREAM_TRANSPORT.
 * The MQTT client is mocked; the WebSocket source talks to an in-process server.
 */

import { EventEmitter, once } from 'events';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocketServer } from 'ws';
import logger from '../utils/logger';
import { createStreamingSource } from '../integrations/registry';
import { CloudApiClient } from '../integrations/cloud/CloudApiClient';
import { MqttStreamingSource } from '../integrations/mqtt/realtime';
import { WebSocketStreamingSource } from '../integrations/websocket/realtime';
import type { StreamEnv } from '../config/env';
import { TransportError } from '../errors';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

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
const mockMqttConnect = vi.fn((_url: string, _opts: unknown) => {
    const client = new FakeMqttClient();
    mqttClients.push(client);
    queueMicrotask(() => client.emit('connect'));
    return client;
});

vi.mock('mqtt', () => ({
    connect: (url: string, opts: unknown) => mockMqttConnect(url, opts),
}));

function streamEnv(overrides: Partial<StreamEnv> = {}): StreamEnv {
    return {
        transport: 'mqtt',
        mqttUrl: null,
        mqttUsername: null,
        mqttPassword: null,
        mqttAccount: null,
        wsUrl: null,
        wsToken: null,
        ...overrides,
    };
}

const CREDENTIALS = {
    host: 'broker.test.local',
    port: 8883,
    protocol: 'mqtts',
    username: 'open-cert',
    password: 'test-password',
};

describe('createStreamingSource', () => {
    let client: CloudApiClient;

    beforeEach(() => {
        vi.clearAllMocks();
        mqttClients.length = 0;
        client = new CloudApiClient({
            baseUrl: 'http://127.0.0.1:9',
            accessKey: 'test-access-key',
            secretKey: 'test-secret',
        });
    });

    function latestClient(): FakeMqttClient {
        const mqttClient = mqttClients[mqttClients.length - 1];
        if (!mqttClient) throw new Error('no client created');
        return mqttClient;
    }

    it('returns null when streaming is disabled', async () => {
        const credentials = vi.spyOn(client, 'getStreamCredentials');

        const source = await createStreamingSource(streamEnv({ transport: 'none' }), client);

        expect(source).toBeNull();
        expect(credentials).not.toHaveBeenCalled();
        expect(logger.info).toHaveBeenCalledWith('[StreamRegistry] Streaming disabled, devices run poll-only');
    });

    // ========================================================================
    // MQTT
    // ========================================================================

    it('uses a configured broker without asking for credentials', async () => {
        const credentials = vi.spyOn(client, 'getStreamCredentials');

        const source = await createStreamingSource(streamEnv({
            mqttUrl: 'mqtt://broker.local:1883',
            mqttUsername: 'local-user',
            mqttPassword: 'test-password',
            mqttAccount: 'local-acct',
        }), client);

        expect(source).toBeInstanceOf(MqttStreamingSource);
        expect(credentials).not.toHaveBeenCalled();
        if (!source) return;

        source.subscribe('DEV1', () => undefined);
        await source.connect();

        expect(mockMqttConnect).toHaveBeenCalledWith('mqtt://broker.local:1883', expect.objectContaining({
            username: 'local-user',
            password: 'test-password',
        }));
        expect(latestClient().subscribe).toHaveBeenCalledWith('/open/local-acct/DEV1/quota', { qos: 1 }, expect.any(Function));
        await source.disconnect();
    });

    it('builds the broker from the certification endpoint', async () => {
        vi.spyOn(client, 'getStreamCredentials').mockResolvedValue(CREDENTIALS);

        const source = await createStreamingSource(streamEnv(), client);

        expect(source).toBeInstanceOf(MqttStreamingSource);
        expect(logger.info).toHaveBeenCalledWith(
            '[StreamRegistry] Using broker from certification endpoint: host=broker.test.local port=8883'
        );
        if (!source) return;

        source.subscribe('DEV1', () => undefined);
        await source.connect();

        expect(mockMqttConnect).toHaveBeenCalledWith('mqtts://broker.test.local:8883', expect.objectContaining({
            username: 'open-cert',
            password: 'test-password',
        }));
        expect(latestClient().subscribe).toHaveBeenCalledWith('/open/open-cert/DEV1/quota', { qos: 1 }, expect.any(Function));
        await source.disconnect();
    });

    it('lets MQTT_ACCOUNT override the certification account', async () => {
        vi.spyOn(client, 'getStreamCredentials').mockResolvedValue(CREDENTIALS);

        const source = await createStreamingSource(streamEnv({ mqttAccount: 'acct-override' }), client);
        if (!source) throw new Error('expected a source');

        source.subscribe('DEV1', () => undefined);
        await source.connect();

        expect(latestClient().subscribe).toHaveBeenCalledWith('/open/acct-override/DEV1/quota', { qos: 1 }, expect.any(Function));
        await source.disconnect();
    });

    it('falls back to poll-only when certification fails', async () => {
        vi.spyOn(client, 'getStreamCredentials').mockRejectedValue(
            new TransportError('SERVICE_UNREACHABLE', 'Cannot reach Cloud API: ECONNREFUSED')
        );

        const source = await createStreamingSource(streamEnv(), client);

        expect(source).toBeNull();
        expect(mockMqttConnect).not.toHaveBeenCalled();
        expect(logger.error).toHaveBeenCalledWith(
            '[StreamRegistry] Broker credentials unavailable, devices run poll-only: error="Cannot reach Cloud API: ECONNREFUSED"'
        );
    });

    // ========================================================================
    // WebSocket
    // ========================================================================

    describe('websocket', () => {
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
            for (const socket of server.clients) {
                socket.terminate();
            }
            await new Promise<void>(resolve => server.close(() => resolve()));
        });

        it('connects with the bearer token', async () => {
            const headers: Array<string | undefined> = [];
            server.on('connection', (_socket, request) => {
                headers.push(request.headers.authorization);
            });

            const source = await createStreamingSource(streamEnv({
                transport: 'websocket',
                wsUrl: url,
                wsToken: 'test-token',
            }), client);

            expect(source).toBeInstanceOf(WebSocketStreamingSource);
            if (!source) return;
            await source.connect();

            await vi.waitFor(() => expect(headers).toEqual(['Bearer test-token']));
            await source.disconnect();
        });

        it('sends no authorization header without a token', async () => {
            const headers: Array<string | undefined> = [];
            server.on('connection', (_socket, request) => {
                headers.push(request.headers.authorization);
            });

            const source = await createStreamingSource(streamEnv({ transport: 'websocket', wsUrl: url }), client);
            if (!source) throw new Error('expected a source');
            await source.connect();

            await vi.waitFor(() => expect(headers).toEqual([undefined]));
            await source.disconnect();
        });
    });
});
