/**
 * Streaming Source Registry
 *
 * Builds the process-wide streaming source named by STREAM_TRANSPORT.
 * One source is shared by every device; each coordinator subscribes its
 * own device on it.
 */

import logger from '../utils/logger';
import { extractErrorMessage } from '../errors';
import type { StreamEnv } from '../config/env';
import type { CloudApiClient, StreamCredentials } from './cloud/CloudApiClient';
import { MqttStreamingSource } from './mqtt/realtime';
import { WebSocketStreamingSource } from './websocket/realtime';
import type { StreamingOptions } from './BaseStreamingSource';
import type { StreamingSource } from './types';

type StreamFactory = (env: StreamEnv, client: CloudApiClient, options: StreamingOptions) => Promise<StreamingSource | null>;

async function createMqttSource(env: StreamEnv, client: CloudApiClient, options: StreamingOptions): Promise<StreamingSource | null> {
    if (env.mqttUrl) {
        return new MqttStreamingSource({
            ...options,
            url: env.mqttUrl,
            username: env.mqttUsername ?? undefined,
            password: env.mqttPassword ?? undefined,
            account: env.mqttAccount ?? undefined,
        });
    }

    // No broker configured: ask the cloud API for one
    let credentials: StreamCredentials;
    try {
        credentials = await client.getStreamCredentials();
    } catch (error) {
        logger.error(`[StreamRegistry] Broker credentials unavailable, devices run poll-only: error="${extractErrorMessage(error)}"`);
        return null;
    }
    logger.info(`[StreamRegistry] Using broker from certification endpoint: host=${credentials.host} port=${credentials.port}`);
    return new MqttStreamingSource({
        ...options,
        url: `${credentials.protocol}://${credentials.host}:${credentials.port}`,
        username: credentials.username,
        password: credentials.password,
        account: env.mqttAccount ?? credentials.username,
    });
}

async function createWebSocketSource(env: StreamEnv, _client: CloudApiClient, options: StreamingOptions): Promise<StreamingSource> {
    return new WebSocketStreamingSource({
        ...options,
        url: env.wsUrl ?? '',
        headers: env.wsToken ? { Authorization: `Bearer ${env.wsToken}` } : undefined,
    });
}

const factories: Record<Exclude<StreamEnv['transport'], 'none'>, StreamFactory> = {
    mqtt: createMqttSource,
    websocket: createWebSocketSource,
};

/**
 * @returns the configured source, or null when STREAM_TRANSPORT=none or
 * the broker credentials cannot be fetched
 */
export async function createStreamingSource(
    env: StreamEnv,
    client: CloudApiClient,
    options: StreamingOptions = {}
): Promise<StreamingSource | null> {
    if (env.transport === 'none') {
        logger.info('[StreamRegistry] Streaming disabled, devices run poll-only');
        return null;
    }
    return factories[env.transport](env, client, options);
}
