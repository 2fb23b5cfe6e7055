/**
 * Environment configuration
 *
 * Read once at startup (after dotenv has populated process.env) and
 * validated; a bad value stops the server with a ConfigError instead of
 * surfacing later as a failed poll.
 */

import { ConfigError } from '../errors';
import { API_REGIONS, type ApiRegion, type CloudApiConfig } from '../integrations/cloud/config';

export const STREAM_TRANSPORTS = ['mqtt', 'websocket', 'none'] as const;
export type StreamTransport = typeof STREAM_TRANSPORTS[number];

export interface StreamEnv {
    transport: StreamTransport;
    mqttUrl: string | null;
    mqttUsername: string | null;
    mqttPassword: string | null;
    mqttAccount: string | null;
    wsUrl: string | null;
    wsToken: string | null;
}

export interface AppEnv {
    port: number;
    logLevel: string;
    api: CloudApiConfig;
    stream: StreamEnv;
    devicesFile: string;
}

const DEFAULT_PORT = 3300;

function isRegion(value: string): value is ApiRegion {
    return Object.prototype.hasOwnProperty.call(API_REGIONS, value);
}

function isTransport(value: string): value is StreamTransport {
    return (STREAM_TRANSPORTS as readonly string[]).includes(value);
}

/** Empty and whitespace-only values count as unset. */
function read(source: NodeJS.ProcessEnv, key: string): string | null {
    const value = source[key]?.trim();
    return value ? value : null;
}

function readRequired(source: NodeJS.ProcessEnv, key: string): string {
    const value = read(source, key);
    if (!value) {
        throw new ConfigError('CONFIG_INVALID', `${key} is required`, { key });
    }
    return value;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
    const portRaw = read(source, 'PORT');
    const port = portRaw === null ? DEFAULT_PORT : Number(portRaw);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigError('CONFIG_INVALID', `PORT must be a port number, got "${portRaw}"`, { key: 'PORT' });
    }

    const region = (read(source, 'API_REGION') ?? 'eu').toLowerCase();
    if (!isRegion(region)) {
        throw new ConfigError('CONFIG_INVALID',
            `API_REGION must be one of ${Object.keys(API_REGIONS).join(', ')}`,
            { key: 'API_REGION' }
        );
    }

    const transport = (read(source, 'STREAM_TRANSPORT') ?? 'mqtt').toLowerCase();
    if (!isTransport(transport)) {
        throw new ConfigError('CONFIG_INVALID',
            `STREAM_TRANSPORT must be one of ${STREAM_TRANSPORTS.join(', ')}`,
            { key: 'STREAM_TRANSPORT' }
        );
    }

    const wsUrl = read(source, 'STREAM_WS_URL');
    if (transport === 'websocket' && !wsUrl) {
        throw new ConfigError('CONFIG_INVALID', 'STREAM_WS_URL is required when STREAM_TRANSPORT=websocket', { key: 'STREAM_WS_URL' });
    }

    return {
        port,
        logLevel: read(source, 'LOG_LEVEL') ?? 'info',
        api: {
            baseUrl: read(source, 'API_BASE_URL') ?? API_REGIONS[region],
            accessKey: readRequired(source, 'API_ACCESS_KEY'),
            secretKey: readRequired(source, 'API_SECRET_KEY'),
        },
        stream: {
            transport,
            mqttUrl: read(source, 'MQTT_URL'),
            mqttUsername: read(source, 'MQTT_USERNAME'),
            mqttPassword: read(source, 'MQTT_PASSWORD'),
            mqttAccount: read(source, 'MQTT_ACCOUNT'),
            wsUrl,
            wsToken: read(source, 'STREAM_WS_TOKEN'),
        },
        devicesFile: read(source, 'DEVICES_FILE') ?? './devices.json',
    };
}
