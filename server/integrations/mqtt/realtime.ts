/**
 * MQTT Streaming Source
 *
 * Subscribes to per-device quota topics on the cloud broker:
 *
 *   /open/{account}/{deviceId}/quota
 *
 * The client's own reconnect is disabled (reconnectPeriod: 0); lost
 * connections are reported to BaseStreamingSource, which owns backoff
 * and resubscription.
 */

import * as mqtt from 'mqtt';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logger';
import { BaseStreamingSource, type StreamingOptions } from '../BaseStreamingSource';
import { parseFrame } from '../envelope';

// ============================================================================
// OPTIONS
// ============================================================================

export interface MqttStreamingOptions extends StreamingOptions {
    /** Broker URL, e.g. mqtts://broker.example.com:8883 */
    url: string;
    username?: string;
    password?: string;
    /** Account segment of the topic; defaults to the username */
    account?: string;
    connectTimeoutMs?: number;
}

const QUOTA_TOPIC = /^\/open\/[^/]+\/([^/]+)\/quota$/;

export function quotaTopic(account: string, deviceId: string): string {
    return `/open/${account}/${deviceId}/quota`;
}

// ============================================================================
// MQTT STREAMING SOURCE
// ============================================================================

export class MqttStreamingSource extends BaseStreamingSource {
    readonly transport = 'mqtt';

    private client: mqtt.MqttClient | null = null;
    private readonly account: string;

    constructor(private readonly options: MqttStreamingOptions) {
        super(options);
        this.account = options.account ?? options.username ?? '';
    }

    protected openTransport(): Promise<void> {
        // Drop a client left over from a lost connection
        const previous = this.client;
        this.client = null;
        previous?.end(true);

        return new Promise((resolve, reject) => {
            const clientOptions: mqtt.IClientOptions = {
                clientId: `voltsync-${uuidv4()}`,
                clean: true,
                connectTimeout: this.options.connectTimeoutMs ?? 30_000,
                reconnectPeriod: 0,
            };
            if (this.options.username && this.options.password) {
                clientOptions.username = this.options.username;
                clientOptions.password = this.options.password;
            }

            logger.debug('[MQTT] Connecting to broker');

            const client = mqtt.connect(this.options.url, clientOptions);
            this.client = client;
            let settled = false;

            client.on('connect', () => {
                if (settled) return;
                settled = true;
                resolve();
            });

            client.on('error', (error: Error) => {
                this.recordError(error.message);
                logger.debug(`[MQTT] Client error: error="${error.message}"`);
                if (!settled) {
                    settled = true;
                    client.end(true);
                    reject(error);
                }
            });

            client.on('close', () => {
                if (!settled) {
                    settled = true;
                    reject(new Error('Connection closed before broker accepted it'));
                    return;
                }
                // A client replaced by a newer connection is not a loss
                if (this.client === client) {
                    this.handleTransportLost('connection closed');
                }
            });

            client.on('message', (topic: string, payload: Buffer) => {
                this.handleMessage(topic, payload);
            });
        });
    }

    protected async closeTransport(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (!client) return;

        await new Promise<void>(resolve => {
            client.end(false, {}, () => resolve());
        });
    }

    protected subscribeDevice(deviceId: string): void {
        const topic = quotaTopic(this.account, deviceId);
        this.client?.subscribe(topic, { qos: 1 }, (error?: Error | null) => {
            if (error) {
                logger.warn(`[MQTT] Subscribe failed: error="${error.message}"`);
            } else {
                logger.debug('[MQTT] Subscribed to quota topic');
            }
        });
    }

    protected unsubscribeDevice(deviceId: string): void {
        this.client?.unsubscribe(quotaTopic(this.account, deviceId));
    }

    private handleMessage(topic: string, payload: Buffer): void {
        const match = QUOTA_TOPIC.exec(topic);
        if (!match) {
            logger.debug(`[MQTT] Ignoring message on unexpected topic`);
            return;
        }

        const parsed = parseFrame(payload);
        if (parsed === undefined) {
            logger.debug('[MQTT] Dropped non-JSON message');
            return;
        }

        this.deliver(match[1], parsed);
    }
}
