/**
 * WebSocket Streaming Source
 *
 * One socket carries every device. After connecting (and after every
 * reconnect) the source sends a subscribe frame per device:
 *
 *   → { "type": "subscribe", "deviceId": "DPR3-0001" }
 *   ← { "deviceId": "DPR3-0001", "params": { "soc": 85 } }
 *
 * Inbound frames without a deviceId are ignored.
 */

import WebSocket from 'ws';
import logger from '../../utils/logger';
import { BaseStreamingSource, type StreamingOptions } from '../BaseStreamingSource';
import { parseFrame } from '../envelope';

export interface WebSocketStreamingOptions extends StreamingOptions {
    url: string;
    /** Extra handshake headers, e.g. an authorization header */
    headers?: Record<string, string>;
    handshakeTimeoutMs?: number;
}

function isObj(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class WebSocketStreamingSource extends BaseStreamingSource {
    readonly transport = 'websocket';

    private ws: WebSocket | null = null;

    constructor(private readonly options: WebSocketStreamingOptions) {
        super(options);
    }

    protected openTransport(): Promise<void> {
        const previous = this.ws;
        this.ws = null;
        previous?.terminate();

        return new Promise((resolve, reject) => {
            logger.debug('[WebSocket] Connecting');

            const ws = new WebSocket(this.options.url, {
                headers: this.options.headers,
                handshakeTimeout: this.options.handshakeTimeoutMs ?? 30_000,
            });
            this.ws = ws;
            let settled = false;

            ws.on('open', () => {
                if (settled) return;
                settled = true;
                resolve();
            });

            ws.on('message', (data: WebSocket.RawData) => {
                this.handleFrame(data);
            });

            ws.on('error', (error: Error) => {
                this.recordError(error.message);
                logger.debug(`[WebSocket] Error: error="${error.message}"`);
                if (!settled) {
                    settled = true;
                    reject(error);
                }
                // After open, 'close' follows and reports the loss
            });

            ws.on('close', (code: number) => {
                if (!settled) {
                    settled = true;
                    reject(new Error(`Socket closed during handshake (code ${code})`));
                    return;
                }
                if (this.ws === ws) {
                    this.handleTransportLost(`socket closed (code ${code})`);
                }
            });
        });
    }

    protected async closeTransport(): Promise<void> {
        const ws = this.ws;
        this.ws = null;
        if (!ws) return;

        if (ws.readyState === WebSocket.CLOSED) return;
        await new Promise<void>(resolve => {
            ws.once('close', () => resolve());
            ws.close();
        });
    }

    protected subscribeDevice(deviceId: string): void {
        this.send({ type: 'subscribe', deviceId });
    }

    protected unsubscribeDevice(deviceId: string): void {
        this.send({ type: 'unsubscribe', deviceId });
    }

    private send(frame: { type: string; deviceId: string }): void {
        const ws = this.ws;
        if (!ws || ws.readyState !== WebSocket.OPEN) return;
        ws.send(JSON.stringify(frame));
    }

    private handleFrame(data: WebSocket.RawData): void {
        let buffer: Buffer;
        if (Array.isArray(data)) {
            buffer = Buffer.concat(data);
        } else if (data instanceof ArrayBuffer) {
            buffer = Buffer.from(data);
        } else {
            buffer = data;
        }

        const parsed = parseFrame(buffer);
        if (!isObj(parsed)) {
            logger.debug('[WebSocket] Dropped malformed frame');
            return;
        }

        const { deviceId, ...payload } = parsed;
        if (typeof deviceId !== 'string' || !deviceId) {
            logger.debug('[WebSocket] Dropped frame without deviceId');
            return;
        }

        this.deliver(deviceId, payload);
    }
}
