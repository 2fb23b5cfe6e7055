/**
 * CloudApiClient: signed HTTP client for the device cloud API
 *
 * Provides:
 * - Signed GET/PUT through a single request() path
 * - Config validation before every request
 * - Error classification (TransportError / AuthError)
 * - Envelope unwrapping: `{ code, message, data }` → data
 *
 * @module server/integrations/cloud/CloudApiClient
 */

import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import logger from '../../utils/logger';
import { classifyError, TransportError } from '../../errors';
import { isFieldMap } from '../../telemetry/equality';
import type { FieldMap } from '../../telemetry/types';
import type { CommandPayload } from '../../commands/types';
import type { HttpMethod, HttpOpts } from '../httpTypes';
import { canonicalQuery, signRequest } from './signing';
import {
    API_TIMEOUT_MS,
    DEVICE_ACCESS_DENIED_CODE,
    ENDPOINTS,
    SUCCESS_CODES,
    type CloudApiConfig,
} from './config';

const SERVICE_NAME = 'Cloud API';

export interface StreamCredentials {
    host: string;
    port: number;
    protocol: string;
    username: string;
    password: string;
}

function isObj(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class CloudApiClient {
    constructor(private readonly config: CloudApiConfig) { }

    validateConfig(): boolean {
        return !!this.config.baseUrl && !!this.config.accessKey && !!this.config.secretKey;
    }

    // ========================================================================
    // CORE HTTP METHODS (throw TransportError / AuthError on failure)
    // ========================================================================

    async get(path: string, opts?: HttpOpts): Promise<unknown> {
        return this.request('GET', path, opts);
    }

    async put(path: string, opts?: HttpOpts): Promise<unknown> {
        return this.request('PUT', path, opts);
    }

    /**
     * Core request method. Signs, sends, classifies errors and unwraps
     * the response envelope.
     */
    async request(method: HttpMethod, path: string, opts: HttpOpts = {}): Promise<unknown> {
        if (!this.validateConfig()) {
            throw new TransportError('CONFIG_INVALID',
                `Missing required configuration for ${SERVICE_NAME} (base URL, access key, secret key)`
            );
        }

        const query = canonicalQuery(method === 'GET' ? opts.params : opts.body);
        const headers: Record<string, string> = {
            ...signRequest(this.config.accessKey, this.config.secretKey, query),
        };
        if (method !== 'GET' && opts.body) {
            headers['Content-Type'] = 'application/json;charset=UTF-8';
        }

        const baseUrl = this.config.baseUrl.replace(/\/$/, '');
        const config: AxiosRequestConfig = {
            method,
            url: method === 'GET' && query ? `${baseUrl}${path}?${query}` : `${baseUrl}${path}`,
            headers,
            data: method === 'GET' ? undefined : opts.body,
            timeout: opts.timeout ?? this.config.timeoutMs ?? API_TIMEOUT_MS,
        };

        logger.debug(`[CloudApi] ${method} ${path}`);

        let response: AxiosResponse<unknown>;
        try {
            response = await axios.request<unknown>(config);
        } catch (error) {
            const classified = classifyError(error, SERVICE_NAME);
            // Timeouts and network blips are transient; auth and server errors are actionable
            const logLevel = classified.code === 'SERVICE_UNREACHABLE' || classified.code === 'NETWORK_ERROR'
                ? 'debug' : 'warn';
            logger[logLevel](`[CloudApi] ${classified.code}: ${classified.message}`, { path });
            throw classified;
        }

        return this.unwrap(response.data, path);
    }

    // ========================================================================
    // ENDPOINTS
    // ========================================================================

    /** All current quota values for one device. */
    async getDeviceQuota(deviceId: string): Promise<FieldMap> {
        const data = await this.get(ENDPOINTS.quotaAll, { params: { sn: deviceId } });
        if (!isFieldMap(data)) {
            throw new TransportError('MALFORMED_RESPONSE',
                `${SERVICE_NAME} returned a non-object quota payload`,
                { path: ENDPOINTS.quotaAll }
            );
        }
        return data;
    }

    /** Execute a command payload produced by an encoder. */
    async setDeviceQuota(payload: CommandPayload): Promise<unknown> {
        return this.put(ENDPOINTS.quotaSet, { body: payload });
    }

    /** Broker credentials for the streaming channel. */
    async getStreamCredentials(): Promise<StreamCredentials> {
        const data = await this.get(ENDPOINTS.certification);
        if (!isObj(data)) {
            throw new TransportError('MALFORMED_RESPONSE', `${SERVICE_NAME} returned no certification data`);
        }

        const { url, port, protocol, certificateAccount, certificatePassword } = data;
        const portNumber = typeof port === 'string' ? Number.parseInt(port, 10) : port;

        if (typeof url !== 'string' || typeof portNumber !== 'number' || !Number.isInteger(portNumber)
            || typeof certificateAccount !== 'string' || typeof certificatePassword !== 'string') {
            throw new TransportError('MALFORMED_RESPONSE',
                `${SERVICE_NAME} certification payload is incomplete`,
                { path: ENDPOINTS.certification }
            );
        }

        return {
            host: url,
            port: portNumber,
            protocol: typeof protocol === 'string' && protocol ? protocol : 'mqtts',
            username: certificateAccount,
            password: certificatePassword,
        };
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    private unwrap(body: unknown, path: string): unknown {
        if (!isObj(body)) {
            throw new TransportError('MALFORMED_RESPONSE',
                `${SERVICE_NAME} response is not a JSON object`,
                { path }
            );
        }

        const code = body.code;
        if (code !== undefined && code !== null && !SUCCESS_CODES.some(ok => ok === code)) {
            const message = typeof body.message === 'string' ? body.message : 'Unknown error';

            if (String(code) === DEVICE_ACCESS_DENIED_CODE) {
                throw new TransportError('API_ERROR',
                    `API error (code ${String(code)}): ${message}. The device is not bound to this ` +
                    'developer account, the serial number is wrong, or API access is not enabled for this model',
                    { path, code: String(code) }
                );
            }

            throw new TransportError('API_ERROR',
                `API error (code ${String(code)}): ${message}`,
                { path, code: String(code) }
            );
        }

        return 'data' in body ? body.data : body;
    }
}
