/**
 * Cloud API constants
 */

export const API_REGIONS = {
    eu: 'https://api-e.ecoflow.com',
    us: 'https://api.ecoflow.com',
} as const;

export type ApiRegion = keyof typeof API_REGIONS;

export const API_TIMEOUT_MS = 30_000;

export const ENDPOINTS = {
    quotaAll: '/iot-open/sign/device/quota/all',
    quotaSet: '/iot-open/sign/device/quota',
    certification: '/iot-open/sign/certification',
} as const;

/** Envelope codes that mean success; an absent code also counts. */
export const SUCCESS_CODES: ReadonlyArray<string | number> = ['0', 0, '200', 200];

/** Envelope code for a device the account may not access. */
export const DEVICE_ACCESS_DENIED_CODE = '1006';

export interface CloudApiConfig {
    baseUrl: string;
    accessKey: string;
    secretKey: string;
    timeoutMs?: number;
}
