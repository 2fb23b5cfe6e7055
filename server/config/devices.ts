/**
 * Device list configuration
 *
 * The devices file is JSON with a top-level `devices` array (a bare array
 * is accepted too). Each entry names a device and its hardware profile;
 * everything else has a default.
 */

import fs from 'fs/promises';
import { ConfigError, extractErrorMessage } from '../errors';
import { isProfileId } from '../profiles';
import type { ProfileId } from '../profiles/types';
import {
    DEFAULT_CONFIRM_DELAY_MS,
    DEFAULT_DEGRADED_MULTIPLIER,
    DEFAULT_POLL_INTERVAL_S,
    POLL_INTERVAL_MAX_S,
    POLL_INTERVAL_MIN_S,
} from '../telemetry/HybridCoordinator';

export interface DeviceConfig {
    deviceId: string;
    name: string;
    profile: ProfileId;
    pollIntervalSeconds: number;
    streaming: boolean;
    degradedMultiplier: number;
    confirmDelayMs: number;
    diagnostics: boolean;
}

function isObj(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(index: number, message: string): never {
    throw new ConfigError('CONFIG_INVALID', `Device #${index + 1}: ${message}`, { index });
}

function optionalNumber(
    entry: Record<string, unknown>,
    key: string,
    index: number,
    fallback: number,
    check: (n: number) => boolean,
    rule: string
): number {
    const value = entry[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
        fail(index, `${key} must be ${rule}`);
    }
    return value;
}

function optionalBoolean(entry: Record<string, unknown>, key: string, index: number, fallback: boolean): boolean {
    const value = entry[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
        fail(index, `${key} must be true or false`);
    }
    return value;
}

function parseEntry(entry: unknown, index: number): DeviceConfig {
    if (!isObj(entry)) fail(index, 'entry must be an object');

    const { deviceId, name, profile } = entry;
    if (typeof deviceId !== 'string' || !deviceId.trim()) {
        fail(index, 'deviceId is required');
    }
    if (!isProfileId(profile)) {
        throw new ConfigError('UNKNOWN_PROFILE',
            `Device #${index + 1}: unknown profile "${String(profile)}"`,
            { index, profile: String(profile) }
        );
    }
    let label = deviceId.trim();
    if (name !== undefined) {
        if (typeof name !== 'string') fail(index, 'name must be a string');
        if (name.trim()) label = name.trim();
    }

    return {
        deviceId: deviceId.trim(),
        name: label,
        profile,
        pollIntervalSeconds: optionalNumber(entry, 'pollIntervalSeconds', index, DEFAULT_POLL_INTERVAL_S,
            n => n >= POLL_INTERVAL_MIN_S && n <= POLL_INTERVAL_MAX_S,
            `between ${POLL_INTERVAL_MIN_S} and ${POLL_INTERVAL_MAX_S}`),
        streaming: optionalBoolean(entry, 'streaming', index, true),
        degradedMultiplier: optionalNumber(entry, 'degradedMultiplier', index, DEFAULT_DEGRADED_MULTIPLIER,
            n => n > 0, 'a positive number'),
        confirmDelayMs: optionalNumber(entry, 'confirmDelayMs', index, DEFAULT_CONFIRM_DELAY_MS,
            n => n >= 0, 'zero or more'),
        diagnostics: optionalBoolean(entry, 'diagnostics', index, false),
    };
}

export function parseDeviceConfigs(raw: unknown): DeviceConfig[] {
    const list = isObj(raw) ? raw.devices : raw;
    if (!Array.isArray(list)) {
        throw new ConfigError('CONFIG_INVALID', 'Devices file must contain a "devices" array');
    }

    const devices = list.map((entry: unknown, index) => parseEntry(entry, index));

    const seen = new Set<string>();
    for (const device of devices) {
        if (seen.has(device.deviceId)) {
            throw new ConfigError('CONFIG_INVALID', `Duplicate deviceId "${device.deviceId}"`, { deviceId: device.deviceId });
        }
        seen.add(device.deviceId);
    }

    return devices;
}

export async function loadDeviceConfigs(file: string): Promise<DeviceConfig[]> {
    let text: string;
    try {
        text = await fs.readFile(file, 'utf-8');
    } catch (error) {
        throw new ConfigError('CONFIG_INVALID',
            `Cannot read devices file ${file}: ${extractErrorMessage(error)}`,
            { file },
            { cause: error }
        );
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError('CONFIG_INVALID',
            `Devices file ${file} is not valid JSON: ${extractErrorMessage(error)}`,
            { file },
            { cause: error }
        );
    }

    return parseDeviceConfigs(raw);
}
