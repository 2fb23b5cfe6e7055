/**
 * Hardware Profile Registry
 *
 * Loads catalog.json once and indexes profiles by id. The catalog is
 * validated on load; a malformed entry is a ConfigError at startup rather
 * than a surprise at command time.
 */

import { ConfigError } from '../errors';
import { isFieldValue } from '../telemetry/equality';
import type { FieldValue } from '../telemetry/types';
import catalog from './catalog.json';
import {
    COMMAND_FORMATS,
    CONTROL_KINDS,
    PROFILE_IDS,
    type CommandFormat,
    type CommandRouting,
    type ControlDefinition,
    type ControlKind,
    type DeviceProfile,
    type ProfileId,
    type SelectOption,
} from './types';

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

type Obj = Record<string, unknown>;

function isObj(value: unknown): value is Obj {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(where: string, problem: string): ConfigError {
    return new ConfigError('CONFIG_INVALID', `Profile catalog: ${where} ${problem}`, { where });
}

function requireString(obj: Obj, key: string, where: string): string {
    const value = obj[key];
    if (typeof value !== 'string' || value === '') {
        throw invalid(where, `requires a non-empty string "${key}"`);
    }
    return value;
}

function optionalString(obj: Obj, key: string, where: string): string | undefined {
    return obj[key] === undefined ? undefined : requireString(obj, key, where);
}

function requireNumber(obj: Obj, key: string, where: string): number {
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw invalid(where, `requires a finite number "${key}"`);
    }
    return value;
}

function optionalNumber(obj: Obj, key: string, where: string): number | undefined {
    return obj[key] === undefined ? undefined : requireNumber(obj, key, where);
}

function requireFieldValue(obj: Obj, key: string, where: string): FieldValue {
    const value = obj[key];
    if (!isFieldValue(value)) {
        throw invalid(where, `requires a JSON value "${key}"`);
    }
    return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
    return allowed.some(item => item === value);
}

export function isProfileId(value: unknown): value is ProfileId {
    return oneOf(PROFILE_IDS, value);
}

// ============================================================================
// PARSERS
// ============================================================================

function parseRouting(raw: unknown, where: string): CommandRouting | undefined {
    if (raw === undefined) return undefined;
    if (!isObj(raw)) throw invalid(where, 'routing must be an object');
    return {
        cmdSet: optionalNumber(raw, 'cmdSet', where),
        cmdId: optionalNumber(raw, 'cmdId', where),
        moduleType: optionalNumber(raw, 'moduleType', where),
        operateType: optionalString(raw, 'operateType', where),
        cmdCode: optionalString(raw, 'cmdCode', where),
    };
}

function parseOptions(raw: unknown, where: string): SelectOption[] {
    if (!Array.isArray(raw) || raw.length === 0) {
        throw invalid(where, 'requires a non-empty "options" array');
    }
    return raw.map((entry: unknown, index) => {
        const at = `${where} option ${index}`;
        if (!isObj(entry)) throw invalid(at, 'must be an object');
        return { label: requireString(entry, 'label', at), value: requireFieldValue(entry, 'value', at) };
    });
}

function parseControl(raw: unknown, where: string): ControlDefinition {
    if (!isObj(raw)) throw invalid(where, 'must be an object');

    const kind: unknown = raw.kind;
    if (!oneOf<ControlKind>(CONTROL_KINDS, kind)) {
        throw invalid(where, `has unknown kind "${String(kind)}"`);
    }

    const base = {
        key: requireString(raw, 'key', where),
        name: requireString(raw, 'name', where),
        param: requireString(raw, 'param', where),
        stateField: optionalString(raw, 'stateField', where),
        routing: parseRouting(raw.routing, where),
    };

    switch (kind) {
        case 'switch':
            return {
                ...base,
                kind,
                valueOn: requireFieldValue(raw, 'valueOn', where),
                valueOff: requireFieldValue(raw, 'valueOff', where),
                inverted: raw.inverted === true,
            };

        case 'number': {
            const min = requireNumber(raw, 'min', where);
            const max = requireNumber(raw, 'max', where);
            if (min > max) throw invalid(where, 'has min greater than max');

            let scale: { ui: number; device: number } | undefined;
            if (raw.scale !== undefined) {
                if (!isObj(raw.scale)) throw invalid(where, 'scale must be an object');
                scale = { ui: requireNumber(raw.scale, 'ui', where), device: requireNumber(raw.scale, 'device', where) };
                if (scale.ui === 0) throw invalid(where, 'scale.ui must not be zero');
            }

            let nested: Record<string, FieldValue> | undefined;
            if (raw.nested !== undefined) {
                const template = raw.nested;
                if (!isObj(template) || !isFieldValue(template)) throw invalid(where, 'nested must be an object');
                if (!Object.values(template).includes(null)) throw invalid(where, 'nested needs a null slot');
                nested = {};
                for (const key of Object.keys(template)) {
                    nested[key] = requireFieldValue(template, key, where);
                }
            }

            return {
                ...base,
                kind,
                min,
                max,
                step: optionalNumber(raw, 'step', where),
                unit: optionalString(raw, 'unit', where),
                scale,
                nested,
            };
        }

        case 'select':
            return { ...base, kind, options: parseOptions(raw.options, where) };

        case 'button':
            return {
                ...base,
                kind,
                paramValue: raw.paramValue === undefined ? 1 : requireFieldValue(raw, 'paramValue', where),
            };
    }
}

function parseProfile(raw: unknown, index: number): DeviceProfile {
    const where = `profile ${index}`;
    if (!isObj(raw)) throw invalid(where, 'must be an object');

    const id: unknown = raw.id;
    if (!isProfileId(id)) throw invalid(where, `has unknown id "${String(id)}"`);

    const format: unknown = raw.format;
    if (!oneOf<CommandFormat>(COMMAND_FORMATS, format)) {
        throw invalid(id, `has unknown format "${String(format)}"`);
    }

    if (!Array.isArray(raw.controls)) throw invalid(id, 'requires a "controls" array');
    const controls = raw.controls.map((control: unknown, i: number) => parseControl(control, `${id} control ${i}`));

    const seen = new Set<string>();
    for (const control of controls) {
        if (seen.has(control.key)) throw invalid(id, `declares control "${control.key}" twice`);
        seen.add(control.key);
    }

    return { id, displayName: requireString(raw, 'displayName', id), format, controls };
}

/**
 * Validate a raw catalog document.
 * @throws ConfigError when any profile or control is malformed
 */
export function parseCatalog(raw: unknown): DeviceProfile[] {
    if (!isObj(raw) || !Array.isArray(raw.profiles)) {
        throw invalid('root', 'requires a "profiles" array');
    }
    const profiles = raw.profiles.map((entry: unknown, index: number) => parseProfile(entry, index));

    const ids = new Set(profiles.map(p => p.id));
    if (ids.size !== profiles.length) throw invalid('root', 'declares a profile id twice');

    return profiles;
}

// ============================================================================
// REGISTRY
// ============================================================================

export const profiles: DeviceProfile[] = parseCatalog(catalog);

export const profileMap = new Map<ProfileId, DeviceProfile>(
    profiles.map(p => [p.id, p])
);

/**
 * @throws ConfigError for an id that is not in the catalog
 */
export function getProfile(id: string): DeviceProfile {
    const profile = isProfileId(id) ? profileMap.get(id) : undefined;
    if (!profile) {
        throw new ConfigError('UNKNOWN_PROFILE', `Unknown device profile "${id}"`, { profile: id });
    }
    return profile;
}
