/**
 * Hardware Profile Types
 *
 * A profile names the command format a device family speaks and the
 * controls it accepts. Profiles form a closed set; the catalog is read
 * once at startup.
 *
 * @module server/profiles/types
 */

import type { FieldValue } from '../telemetry/types';

// ============================================================================
// PROFILE + FORMAT IDS
// ============================================================================

export const PROFILE_IDS = ['delta_pro_3', 'delta_pro', 'delta_2', 'stream_ultra_x', 'smart_plug'] as const;
export type ProfileId = typeof PROFILE_IDS[number];

export const COMMAND_FORMATS = ['cmd_func', 'cmd_set', 'module_operate', 'cmd_code'] as const;
export type CommandFormat = typeof COMMAND_FORMATS[number];

export const CONTROL_KINDS = ['switch', 'number', 'select', 'button'] as const;
export type ControlKind = typeof CONTROL_KINDS[number];

// ============================================================================
// CONTROLS
// ============================================================================

/** Format-specific routing fields carried alongside params. */
export interface CommandRouting {
    cmdSet?: number;      // cmd_set
    cmdId?: number;       // cmd_set
    moduleType?: number;  // module_operate
    operateType?: string; // module_operate
    cmdCode?: string;     // cmd_code
}

interface ControlBase {
    key: string;
    name: string;
    /** Key inside the command params */
    param: string;
    /** Telemetry field reflecting the control's current state */
    stateField?: string;
    routing?: CommandRouting;
}

export interface SwitchControl extends ControlBase {
    kind: 'switch';
    valueOn: FieldValue;
    valueOff: FieldValue;
    inverted?: boolean;
}

export interface NumberControl extends ControlBase {
    kind: 'number';
    min: number;
    max: number;
    step?: number;
    unit?: string;
    /** Linear conversion from UI units to device units, rounded */
    scale?: { ui: number; device: number };
    /** Params template; the null slot receives the value */
    nested?: Record<string, FieldValue>;
}

export interface SelectOption {
    label: string;
    value: FieldValue;
}

export interface SelectControl extends ControlBase {
    kind: 'select';
    options: SelectOption[];
}

export interface ButtonControl extends ControlBase {
    kind: 'button';
    paramValue: FieldValue;
}

export type ControlDefinition = SwitchControl | NumberControl | SelectControl | ButtonControl;

// ============================================================================
// PROFILE
// ============================================================================

export interface DeviceProfile {
    id: ProfileId;
    displayName: string;
    format: CommandFormat;
    controls: ControlDefinition[];
}
