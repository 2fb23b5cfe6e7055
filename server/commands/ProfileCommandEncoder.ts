/**
 * ProfileCommandEncoder
 *
 * Encodes control commands for one device using its hardware profile.
 * The field name is the control key from the catalog (e.g. "ac_hv_out");
 * the profile decides the device param and the wire format.
 *
 * Values are validated, never coerced:
 * - switch: boolean
 * - number: finite number within [min, max]; values outside are rejected
 * - select: an option label or an option value
 * - button: any value, the catalog's paramValue is sent
 *
 * @module server/commands/ProfileCommandEncoder
 */

import { EncodingError } from '../errors';
import { fieldValuesEqual, isFieldValue } from '../telemetry/equality';
import type { FieldValue } from '../telemetry/types';
import type {
    ControlDefinition,
    DeviceProfile,
    NumberControl,
    SelectControl,
    SwitchControl,
} from '../profiles/types';
import { payloadBuilders } from './formats';
import type { CommandEncoder, CommandPayload } from './types';

export class ProfileCommandEncoder implements CommandEncoder {
    private readonly controls: Map<string, ControlDefinition>;

    constructor(
        private readonly profile: DeviceProfile,
        private readonly deviceId: string
    ) {
        this.controls = new Map(profile.controls.map(c => [c.key, c]));
    }

    encode(field: string, value: unknown): CommandPayload {
        const control = this.controls.get(field);
        if (!control) {
            throw new EncodingError('UNKNOWN_FIELD',
                `Profile ${this.profile.id} has no control "${field}"`,
                { field, profile: this.profile.id }
            );
        }

        const paramValue = this.resolveValue(control, value);
        const build = payloadBuilders[this.profile.format];
        return build(this.deviceId, { [control.param]: paramValue }, control.routing ?? {});
    }

    /** Control keys this encoder accepts. */
    get fields(): string[] {
        return Array.from(this.controls.keys());
    }

    // ========================================================================
    // PER-KIND VALUE RESOLUTION
    // ========================================================================

    private resolveValue(control: ControlDefinition, value: unknown): FieldValue {
        switch (control.kind) {
            case 'switch':
                return this.resolveSwitch(control, value);
            case 'number':
                return this.resolveNumber(control, value);
            case 'select':
                return this.resolveSelect(control, value);
            case 'button':
                return control.paramValue;
        }
    }

    private resolveSwitch(control: SwitchControl, value: unknown): FieldValue {
        if (typeof value !== 'boolean') {
            throw new EncodingError('INVALID_VALUE',
                `Control "${control.key}" expects a boolean`,
                { field: control.key, received: typeof value }
            );
        }
        const on = control.inverted ? !value : value;
        return on ? control.valueOn : control.valueOff;
    }

    private resolveNumber(control: NumberControl, value: unknown): FieldValue {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new EncodingError('INVALID_VALUE',
                `Control "${control.key}" expects a finite number`,
                { field: control.key, received: typeof value }
            );
        }
        if (value < control.min || value > control.max) {
            throw new EncodingError('OUT_OF_RANGE',
                `Control "${control.key}" accepts ${control.min}-${control.max}, got ${value}`,
                { field: control.key, min: control.min, max: control.max, value }
            );
        }

        const deviceValue = control.scale
            ? Math.round((value / control.scale.ui) * control.scale.device)
            : value;

        if (!control.nested) {
            return deviceValue;
        }

        const params: Record<string, FieldValue> = {};
        for (const [key, slot] of Object.entries(control.nested)) {
            params[key] = slot === null ? deviceValue : slot;
        }
        return params;
    }

    private resolveSelect(control: SelectControl, value: unknown): FieldValue {
        const byLabel = control.options.find(option => option.label === value);
        if (byLabel) {
            return byLabel.value;
        }

        if (isFieldValue(value)) {
            const byValue = control.options.find(option => fieldValuesEqual(option.value, value));
            if (byValue) {
                return byValue.value;
            }
        }

        throw new EncodingError('INVALID_OPTION',
            `Control "${control.key}" has no option ${JSON.stringify(value) ?? String(value)}`,
            { field: control.key, options: control.options.map(o => o.label) }
        );
    }
}
