/**
 * Command Encoder Types
 *
 * @module server/commands/types
 */

import type { FieldMap, FieldValue } from '../telemetry/types';
import type { CommandRouting } from '../profiles/types';

/** Request body sent to the cloud API's set endpoint. */
export type CommandPayload = Record<string, FieldValue>;

/**
 * Turns a logical "set field to value" into a device payload.
 * Implementations throw EncodingError for anything they cannot encode.
 */
export interface CommandEncoder {
    encode(field: string, value: unknown): CommandPayload;
}

export type PayloadBuilder = (
    deviceId: string,
    params: FieldMap,
    routing: CommandRouting
) => CommandPayload;
