/**
 * CommandDispatcher
 *
 * Encodes a logical "set field to value" with the device's encoder and
 * sends it over the polling source's request channel. Any failure comes
 * back as a CommandError whose cause is the original EncodingError or
 * transport error.
 *
 * @module server/telemetry/CommandDispatcher
 */

import logger from '../utils/logger';
import { maskIdentifier } from '../utils/redact';
import { CommandError, EncodingError, extractErrorMessage } from '../errors';
import type { CommandEncoder, CommandPayload } from '../commands/types';
import type { PollingSource } from '../integrations/types';
import type { DiagnosticsRecorder } from './DiagnosticsRecorder';

export class CommandDispatcher {
    constructor(
        private readonly deviceId: string,
        private readonly encoder: CommandEncoder,
        private readonly source: PollingSource,
        private readonly diagnostics: DiagnosticsRecorder | null = null
    ) { }

    async dispatch(field: string, value: unknown): Promise<void> {
        const device = maskIdentifier(this.deviceId);

        let payload: CommandPayload;
        try {
            payload = this.encoder.encode(field, value);
        } catch (error) {
            const reason = extractErrorMessage(error);
            logger.debug(`[CommandDispatcher] Rejected: device=${device} field=${field} error="${reason}"`);
            throw new CommandError('ENCODING_FAILED',
                `Cannot encode ${field}: ${reason}`,
                {
                    field,
                    deviceId: this.deviceId,
                    reason: error instanceof EncodingError ? error.code : undefined,
                },
                { cause: error }
            );
        }

        this.diagnostics?.record('command', { field, value, payload });

        let reply: unknown;
        try {
            reply = await this.source.sendCommand(this.deviceId, payload);
        } catch (error) {
            const reason = extractErrorMessage(error);
            logger.warn(`[CommandDispatcher] Send failed: device=${device} field=${field} error="${reason}"`);
            this.diagnostics?.record('reply', { field, ok: false, error: reason });
            throw new CommandError('TRANSPORT_FAILED',
                `Command ${field} failed: ${reason}`,
                { field, deviceId: this.deviceId },
                { cause: error }
            );
        }

        this.diagnostics?.record('reply', { field, ok: true, reply });
        logger.info(`[CommandDispatcher] Sent: device=${device} field=${field}`);
    }
}
