/**
 * Polling source backed by the cloud API. One fetchSnapshot() call is one
 * quota request; commands go out through the same signed channel.
 */

import logger from '../../utils/logger';
import { maskIdentifier } from '../../utils/redact';
import type { CommandPayload } from '../../commands/types';
import type { FieldMap } from '../../telemetry/types';
import type { PollingSource } from '../types';
import type { CloudApiClient } from './CloudApiClient';

export class CloudPollingSource implements PollingSource {
    constructor(private readonly client: CloudApiClient) { }

    async fetchSnapshot(deviceId: string): Promise<FieldMap> {
        const started = Date.now();
        const fields = await this.client.getDeviceQuota(deviceId);
        logger.debug(`[CloudPolling] Snapshot: device=${maskIdentifier(deviceId)} fields=${Object.keys(fields).length} duration=${Date.now() - started}ms`);
        return fields;
    }

    async sendCommand(deviceId: string, payload: CommandPayload): Promise<unknown> {
        const reply = await this.client.setDeviceQuota(payload);
        logger.debug(`[CloudPolling] Command accepted: device=${maskIdentifier(deviceId)} keys=${Object.keys(payload).join(',')}`);
        return reply;
    }
}
