/**
 * Device Routes
 *
 * Endpoints:
 * - GET /                    - List devices with their current mode
 * - GET /:deviceId/state     - Current merged field snapshot
 * - GET /:deviceId/mode      - Current coordinator mode
 * - GET /:deviceId/controls  - Controls the device's profile accepts
 * - POST /:deviceId/commands - Send { field, value } (202 / 400 / 502)
 * - POST /:deviceId/refresh  - Poll now
 * - PUT /:deviceId/interval  - Change the poll interval { seconds }
 * - GET /:deviceId/stream    - SSE: state, update, mode, refresh-failed
 */
import { Router, Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import { maskIdentifier } from '../utils/redact';
import { CommandError, ConfigError, extractErrorMessage } from '../errors';
import { commandRateLimit } from '../middleware/rateLimit';
import type { ControlDefinition } from '../profiles/types';
import type { DeviceChange, DeviceManager } from '../services/DeviceManager';

const HEARTBEAT_MS = 25_000;

function sseFrame(event: string, data: unknown): string {
    return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

function toSseEvent(change: DeviceChange): { event: string; data: unknown } {
    switch (change.type) {
        case 'update':
            return { event: 'update', data: change.record };
        case 'mode':
            return { event: 'mode', data: change.event };
        case 'refresh-failed':
            return {
                event: 'refresh-failed',
                data: {
                    deviceId: change.event.deviceId,
                    error: change.event.error.message,
                    consecutiveFailures: change.event.consecutiveFailures,
                    timestamp: change.event.timestamp,
                },
            };
    }
}

/** Client-facing view of a control; wire details stay server-side. */
function describeControl(control: ControlDefinition): Record<string, unknown> {
    const base = { key: control.key, kind: control.kind, name: control.name, stateField: control.stateField ?? null };
    switch (control.kind) {
        case 'number':
            return { ...base, min: control.min, max: control.max, step: control.step ?? null, unit: control.unit ?? null };
        case 'select':
            return { ...base, options: control.options.map(option => option.label) };
        default:
            return base;
    }
}

export function createDevicesRouter(manager: DeviceManager): Router {
    const router = Router();

    // 404 for unknown devices on every /:deviceId route
    router.param('deviceId', (req: Request, res: Response, next: NextFunction, deviceId: string) => {
        if (!manager.has(deviceId)) {
            res.status(404).json({ error: `Unknown device: ${deviceId}` });
            return;
        }
        next();
    });

    /**
     * GET /
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json({ devices: manager.listDevices() });
    });

    /**
     * GET /:deviceId/state
     */
    router.get('/:deviceId/state', (req: Request, res: Response) => {
        const { deviceId } = req.params;
        res.json({
            deviceId,
            mode: manager.mode(deviceId),
            fields: manager.currentState(deviceId),
        });
    });

    /**
     * GET /:deviceId/mode
     */
    router.get('/:deviceId/mode', (req: Request, res: Response) => {
        const { deviceId } = req.params;
        res.json({ deviceId, mode: manager.mode(deviceId) });
    });

    /**
     * GET /:deviceId/controls
     */
    router.get('/:deviceId/controls', (req: Request, res: Response) => {
        const profile = manager.profile(req.params.deviceId);
        res.json({
            profile: profile.id,
            displayName: profile.displayName,
            controls: profile.controls.map(describeControl),
        });
    });

    /**
     * POST /:deviceId/commands
     * Body: { field: string, value: unknown }
     */
    router.post('/:deviceId/commands', commandRateLimit, async (req: Request, res: Response) => {
        const { deviceId } = req.params;
        const { field, value } = req.body ?? {};

        if (typeof field !== 'string' || !field) {
            res.status(400).json({ error: 'field (string) is required' });
            return;
        }
        if (value === undefined) {
            res.status(400).json({ error: 'value is required' });
            return;
        }

        try {
            await manager.dispatchCommand(deviceId, field, value);
            res.status(202).json({ accepted: true, field });
        } catch (error) {
            if (error instanceof CommandError && error.code === 'ENCODING_FAILED') {
                res.status(400).json({ error: error.message, code: error.code });
                return;
            }
            logger.error(`[Devices] Command failed: device=${maskIdentifier(deviceId)} field=${field} error="${extractErrorMessage(error)}"`);
            res.status(502).json({
                error: extractErrorMessage(error),
                code: error instanceof CommandError ? error.code : 'TRANSPORT_FAILED',
            });
        }
    });

    /**
     * POST /:deviceId/refresh
     */
    router.post('/:deviceId/refresh', async (req: Request, res: Response) => {
        const outcome = await manager.refresh(req.params.deviceId);
        switch (outcome.status) {
            case 'merged':
                res.json({
                    changedFields: outcome.record.changedFields,
                    fieldCount: outcome.record.fieldCountAfter,
                    timestamp: outcome.record.timestamp,
                });
                return;
            case 'failed':
                res.status(502).json({ error: outcome.error.message });
                return;
            case 'skipped':
                res.status(503).json({ error: 'Device is shutting down' });
                return;
        }
    });

    /**
     * PUT /:deviceId/interval
     * Body: { seconds: number }
     */
    router.put('/:deviceId/interval', (req: Request, res: Response) => {
        const { deviceId } = req.params;
        const { seconds } = req.body ?? {};

        if (typeof seconds !== 'number') {
            res.status(400).json({ error: 'seconds (number) is required' });
            return;
        }

        try {
            manager.setPollInterval(deviceId, seconds);
            res.json({ deviceId, pollIntervalSeconds: seconds });
        } catch (error) {
            if (error instanceof ConfigError) {
                res.status(400).json({ error: error.message });
                return;
            }
            throw error;
        }
    });

    /**
     * GET /:deviceId/stream
     * Sends the current state first, then every change as it happens.
     */
    router.get('/:deviceId/stream', (req: Request, res: Response) => {
        const { deviceId } = req.params;
        const connectionId = uuidv4();

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        res.write(sseFrame('state', {
            deviceId,
            mode: manager.mode(deviceId),
            fields: manager.currentState(deviceId),
        }));

        const unsubscribe = manager.subscribeChanges(deviceId, change => {
            const { event, data } = toSseEvent(change);
            res.write(sseFrame(event, data));
        });

        // Heartbeat to keep proxies from closing the connection
        const heartbeat = setInterval(() => {
            res.write(': heartbeat\n\n');
        }, HEARTBEAT_MS);

        let closed = false;
        const cleanup = (): void => {
            if (closed) return;
            closed = true;
            clearInterval(heartbeat);
            unsubscribe();
            logger.debug(`[Devices SSE] Connection closed: connectionId=${connectionId}`);
        };

        req.on('close', cleanup);
        req.on('error', cleanup);

        logger.debug(`[Devices SSE] New connection: connectionId=${connectionId} device=${maskIdentifier(deviceId)}`);
    });

    return router;
}
