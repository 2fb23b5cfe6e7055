/**
 * Diagnostics Routes
 *
 * Endpoints:
 * - GET /           - Health of every coordinator and the stream
 * - GET /:deviceId  - Redacted state, field provenance and recent history
 */
import { Router, Request, Response } from 'express';
import type { DeviceManager } from '../services/DeviceManager';

export function createDiagnosticsRouter(manager: DeviceManager): Router {
    const router = Router();

    router.get('/', (_req: Request, res: Response) => {
        res.json(manager.getHealth());
    });

    router.get('/:deviceId', (req: Request, res: Response) => {
        const { deviceId } = req.params;
        if (!manager.has(deviceId)) {
            res.status(404).json({ error: `Unknown device: ${deviceId}` });
            return;
        }
        res.json(manager.diagnostics(deviceId));
    });

    return router;
}
