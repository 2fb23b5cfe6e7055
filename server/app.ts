/**
 * Express application
 *
 * Built separately from the entry point so tests can mount it against a
 * DeviceManager with fake sources.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import logger from './utils/logger';
import { extractErrorMessage } from './errors';
import { standardRateLimit } from './middleware/rateLimit';
import { createDevicesRouter } from './routes/devices';
import { createDiagnosticsRouter } from './routes/diagnostics';
import type { DeviceManager } from './services/DeviceManager';
import pkg from '../package.json';

export function createApp(manager: DeviceManager): express.Express {
    const app = express();

    // Trust first proxy hop so req.ip is the client, not the proxy
    app.set('trust proxy', 1);

    app.use(express.json({ limit: '100kb' }));

    app.use(helmet({
        contentSecurityPolicy: false,
        hsts: false,
    }));
    app.use(cors({
        origin: false,  // Same-origin only
    }));

    app.use('/api', standardRateLimit);

    // Health check endpoint
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            version: pkg.version,
            devices: manager.listDevices().length,
        });
    });

    app.use('/api/devices', createDevicesRouter(manager));
    app.use('/api/diagnostics', createDiagnosticsRouter(manager));

    app.use('/api', (_req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Last-resort error handler; route-level errors are answered in place
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        // body-parser errors carry their own 4xx status
        const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
            ? err.status
            : 500;
        if (status >= 500) {
            logger.error(`[Server] Unhandled route error: path=${req.path} error="${extractErrorMessage(err)}"`);
        }
        if (res.headersSent) return;
        res.status(status).json({ error: status >= 500 ? 'Internal server error' : extractErrorMessage(err) });
    });

    return app;
}
