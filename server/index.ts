/**
 * voltsync - Server Entry Point
 *
 * Loads configuration, builds the polling and streaming sources, starts
 * one coordinator per device and serves the HTTP/SSE API.
 */

// Load environment variables from .env file (development only)
import 'dotenv/config';

import { createServer } from 'http';
import logger, { setLogLevel } from './utils/logger';
import { extractErrorMessage } from './errors';
import { loadEnv } from './config/env';
import { loadDeviceConfigs } from './config/devices';
import { CloudApiClient } from './integrations/cloud/CloudApiClient';
import { CloudPollingSource } from './integrations/cloud/CloudPollingSource';
import { createStreamingSource } from './integrations/registry';
import { DeviceManager } from './services/DeviceManager';
import { createApp } from './app';

let manager: DeviceManager | null = null;

void (async () => {
    try {
        const env = loadEnv();
        setLogLevel(env.logLevel);

        const devices = await loadDeviceConfigs(env.devicesFile);
        logger.info(`[Startup] Loaded ${devices.length} device(s) from ${env.devicesFile}`);

        const client = new CloudApiClient(env.api);
        const streamingSource = await createStreamingSource(env.stream, client, {
            // Devices run poll-only until the stream comes up
            retryInitialConnect: true,
        });

        manager = new DeviceManager({
            devices,
            pollingSource: new CloudPollingSource(client),
            streamingSource,
        });

        const httpServer = createServer(createApp(manager));
        await manager.start();

        httpServer.listen(env.port, () => {
            logger.info(`[Server] Listening on port ${env.port}`);
            logger.info('[Server] Ready ✓');
        });
    } catch (error) {
        logger.error(`[Startup] Failed to start server: error="${extractErrorMessage(error)}"`);
        process.exit(1);
    }
})();

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
    logger.info(`${signal} received, shutting down gracefully`);
    try {
        await manager?.shutdown();
    } catch (error) {
        logger.error(`[Shutdown] error="${extractErrorMessage(error)}"`);
    }
    process.exit(0);
}

process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
    void shutdown('SIGINT');
});
