import rateLimit from 'express-rate-limit';
import { Request } from 'express';

/**
 * Rate Limiting Middleware
 *
 * Commands reach real hardware, so the command route gets a tighter budget
 * than reads. Limits are per client IP.
 */

/**
 * Key generator: IP plus device, so one busy device does not starve
 * commands to the others
 */
const deviceKeyGenerator = (req: Request): string => {
    return `${req.ip || 'unknown'}:${req.params.deviceId || ''}`;
};

/**
 * Standard rate limit for API endpoints
 * 300 requests per minute per IP
 */
export const standardRateLimit = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 300,
    message: { error: 'Too many requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});

/**
 * Rate limit for command endpoints
 * 30 commands per minute per IP and device
 */
export const commandRateLimit = rateLimit({
    windowMs: 60 * 1000,
    max: 30,
    keyGenerator: deviceKeyGenerator,
    message: { error: 'Too many commands, please slow down' },
    standardHeaders: true,
    legacyHeaders: false,
});
