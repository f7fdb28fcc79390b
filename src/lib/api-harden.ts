import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

/**
 * Enhanced Error Response Structure
 */
export interface ErrorResponse {
    error: string;
    details?: unknown;
    request_id: string;
    [key: string]: unknown;
}

export function getRequestId(res: Response): string {
    const requestId: unknown = res.locals.requestId;
    return typeof requestId === 'string' ? requestId : 'unknown';
}

/**
 * Middleware to attach unique Request ID
 */
export function requestIdMiddleware(_req: Request, res: Response, next: NextFunction) {
    const requestId = crypto.randomBytes(8).toString('hex');
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
}

/**
 * Helper to send standardized error responses
 */
export function sendError(
    res: Response,
    status: number,
    message: string,
    details?: unknown,
    extra: Record<string, unknown> = {}
) {
    const response: ErrorResponse = {
        error: message,
        details,
        request_id: getRequestId(res),
        ...extra,
    };
    return res.status(status).json(response);
}

export interface RateLimitOptions {
    windowMs?: number;
    maxRequests?: number;
    now?: () => number;
}

/**
 * In-memory rate limiter, keyed by client IP.
 * Default: 30 requests / 10 minutes
 */
export function createRateLimiter({
    windowMs = 10 * 60 * 1000,
    maxRequests = 30,
    now = () => Date.now(),
}: RateLimitOptions = {}) {
    const rateLimitMap = new Map<string, { count: number; resetAt: number }>();

    function pruneExpired(current: number) {
        for (const [key, entry] of rateLimitMap) {
            if (current > entry.resetAt) {
                rateLimitMap.delete(key);
            }
        }
    }

    function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
        const flyClientIp = req.headers['fly-client-ip'];
        const ip = (typeof flyClientIp === 'string' ? flyClientIp : undefined) || req.ip || 'unknown';
        const current = now();

        const record = rateLimitMap.get(ip);

        if (!record || current > record.resetAt) {
            // Drop every client whose window has closed
            pruneExpired(current);
            rateLimitMap.set(ip, { count: 1, resetAt: current + windowMs });
            return next();
        }

        if (record.count >= maxRequests) {
            console.warn(`[RateLimit] Blocked IP: ${ip}, Request ID: ${getRequestId(res)}`);
            return sendError(res, 429, 'Too Many Requests', {
                retry_after_ms: record.resetAt - current,
            });
        }

        record.count++;
        next();
    }

    return Object.assign(rateLimitMiddleware, {
        trackedClients: () => rateLimitMap.size,
    });
}

/**
 * Status carried by errors raised before a route runs (body-parser sets `status`, http-errors `statusCode`).
 * Only 4xx values count; anything else is a server fault.
 */
export function clientErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

const LOCALHOST_REGEX = /^https?:\/\/localhost(?::\d+)?$/i;
const LOCALHOST_IPV4_REGEX = /^https?:\/\/127\.0\.0\.1(?::\d+)?$/i;

export function isAllowedOrigin(origin: string | undefined, allowedOrigins: string[]) {
    if (!origin) return false;
    return LOCALHOST_REGEX.test(origin) || LOCALHOST_IPV4_REGEX.test(origin) || allowedOrigins.includes(origin);
}

/**
 * CORS for the browser front end; preflight answered with 204
 */
export function createCorsMiddleware(allowedOrigins: string[]) {
    return function apiCorsMiddleware(req: Request, res: Response, next: NextFunction) {
        const origin = req.headers.origin;
        if (origin) {
            if (isAllowedOrigin(origin, allowedOrigins)) {
                res.setHeader('Access-Control-Allow-Origin', origin);
                res.setHeader('Vary', 'Origin');
                res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
                res.setHeader('Access-Control-Allow-Headers', 'content-type');
                if (req.method === 'OPTIONS') {
                    res.sendStatus(204);
                    return;
                }
            } else {
                console.warn(`[CORS] rejected origin ${origin} for ${req.method} ${req.path}`);
            }
        }
        next();
    };
}
