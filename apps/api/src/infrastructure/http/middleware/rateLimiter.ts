import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for answer generation.
 * Limits to 10 requests per minute per IP address
 */
export const askRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 10,
    message: { status: 'error', code: 'RATE_LIMITED', message: 'Too many questions, try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
