import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for question answering, which holds a completion stream per request.
 * Limits to 10 requests per minute per IP address.
 */
export const askRateLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    message: { status: 'error', message: 'Too many questions, try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
