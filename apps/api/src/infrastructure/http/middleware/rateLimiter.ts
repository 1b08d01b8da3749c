import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for the answer endpoint
 * Every request costs two model calls, limits to 20 requests per minute per IP
 */
export const answerRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 20,
    message: { status: 'error', message: 'Too many questions, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
