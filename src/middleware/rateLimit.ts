import rateLimit from 'express-rate-limit';
import { ApiError } from '../lib/errors.js';

const tooManyRequests = new ApiError('RATE_LIMIT', 'Too many requests');

export function createSendEmailRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    statusCode: tooManyRequests.status,
    message: tooManyRequests.toBody()
  });
}
