import { NextFunction, Request, Response } from 'express';
import { ApiError } from '../lib/errors.js';
import { logger } from '../utils/logger.js';

interface BodyParserError {
  type?: string;
  status?: number;
  expose?: boolean;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ApiError) {
    return res.status(err.status).json(err.toBody());
  }
  if (isBodyParserError(err)) {
    if (err.type === 'entity.too.large') {
      const tooLarge = new ApiError('PAYLOAD_TOO_LARGE', 'Payload too large');
      return res.status(tooLarge.status).json(tooLarge.toBody());
    }
    if (err.expose && err.status !== undefined && err.status < 500) {
      return res.status(err.status).json({ error: err.message });
    }
  }
  logger.error({ err }, 'Unhandled error');
  return res.status(500).json({ error: 'Internal Server Error' });
}
