import express, { Router } from 'express';
import { createSendEmailHandler } from '../controllers/emailController.js';
import { createSendEmailRateLimiter } from '../middleware/rateLimit.js';
import type { SendEmailDeps } from '../services/emailService.js';

export interface EmailRouteOptions {
  bodyLimit: string;
  rateLimitPerMinute: number;
}

export function createEmailRoutes(deps: SendEmailDeps, options: EmailRouteOptions): Router {
  const router = Router();

  // Body stays raw text whatever the content type; the handler owns JSON parsing
  // so malformed bodies get its 400 rather than the json parser's.
  const rawText = express.text({ type: () => true, limit: options.bodyLimit });

  router.post('/ses', createSendEmailRateLimiter(options.rateLimitPerMinute), rawText, createSendEmailHandler(deps));

  return router;
}
