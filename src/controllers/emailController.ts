import { NextFunction, Request, Response } from 'express';
import { handleSendEmail, type SendEmailDeps } from '../services/emailService.js';

// The /ses route parses its body as text, so req.body is the raw string
// unless the request had no body at all.
function rawBodyOf(req: Request): string | undefined {
  return typeof req.body === 'string' ? req.body : undefined;
}

export function createSendEmailHandler(deps: SendEmailDeps) {
  return (req: Request, res: Response, next: NextFunction) => {
    handleSendEmail(rawBodyOf(req), deps)
      .then(result => {
        res.status(result.statusCode).json(result.body);
      })
      .catch(next);
  };
}
