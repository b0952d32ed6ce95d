import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { createEmailRoutes } from './routes/emailRoutes.js';
import { errorHandler } from './middleware/errorHandler.js';
import { buildSwaggerSpec } from './docs/swagger.js';
import type { AppConfig } from './config/env.js';
import type { MailProvider } from './types/email.js';

export interface AppDependencies {
  config: AppConfig;
  provider: MailProvider;
}

export function createApp({ config, provider }: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: '*' }));

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(buildSwaggerSpec(config.port)));

  app.get('/healthz', (_req: Request, res: Response) => res.json({ status: 'ok' }));
  app.use(createEmailRoutes(
    { settings: config, provider },
    { bodyLimit: config.bodyLimit, rateLimitPerMinute: config.rateLimitPerMinute }
  ));
  app.use(errorHandler);

  return app;
}
