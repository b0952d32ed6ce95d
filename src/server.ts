import { ConfigError, loadConfig, type AppConfig } from './config/env.js';
import { createApp } from './app.js';
import { createMailProvider } from './services/providers/index.js';
import { applyLogConfig, logger } from './utils/logger.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error('Invalid environment variables', err.fieldErrors);
    process.exit(1);
  }
  throw err;
}

applyLogConfig(config);

const provider = createMailProvider(config.mail);
const app = createApp({ config, provider });

app.listen(config.port, () => {
  logger.info({ port: config.port, provider: provider.label, identity: config.verifiedIdentity }, 'Server started');
  logger.info(`Docs: http://localhost:${config.port}/docs`);
});
