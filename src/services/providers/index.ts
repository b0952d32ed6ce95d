import type { MailProviderConfig } from '../../config/env.js';
import type { MailProvider } from '../../types/email.js';
import { SesMailProvider } from './ses.js';
import { SmtpMailProvider } from './smtp.js';

export { SesMailProvider } from './ses.js';
export { SmtpMailProvider } from './smtp.js';

export function createMailProvider(config: Readonly<MailProviderConfig>): MailProvider {
  switch (config.kind) {
  case 'ses':
    return new SesMailProvider({ region: config.region, configurationSet: config.configurationSet });
  case 'smtp':
    return new SmtpMailProvider(config);
  }
}
