import {
  SESClient,
  SendEmailCommand,
  type SendEmailCommandOutput
} from '@aws-sdk/client-ses';
import { logger } from '../../utils/logger.js';
import { toMailProviderError } from '../../lib/errors.js';
import type { MailProvider, OutboundEmail } from '../../types/email.js';

export interface SesProviderOptions {
  region?: string;
  configurationSet?: string;
}

export class SesMailProvider implements MailProvider<SendEmailCommandOutput> {
  readonly label = 'SES';

  private readonly client: SESClient;
  private readonly configurationSet?: string;

  // Region falls back to the SDK's own resolution (AWS_REGION, profile) when unset.
  constructor(options: SesProviderOptions = {}, client?: SESClient) {
    this.client = client ?? new SESClient({ region: options.region });
    this.configurationSet = options.configurationSet;
  }

  async send(message: OutboundEmail): Promise<SendEmailCommandOutput> {
    const command = new SendEmailCommand({
      Source: message.from,
      Destination: {
        ToAddresses: [message.to]
      },
      Message: {
        Subject: {
          Data: message.subject,
          Charset: 'UTF-8'
        },
        Body: {
          Html: {
            Data: message.html,
            Charset: 'UTF-8'
          }
        }
      },
      ConfigurationSetName: this.configurationSet
    });

    try {
      const response = await this.client.send(command);
      logger.info({ action: 'email_sent', provider: this.label, messageId: response.MessageId, to: message.to }, 'Email sent');
      return response;
    } catch (err) {
      const mapped = toMailProviderError(this.label, err);
      logger.error({ err, action: 'email_send_error', provider: this.label, code: mapped.code }, 'Send email failed');
      throw mapped;
    }
  }
}
