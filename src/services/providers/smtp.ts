import nodemailer, { type Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport/index.js';
import { logger } from '../../utils/logger.js';
import { toMailProviderError } from '../../lib/errors.js';
import type { MailProvider, OutboundEmail } from '../../types/email.js';

export interface SmtpParams {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
}

export type SmtpTransporter = Pick<Transporter<SMTPTransport.SentMessageInfo>, 'sendMail'>;

export class SmtpMailProvider implements MailProvider<SMTPTransport.SentMessageInfo> {
  readonly label = 'SMTP';

  private readonly transporter: SmtpTransporter;

  constructor(params: SmtpParams, transporter?: SmtpTransporter) {
    this.transporter = transporter ?? nodemailer.createTransport({
      host: params.host,
      port: params.port,
      secure: params.secure,
      auth: { user: params.user, pass: params.pass },
      tls: { rejectUnauthorized: true }
    });
  }

  async send(message: OutboundEmail): Promise<SMTPTransport.SentMessageInfo> {
    try {
      const info = await this.transporter.sendMail({
        from: message.from,
        to: message.to,
        subject: message.subject,
        html: message.html
      });
      logger.info({ action: 'email_sent', provider: this.label, messageId: info.messageId, to: message.to }, 'Email sent');
      return info;
    } catch (err) {
      const mapped = toMailProviderError(this.label, err);
      logger.error({ err, action: 'email_send_error', provider: this.label, code: mapped.code }, 'Send email failed');
      throw mapped;
    }
  }
}
