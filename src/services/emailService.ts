import { ApiError } from '../lib/errors.js';
import { DEFAULT_SUBJECT } from '../config/env.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { EmailRequest, EmailResponse, MailProvider } from '../types/email.js';

export const SUCCESS_MESSAGE = 'Email sent successfully';

export interface HandlerSettings {
  readonly verifiedIdentity: string;
  readonly expectedApiKey: string;
  readonly subject?: string;
}

export interface SendEmailDeps {
  settings: HandlerSettings;
  provider: MailProvider;
  log?: Logger;
}

// Older clients post the template under this spelling.
const LEGACY_TEMPLATE_FIELD = 'emailtemplete';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRequestBody(rawBody: string | null | undefined): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody ?? '{}');
  } catch {
    throw new ApiError('INVALID_JSON', 'Invalid JSON in request body');
  }
  if (!isRecord(parsed)) {
    throw new ApiError('INVALID_JSON', 'Invalid JSON in request body');
  }
  return parsed;
}

/** Plain equality, not constant-time. */
export function authorize(body: Record<string, unknown>, expectedApiKey: string): string {
  const provided = body.apikey ?? '';
  if (typeof provided !== 'string' || provided !== expectedApiKey) {
    throw new ApiError('AUTH', 'Access Denied: Invalid API key');
  }
  return provided;
}

function requireString(field: string, value: unknown): string {
  if (value === undefined) {
    throw new ApiError('MISSING_FIELD', `Missing required field: ${field}`);
  }
  if (typeof value !== 'string') {
    throw new ApiError('INVALID_FIELD', `Invalid field type: ${field}`);
  }
  return value;
}

export function extractFields(body: Record<string, unknown>): Pick<EmailRequest, 'emailtemplate' | 'toaddress'> {
  const template = 'emailtemplate' in body ? body.emailtemplate : body[LEGACY_TEMPLATE_FIELD];
  const emailtemplate = requireString('emailtemplate', template);
  const toaddress = requireString('toaddress', body.toaddress);
  return { emailtemplate, toaddress };
}

export function buildSenderAddress(verifiedIdentity: string): string {
  return `no-reply@${verifiedIdentity}`;
}

export function hasAddressFormat(address: string): boolean {
  return address.includes('@');
}

function reject(err: ApiError, log: Logger): EmailResponse {
  log.warn({ action: 'email_request_rejected', type: err.type, status: err.status }, err.message);
  return { statusCode: err.status, body: err.toBody() };
}

/**
 * Runs one send request end to end: parse, API key check, required fields,
 * address check, then a single provider call. Every failure becomes a
 * status/body pair; nothing is thrown to the caller.
 */
export async function handleSendEmail(rawBody: string | null | undefined, deps: SendEmailDeps): Promise<EmailResponse> {
  const { settings, provider } = deps;
  const log = deps.log ?? rootLogger;

  let from: string;
  let request: EmailRequest;
  try {
    const body = parseRequestBody(rawBody);
    const apikey = authorize(body, settings.expectedApiKey);
    const fields = extractFields(body);
    from = buildSenderAddress(settings.verifiedIdentity);
    if (!hasAddressFormat(from) || !hasAddressFormat(fields.toaddress)) {
      throw new ApiError('INVALID_ADDRESS', 'Invalid email address format');
    }
    request = { apikey, ...fields };
  } catch (err) {
    if (err instanceof ApiError) return reject(err, log);
    log.error({ err }, 'Unexpected error while validating send request');
    return reject(new ApiError('INTERNAL_ERROR', 'Internal Server Error'), log);
  }

  try {
    const response = await provider.send({
      from,
      to: request.toaddress,
      subject: settings.subject ?? DEFAULT_SUBJECT,
      html: request.emailtemplate
    });
    return { statusCode: 200, body: { message: SUCCESS_MESSAGE, response } };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return reject(new ApiError('PROVIDER_ERROR', `Error sending email via ${provider.label}: ${reason}`), log);
  }
}
