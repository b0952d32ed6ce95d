/** Request after parsing and field validation. */
export interface EmailRequest {
  apikey: string;
  toaddress: string;
  emailtemplate: string;
}

export interface OutboundEmail {
  from: string;
  to: string;
  subject: string;
  html: string;
}

export interface MailProvider<T = unknown> {
  /** Used in error text, e.g. "Error sending email via SES: ...". */
  readonly label: string;
  send(message: OutboundEmail): Promise<T>;
}

export type ApiErrorType =
  | 'INVALID_JSON'
  | 'AUTH'
  | 'MISSING_FIELD'
  | 'INVALID_FIELD'
  | 'INVALID_ADDRESS'
  | 'PROVIDER_ERROR'
  | 'RATE_LIMIT'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL_ERROR';

export interface ApiSuccess<T = unknown> {
  message: string;
  response: T;
}

export interface ApiErrorBody {
  error: string;
}

export type ErrorStatus = 400 | 403 | 413 | 429 | 500;

export type EmailResponse =
  | { statusCode: 200; body: ApiSuccess }
  | { statusCode: ErrorStatus; body: ApiErrorBody };
