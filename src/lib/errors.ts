import type { ApiErrorBody, ApiErrorType, ErrorStatus } from '../types/email.js';

export class ApiError extends Error {
  constructor(readonly type: ApiErrorType, message: string) {
    super(message);
    this.name = 'ApiError';
  }

  get status(): ErrorStatus {
    return mapStatus(this.type);
  }

  toBody(): ApiErrorBody {
    return { error: this.message };
  }
}

export function mapStatus(type: ApiErrorType): ErrorStatus {
  switch (type) {
  case 'INVALID_JSON':
  case 'MISSING_FIELD':
  case 'INVALID_FIELD':
  case 'INVALID_ADDRESS':
    return 400;
  case 'AUTH': return 403;
  case 'PAYLOAD_TOO_LARGE': return 413;
  case 'RATE_LIMIT': return 429;
  default: return 500;
  }
}

export class MailProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MailProviderError';
  }
}

export function toMailProviderError(provider: string, err: unknown): MailProviderError {
  if (err instanceof MailProviderError) return err;
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : err.name;
    return new MailProviderError(provider, err.message, code, { cause: err });
  }
  return new MailProviderError(provider, String(err));
}
