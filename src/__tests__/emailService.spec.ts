import { describe, it, expect, beforeEach } from 'vitest';
import {
  buildSenderAddress,
  extractFields,
  handleSendEmail,
  hasAddressFormat,
  parseRequestBody
} from '../services/emailService.js';
import { ApiError } from '../lib/errors.js';
import { createMockProvider, requestBody, testSettings } from './helpers/test-utils.js';

describe('handleSendEmail', () => {
  let mock: ReturnType<typeof createMockProvider>;

  beforeEach(() => {
    mock = createMockProvider();
  });

  const run = (rawBody: string | null | undefined, settings = testSettings) =>
    handleSendEmail(rawBody, { settings, provider: mock.provider });

  describe('body parsing', () => {
    it('rejects a body that is not JSON', async () => {
      const result = await run('apikey=test-secret-key&toaddress=a@b.c');

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid JSON in request body' } });
      expect(mock.send).not.toHaveBeenCalled();
    });

    it('rejects truncated JSON even when the fields look valid', async () => {
      const result = await run(requestBody().slice(0, -1));

      expect(result.statusCode).toBe(400);
      expect(result.body).toEqual({ error: 'Invalid JSON in request body' });
    });

    it('rejects JSON that is not an object', async () => {
      for (const body of ['[]', '"hello"', '42', 'null']) {
        const result = await run(body);
        expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid JSON in request body' } });
      }
    });

    it('treats an absent body as an empty object', async () => {
      const result = await run(undefined);

      expect(result).toEqual({ statusCode: 403, body: { error: 'Access Denied: Invalid API key' } });
    });
  });

  describe('api key', () => {
    it('rejects a wrong key even when every other field is valid', async () => {
      const result = await run(requestBody({ apikey: 'wrong-secret-key' }));

      expect(result).toEqual({ statusCode: 403, body: { error: 'Access Denied: Invalid API key' } });
      expect(mock.send).not.toHaveBeenCalled();
    });

    it('rejects an absent or empty key', async () => {
      const absent = await run(JSON.stringify({ toaddress: 'a@b.c', emailtemplate: 'x' }));
      const empty = await run(requestBody({ apikey: '' }));

      expect(absent.statusCode).toBe(403);
      expect(empty.statusCode).toBe(403);
    });

    it('rejects a key that differs only in case or whitespace', async () => {
      expect((await run(requestBody({ apikey: 'TEST-SECRET-KEY' }))).statusCode).toBe(403);
      expect((await run(requestBody({ apikey: 'test-secret-key ' }))).statusCode).toBe(403);
    });

    it('rejects a non-string key', async () => {
      const result = await run(requestBody({ apikey: 12345 }));

      expect(result.statusCode).toBe(403);
    });

    it('checks the key before the required fields', async () => {
      const result = await run(JSON.stringify({ apikey: 'nope' }));

      expect(result.statusCode).toBe(403);
    });
  });

  describe('required fields', () => {
    it('names a missing toaddress', async () => {
      const result = await run(requestBody({ toaddress: undefined }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Missing required field: toaddress' } });
    });

    it('names a missing emailtemplate', async () => {
      const result = await run(requestBody({ emailtemplate: undefined }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Missing required field: emailtemplate' } });
    });

    it('reports only emailtemplate when both are missing', async () => {
      const result = await run(JSON.stringify({ apikey: testSettings.expectedApiKey }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Missing required field: emailtemplate' } });
      expect(mock.send).not.toHaveBeenCalled();
    });

    it('accepts the legacy emailtemplete spelling', async () => {
      mock.send.mockResolvedValue({ MessageId: 'legacy-1' });

      const result = await run(requestBody({ emailtemplate: undefined, emailtemplete: '<p>old client</p>' }));

      expect(result.statusCode).toBe(200);
      expect(mock.send).toHaveBeenCalledWith(expect.objectContaining({ html: '<p>old client</p>' }));
    });

    it('rejects a field that is present but not a string', async () => {
      const result = await run(requestBody({ toaddress: ['a@b.c'] }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid field type: toaddress' } });
    });

    it('treats a null field as the wrong type, not as missing', async () => {
      const result = await run(requestBody({ emailtemplate: null }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid field type: emailtemplate' } });
    });

    it('does not fall back to the legacy spelling when emailtemplate is null', async () => {
      const result = await run(requestBody({ emailtemplate: null, emailtemplete: '<p>old client</p>' }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid field type: emailtemplate' } });
      expect(mock.send).not.toHaveBeenCalled();
    });

    it('treats a null toaddress the same way as a null emailtemplate', async () => {
      const result = await run(requestBody({ toaddress: null }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid field type: toaddress' } });
    });
  });

  describe('address format', () => {
    it('rejects a recipient without @ before calling the provider', async () => {
      const result = await run(requestBody({ toaddress: 'recipient.example.org' }));

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid email address format' } });
      expect(mock.send).not.toHaveBeenCalled();
    });

    it('accepts anything containing @ without further validation', async () => {
      mock.send.mockResolvedValue({});

      const result = await run(requestBody({ toaddress: '@' }));

      expect(result.statusCode).toBe(200);
    });
  });

  describe('sending', () => {
    it('sends from no-reply@<identity> with the template verbatim', async () => {
      mock.send.mockResolvedValue({ MessageId: 'abc-123' });
      const html = '<script>alert(1)</script><p class="x">Hi & bye</p>';

      await run(requestBody({ emailtemplate: html }));

      expect(mock.send).toHaveBeenCalledTimes(1);
      expect(mock.send).toHaveBeenCalledWith({
        from: 'no-reply@example.com',
        to: 'recipient@example.org',
        subject: 'Test Email from AWS SES',
        html
      });
    });

    it('uses the configured subject', async () => {
      mock.send.mockResolvedValue({});

      await run(requestBody(), { ...testSettings, subject: 'Weekly digest' });

      expect(mock.send).toHaveBeenCalledWith(expect.objectContaining({ subject: 'Weekly digest' }));
    });

    it('returns 200 with the provider metadata passed through unchanged', async () => {
      const metadata = { MessageId: 'abc-123', $metadata: { httpStatusCode: 200, requestId: 'req-1' } };
      mock.send.mockResolvedValue(metadata);

      const result = await run(requestBody());

      expect(result.body).toEqual({ message: 'Email sent successfully', response: metadata });
      if (result.statusCode !== 200) throw new Error(`expected 200, got ${result.statusCode}`);
      expect(result.body.response).toBe(metadata);
    });

    it('returns 500 with the provider error text embedded verbatim', async () => {
      mock.send.mockRejectedValue(new Error('Email address is not verified. The following identities failed the check: no-reply@example.com'));

      const result = await run(requestBody());

      expect(result).toEqual({
        statusCode: 500,
        body: { error: 'Error sending email via SES: Email address is not verified. The following identities failed the check: no-reply@example.com' }
      });
    });

    it('labels the error with the provider in use', async () => {
      const smtp = createMockProvider('SMTP');
      smtp.send.mockRejectedValue(new Error('Invalid login'));

      const result = await handleSendEmail(requestBody(), { settings: testSettings, provider: smtp.provider });

      expect(result.body).toEqual({ error: 'Error sending email via SMTP: Invalid login' });
    });

    it('stringifies a non-Error rejection', async () => {
      mock.send.mockRejectedValue('socket hang up');

      const result = await run(requestBody());

      expect(result).toEqual({ statusCode: 500, body: { error: 'Error sending email via SES: socket hang up' } });
    });

    it('does not retry a failed send', async () => {
      mock.send.mockRejectedValue(new Error('Throttling'));

      await run(requestBody());

      expect(mock.send).toHaveBeenCalledTimes(1);
    });

    it('sends twice for two identical requests', async () => {
      mock.send.mockResolvedValueOnce({ MessageId: 'first' }).mockResolvedValueOnce({ MessageId: 'second' });

      const first = await run(requestBody());
      const second = await run(requestBody());

      expect(first).toEqual({ statusCode: 200, body: { message: 'Email sent successfully', response: { MessageId: 'first' } } });
      expect(second).toEqual({ statusCode: 200, body: { message: 'Email sent successfully', response: { MessageId: 'second' } } });
      expect(mock.send).toHaveBeenCalledTimes(2);
    });
  });
});

describe('request helpers', () => {
  it('parseRequestBody throws an INVALID_JSON ApiError', () => {
    expect(() => parseRequestBody('{')).toThrow(ApiError);
    expect(() => parseRequestBody('{')).toThrow('Invalid JSON in request body');
  });

  it('parseRequestBody defaults a null body to {}', () => {
    expect(parseRequestBody(null)).toEqual({});
  });

  it('extractFields falls back to the legacy spelling only when emailtemplate is absent', () => {
    expect(extractFields({ emailtemplete: 'old', toaddress: 'a@b' }))
      .toEqual({ emailtemplate: 'old', toaddress: 'a@b' });
    expect(() => extractFields({ emailtemplate: null, emailtemplete: 'old', toaddress: 'a@b' }))
      .toThrow('Invalid field type: emailtemplate');
  });

  it('extractFields prefers emailtemplate over the legacy spelling', () => {
    expect(extractFields({ emailtemplate: 'new', emailtemplete: 'old', toaddress: 'a@b' }))
      .toEqual({ emailtemplate: 'new', toaddress: 'a@b' });
  });

  it('buildSenderAddress prefixes no-reply@', () => {
    expect(buildSenderAddress('example.com')).toBe('no-reply@example.com');
    expect(buildSenderAddress('ops@example.com')).toBe('no-reply@ops@example.com');
  });

  it('hasAddressFormat only looks for @', () => {
    expect(hasAddressFormat('user@example.com')).toBe(true);
    expect(hasAddressFormat('not an address @ all')).toBe(true);
    expect(hasAddressFormat('example.com')).toBe(false);
    expect(hasAddressFormat('')).toBe(false);
  });
});
