import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig } from './config/env.js';
import { createMailProvider } from './services/providers/index.js';
import { handleSendEmail, type SendEmailDeps } from './services/emailService.js';
import { applyLogConfig } from './utils/logger.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export type ProxyHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

function rawBodyOf(event: APIGatewayProxyEvent): string | undefined {
  if (event.body === null) return undefined;
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
}

export function createLambdaHandler(deps: SendEmailDeps): ProxyHandler {
  return async event => {
    const result = await handleSendEmail(rawBodyOf(event), deps);
    return {
      statusCode: result.statusCode,
      headers: JSON_HEADERS,
      body: JSON.stringify(result.body)
    };
  };
}

let coldStart: ProxyHandler | undefined;

/** API Gateway proxy entry point; configuration is read once per container. */
export const handler: ProxyHandler = async event => {
  if (!coldStart) {
    const config = loadConfig();
    applyLogConfig(config);
    coldStart = createLambdaHandler({ settings: config, provider: createMailProvider(config.mail) });
  }
  return coldStart(event);
};
