export function buildSwaggerSpec(port: number) {
  return {
    openapi: '3.0.3',
    info: {
      title: 'SES Mail Relay API',
      version: '1.0.0',
      description: 'Send one HTML email through AWS SES (or SMTP) from no-reply@<verified identity>, authorized by an API key in the request body.'
    },
    servers: [
      { url: `http://localhost:${port}`, description: 'Local' }
    ],
    components: {
      schemas: {
        SendEmailRequest: {
          type: 'object',
          required: ['apikey', 'toaddress', 'emailtemplate'],
          properties: {
            apikey: { type: 'string', example: 'test-secret-key', description: 'Must equal the configured API_KEY exactly' },
            toaddress: { type: 'string', example: 'user@example.com', description: 'Single recipient; must contain "@"' },
            emailtemplate: { type: 'string', example: '<h1>Hello</h1>', description: 'HTML body, sent verbatim' }
          }
        },
        SendEmailSuccess: {
          type: 'object',
          properties: {
            message: { type: 'string', example: 'Email sent successfully' },
            response: { type: 'object', description: 'Provider response metadata, passed through unchanged' }
          }
        },
        ApiError: {
          type: 'object',
          properties: {
            error: { type: 'string', example: 'Missing required field: toaddress' }
          }
        }
      }
    },
    paths: {
      '/healthz': {
        get: {
          tags: ['System'],
          summary: 'Health check',
          responses: { '200': { description: 'OK' } }
        }
      },
      '/ses': {
        post: {
          summary: 'Send an email via the configured provider',
          tags: ['Email'],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: { $ref: '#/components/schemas/SendEmailRequest' }
              }
            }
          },
          responses: {
            '200': { description: 'Email sent', content: { 'application/json': { schema: { $ref: '#/components/schemas/SendEmailSuccess' } } } },
            '400': { description: 'Invalid JSON, missing field or invalid address', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '403': { description: 'Invalid API key', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '413': { description: 'Payload too large', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '429': { description: 'Rate limit', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } },
            '500': { description: 'Provider error', content: { 'application/json': { schema: { $ref: '#/components/schemas/ApiError' } } } }
          }
        }
      }
    }
  };
}
