#!/usr/bin/env node

import { fileURLToPath } from 'node:url';
import { ApiServer } from './server.js';

export { ApiServer, API_SERVER_VERSION } from './server.js';
export type { ApiServerOptions } from './server.js';

export { parseApiKeys, createAuthMiddleware, API_KEYS_ENV } from './middleware/auth.js';

export { createAskRouter, askRequestSchema, formatRow } from './routes/ask.js';
export type { AskRequest, AskResponseItem, AskRouteDeps } from './routes/ask.js';

export { createClassifyRouter, classifyRequestSchema } from './routes/classify.js';
export type { ClassifyRequest } from './routes/classify.js';

export { createStatusRouter } from './routes/status.js';
export type { StatusResponse, StatusRouteDeps } from './routes/status.js';

export { createOpenAPISpec } from './openapi.js';
export type { OpenAPISpec } from './openapi.js';

export const DEFAULT_PORT = 3100;

async function main(): Promise<void> {
  const rootDir = process.argv[2] ?? process.cwd();
  const port = parseInt(process.env['PAPERGRAPH_PORT'] ?? '', 10) || DEFAULT_PORT;

  const server = new ApiServer({ rootDir, port });
  await server.initialize();
  await server.start();

  // eslint-disable-next-line no-console
  console.log(`[api-server] PaperGraph API server listening on http://localhost:${port}`);
  // eslint-disable-next-line no-console
  console.log(`[api-server] OpenAPI spec: http://localhost:${port}/api/openapi.json`);
  // eslint-disable-next-line no-console
  console.log(`[api-server] Health check: http://localhost:${port}/health`);
}

// Only run main when this module is executed directly (not imported)
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
