// Express app factory, exported without listen() for Supertest compatibility
import http from 'node:http';
import express, { Express } from 'express';

import type { ProxyConfig } from './config';
import { legacyAuth } from './middleware/legacyAuth';
import { errorHandler } from './middleware/errorHandler';
import { createForwarder } from './proxy/forwarder';
import { createUpstreamAgent } from './services/upstreamClient';

export function createApp(config: ProxyConfig, agent: http.Agent = createUpstreamAgent()): Express {
  const app = express();

  // Upstream responses are relayed untouched: no framework headers, no body parsing
  app.disable('x-powered-by');
  app.disable('etag');

  // Legacy auth rewrite (reads the body only for JSON requests without a header or query token)
  app.use(legacyAuth(config));

  // Every method, every path goes upstream
  app.use(createForwarder(config, agent));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
