// Transparent forwarder: every request goes to http://<upstream> with the rewritten headers, response relayed as is
import http from 'node:http';
import { Socket } from 'node:net';
import { createProxyMiddleware, RequestHandler } from 'http-proxy-middleware';
import type { ProxyConfig } from '../config';
import { UpstreamError } from '../errors';
import type { ForwardBody } from '../auth/extractAuth';
import type { HeaderList } from '../auth/headers';

export interface ForwardPlan {
  /** Path and query exactly as the client sent them. */
  pathAndQuery: string;
  headers: HeaderList;
  body: ForwardBody;
}

// Filled by the legacyAuth middleware, read back when http-proxy opens the upstream request
const plans = new WeakMap<http.IncomingMessage, ForwardPlan>();

export function setForwardPlan(req: http.IncomingMessage, plan: ForwardPlan): void {
  plans.set(req, plan);
  // With Expect in req.headers, http-proxy's ClientRequest flushes its headers at construction and
  // proxyReq never fires. The inbound 100-continue is already answered; applyPlan restores the header.
  delete req.headers.expect;
}

export function getForwardPlan(req: http.IncomingMessage): ForwardPlan | undefined {
  return plans.get(req);
}

// Replace everything http-proxy copied from the folded req.headers with the ordered list, duplicates included
function applyPlan(proxyReq: http.ClientRequest, plan: ForwardPlan): void {
  proxyReq.path = plan.pathAndQuery;
  for (const name of proxyReq.getHeaderNames()) {
    proxyReq.removeHeader(name);
  }
  for (const [name, value] of plan.headers) {
    proxyReq.appendHeader(name, value);
  }
  // The inbound stream is already drained; http-proxy's pipe only ends proxyReq after this write
  if (plan.body.kind === 'buffered' && plan.body.bytes.length > 0) {
    proxyReq.write(plan.body.bytes);
  }
}

function failureReason(error: Error): string {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (!error.message) {
    return code ?? 'unknown error';
  }
  return code && !error.message.includes(code) ? `${code} ${error.message}` : error.message;
}

function writeUpstreamError(res: http.ServerResponse | Socket, error: UpstreamError): void {
  if (res instanceof Socket) {
    res.destroy();
    return;
  }
  if (res.headersSent) {
    // Upstream died mid-response: nothing left to synthesize
    res.destroy(error);
    return;
  }
  res.writeHead(error.status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(error.message);
}

/**
 * Builds the proxy middleware for a single upstream. Requests share `agent`, so keep-alive
 * connections to the upstream are pooled across clients.
 */
export function createForwarder(config: ProxyConfig, agent: http.Agent): RequestHandler {
  return createProxyMiddleware({
    target: `http://${config.upstream}`,
    agent,
    // Host and every other client header go through untouched
    changeOrigin: false,
    xfwd: false,
    on: {
      proxyReq: (proxyReq, req) => {
        const plan = getForwardPlan(req);
        if (plan) {
          applyPlan(proxyReq, plan);
        }
      },
      error: (error, req, res) => {
        const reason = failureReason(error);
        console.error(`Proxy error: ${req.method ?? 'UNKNOWN'} ${pathOnly(req.url)} -> ${config.upstream}: ${reason}`);
        writeUpstreamError(res, new UpstreamError(reason, error));
      },
    },
  });
}

// Query strings may carry legacy tokens and are never logged
export function pathOnly(url: string | undefined): string {
  if (!url) {
    return '/';
  }
  const end = url.indexOf('?');
  return end === -1 ? url : url.slice(0, end);
}
