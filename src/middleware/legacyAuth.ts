// Runs extract -> rewrite for each request and stores the resulting forward plan for the proxy
import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ProxyConfig } from '../config';
import { extractAuth } from '../auth/extractAuth';
import { fromRawHeaders, hasHeader } from '../auth/headers';
import { rewriteHeaders } from '../auth/rewriteHeaders';
import { pathOnly, setForwardPlan } from '../proxy/forwarder';

export function legacyAuth(config: ProxyConfig): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    // originalUrl survives router mount-path stripping; it is the target line the client sent
    const pathAndQuery = req.originalUrl;
    const headers = fromRawHeaders(req.rawHeaders);

    const extracted = await extractAuth({
      url: pathAndQuery,
      headers,
      body: req,
      maxBodyBytes: config.maxJsonBodyBytes,
    });
    if (!extracted.ok) {
      next(extracted.error);
      return;
    }

    const { body, token } = extracted.value;
    const rewritten = rewriteHeaders(headers, token?.value);
    if (!rewritten.ok) {
      next(rewritten.error);
      return;
    }

    if (config.logTraffic) {
      const source = token?.source ?? (hasHeader(headers, 'authorization') ? 'header' : 'none');
      console.log(`${req.method} ${pathOnly(pathAndQuery)} -> ${config.upstream} auth=${source}`);
    }

    setForwardPlan(req, { pathAndQuery, headers: rewritten.value, body });
    next();
  };
}
