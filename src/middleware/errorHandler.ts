// Turns any pipeline failure into a plain-text response so the server keeps serving
import { Request, Response, NextFunction } from 'express';
import { ProxyError } from '../errors';
import { pathOnly } from '../proxy/forwarder';

interface ErrorReply {
  status: number;
  message: string;
}

function toReply(err: unknown): ErrorReply {
  if (err instanceof ProxyError) {
    return { status: err.status, message: err.message };
  }
  if (err instanceof Error) {
    return { status: 500, message: `Internal proxy error: ${err.message}` };
  }
  return { status: 500, message: 'Internal proxy error' };
}

// Express 5 error handler: 4 params required
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const reply = toReply(err);
  if (reply.status >= 500) {
    console.error(`Request failed: ${req.method} ${pathOnly(req.originalUrl)}:`, err);
  }

  // Response already streaming: let Express tear the connection down
  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(reply.status).type('text/plain').send(reply.message);
}
