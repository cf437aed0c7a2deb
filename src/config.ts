// Proxy configuration from environment variables, built once at startup and passed to the app
import 'dotenv/config';
import { ConfigError } from './errors';

// Listen address is fixed: the proxy only ever serves loopback clients
export const LISTEN_HOST = '127.0.0.1';
export const LISTEN_PORT = 8536;

export interface ProxyConfig {
  /** Upstream authority as `host:port`. */
  readonly upstream: string;
  readonly listenHost: string;
  readonly listenPort: number;
  /** Cap on buffered JSON bodies; `undefined` buffers without limit. */
  readonly maxJsonBodyBytes: number | undefined;
  readonly logTraffic: boolean;
}

type Env = Record<string, string | undefined>;

const HOST_PORT = /^(\[[0-9a-fA-F:.]+\]|[^\s:/?#@[\]]+):(\d{1,5})$/;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function parseUpstream(value: string): string {
  const trimmed = value.trim();
  const match = HOST_PORT.exec(trimmed);
  const port = match ? Number(match[2]) : NaN;
  if (!match || port < 1 || port > 65535) {
    throw new ConfigError(`UPSTREAM_ADDR must be host:port, got "${value}"`);
  }
  return trimmed;
}

function parseByteLimit(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const limit = Number(value);
  if (!Number.isSafeInteger(limit) || limit <= 0) {
    throw new ConfigError(`MAX_JSON_BODY_BYTES must be a positive integer, got "${value}"`);
  }
  return limit;
}

export function loadConfig(env: Env = process.env): ProxyConfig {
  return Object.freeze({
    upstream: parseUpstream(requireEnv(env, 'UPSTREAM_ADDR')),
    listenHost: LISTEN_HOST,
    listenPort: LISTEN_PORT,
    maxJsonBodyBytes: parseByteLimit(env['MAX_JSON_BODY_BYTES']),
    logTraffic: env['LOG_TRAFFIC'] === '1',
  });
}
