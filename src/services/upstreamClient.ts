// Shared keep-alive pool for proxied traffic, plus an axios reachability check run once at startup
import http from 'node:http';
import axios, { AxiosRequestConfig } from 'axios';
import type { ProxyConfig } from '../config';

const UPSTREAM_PROBE_TIMEOUT_MS = 2000;

// One agent per process: every proxied request borrows sockets from this pool
export function createUpstreamAgent(): http.Agent {
  return new http.Agent({ keepAlive: true });
}

export interface ProbeResult {
  reachable: boolean;
  latencyMs: number;
  status?: number;
  reason?: string;
}

// Any HTTP answer counts as reachable; only transport failures do not
export async function pingUpstream(config: ProxyConfig): Promise<ProbeResult> {
  const start = Date.now();
  try {
    const { status } = await axios.get(`http://${config.upstream}/`, {
      timeout: UPSTREAM_PROBE_TIMEOUT_MS,
      maxRedirects: 0,
      validateStatus: () => true,
    } satisfies AxiosRequestConfig);
    return { reachable: true, latencyMs: Date.now() - start, status };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { reachable: false, latencyMs: Date.now() - start, reason };
  }
}
