// Proxy entry point: validates config, starts the HTTP server, checks the upstream once
import { loadConfig, ProxyConfig } from './config';
import { createApp } from './app';
import { createUpstreamAgent, pingUpstream } from './services/upstreamClient';

function readConfig(): ProxyConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    return process.exit(1);
  }
}

const config = readConfig();

const agent = createUpstreamAgent();
const app = createApp(config, agent);

const server = app.listen(config.listenPort, config.listenHost, (error?: Error) => {
  if (error) {
    console.error('Server error:', error);
    process.exit(1);
  }
  console.log(`Legacy auth proxy listening on http://${config.listenHost}:${config.listenPort}`);
  console.log(`Upstream: http://${config.upstream}`);

  void pingUpstream(config).then((check) => {
    if (check.reachable) {
      console.log(`Upstream reachable (HTTP ${check.status ?? '?'}, ${check.latencyMs}ms)`);
    } else {
      console.warn(`Upstream not reachable yet: ${check.reason ?? 'unknown error'}`);
    }
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`${signal} received, closing proxy`);
  server.close(() => {
    agent.destroy();
    console.log('Proxy server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default server;
