import type { ProxyConfig } from '../src/config';
import { pingUpstream } from '../src/services/upstreamClient';
import { closedPortAddress, FakeUpstream, startUpstream, testConfig } from './helpers/upstream';

describe('pingUpstream', () => {
  let upstream: FakeUpstream | undefined;

  afterEach(async () => {
    await upstream?.close();
    upstream = undefined;
  });

  it('reports reachable with the status of any HTTP answer', async () => {
    upstream = await startUpstream((_req, res) => {
      res.writeHead(404);
      res.end();
    });
    const config: ProxyConfig = testConfig(upstream.address);

    const check = await pingUpstream(config);

    expect(check.reachable).toBe(true);
    expect(check.status).toBe(404);
    expect(typeof check.latencyMs).toBe('number');
    expect(upstream.received.map((r) => `${r.method} ${r.url}`)).toEqual(['GET /']);
  });

  it('reports unreachable with the transport error', async () => {
    const address = await closedPortAddress();

    const check = await pingUpstream(testConfig(address));

    expect(check.reachable).toBe(false);
    expect(check.reason).toBe(`connect ECONNREFUSED ${address}`);
  });
});
