import net from 'net';
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { Endpoint } from '../types/index.js';
import { ReachabilityProber, tcpPing } from './reachabilityProber.js';

// ---------------------------------------------------------------------------
// In-process listener standing in for a server's registration port
// ---------------------------------------------------------------------------

let server: net.Server;
let openPort: number;
let closedPort: number;

async function listen(target: net.Server): Promise<number> {
  await new Promise<void>(resolve => target.listen(0, '127.0.0.1', resolve));
  const address = target.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return address.port;
}

beforeAll(async () => {
  server = net.createServer(socket => socket.destroy());
  openPort = await listen(server);

  // grab a free port, then release it so connections are refused
  const scratch = net.createServer();
  closedPort = await listen(scratch);
  await new Promise<void>(resolve => scratch.close(() => resolve()));
});

afterAll(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
});

const local: Endpoint = { hostname: 'localhost401', ip: '127.0.0.1', regionId: 'local' };

describe('tcpPing', () => {
  it('resolves with the connect time when the port accepts', async () => {
    const elapsed = await tcpPing('127.0.0.1', openPort, 2000);
    expect(elapsed).toBeGreaterThanOrEqual(0);
  });

  it('rejects when the connection is refused', async () => {
    await expect(tcpPing('127.0.0.1', closedPort, 2000)).rejects.toThrow(`Connection refused to 127.0.0.1:${closedPort}`);
  });
});

describe('ReachabilityProber', () => {
  it('reports presence without a latency', async () => {
    const prober = new ReachabilityProber({ port: openPort });
    const [result] = await prober.probe([local], 'presence', 2000);

    expect(result).toEqual({ endpoint: local, reachable: true });
  });

  it('reports unreachable endpoints without a latency', async () => {
    const prober = new ReachabilityProber({ port: closedPort, samples: 2 });
    const [result] = await prober.probe([local], 'latency', 2000);

    expect(result).toEqual({ endpoint: local, reachable: false });
  });

  it('reports the median of the successful samples', async () => {
    const timings = [30, 10, 12];
    const ping = vi.fn(async () => {
      const next = timings.shift();
      if (next === undefined) throw new Error('no more samples');
      return next;
    });
    const prober = new ReachabilityProber({ samples: 3 }, ping);

    const result = await prober.probeOne(local, 'latency', 1000);

    expect(ping).toHaveBeenCalledTimes(3);
    expect(result).toEqual({ endpoint: local, reachable: true, latencyMillis: 12 });
  });

  it('ignores failed samples when computing latency', async () => {
    const outcomes: Array<number | Error> = [new Error('timeout'), 7.4, 8.8];
    const ping = vi.fn(async () => {
      const next = outcomes.shift();
      if (next === undefined || next instanceof Error) throw next ?? new Error('no more samples');
      return next;
    });
    const prober = new ReachabilityProber({ samples: 3 }, ping);

    const result = await prober.probeOne(local, 'latency', 1000);

    // median of 7.4 and 8.8 is 8.1, rounded
    expect(result.latencyMillis).toBe(8);
  });

  it('probes each endpoint independently and keeps input order', async () => {
    const down: Endpoint = { hostname: 'down401', ip: '10.255.0.1', regionId: 'local' };
    const up: Endpoint = { hostname: 'up401', ip: '10.255.0.2', regionId: 'local' };
    const ping = vi.fn(async (host: string) => {
      if (host === down.ip) throw new Error('timed out');
      return 5;
    });
    const prober = new ReachabilityProber({ samples: 1, concurrency: 1 }, ping);

    const results = await prober.probe([down, up], 'latency', 1000);

    expect(results).toEqual([
      { endpoint: down, reachable: false },
      { endpoint: up, reachable: true, latencyMillis: 5 },
    ]);
  });
});
