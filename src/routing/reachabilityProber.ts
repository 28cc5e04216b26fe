import net from 'net';
import { Endpoint, ProbeMode, ProbeResult } from '../types/index.js';
import { settleWithConcurrency } from '../utils/pool.js';
import { toMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface ProberOptions {
  port: number;
  samples: number;
  concurrency: number;
}

/**
 * Open a TCP connection and close it as soon as the handshake completes.
 * Resolves with the connect time in milliseconds.
 */
export function tcpPing(host: string, port: number, timeoutMs: number): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const socket = new net.Socket();
    const startTime = process.hrtime.bigint();
    let settled = false;

    function settle(result: number | Error): void {
      if (settled) return;
      settled = true;
      socket.destroy();
      if (result instanceof Error) {
        reject(result);
      } else {
        resolve(result);
      }
    }

    socket.setTimeout(timeoutMs, () => {
      settle(new Error(`Connection timed out after ${timeoutMs}ms to ${host}:${port}`));
    });

    socket.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ECONNREFUSED') {
        settle(new Error(`Connection refused to ${host}:${port}`));
      } else {
        settle(err);
      }
    });

    socket.once('connect', () => {
      const elapsed = Number(process.hrtime.bigint() - startTime) / 1e6;
      settle(elapsed);
    });

    socket.connect({ host, port });
  });
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[middle - 1] + sorted[middle]) / 2
    : sorted[middle];
}

/**
 * Measures whether endpoints accept connections on the registration port,
 * and optionally how fast.
 */
export class ReachabilityProber {
  private readonly options: ProberOptions;

  constructor(
    options: Partial<ProberOptions> = {},
    private readonly ping: typeof tcpPing = tcpPing
  ) {
    this.options = {
      port: options.port ?? 1337,
      samples: Math.max(1, options.samples ?? 3),
      concurrency: options.concurrency ?? 8,
    };
  }

  /**
   * Probe a single endpoint.
   * `presence` makes one attempt; `latency` makes `samples` attempts and
   * reports the median of the successful ones.
   */
  async probeOne(endpoint: Endpoint, mode: ProbeMode, timeoutMs: number): Promise<ProbeResult> {
    const attempts = mode === 'latency' ? this.options.samples : 1;
    const timings: number[] = [];

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        timings.push(await this.ping(endpoint.ip, this.options.port, timeoutMs));
      } catch (error) {
        logger.debug(`Probe ${attempt + 1}/${attempts} to ${endpoint.hostname} (${endpoint.ip}) failed: ${toMessage(error)}`);
      }
    }

    if (timings.length === 0) {
      return { endpoint, reachable: false };
    }
    if (mode === 'presence') {
      return { endpoint, reachable: true };
    }
    return { endpoint, reachable: true, latencyMillis: Math.round(median(timings)) };
  }

  /**
   * Probe every endpoint; results come back in input order
   */
  async probe(endpoints: Endpoint[], mode: ProbeMode, timeoutMs: number): Promise<ProbeResult[]> {
    logger.info(`Probing ${endpoints.length} servers (${mode})...`);

    const settled = await settleWithConcurrency(endpoints, this.options.concurrency, endpoint =>
      this.probeOne(endpoint, mode, timeoutMs)
    );

    return settled.map((result, index) => {
      const endpoint = endpoints[index];
      if (result.status === 'rejected') {
        logger.warn(`Probe of ${endpoint.hostname} (${endpoint.ip}) failed: ${toMessage(result.reason)}`);
        return { endpoint, reachable: false };
      }

      const probe = result.value;
      if (!probe.reachable) {
        logger.info(`${endpoint.hostname} (${endpoint.ip}): unreachable`);
      } else if (probe.latencyMillis !== undefined) {
        logger.info(`${endpoint.hostname} (${endpoint.ip}): ${probe.latencyMillis}ms`);
      } else {
        logger.info(`${endpoint.hostname} (${endpoint.ip}): responsive`);
      }
      return probe;
    });
  }
}

export default ReachabilityProber;
