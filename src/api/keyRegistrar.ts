import fs from 'fs';
import https from 'https';
import axios from 'axios';
import { z } from 'zod';
import { Endpoint, Registration, SessionToken, TunnelGrant } from '../types/index.js';
import {
  MalformedRegistrationResponse,
  RegistrationRejected,
  RegistrationUnreachable,
  SetupError,
  toMessage,
} from '../utils/errors.js';
import { WG_KEY_RE, discardKeyPair, generateKeyPair, toBase64 } from '../vpn/keyPair.js';
import logger from '../utils/logger.js';

/**
 * PEM-encoded root certificate the registration services must chain to
 */
export type TrustAnchor = string | Buffer;

export interface RegistrationRequest {
  endpoint: Endpoint;
  port: number;
  token: SessionToken;
  publicKey: string;
  trustAnchor: TrustAnchor;
  timeoutMs: number;
}

export interface RegistrationReply {
  httpStatus: number;
  data: unknown;
}

/**
 * Performs the HTTP exchange. Rejects only on transport failure;
 * any HTTP status is returned as a reply.
 */
export type RegistrationTransport = (request: RegistrationRequest) => Promise<RegistrationReply>;

/**
 * Talks to the endpoint's IP directly while verifying its certificate
 * against the endpoint hostname and the trust anchor only.
 */
export const httpsTransport: RegistrationTransport = async (request) => {
  const { endpoint, port, token, publicKey, trustAnchor, timeoutMs } = request;

  const httpsAgent = new https.Agent({
    ca: trustAnchor,
    servername: endpoint.hostname,
    keepAlive: false,
  });

  try {
    const response = await axios.get<unknown>(`https://${endpoint.ip}:${port}/addKey`, {
      params: { pt: token, pubkey: publicKey },
      headers: { Host: `${endpoint.hostname}:${port}` },
      httpsAgent,
      proxy: false,
      maxRedirects: 0,
      timeout: timeoutMs,
      validateStatus: () => true,
    });
    return { httpStatus: response.status, data: response.data };
  } finally {
    httpsAgent.destroy();
  }
};

/**
 * Read the trust anchor once, before any network work
 */
export function loadTrustAnchor(caPath: string): TrustAnchor {
  try {
    const pem = fs.readFileSync(caPath);
    if (pem.length === 0) {
      throw new Error('file is empty');
    }
    return pem;
  } catch (error) {
    throw new SetupError(`CA certificate unavailable at ${caPath}: ${toMessage(error)}`, { cause: error });
  }
}

const statusSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

const grantSchema = z.object({
  status: z.literal('OK'),
  server_key: z.string().regex(WG_KEY_RE, 'not a WireGuard key'),
  server_port: z.coerce.number().int().min(1).max(65535),
  peer_ip: z.string().ip({ version: 'v4' }),
  peer_pubkey: z.string().optional(),
  dns_servers: z.array(z.string().min(1)).min(1),
});

function decodeBody(data: unknown): unknown {
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * Validate a registration reply and turn it into a tunnel grant.
 * The status field is checked first; the tunnel parameters only after
 * the service has confirmed success.
 */
export function parseRegistrationReply(
  endpoint: Endpoint,
  publicKey: string,
  reply: RegistrationReply
): TunnelGrant {
  const body = decodeBody(reply.data);
  const status = statusSchema.safeParse(body);

  if (!status.success) {
    if (reply.httpStatus < 200 || reply.httpStatus >= 300) {
      throw new RegistrationRejected(endpoint, `HTTP ${reply.httpStatus}`);
    }
    throw new MalformedRegistrationResponse(endpoint, 'missing status field');
  }

  if (status.data.status !== 'OK') {
    throw new RegistrationRejected(endpoint, status.data.message ?? status.data.status);
  }

  const grant = grantSchema.safeParse(body);
  if (!grant.success) {
    const issue = grant.error.issues[0];
    throw new MalformedRegistrationResponse(endpoint, `${issue.path.join('.')}: ${issue.message}`);
  }

  if (grant.data.peer_pubkey !== undefined && grant.data.peer_pubkey !== publicKey) {
    throw new MalformedRegistrationResponse(endpoint, 'grant was issued for a different public key');
  }

  return {
    serverPublicKey: grant.data.server_key,
    serverPort: grant.data.server_port,
    assignedClientAddress: grant.data.peer_ip,
    dnsServers: grant.data.dns_servers,
  };
}

export interface KeyRegistrarOptions {
  port: number;
  timeoutMs: number;
}

/**
 * Registers freshly generated WireGuard keys with an endpoint's key service
 */
export class KeyRegistrar {
  private readonly options: KeyRegistrarOptions;

  constructor(
    options: Partial<KeyRegistrarOptions> = {},
    private readonly transport: RegistrationTransport = httpsTransport
  ) {
    this.options = {
      port: options.port ?? 1337,
      timeoutMs: options.timeoutMs ?? 10000,
    };
  }

  /**
   * Generate a key pair and register its public half with the endpoint
   * @returns The grant together with the key pair it was issued for
   */
  async register(endpoint: Endpoint, token: SessionToken, trustAnchor: TrustAnchor): Promise<Registration> {
    const keyPair = generateKeyPair();
    const publicKey = toBase64(keyPair.publicKey);

    logger.debug(`Registering public key ${publicKey} with ${endpoint.hostname} (${endpoint.ip})`);

    try {
      let reply: RegistrationReply;
      try {
        reply = await this.transport({
          endpoint,
          port: this.options.port,
          token,
          publicKey,
          trustAnchor,
          timeoutMs: this.options.timeoutMs,
        });
      } catch (error) {
        throw new RegistrationUnreachable(endpoint, error);
      }

      const grant = parseRegistrationReply(endpoint, publicKey, reply);
      logger.debug(`${endpoint.hostname} assigned ${grant.assignedClientAddress}, server port ${grant.serverPort}`);

      return { endpoint, keyPair, grant };
    } catch (error) {
      discardKeyPair(keyPair);
      throw error;
    }
  }
}

export default KeyRegistrar;
