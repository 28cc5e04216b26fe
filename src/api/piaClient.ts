import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { SessionToken } from '../types/index.js';
import { AuthError, DirectoryError, toMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

export type HttpClient = Pick<AxiosInstance, 'get' | 'postForm'>;

export interface ProviderClientOptions {
  tokenUrl: string;
  serverListUrl: string;
  timeoutMs: number;
}

const tokenSchema = z.object({
  token: z.string().min(1),
});

/**
 * Client for the provider's account and server list services
 */
export class PiaClient {
  constructor(
    private readonly options: ProviderClientOptions,
    private readonly http: HttpClient = axios.create()
  ) {}

  /**
   * Exchange account credentials for a session token
   */
  async authenticate(username: string, password: string): Promise<SessionToken> {
    logger.debug(`Requesting session token from ${this.options.tokenUrl}`);

    let data: unknown;
    try {
      const response = await this.http.postForm<unknown>(
        this.options.tokenUrl,
        { username, password },
        { timeout: this.options.timeoutMs }
      );
      data = response.data;
    } catch (error) {
      if (isAxiosError(error) && (error.response?.status === 401 || error.response?.status === 403)) {
        throw new AuthError('Failed to authenticate. Check your credentials.', { cause: error });
      }
      throw new AuthError(`Authentication request failed: ${toMessage(error)}`, { cause: error });
    }

    const parsed = tokenSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError('Failed to authenticate. Check your credentials.');
    }

    return parsed.data.token;
  }

  /**
   * Download the raw server directory document
   */
  async fetchDirectory(): Promise<string> {
    logger.debug(`Fetching server list from ${this.options.serverListUrl}`);

    let body: string;
    try {
      const response = await this.http.get<string>(this.options.serverListUrl, {
        timeout: this.options.timeoutMs,
        responseType: 'text',
        // the document is followed by a signature, keep it as text
        transformResponse: [(raw: unknown) => raw],
      });
      body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    } catch (error) {
      throw new DirectoryError(`Failed to fetch server list: ${toMessage(error)}`, { cause: error });
    }

    if (!body || body.trim() === '') {
      throw new DirectoryError('Failed to fetch server list: empty response');
    }

    return body;
  }
}

export default PiaClient;
