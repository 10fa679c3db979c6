/**
 * HTTP session for the Miniserver REST endpoints
 *
 * Wraps undici's fetch with a dispatcher. A dispatcher created here is
 * owned and closed by `close()`; one passed in belongs to the caller.
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { TransportError } from '../MiniserverProtocol.mjs';
import type { HttpResponse, Logger } from '../types.mjs';

export interface HttpSessionOptions {
  baseUrl: string;
  verifySsl: boolean;
  dispatcher?: Dispatcher;
  logger: Logger;
}

export class HttpSession {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly owned: boolean;
  private readonly logger: Logger;
  private closed: boolean = false;

  constructor(options: HttpSessionOptions) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.owned = false;
    } else {
      this.dispatcher = new Agent({
        connect: { rejectUnauthorized: options.verifySsl },
      });
      this.owned = true;
    }
  }

  /**
   * GET a path relative to the base URL
   *
   * @throws TransportError when the request cannot be completed
   */
  async get(path: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    if (this.closed) {
      throw new TransportError('HTTP session is closed');
    }

    const url = new URL(path, this.baseUrl);
    this.logger.debug(`GET ${url.pathname}`);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        dispatcher: this.dispatcher,
      });
      const body = await response.text();
      return { status: response.status, body };
    } catch (error) {
      throw new TransportError(
        `Request to ${url.pathname} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.owned) {
      await this.dispatcher.close();
    }
  }
}
