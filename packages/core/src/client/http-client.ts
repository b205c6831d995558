import type { ThumbnailSize } from '../types';
import type { DeviceClient, StatusStream, StatusStreamHandlers } from './types';
import { SseDecoder } from './sse';
import {
  DeviceConnectionError,
  DeviceRequestError,
  ParseError,
  StreamError,
  describeError,
  toError,
} from '../errors';
import { silentLogger, type Logger } from '../logger';
import { formatDuration, normalizeUrl } from '../utils';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpDeviceClientOptions {
  apiUrl: string;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

const DEFAULT_REQUEST_TIMEOUT = 5000;

export class HttpDeviceClient implements DeviceClient {
  private readonly apiUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: HttpDeviceClientOptions) {
    this.apiUrl = normalizeUrl(options.apiUrl);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  async getStatus(): Promise<unknown> {
    const response = await this.request('GET', '/status');
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Status response is not valid JSON: ${describeError(error)}`, undefined, toError(error));
    }
  }

  async openStatusStream(handlers: StatusStreamHandlers): Promise<StatusStream> {
    const url = this.buildUrl('/status/stream');
    const controller = new AbortController();

    // Only the wait for response headers is bounded; the body stays open.
    let openTimer: ReturnType<typeof setTimeout> | undefined;
    const openTimeout = new Promise<never>((_, reject) => {
      openTimer = setTimeout(() => {
        controller.abort();
        reject(
          new DeviceConnectionError(
            `Failed to open status stream: no response within ${formatDuration(this.requestTimeoutMs)}`
          )
        );
      }, this.requestTimeoutMs);
    });

    let response: Response;
    try {
      response = await Promise.race([
        this.fetchImpl(url, {
          headers: { Accept: 'text/event-stream' },
          signal: controller.signal,
        }),
        openTimeout,
      ]);
    } catch (error) {
      if (error instanceof DeviceConnectionError) throw error;
      throw new DeviceConnectionError(`Failed to open status stream: ${describeError(error)}`, toError(error));
    } finally {
      clearTimeout(openTimer);
    }

    if (!response.ok) {
      const body = await this.readBody(response);
      throw new DeviceRequestError(
        `Status stream failed: HTTP ${response.status} ${response.statusText}`,
        response.status,
        body
      );
    }
    if (!response.body) {
      throw new StreamError('Status stream returned no body');
    }

    const reader = response.body.getReader();
    let closed = false;

    const pump = async (): Promise<void> => {
      const decoder = new TextDecoder();
      const sse = new SseDecoder();
      try {
        while (!closed) {
          const { done, value } = await reader.read();
          if (done) break;
          for (const message of sse.push(decoder.decode(value, { stream: true }))) {
            if (closed) return;
            if (!message.data) continue;
            let payload: unknown;
            try {
              payload = JSON.parse(message.data);
            } catch (error) {
              this.logger.warn('Skipping malformed stream event', describeError(error));
              continue;
            }
            handlers.onPayload(payload);
          }
        }
        if (!closed) {
          closed = true;
          handlers.onEnd(new StreamError('Status stream closed by device'));
        }
      } catch (error) {
        if (!closed) {
          closed = true;
          handlers.onEnd(new StreamError(`Status stream failed: ${describeError(error)}`, toError(error)));
        }
      } finally {
        await reader.cancel().catch((error: unknown) => {
          this.logger.debug('Stream reader cancel failed', describeError(error));
        });
      }
    };

    void pump();

    return {
      close: () => {
        if (closed) return;
        closed = true;
        controller.abort();
        reader.cancel().catch((error: unknown) => {
          this.logger.debug('Stream reader cancel failed', describeError(error));
        });
      },
    };
  }

  async pause(): Promise<void> {
    await this.request('POST', '/pause');
  }

  async resume(): Promise<void> {
    await this.request('POST', '/resume');
  }

  async cancel(): Promise<void> {
    await this.request('POST', '/cancel');
  }

  async getThumbnail(location: string, path: string, size: ThumbnailSize): Promise<Uint8Array | null> {
    const response = await this.request('GET', '/thumbnail', { location, path, size }, [204, 404]);
    if (response.status === 204 || response.status === 404) {
      return null;
    }
    const bytes = new Uint8Array(await response.arrayBuffer());
    return bytes.length > 0 ? bytes : null;
  }

  private buildUrl(endpoint: string, query: Record<string, string> = {}): string {
    const url = new URL(endpoint.replace(/^\//, ''), `${this.apiUrl}/`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request(
    method: 'GET' | 'POST',
    endpoint: string,
    query: Record<string, string> = {},
    allowStatus: number[] = []
  ): Promise<Response> {
    const url = this.buildUrl(endpoint, query);
    const start = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new DeviceConnectionError(`${method} ${endpoint} failed: ${describeError(error)}`, toError(error));
    }
    this.logger.debug(`${method} ${endpoint} -> ${response.status} (${formatDuration(Date.now() - start)})`);

    if (!response.ok && !allowStatus.includes(response.status)) {
      const body = await this.readBody(response);
      throw new DeviceRequestError(
        `${method} ${endpoint} failed: HTTP ${response.status} ${response.statusText}`,
        response.status,
        body
      );
    }
    return response;
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return (await response.text()).slice(0, 200);
    } catch (error) {
      return `<unreadable body: ${describeError(error)}>`;
    }
  }
}
