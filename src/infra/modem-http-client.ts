import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { createChildLogger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/async-helpers.js';
import {
  CancelledError,
  ConnectionError,
  HttpStatusError,
  MonitorError,
  OperationTimeoutError,
} from '../utils/errors.js';

const logger = createChildLogger('modem-http');

const DEFAULT_TIMEOUT = 10000;
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface ModemHttpClientOptions {
  host: string;
  port?: number | undefined;
  useSsl?: boolean | undefined;
  timeoutMs?: number | undefined;
  /** Replaces the network adapter, e.g. to serve canned responses. */
  adapter?: AxiosAdapter | undefined;
}

export interface FetchOptions {
  timeoutMs?: number | undefined;
}

export type FetchResult =
  | { ok: true; path: string; status: number; body: string; fromCache: boolean }
  | { ok: false; path: string; error: MonitorError };

/**
 * One poll cycle's view of the device. Requests run one at a time over a
 * single socket; `close()` releases it.
 */
export interface TransportSession {
  fetch(path: string, options?: FetchOptions): Promise<FetchResult>;
  /** Visits `primePath` (unless already visited this session), then fetches `path`. */
  fetchPrimed(primePath: string, path: string, options?: FetchOptions): Promise<FetchResult>;
  close(): void;
  readonly closed: boolean;
}

export interface ModemTransport {
  openSession(signal?: AbortSignal): TransportSession;
}

export interface ProbeResult {
  reachable: boolean;
  /** The landing page mentions a cable modem or DOCSIS. */
  recognized: boolean;
  status?: number | undefined;
  error?: MonitorError | undefined;
}

function toTransportError(err: unknown, path: string, timeoutMs: number): MonitorError {
  if (err instanceof MonitorError) return err;

  if (err instanceof TimeoutError) {
    return new OperationTimeoutError(`GET ${path}`, timeoutMs, { cause: err });
  }

  if (axios.isCancel(err)) {
    return new CancelledError(`GET ${path} was aborted`, { context: { path } });
  }

  if (axios.isAxiosError(err)) {
    if (err.code !== undefined && TIMEOUT_CODES.has(err.code)) {
      return new OperationTimeoutError(`GET ${path}`, timeoutMs, { cause: err, context: { path } });
    }
    return new ConnectionError(`Cannot reach modem for GET ${path}: ${err.message}`, {
      cause: err,
      context: { path, code: err.code },
    });
  }

  return MonitorError.fromError(err);
}

/** Failures after which there is no point asking the device for the data page. */
function isDeviceDown(error: MonitorError): boolean {
  return (
    error instanceof ConnectionError ||
    error instanceof OperationTimeoutError ||
    error instanceof CancelledError
  );
}

class ModemSession implements TransportSession {
  private readonly agent: http.Agent;
  private readonly pages = new Map<string, string>();
  private isClosed = false;

  constructor(
    private readonly api: AxiosInstance,
    private readonly useSsl: boolean,
    private readonly defaultTimeoutMs: number,
    private readonly signal: AbortSignal | undefined
  ) {
    const agentOptions: http.AgentOptions = { keepAlive: true, maxSockets: 1 };
    this.agent = useSsl ? new https.Agent(agentOptions) : new http.Agent(agentOptions);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async fetch(path: string, options: FetchOptions = {}): Promise<FetchResult> {
    if (this.isClosed || this.signal?.aborted) {
      return { ok: false, path, error: new CancelledError(`Session ended before GET ${path}`, { context: { path } }) };
    }

    const cached = this.pages.get(path);
    if (cached !== undefined) {
      logger.debug({ path }, 'Reusing page fetched earlier in this cycle');
      return { ok: true, path, status: 200, body: cached, fromCache: true };
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    this.signal?.addEventListener('abort', onAbort, { once: true });

    const started = Date.now();
    try {
      const response = await withTimeout(
        this.api.get<string>(path, {
          timeout: timeoutMs,
          signal: controller.signal,
          ...(this.useSsl ? { httpsAgent: this.agent } : { httpAgent: this.agent }),
        }),
        timeoutMs,
        `GET ${path} timed out`
      );

      const durationMs = Date.now() - started;
      if (response.status < 200 || response.status >= 300) {
        logger.debug({ path, status: response.status, durationMs }, 'Non-2xx response');
        return { ok: false, path, error: new HttpStatusError(path, response.status) };
      }

      const body = String(response.data ?? '');
      this.pages.set(path, body);
      logger.debug({ path, status: response.status, bytes: body.length, durationMs }, 'Fetched');
      return { ok: true, path, status: response.status, body, fromCache: false };
    } catch (err) {
      // Stop the underlying request when our own ceiling fired first
      controller.abort();
      const error = toTransportError(err, path, timeoutMs);
      logger.debug({ path, err: error.message, durationMs: Date.now() - started }, 'Request failed');
      return { ok: false, path, error };
    } finally {
      this.signal?.removeEventListener('abort', onAbort);
    }
  }

  async fetchPrimed(primePath: string, path: string, options: FetchOptions = {}): Promise<FetchResult> {
    const primed = await this.fetch(primePath, options);
    if (!primed.ok) {
      if (isDeviceDown(primed.error)) {
        logger.warn({ primePath, path, err: primed.error.message }, 'Priming request failed, skipping data endpoint');
        return { ok: false, path, error: primed.error };
      }
      logger.debug({ primePath, path, err: primed.error.message }, 'Priming request rejected, trying data endpoint anyway');
    }
    return this.fetch(path, options);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.pages.clear();
    this.agent.destroy();
  }
}

export class ModemHttpClient implements ModemTransport {
  private readonly api: AxiosInstance;
  private readonly useSsl: boolean;
  private readonly timeoutMs: number;
  readonly baseUrl: string;

  constructor(options: ModemHttpClientOptions) {
    this.useSsl = options.useSsl ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;

    const protocol = this.useSsl ? 'https' : 'http';
    const port = options.port ?? (this.useSsl ? 443 : 80);
    this.baseUrl = `${protocol}://${options.host}:${port}`;

    this.api = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      responseType: 'text',
      // Bodies are parsed per endpoint shape, never by axios
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      maxRedirects: 3,
      headers: {
        Accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  openSession(signal?: AbortSignal): TransportSession {
    return new ModemSession(this.api, this.useSsl, this.timeoutMs, signal);
  }

  /** Checks that the host answers and looks like a cable modem. */
  async probe(): Promise<ProbeResult> {
    const session = this.openSession();
    try {
      const result = await session.fetch('/');
      if (!result.ok) {
        logger.error({ baseUrl: this.baseUrl, err: result.error.message }, 'Error connecting to modem');
        const status = result.error instanceof HttpStatusError ? result.error.status : undefined;
        return { reachable: false, recognized: false, status, error: result.error };
      }

      const text = result.body.toLowerCase();
      const recognized = text.includes('cable modem') || text.includes('docsis');
      if (!recognized) {
        logger.warn({ baseUrl: this.baseUrl }, "Landing page doesn't look like a cable modem");
      }
      return { reachable: true, recognized, status: result.status };
    } finally {
      session.close();
    }
  }
}
