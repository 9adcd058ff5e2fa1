import { EventEmitter } from 'eventemitter3';
import { aggregate, populatedKeys, type EndpointAttempt } from './snapshot-aggregator.js';
import { createEndpointTable, type EndpointTable } from './endpoint-table.js';
import { CHANNEL_COUNT_KEYS } from './metric-catalog.js';
import { parseStatusPage } from './parsers/status-page-parser.js';
import { parseJsonPayload } from './parsers/json-payload-parser.js';
import { ModemHttpClient, type FetchResult, type ModemTransport, type TransportSession } from '../infra/modem-http-client.js';
import { createChildLogger } from '../utils/logger.js';
import { retry } from '../utils/async-helpers.js';
import {
  CancelledError,
  ErrorCode,
  HttpStatusError,
  MonitorError,
  OperationTimeoutError,
  ParseError,
  isRetryable,
} from '../utils/errors.js';
import type { Config } from '../config/index.js';
import type { EndpointDescriptor } from '../types/endpoints.js';
import type { EndpointOutcome, EndpointStatus, HealthVerdict, PollResult, RawFieldMap } from '../types/metrics.js';

const logger = createChildLogger('modem-poller');

export interface ModemPollerEvents {
  endpoint: (outcome: EndpointOutcome) => void;
  poll: (result: PollResult) => void;
}

export interface ModemPollerOptions {
  host: string;
  timeoutMs: number;
  retries?: number | undefined;
  retryDelayMs?: number | undefined;
  table?: EndpointTable | undefined;
  /** Defaults to an HTTP client for `host`. */
  transport?: ModemTransport | undefined;
}

export interface PollOptions {
  /** Abandons the cycle; endpoints not yet finished are recorded as cancelled. */
  signal?: AbortSignal | undefined;
}

interface AttemptReport {
  attempt: EndpointAttempt;
  outcome: EndpointOutcome;
}

function statusFor(error: MonitorError): EndpointStatus {
  if (error instanceof OperationTimeoutError) return 'timeout';
  if (error instanceof CancelledError) return 'cancelled';
  if (error instanceof HttpStatusError) return 'http-error';
  if (error instanceof ParseError) return 'parse-error';
  return 'network-error';
}

export function verdictFor(outcomes: readonly EndpointOutcome[], populated: number): HealthVerdict {
  if (populated === 0) return 'unavailable';
  return outcomes.every(o => o.status === 'success') ? 'healthy' : 'degraded';
}

/**
 * Runs poll cycles against one modem. Endpoints are tried one after another in
 * table order; no endpoint failure escapes `poll()`.
 */
export class ModemPoller extends EventEmitter<ModemPollerEvents> {
  readonly table: EndpointTable;
  private readonly transport: ModemTransport;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(options: ModemPollerOptions) {
    super();
    this.table = options.table ?? createEndpointTable();
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.transport = options.transport ?? new ModemHttpClient({ host: options.host, timeoutMs: options.timeoutMs });
  }

  static fromConfig(config: Config, extra: Pick<ModemPollerOptions, 'table' | 'transport'> = {}): ModemPoller {
    return new ModemPoller({
      host: config.modem.host,
      timeoutMs: config.poll.timeoutMs,
      retries: config.poll.retries,
      retryDelayMs: config.poll.retryDelayMs,
      table: extra.table,
      transport: extra.transport ?? new ModemHttpClient({
        host: config.modem.host,
        port: config.modem.port,
        useSsl: config.modem.useSsl,
        timeoutMs: config.poll.timeoutMs,
      }),
    });
  }

  private endpointTimeout(descriptor: EndpointDescriptor): number {
    return descriptor.timeoutMs ?? this.timeoutMs;
  }

  /**
   * Upper bound for one cycle: every request of every attempt timing out, plus
   * the fixed wait before each retry.
   */
  cycleBudgetMs(): number {
    const attempts = this.retries + 1;
    return this.table.endpoints.reduce((total, descriptor) => {
      const requests = descriptor.primeWith ? 2 : 1;
      return total + attempts * requests * this.endpointTimeout(descriptor) + this.retries * this.retryDelayMs;
    }, 0);
  }

  async poll(options: PollOptions = {}): Promise<PollResult> {
    const budgetMs = this.cycleBudgetMs();
    const deadline = new AbortController();
    const onCallerAbort = (): void => deadline.abort();
    if (options.signal?.aborted) {
      deadline.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const cycle = { deadlineHit: false };
    const timer = setTimeout(() => {
      cycle.deadlineHit = true;
      deadline.abort();
    }, budgetMs);

    const session = this.transport.openSession(deadline.signal);
    const reports: AttemptReport[] = [];

    logger.debug({ endpoints: this.table.endpoints.length, budgetMs }, 'Poll cycle started');

    try {
      for (const descriptor of this.table.endpoints) {
        const report = deadline.signal.aborted
          ? this.abandoned(descriptor, cycle.deadlineHit, budgetMs)
          : await this.attemptEndpoint(session, descriptor, deadline.signal);

        // A request cut short by the cycle deadline is a timeout, not a cancellation
        if (report.outcome.status === 'cancelled' && cycle.deadlineHit) {
          const error = new OperationTimeoutError('poll cycle', budgetMs, { code: ErrorCode.POLL_CYCLE_TIMEOUT });
          reports.push({
            attempt: { descriptor, ok: false, error },
            outcome: { ...report.outcome, status: 'timeout', error: { code: error.code, message: error.message } },
          });
        } else {
          reports.push(report);
        }

        const last = reports[reports.length - 1];
        if (last) this.emit('endpoint', last.outcome);
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
      session.close();
    }

    const { snapshot, warnings } = aggregate(reports.map(r => r.attempt));
    const outcomes = reports.map(r => r.outcome);
    const populated = populatedKeys(snapshot).length;
    const health = verdictFor(outcomes, populated);

    const result: PollResult = { snapshot, health, outcomes, warnings };

    logger.info({
      health,
      populated,
      outcomes: outcomes.map(o => `${o.endpointId}:${o.status}`),
    }, 'Poll cycle finished');

    this.emit('poll', result);
    return result;
  }

  private abandoned(descriptor: EndpointDescriptor, deadlineHit: boolean, budgetMs: number): AttemptReport {
    const error = deadlineHit
      ? new OperationTimeoutError('poll cycle', budgetMs, { code: ErrorCode.POLL_CYCLE_TIMEOUT })
      : new CancelledError('Poll cycle abandoned by caller');
    return this.failure(descriptor, error, 0, 0);
  }

  private failure(descriptor: EndpointDescriptor, error: MonitorError, attempts: number, durationMs: number): AttemptReport {
    return {
      attempt: { descriptor, ok: false, error },
      outcome: {
        endpointId: descriptor.id,
        path: descriptor.path,
        status: statusFor(error),
        attempts,
        fieldCount: 0,
        durationMs,
        error: { code: error.code, message: error.message },
      },
    };
  }

  private async fetchWithRetry(
    session: TransportSession,
    descriptor: EndpointDescriptor,
    signal: AbortSignal,
    onAttempt: (attempt: number) => void
  ): Promise<FetchResult> {
    const timeoutMs = this.endpointTimeout(descriptor);
    try {
      return await retry(async () => {
        const result = descriptor.primeWith
          ? await session.fetchPrimed(descriptor.primeWith, descriptor.path, { timeoutMs })
          : await session.fetch(descriptor.path, { timeoutMs });
        if (!result.ok) throw result.error;
        return result;
      }, {
        maxAttempts: this.retries + 1,
        delayMs: this.retryDelayMs,
        backoffMultiplier: 1,
        signal,
        shouldRetry: err => isRetryable(err) && !session.closed,
        onAttempt,
      });
    } catch (err) {
      return { ok: false, path: descriptor.path, error: MonitorError.fromError(err) };
    }
  }

  private async attemptEndpoint(
    session: TransportSession,
    descriptor: EndpointDescriptor,
    signal: AbortSignal
  ): Promise<AttemptReport> {
    const started = Date.now();
    let attempts = 0;

    const fetched = await this.fetchWithRetry(session, descriptor, signal, n => {
      attempts = n;
    });
    const durationMs = (): number => Date.now() - started;

    if (!fetched.ok) {
      logger.debug({ endpoint: descriptor.id, err: fetched.error.message }, 'Endpoint failed');
      return this.failure(descriptor, fetched.error, attempts, durationMs());
    }

    let raw: RawFieldMap;
    if (descriptor.shape === 'html-status') {
      raw = parseStatusPage(fetched.body);
    } else {
      const parsed = parseJsonPayload(fetched.body, descriptor);
      if (!parsed.ok) {
        logger.warn({ endpoint: descriptor.id, err: parsed.error.message }, 'Endpoint payload rejected');
        return this.failure(descriptor, parsed.error, attempts, durationMs());
      }
      raw = parsed.raw;
    }

    const fieldCount = Object.keys(raw.fields).length + (raw.channels ? CHANNEL_COUNT_KEYS.length : 0);
    return {
      attempt: { descriptor, ok: true, raw },
      outcome: {
        endpointId: descriptor.id,
        path: descriptor.path,
        status: fieldCount > 0 ? 'success' : 'empty',
        attempts,
        fieldCount,
        durationMs: durationMs(),
      },
    };
  }
}
