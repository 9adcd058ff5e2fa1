import { EventEmitter } from 'eventemitter3';
import { ModemPoller, type PollOptions } from './modem-poller.js';
import { loadEndpointTable } from './endpoint-table.js';
import { createChildLogger } from '../utils/logger.js';
import { MonitorError } from '../utils/errors.js';
import type { Config } from '../config/index.js';
import type { ModemTransport } from '../infra/modem-http-client.js';
import type { PollResult } from '../types/metrics.js';

const logger = createChildLogger('modem-monitor');

export interface ModemMonitorEvents {
  update: (result: PollResult) => void;
  /** The device stopped yielding any field. */
  stale: (result: PollResult) => void;
  recovered: (result: PollResult) => void;
  error: (error: MonitorError) => void;
}

export type PollSource = Pick<ModemPoller, 'poll'>;

/**
 * Drives a poller on a fixed interval. The next cycle is scheduled only after
 * the previous one settles, so cycles never overlap.
 */
export class ModemMonitor extends EventEmitter<ModemMonitorEvents> {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollResult> | null = null;
  private controller: AbortController | null = null;
  private latest: PollResult | null = null;
  private active = false;

  constructor(
    private readonly poller: PollSource,
    private readonly intervalMs: number
  ) {
    super();
  }

  get running(): boolean {
    return this.active;
  }

  get lastResult(): PollResult | null {
    return this.latest;
  }

  /** True until a cycle populates at least one field, and whenever the last one populated none. */
  get stale(): boolean {
    return this.latest === null || this.latest.health === 'unavailable';
  }

  /** Polls immediately, then every `intervalMs` after each cycle ends. */
  start(): void {
    if (this.active) return;
    this.active = true;
    logger.info({ intervalMs: this.intervalMs }, 'Monitor started');
    this.tick();
  }

  async stop(): Promise<void> {
    if (!this.active && !this.inFlight) return;
    this.active = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.controller?.abort();
    if (this.inFlight) {
      try {
        await this.inFlight;
      } catch (err) {
        logger.warn({ err: MonitorError.fromError(err).message }, 'Poll cycle failed while stopping');
      }
    }
    logger.info('Monitor stopped');
  }

  /** Runs a cycle now, or joins the one already running. */
  pollNow(options: PollOptions = {}): Promise<PollResult> {
    if (this.inFlight) return this.inFlight;

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    this.controller = controller;

    const cycle = this.poller
      .poll({ signal: controller.signal })
      .then(result => {
        // A cycle cut short by stop() or the caller says nothing about the device
        if (!controller.signal.aborted) this.record(result);
        return result;
      })
      .finally(() => {
        options.signal?.removeEventListener('abort', onAbort);
        this.inFlight = null;
        this.controller = null;
      });

    this.inFlight = cycle;
    return cycle;
  }

  private tick(): void {
    this.timer = null;
    void this.pollNow()
      .catch((err: unknown) => {
        const error = MonitorError.fromError(err);
        logger.error({ err: error.message }, 'Poll cycle failed');
        this.emit('error', error);
      })
      .finally(() => this.scheduleNext());
  }

  private scheduleNext(): void {
    if (!this.active || this.timer) return;
    this.timer = setTimeout(() => this.tick(), this.intervalMs);
  }

  private record(result: PollResult): void {
    const previous = this.latest;
    this.latest = result;

    this.emit('update', result);

    // The first cycle counts as a change when it already finds nothing
    const wasStale = previous !== null && previous.health === 'unavailable';
    if (!wasStale && this.stale) {
      logger.warn({ takenAt: result.snapshot.takenAt }, 'Modem data is stale');
      this.emit('stale', result);
    } else if (wasStale && !this.stale) {
      logger.info('Modem data recovered');
      this.emit('recovered', result);
    }
  }
}

export interface MonitorOverrides {
  transport?: ModemTransport | undefined;
}

/** Builds a poller and monitor from validated configuration, loading a custom endpoint table if one is named. */
export async function createModemMonitor(config: Config, overrides: MonitorOverrides = {}): Promise<ModemMonitor> {
  const table = config.endpoints.tablePath
    ? await loadEndpointTable(config.endpoints.tablePath)
    : undefined;

  const poller = ModemPoller.fromConfig(config, { table, transport: overrides.transport });
  return new ModemMonitor(poller, config.poll.intervalMs);
}
