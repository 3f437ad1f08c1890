import { LookupFailureError } from '../domain/errors/index.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ProcessResult } from './HomeRegistry.js';

type MaybePromise<T> = T | Promise<T>;

/**
 * What the poller drives; both AsyncClimate and SyncClimate qualify
 */
export interface RefreshableClimate {
  update(): MaybePromise<ProcessResult[]>;
  updateTopology(): MaybePromise<ProcessResult>;
}

export interface PollerStats {
  cycles: number;
  skipped: number;
  failures: number;
  topologyRefreshes: number;
}

export interface ClimatePollerOptions {
  /** Period between refresh cycles in ms */
  interval: number;
}

/**
 * Periodic refresh of topology and status.
 *
 * Only one cycle runs at a time, so a topology rebuild never interleaves with
 * a status reconciliation. A LookupFailureError marks the topology stale and
 * the next cycle fetches it again before the status.
 */
export class ClimatePoller {
  private timer: NodeJS.Timeout | null = null;
  private cycleInFlight = false;
  private topologyStale = false;
  private readonly logger: ILogger;

  private stats: PollerStats = {
    cycles: 0,
    skipped: 0,
    failures: 0,
    topologyRefreshes: 0,
  };

  constructor(
    private readonly climate: RefreshableClimate,
    private readonly options: ClimatePollerOptions,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'ClimatePoller' });
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get isTopologyStale(): boolean {
    return this.topologyStale;
  }

  getStats(): PollerStats {
    return { ...this.stats };
  }

  /**
   * Run a cycle now, then every `interval` ms
   */
  start(): void {
    if (this.timer) {
      this.logger.warn('Poller already started');
      return;
    }

    this.logger.info('Starting climate poller', { interval: this.options.interval });
    this.timer = setInterval(() => this.tick(), this.options.interval);
    this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Climate poller stopped', { ...this.stats });
  }

  /**
   * @returns false when skipped because another cycle is still running
   */
  async runCycle(): Promise<boolean> {
    if (this.cycleInFlight) {
      this.stats.skipped++;
      this.logger.warn('Previous refresh cycle still running, skipping');
      return false;
    }

    this.cycleInFlight = true;
    this.stats.cycles++;
    try {
      if (this.topologyStale) {
        this.logger.info('Refreshing stale topology');
        await this.climate.updateTopology();
        this.topologyStale = false;
        this.stats.topologyRefreshes++;
      }

      const results = await this.climate.update();
      this.logger.debug('Refresh cycle completed', { results: results.length });
    } catch (error) {
      this.stats.failures++;
      if (error instanceof LookupFailureError) {
        this.topologyStale = true;
        this.logger.warn('Topology out of date, will refresh on next cycle', {
          homeId: error.homeId,
          moduleIds: error.moduleIds,
          roomIds: error.roomIds,
        });
      } else {
        this.logger.error('Refresh cycle failed', error);
      }
    } finally {
      this.cycleInFlight = false;
    }
    return true;
  }

  private tick(): void {
    this.runCycle().catch((error: unknown) => {
      this.logger.error('Unexpected poller failure', error);
    });
  }
}
