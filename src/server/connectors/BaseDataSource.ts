/**
 * BaseDataSource - shared lifecycle for data sources that feed the index queue
 *
 * A data source splits a run into independent units of work (one per
 * project, space, channel, ...). Units go through a bounded limiter and each
 * gets its own deadline; a unit's failure never cancels its siblings.
 */

import type { IndexQueue, IngestionRunSummary } from '../contracts/types.js';
import { UnitTimeoutError } from '../types/errors.js';
import { ConcurrencyLimiter, settleWithLimit } from '../utils/concurrency.js';
import { createChildLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_UNIT_CONCURRENCY = 4;
export const DEFAULT_UNIT_TIMEOUT_MS = 10 * 60 * 1000;

export interface DataSourceDependencies {
  indexQueue: IndexQueue;
  logger?: Logger;
  /** Max units running at once (default 4) */
  concurrency?: number;
  /** Deadline per unit in ms; 0 disables it (default 10 minutes) */
  unitTimeoutMs?: number;
}

export abstract class BaseDataSource<TConfig> {
  protected readonly indexQueue: IndexQueue;
  protected readonly logger: Logger;
  protected readonly limiter: ConcurrencyLimiter;
  protected readonly unitTimeoutMs: number;

  /** Short source name used in logs and metric labels */
  abstract readonly sourceName: string;

  protected constructor(
    readonly dataSourceId: string,
    protected readonly config: TConfig,
    deps: DataSourceDependencies
  ) {
    this.indexQueue = deps.indexQueue;
    this.logger = deps.logger ?? createChildLogger({ dataSourceId });
    this.limiter = new ConcurrencyLimiter(deps.concurrency ?? DEFAULT_UNIT_CONCURRENCY);
    this.unitTimeoutMs = deps.unitTimeoutMs ?? DEFAULT_UNIT_TIMEOUT_MS;
  }

  /**
   * Fetch everything the source currently holds and enqueue it.
   *
   * Rejects only when the run as a whole cannot proceed; unit failures are
   * reported in the summary.
   */
  abstract feedNewDocuments(): Promise<IngestionRunSummary>;

  /**
   * Run `work` once per item through the limiter, each call under its own deadline.
   *
   * @param label - Names the unit in timeout errors
   */
  protected runUnits<T, R>(
    items: readonly T[],
    label: (item: T) => string,
    work: (item: T, signal: AbortSignal) => Promise<R>
  ): Promise<PromiseSettledResult<R>[]> {
    return settleWithLimit(items, this.limiter, (item) => this.withDeadline(label(item), (signal) => work(item, signal)));
  }

  /**
   * Settles when `work` does or when the deadline passes, whichever comes
   * first. Work that ignores the signal is abandoned, not awaited.
   */
  private async withDeadline<R>(unit: string, work: (signal: AbortSignal) => Promise<R>): Promise<R> {
    const controller = new AbortController();
    let rejectDeadline: (error: UnitTimeoutError) => void = () => undefined;
    const deadline = new Promise<never>((_, reject) => {
      rejectDeadline = reject;
    });
    const onAbort = () => rejectDeadline(new UnitTimeoutError(unit, this.unitTimeoutMs));
    controller.signal.addEventListener('abort', onAbort);

    const timer = this.unitTimeoutMs > 0
      ? setTimeout(() => controller.abort(), this.unitTimeoutMs)
      : undefined;

    try {
      return await Promise.race([work(controller.signal), deadline]);
    } catch (error) {
      if (controller.signal.aborted && !(error instanceof UnitTimeoutError)) {
        throw new UnitTimeoutError(unit, this.unitTimeoutMs, error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      controller.signal.removeEventListener('abort', onAbort);
    }
  }
}
