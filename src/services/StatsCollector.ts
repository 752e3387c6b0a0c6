import { EventEmitter } from 'node:events';
import type { RunStatistics, TickOutcome } from '../types/Aircraft';
import { createLogger } from '../utils/logger';

// =============================================================================
// Types
// =============================================================================

export interface StatsCollectorOptions {
  summaryEveryTicks?: number;
  clock?: () => number;
}

export type SummaryReason = 'periodic' | 'shutdown';

export interface StatsSummaryEvent {
  reason: SummaryReason;
  statistics: RunStatistics;
  runtimeMs: number;
  averageCheckIntervalMs: number | null;
}

// =============================================================================
// Stats Collector
// =============================================================================

/**
 * Accumulates RunStatistics from tick outcomes.
 * Emits 'summary' every N ticks and once more on flush().
 */
export class StatsCollector extends EventEmitter {
  private readonly logger = createLogger({ component: 'StatsCollector' });
  private readonly summaryEveryTicks: number;
  private readonly clock: () => number;
  private readonly statistics: RunStatistics;
  private firstTickAt: number | null = null;

  constructor(options: StatsCollectorOptions = {}) {
    super();
    this.summaryEveryTicks = options.summaryEveryTicks ?? 100;
    this.clock = options.clock ?? Date.now;

    if (!Number.isInteger(this.summaryEveryTicks) || this.summaryEveryTicks < 1) {
      throw new RangeError(`summaryEveryTicks must be a positive integer, got ${this.summaryEveryTicks}`);
    }

    this.statistics = {
      startedAtUtc: new Date(this.clock()),
      checksPerformed: 0,
      totalAircraftDetected: 0,
      errorCount: 0,
      currentAircraftCount: 0,
      notificationsSent: 0,
      lastTickAtUtc: null,
    };
  }

  record(outcome: TickOutcome): void {
    const stats = this.statistics;

    stats.checksPerformed += 1;
    stats.totalAircraftDetected += outcome.newDetections;
    stats.notificationsSent += outcome.notificationsSent;
    stats.errorCount += outcome.errors;
    stats.currentAircraftCount = outcome.positionFetchFailed ? 0 : outcome.aircraftInFence;
    stats.lastTickAtUtc = new Date(outcome.at);
    this.firstTickAt ??= outcome.at.getTime();

    if (stats.checksPerformed % this.summaryEveryTicks === 0) {
      this.publish('periodic');
    }
  }

  /**
   * Copy of the current statistics
   */
  summary(): RunStatistics {
    return {
      ...this.statistics,
      startedAtUtc: new Date(this.statistics.startedAtUtc),
      lastTickAtUtc: this.statistics.lastTickAtUtc ? new Date(this.statistics.lastTickAtUtc) : null,
    };
  }

  /**
   * Publish the final summary, on shutdown
   */
  flush(): StatsSummaryEvent {
    return this.publish('shutdown');
  }

  private publish(reason: SummaryReason): StatsSummaryEvent {
    const statistics = this.summary();
    const runtimeMs = this.clock() - statistics.startedAtUtc.getTime();

    // Intervals between ticks: one fewer than the number of ticks
    const lastTickAt = statistics.lastTickAtUtc?.getTime();
    const averageCheckIntervalMs =
      this.firstTickAt !== null && lastTickAt !== undefined && statistics.checksPerformed > 1
        ? Math.round((lastTickAt - this.firstTickAt) / (statistics.checksPerformed - 1))
        : null;

    const event: StatsSummaryEvent = { reason, statistics, runtimeMs, averageCheckIntervalMs };

    this.logger.info(
      {
        reason,
        runtimeSeconds: Math.round(runtimeMs / 1000),
        checksPerformed: statistics.checksPerformed,
        totalAircraftDetected: statistics.totalAircraftDetected,
        currentAircraftCount: statistics.currentAircraftCount,
        notificationsSent: statistics.notificationsSent,
        errorCount: statistics.errorCount,
        averageCheckIntervalMs,
      },
      reason === 'shutdown' ? '📊 Final statistics' : '📊 Statistics summary'
    );

    this.emit('summary', event);
    return event;
  }
}
