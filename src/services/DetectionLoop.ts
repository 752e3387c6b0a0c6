import { EventEmitter } from 'node:events';
import type {
  AircraftMetadata,
  AircraftState,
  BoundingBox,
  GeoFence,
  LoopPhase,
  TickOutcome,
} from '../types/Aircraft';
import type { DisplayDevice } from '../display/DisplayDevice';
import { buildNotificationGrid, formatNotification } from '../display/notification';
import { normalizeAircraftId } from '../utils/aircraftId';
import { InvalidInputError, describeError } from '../utils/errors';
import { boundingBox, distanceKm, isInside, validateFence } from '../utils/geo';
import { createLogger } from '../utils/logger';
import type { MetadataCache } from './MetadataCache';
import type { RetryingFetcher } from './RetryingFetcher';
import type { Scheduler } from './Scheduler';
import type { SeenAircraftTracker } from './SeenAircraftTracker';
import type { StatsCollector } from './StatsCollector';

/**
 * Polls positions, narrows them to the fence, enriches new aircraft
 * with metadata and puts each one on the display exactly once.
 *
 * One tick at a time: a tick finishes (or is aborted) before the
 * inter-tick sleep starts, so ticks never overlap.
 */

// =============================================================================
// Types
// =============================================================================

export interface DetectionLoopDeps {
  fence: GeoFence;
  positionFetcher: RetryingFetcher<BoundingBox, AircraftState[]>;
  metadataFetcher: RetryingFetcher<string, AircraftMetadata>;
  cache: MetadataCache;
  tracker: SeenAircraftTracker;
  stats: StatsCollector;
  display: DisplayDevice;
  scheduler: Scheduler;
  intervalMs?: number;
  metadataTtlMs?: number;
  notFoundTtlMs?: number;
}

export interface AircraftInFence {
  state: AircraftState;
  distanceKm: number;
}

export interface NotificationEvent {
  state: AircraftState;
  metadata: AircraftMetadata;
  distanceKm: number;
  lines: string[];
}

// =============================================================================
// Detection Loop
// =============================================================================

export class DetectionLoop extends EventEmitter {
  private readonly logger = createLogger({ component: 'DetectionLoop' });
  private readonly deps: DetectionLoopDeps;
  private readonly box: BoundingBox;
  private readonly intervalMs: number;
  private readonly notFoundTtlMs: number;
  private phase: LoopPhase = 'idle';
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(deps: DetectionLoopDeps) {
    super();
    validateFence(deps.fence);
    this.deps = deps;
    this.box = boundingBox(deps.fence);
    this.intervalMs = deps.intervalMs ?? 1000;
    this.notFoundTtlMs = deps.notFoundTtlMs ?? 60 * 60 * 1000;

    if (!Number.isFinite(this.intervalMs) || this.intervalMs < 0) {
      throw new RangeError(`intervalMs must be zero or positive, got ${this.intervalMs}`);
    }
  }

  getPhase(): LoopPhase {
    return this.phase;
  }

  getFence(): GeoFence {
    return this.deps.fence;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Start ticking in the background until stop() is called
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Detection loop already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal);
    this.running.catch((error: unknown) => {
      this.logger.error({ error: describeError(error) }, '❌ Detection loop crashed');
    });
  }

  /**
   * Abort the current tick or sleep and wait for the loop to wind down
   */
  async stop(): Promise<void> {
    if (!this.running || !this.controller) {
      return;
    }

    this.logger.info('Stopping detection loop');
    this.controller.abort();
    await this.running;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.info(
      { fence: this.deps.fence, intervalMs: this.intervalMs, display: this.deps.display.kind },
      '🛫 Detection loop started'
    );

    try {
      while (!signal.aborted) {
        try {
          await this.tick(signal);
        } catch (error) {
          // tick() records its own failures; this only catches listener errors
          this.logger.error({ error: describeError(error) }, 'Tick handler failed');
        }

        if (signal.aborted) {
          break;
        }
        await this.deps.scheduler.sleep(this.intervalMs, signal);
      }
    } finally {
      try {
        this.deps.stats.flush();
      } catch (error) {
        this.logger.error({ error: describeError(error) }, 'Failed to publish final summary');
      }
      this.running = null;
      this.controller = null;
      this.phase = 'idle';
      this.logger.info('🛬 Detection loop stopped');
    }
  }

  /**
   * Run one full cycle and record its outcome. Never throws for upstream,
   * display or data errors; those are counted in the outcome.
   * A tick cancelled before the poll completes is not recorded.
   */
  async tick(signal?: AbortSignal): Promise<TickOutcome> {
    const at = new Date(this.deps.scheduler.now());
    const outcome: TickOutcome = {
      at,
      aircraftInFence: 0,
      newDetections: 0,
      notificationsSent: 0,
      errors: 0,
      positionFetchFailed: false,
    };

    try {
      this.phase = 'polling';
      const result = await this.deps.positionFetcher.attempt(this.box, signal);

      if (!result.success) {
        if (result.errorKind === 'aborted') {
          this.logger.debug('Tick cancelled while polling');
          return outcome;
        }
        outcome.positionFetchFailed = true;
        outcome.errors += 1;
        this.reportError(result.error, 'Position fetch failed, skipping tick');
      } else {
        this.phase = 'filtering';
        const inFence = this.filterToFence(result.value);
        outcome.aircraftInFence = inFence.length;
        this.deps.tracker.markPresent(
          inFence.map((aircraft) => aircraft.state.id),
          at.getTime()
        );

        for (const aircraft of inFence) {
          if (signal?.aborted) {
            break;
          }
          await this.handleAircraft(aircraft, outcome, signal);
        }
      }
    } catch (error) {
      outcome.errors += 1;
      this.reportError(error, 'Unexpected error during tick');
    } finally {
      this.phase = 'idle';
    }

    this.deps.stats.record(outcome);
    this.logger.debug(outcome, 'Tick complete');
    this.emit('tick', outcome);
    return outcome;
  }

  /**
   * In-fence aircraft, one entry per id, nearest first
   */
  private filterToFence(states: AircraftState[]): AircraftInFence[] {
    const byId = new Map<string, AircraftInFence>();

    for (const state of states) {
      const id = normalizeAircraftId(state.id);
      try {
        if (byId.has(id) || !isInside(state.position, this.deps.fence)) {
          continue;
        }
      } catch (error) {
        if (error instanceof InvalidInputError) {
          this.logger.warn({ id: state.id, error: error.message }, 'Ignoring aircraft with invalid position');
          continue;
        }
        throw error;
      }
      byId.set(id, { state, distanceKm: distanceKm(state.position, this.deps.fence.center) });
    }

    return Array.from(byId.values()).sort((a, b) => a.distanceKm - b.distanceKm);
  }

  private async handleAircraft(aircraft: AircraftInFence, outcome: TickOutcome, signal?: AbortSignal): Promise<void> {
    const { state } = aircraft;

    // Already announced: nothing left to do for it this tick
    if (this.deps.tracker.has(state.id)) {
      return;
    }

    this.phase = 'enriching';
    const metadata = await this.enrich(state, outcome.at, signal);
    if (!metadata) {
      if (!signal?.aborted) {
        outcome.errors += 1;
      }
      return;
    }

    this.phase = 'notifying';
    if (!this.deps.tracker.shouldNotify(state.id)) {
      return;
    }
    outcome.newDetections += 1;

    const lines = formatNotification(state, metadata);
    try {
      await this.deps.display.render(buildNotificationGrid(state, metadata));
      outcome.notificationsSent += 1;
      this.logger.info(
        { id: state.id, callsign: state.callsign, distanceKm: Number(aircraft.distanceKm.toFixed(2)) },
        '✈️ New aircraft in fence'
      );
      this.emit('notification', { state, metadata, distanceKm: aircraft.distanceKm, lines } satisfies NotificationEvent);
    } catch (error) {
      // Not retried, and the aircraft stays marked as seen
      outcome.errors += 1;
      this.reportError(error, 'Display failed to show notification');
    }
  }

  /**
   * Metadata from the cache or the upstream; null when the upstream failed
   * or the tick was cancelled.
   * An aircraft no source knows gets a placeholder, cached briefly.
   */
  private async enrich(state: AircraftState, at: Date, signal?: AbortSignal): Promise<AircraftMetadata | null> {
    const cached = this.deps.cache.get(state.id);
    if (cached) {
      return cached;
    }

    const result = await this.deps.metadataFetcher.attempt(state.id, signal);

    if (result.success) {
      this.deps.cache.put(state.id, result.value, this.deps.metadataTtlMs);
      return result.value;
    }

    if (result.errorKind === 'not-found') {
      this.logger.info({ id: state.id }, 'No metadata found, notifying without it');
      const placeholder: AircraftMetadata = {
        id: state.id,
        aircraftType: null,
        manufacturer: null,
        operator: null,
        registration: null,
        fetchedAtUtc: at,
      };
      this.deps.cache.put(state.id, placeholder, this.notFoundTtlMs);
      return placeholder;
    }

    if (result.errorKind === 'aborted') {
      return null;
    }

    this.reportError(result.error, 'Metadata fetch failed, will retry next tick');
    return null;
  }

  private reportError(error: unknown, message: string): void {
    this.logger.error({ error: describeError(error) }, message);
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
