import type { SeenRecord } from '../types/Aircraft';
import { normalizeAircraftId } from '../utils/aircraftId';
import { createLogger } from '../utils/logger';

/**
 * Remembers which aircraft have already produced a notification.
 *
 * By default an aircraft is announced once per process lifetime, no matter
 * how often it leaves and re-enters the fence. Setting `rearmAfterMs`
 * allows a fresh announcement once the aircraft has been absent from the
 * fence for longer than that.
 */

// =============================================================================
// Types
// =============================================================================

export interface SeenAircraftTrackerOptions {
  rearmAfterMs?: number | null;
  clock?: () => number;
}

// =============================================================================
// Seen Aircraft Tracker
// =============================================================================

export class SeenAircraftTracker {
  private readonly logger = createLogger({ component: 'SeenAircraftTracker' });
  private readonly seen: Map<string, SeenRecord> = new Map();
  private readonly lastPresent: Map<string, number> = new Map();
  private readonly rearmAfterMs: number | null;
  private readonly clock: () => number;

  constructor(options: SeenAircraftTrackerOptions = {}) {
    this.rearmAfterMs = options.rearmAfterMs ?? null;
    this.clock = options.clock ?? Date.now;

    if (this.rearmAfterMs !== null && (!Number.isFinite(this.rearmAfterMs) || this.rearmAfterMs <= 0)) {
      throw new RangeError(`rearmAfterMs must be positive, got ${this.rearmAfterMs}`);
    }
  }

  /**
   * Returns true exactly once per aircraft (per arming) and records it.
   * Every later call for the same id returns false.
   */
  shouldNotify(id: string): boolean {
    const key = normalizeAircraftId(id);
    if (this.seen.has(key)) {
      return false;
    }

    this.seen.set(key, Object.freeze({ id: key, firstNotifiedAtUtc: new Date(this.clock()) }));
    this.logger.debug({ id: key }, '🆕 First sighting recorded');
    return true;
  }

  /**
   * Record that these aircraft are inside the fence now.
   * With a re-arm window, aircraft absent for longer than it are forgotten first.
   * Without one, presence is not tracked at all.
   */
  markPresent(ids: Iterable<string>, now: number = this.clock()): void {
    if (this.rearmAfterMs === null) {
      return;
    }

    for (const id of ids) {
      const key = normalizeAircraftId(id);
      const previous = this.lastPresent.get(key);

      if (
        previous !== undefined &&
        now - previous > this.rearmAfterMs &&
        this.seen.delete(key)
      ) {
        this.logger.info({ id: key, absentMs: now - previous }, 'Aircraft re-armed after absence');
      }

      this.lastPresent.set(key, now);
    }
  }

  has(id: string): boolean {
    return this.seen.has(normalizeAircraftId(id));
  }

  /**
   * Snapshot of everything notified so far, oldest first
   */
  records(): SeenRecord[] {
    return Array.from(this.seen.values());
  }

  get size(): number {
    return this.seen.size;
  }

  /**
   * Aircraft whose last presence is remembered for re-arming
   */
  get presenceCount(): number {
    return this.lastPresent.size;
  }

  reset(): void {
    this.seen.clear();
    this.lastPresent.clear();
    this.logger.info('Seen aircraft cleared');
  }
}
