import type { AircraftMetadata, MetadataSource } from '../types/Aircraft';
import { NotFoundError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

/**
 * Tries each metadata source in order until one knows the aircraft.
 *
 * Reports not-found only when every source does. If any source failed for
 * another reason, the last such failure is rethrown so the caller can retry.
 */
export class FallbackMetadataSource implements MetadataSource {
  private readonly logger = createLogger({ component: 'FallbackMetadataSource' });

  constructor(private readonly sources: readonly MetadataSource[]) {
    if (sources.length === 0) {
      throw new RangeError('FallbackMetadataSource needs at least one source');
    }
  }

  getName(): string {
    return this.sources.map((source) => source.getName()).join('+');
  }

  async fetchMetadata(id: string, signal?: AbortSignal): Promise<AircraftMetadata> {
    let lastFailure: unknown = null;

    for (const source of this.sources) {
      try {
        return await source.fetchMetadata(id, signal);
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          lastFailure = error;
          this.logger.warn({ id, source: source.getName(), error: describeError(error) }, 'Metadata source failed');
        }
        if (signal?.aborted) {
          break;
        }
      }
    }

    if (lastFailure !== null) {
      throw lastFailure;
    }
    throw new NotFoundError(`No metadata source knows ${id}`);
  }
}
