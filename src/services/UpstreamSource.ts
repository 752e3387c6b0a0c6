import axios from 'axios';
import { createLogger, type Logger } from '../utils/logger';

// =============================================================================
// Types
// =============================================================================

export interface UpstreamSourceConfig {
  name: string;
  baseUrl: string;
  timeoutMs?: number;
}

export interface UpstreamSourceStats {
  requests: number;
  failures: number;
  lastRequestTime?: Date;
  isHealthy: boolean;
}

export interface RequestOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

// =============================================================================
// Upstream Source
// =============================================================================

/**
 * Base class for every HTTP upstream (positions, metadata).
 * Owns the axios call and per-source request statistics;
 * subclasses only translate payloads into domain types.
 */
export abstract class UpstreamSource {
  protected readonly config: Required<UpstreamSourceConfig>;
  protected readonly logger: Logger;
  private readonly stats: UpstreamSourceStats = {
    requests: 0,
    failures: 0,
    isHealthy: true,
  };

  constructor(config: UpstreamSourceConfig) {
    this.config = {
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? 10_000,
    };
    this.logger = createLogger({ component: 'UpstreamSource', source: config.name });
  }

  getName(): string {
    return this.config.name;
  }

  getStats(): UpstreamSourceStats {
    return { ...this.stats };
  }

  /**
   * GET a JSON document relative to the base URL.
   * A 404 counts as a healthy answer; the caller decides what it means.
   */
  protected async get<T>(path: string, options: RequestOptions = {}): Promise<T> {
    this.stats.requests += 1;
    this.stats.lastRequestTime = new Date();

    try {
      const response = await axios.get<T>(`${this.config.baseUrl}/${path.replace(/^\/+/, '')}`, {
        params: options.params,
        headers: options.headers,
        signal: options.signal,
        timeout: this.config.timeoutMs,
      });
      this.stats.isHealthy = true;
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        this.stats.isHealthy = true;
      } else {
        this.stats.failures += 1;
        this.stats.isHealthy = false;
        this.logger.debug(
          axios.isAxiosError(error)
            ? { path, error: error.message, status: error.response?.status }
            : { path, error },
          'Upstream request failed'
        );
      }
      throw error;
    }
  }
}
