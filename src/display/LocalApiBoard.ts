import axios from 'axios';
import { DisplayError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { gridToText, isBoardGrid, type BoardGrid } from './boardGrid';
import type { DisplayDevice } from './DisplayDevice';

interface BoardReadResponse {
  message?: unknown;
}

export interface LocalApiBoardOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
}

/**
 * Board on the local network, driven through its local HTTP API
 */
export class LocalApiBoard implements DisplayDevice {
  readonly kind = 'local-api';
  private readonly logger = createLogger({ component: 'LocalApiBoard' });
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: LocalApiBoardOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/local-api/message`;
    this.headers = {
      'X-Vestaboard-Local-Api-Key': options.apiKey,
      'Content-Type': 'application/json',
    };
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async render(grid: BoardGrid): Promise<void> {
    try {
      await axios.post(this.url, { characters: grid }, { headers: this.headers, timeout: this.timeoutMs });
      this.logger.debug({ text: gridToText(grid) }, 'Board updated');
    } catch (error) {
      const detail = describeError(error);
      throw new DisplayError(
        detail.status === undefined ? `Board unreachable: ${detail.message}` : `Board rejected message: HTTP ${detail.status}`,
        { cause: error }
      );
    }
  }

  /**
   * Current board contents, or null when the board does not return a grid
   */
  async read(): Promise<BoardGrid | null> {
    try {
      const response = await axios.get<BoardReadResponse>(this.url, { headers: this.headers, timeout: this.timeoutMs });
      const message = response.data?.message;
      return isBoardGrid(message) ? message : null;
    } catch (error) {
      throw new DisplayError(`Board read failed: ${describeError(error).message}`, { cause: error });
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      return (await this.read()) !== null;
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Board connection test failed');
      return false;
    }
  }
}
