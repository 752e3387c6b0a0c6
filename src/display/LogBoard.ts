import { createLogger } from '../utils/logger';
import { gridToText, type BoardGrid } from './boardGrid';
import type { DisplayDevice } from './DisplayDevice';

/**
 * Stand-in board that writes each grid to the log.
 * Used when no board is configured.
 */
export class LogBoard implements DisplayDevice {
  readonly kind = 'log';
  private readonly logger = createLogger({ component: 'LogBoard' });
  private last: BoardGrid | null = null;

  async render(grid: BoardGrid): Promise<void> {
    this.last = grid.map((row) => [...row]);
    this.logger.info(`✈️ New aircraft\n${gridToText(grid)}`);
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  lastRendered(): BoardGrid | null {
    return this.last;
  }
}
