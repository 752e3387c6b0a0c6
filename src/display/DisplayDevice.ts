import type { BoardGrid } from './boardGrid';

export type DisplayKind = 'local-api' | 'log';

/**
 * Anything that can show a 6×22 grid.
 * render() rejects with DisplayError when the grid was not shown.
 */
export interface DisplayDevice {
  readonly kind: DisplayKind;
  render(grid: BoardGrid): Promise<void>;
  testConnection(): Promise<boolean>;
}
