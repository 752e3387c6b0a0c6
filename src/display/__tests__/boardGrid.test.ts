import { describe, it, expect } from 'vitest';
import { BOARD_COLUMNS, BOARD_ROWS, blankGrid, encodeLine, gridToText, isBoardGrid, textToGrid } from '../boardGrid';

describe('boardGrid', () => {
  describe('encodeLine', () => {
    it('should upper-case and pad to the board width', () => {
      const codes = encodeLine('Hello');

      expect(codes.slice(0, 5)).toEqual([8, 5, 12, 12, 15]);
      expect(codes).toHaveLength(BOARD_COLUMNS);
      expect(codes.slice(5).every((code) => code === 0)).toBe(true);
    });

    it('should encode digits and punctuation', () => {
      expect(encodeLine('10,5°').slice(0, 5)).toEqual([27, 36, 55, 31, 62]);
    });

    it('should blank unsupported characters', () => {
      expect(encodeLine('A*B~').slice(0, 4)).toEqual([1, 0, 2, 0]);
    });

    it('should count a colour chip as one column', () => {
      expect(encodeLine('🔴A🟢').slice(0, 4)).toEqual([63, 1, 66, 0]);
    });

    it('should ignore emoji variation selectors', () => {
      expect(encodeLine('⚪️A').slice(0, 2)).toEqual([69, 1]);
    });

    it('should truncate long lines', () => {
      const codes = encodeLine('ABCDEFGHIJKLMNOPQRSTUVWXYZ');

      expect(codes).toHaveLength(BOARD_COLUMNS);
      expect(codes[BOARD_COLUMNS - 1]).toBe(22);
    });
  });

  describe('textToGrid', () => {
    it('should fill missing rows with blanks', () => {
      const grid = textToGrid('ONE\nTWO');

      expect(grid).toHaveLength(BOARD_ROWS);
      expect(grid[2]).toEqual(new Array(BOARD_COLUMNS).fill(0));
    });

    it('should drop rows beyond the sixth', () => {
      expect(textToGrid('1\n2\n3\n4\n5\n6\n7')).toHaveLength(BOARD_ROWS);
    });
  });

  describe('gridToText', () => {
    it('should decode and trim trailing blanks', () => {
      expect(gridToText(textToGrid('Hello world\n\n12,500 ft'))).toBe('HELLO WORLD\n\n12,500 FT\n\n\n');
    });
  });

  describe('isBoardGrid', () => {
    it('should accept a full grid and reject other shapes', () => {
      expect(isBoardGrid(blankGrid())).toBe(true);
      expect(isBoardGrid([[0]])).toBe(false);
      expect(isBoardGrid('HELLO')).toBe(false);
    });
  });
});
