import boardCharacters from '../data/boardCharacters.json';

/**
 * Split-flap board encoding: 6 rows of 22 character codes.
 * Unsupported characters become blank.
 */

export const BOARD_ROWS = 6;
export const BOARD_COLUMNS = 22;
export const BLANK = 0;

export type BoardGrid = number[][];

const VARIATION_SELECTOR = '\uFE0F';

const CHAR_TO_CODE: ReadonlyMap<string, number> = new Map(Object.entries(boardCharacters));
const CODE_TO_CHAR: ReadonlyMap<number, string> = new Map(
  Object.entries(boardCharacters).map(([char, code]): [number, string] => [code, char])
);

export function charToCode(char: string): number {
  return CHAR_TO_CODE.get(char.toUpperCase()) ?? BLANK;
}

/**
 * Encode one line, truncated and padded to the board width.
 * Iterates code points so colour chip emoji count as one column.
 */
export function encodeLine(line: string): number[] {
  const codes = Array.from(line)
    .filter((char) => char !== VARIATION_SELECTOR)
    .slice(0, BOARD_COLUMNS)
    .map(charToCode);

  while (codes.length < BOARD_COLUMNS) {
    codes.push(BLANK);
  }
  return codes;
}

export function blankGrid(): BoardGrid {
  return Array.from({ length: BOARD_ROWS }, () => new Array<number>(BOARD_COLUMNS).fill(BLANK));
}

/**
 * Lines beyond the sixth are dropped; missing lines are blank
 */
export function linesToGrid(lines: readonly string[]): BoardGrid {
  const grid = lines.slice(0, BOARD_ROWS).map(encodeLine);
  while (grid.length < BOARD_ROWS) {
    grid.push(encodeLine(''));
  }
  return grid;
}

export function textToGrid(text: string): BoardGrid {
  return linesToGrid(text.split('\n'));
}

/**
 * Decode a grid for logs and the board read-back; trailing blanks are trimmed
 */
export function gridToText(grid: readonly (readonly number[])[]): string {
  return grid
    .map((row) =>
      row
        .map((code) => CODE_TO_CHAR.get(code) ?? ' ')
        .join('')
        .trimEnd()
    )
    .join('\n');
}

/**
 * True when the value is a 6×22 array of known codes
 */
export function isBoardGrid(value: unknown): value is BoardGrid {
  return (
    Array.isArray(value) &&
    value.length === BOARD_ROWS &&
    value.every(
      (row: unknown) =>
        Array.isArray(row) &&
        row.length === BOARD_COLUMNS &&
        row.every((code: unknown) => typeof code === 'number' && Number.isInteger(code))
    )
  );
}
