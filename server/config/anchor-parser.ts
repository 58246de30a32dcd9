/**
 * Anchor Parser
 *
 * Parses the optional third segment of a view definition into the cell
 * where exported rows start. Two notations are accepted:
 *
 *   "3,2"  row,col (1-based integers)
 *   "B3"   column letters followed by the row number
 *
 * Anything else resolves to `{ kind: 'default' }` and the caller's
 * defaults apply; an anchor never rejects the whole entry.
 */

export const MAX_ROWS = 1048576;
export const MAX_COLUMNS = 16384;

export type AnchorParse =
  | { kind: 'anchor'; row: number; col: number }
  | { kind: 'default'; reason?: string };

const ROW_COL_PATTERN = /^(\d+)\s*,\s*(\d+)$/;
const CELL_PATTERN = /^([A-Za-z]{1,3})(\d+)$/;

export function parseAnchor(text: string | undefined): AnchorParse {
  const value = (text ?? '').trim();
  if (!value) {
    return { kind: 'default' };
  }

  if (value.includes(',')) {
    const match = ROW_COL_PATTERN.exec(value);
    if (!match) {
      return { kind: 'default', reason: `'${value}' is not "row,col"` };
    }
    return checkBounds(Number(match[1]), Number(match[2]), value);
  }

  const cell = CELL_PATTERN.exec(value);
  if (cell) {
    return checkBounds(Number(cell[2]), columnLettersToIndex(cell[1]), value);
  }

  return { kind: 'default', reason: `'${value}' is not a cell reference` };
}

/**
 * "A" -> 1, "Z" -> 26, "AA" -> 27, "ZZ" -> 702.
 */
export function columnLettersToIndex(letters: string): number {
  let index = 0;
  for (const ch of letters.toUpperCase()) {
    const code = ch.charCodeAt(0);
    if (code < 65 || code > 90) {
      throw new RangeError(`Invalid column letter '${ch}'`);
    }
    index = index * 26 + (code - 64);
  }
  return index;
}

function checkBounds(row: number, col: number, source: string): AnchorParse {
  if (!Number.isInteger(row) || row < 1 || row > MAX_ROWS) {
    return { kind: 'default', reason: `row out of range in '${source}'` };
  }
  if (!Number.isInteger(col) || col < 1 || col > MAX_COLUMNS) {
    return { kind: 'default', reason: `column out of range in '${source}'` };
  }
  return { kind: 'anchor', row, col };
}
