import type { Cell, Worksheet } from 'exceljs';
import { formatDateTime, fromWallClockUtc } from '../utils/date-helpers.js';

export const MAX_COLUMN_WIDTH = 50;
export const COLUMN_PADDING = 2;

export type MeasureText = (cell: Cell) => number;

/**
 * Displayed character length of a cell. Written dates hold wall-clock
 * time in their UTC fields and count as `yyyy-MM-dd HH:mm:ss`; everything else uses exceljs' text rendering
 * (formula results, rich text and hyperlinks included).
 */
export const measureCellText: MeasureText = (cell) => {
  if (cell.value instanceof Date) {
    return formatDateTime(fromWallClockUtc(cell.value)).length;
  }
  return cell.text.length;
};

function isEmpty(cell: Cell): boolean {
  return cell.value === null || cell.value === undefined || cell.value === '';
}

/**
 * Width per column: `min(longest + 2, 50)` over every non-empty cell,
 * including template cells above the data region. Throws if a measurement
 * throws; nothing is applied here.
 */
export function computeColumnWidths(
  sheet: Worksheet,
  columns: number[],
  measure: MeasureText = measureCellText,
): Map<number, number> {
  const widths = new Map<number, number>();

  for (const col of columns) {
    let maxLength = 0;
    sheet.getColumn(col).eachCell({ includeEmpty: false }, cell => {
      if (isEmpty(cell)) return;
      maxLength = Math.max(maxLength, measure(cell));
    });
    widths.set(col, Math.min(maxLength + COLUMN_PADDING, MAX_COLUMN_WIDTH));
  }

  return widths;
}

export function applyColumnWidths(sheet: Worksheet, widths: Map<number, number>): void {
  for (const [col, width] of widths) {
    sheet.getColumn(col).width = width;
  }
}
