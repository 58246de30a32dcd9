import { format } from "date-fns";

export function formatDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function formatTimestamp(date: Date): string {
  return format(date, "yyyyMMdd_HHmmss");
}

export function formatTime(date: Date): string {
  return format(date, "HHmmss");
}

export function formatDateTime(date: Date): string {
  return format(date, "yyyy-MM-dd HH:mm:ss");
}

/**
 * Local wall-clock fields moved into UTC fields. Workbooks store dates
 * without a zone and exceljs serialises from UTC, so a Date is shifted
 * this way before it is written to a cell.
 */
export function toWallClockUtc(date: Date): Date {
  return new Date(
    Date.UTC(
      date.getFullYear(),
      date.getMonth(),
      date.getDate(),
      date.getHours(),
      date.getMinutes(),
      date.getSeconds(),
      date.getMilliseconds(),
    ),
  );
}

/** Inverse of toWallClockUtc. */
export function fromWallClockUtc(date: Date): Date {
  return new Date(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    date.getUTCMilliseconds(),
  );
}
