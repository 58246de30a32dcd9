import type { ExportOutcome, ExportStatus } from '../export/types.js';
import type { BatchReport } from './batch-export.js';

const MARKERS: Record<ExportStatus, string> = {
  success: 'OK',
  empty: 'EMPTY',
  failed: 'FAIL',
  cancelled: 'SKIP',
};

export function formatOutcome(outcome: ExportOutcome): string {
  const marker = MARKERS[outcome.status].padEnd(5);
  if (outcome.status === 'success') {
    return `${marker} ${outcome.viewName}: ${outcome.recordCount ?? 0} row(s) -> ${outcome.outputPath ?? ''}`;
  }
  return `${marker} ${outcome.viewName}: ${outcome.message}`;
}

export function formatStatusLine(report: BatchReport): string {
  const total = report.outcomes.length;
  const label = report.status === 'clean' ? 'Completed' : 'Completed with failures';
  const parts = [`${report.successCount}/${total} exported`];
  if (report.emptyCount > 0) parts.push(`${report.emptyCount} empty`);
  if (report.failureCount > 0) parts.push(`${report.failureCount} failed`);
  if (report.cancelled) parts.push('cancelled');
  return `${label}: ${parts.join(', ')}`;
}

/**
 * Aggregate status line followed by one line per view.
 */
export function formatBatchSummary(report: BatchReport): string[] {
  return [formatStatusLine(report), ...report.outcomes.map(formatOutcome)];
}
