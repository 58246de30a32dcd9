/**
 * Export Types
 *
 * Shared shapes for the configuration layer, the data source and the
 * template export engine.
 */

import { TableShapeError } from './errors.js';

// ============================================================================
// Table
// ============================================================================

export type CellScalar = string | number | boolean | Date | null;

export interface Table {
  columns: string[];
  rows: CellScalar[][];
}

/**
 * Build a table, rejecting rows whose width differs from the column list.
 */
export function createTable(columns: string[], rows: CellScalar[][]): Table {
  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new TableShapeError(index, columns.length, row.length);
    }
  });
  return { columns: [...columns], rows };
}

// ============================================================================
// Configuration
// ============================================================================

export interface ViewEntry {
  readonly viewName: string;
  readonly templateName: string;
  readonly outputPattern: string;
  readonly anchorRow: number;   // 1-based
  readonly anchorCol: number;   // 1-based
}

export interface AnchorDefaults {
  row: number;
  col: number;
}

// ============================================================================
// Export request / outcome
// ============================================================================

export interface ExportOptions {
  clearExisting: boolean;
  includeHeaders: boolean;
  autoAdjustColumns: boolean;
  preserveFormatting: boolean;
  sheetName: string;
}

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
  clearExisting: true,
  includeHeaders: false,
  autoAdjustColumns: true,
  preserveFormatting: true,
  sheetName: 'Data',
};

export interface ExportRequest {
  entry: ViewEntry;
  templatePath: string;
  outputPath: string;
  options: ExportOptions;
}

export type ExportStatus = 'success' | 'empty' | 'failed' | 'cancelled';

export type ExportErrorCode =
  | 'CONFIG_PARSE'
  | 'VIEW_NOT_CONFIGURED'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_CORRUPT'
  | 'DATA_SOURCE'
  | 'WRITE_FAILED'
  | 'SAVE_FAILED'
  | 'COLUMN_ADJUST'
  | 'INVALID_STATE'
  | 'TABLE_SHAPE'
  | 'CANCELLED'
  | 'UNEXPECTED';

export interface ExportOutcome {
  viewName: string;
  success: boolean;
  status: ExportStatus;
  message: string;
  outputPath?: string;
  recordCount?: number;
  errorCode?: ExportErrorCode;
}
