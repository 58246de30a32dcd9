/**
 * Template Exporter
 *
 * Writes a table into a copy of an .xlsx template:
 *
 *   unloaded → template_loaded → data_cleared → data_written → saved
 *
 * Any failing step moves the exporter to `failed` and every later step
 * refuses to run. `export()` drives the whole sequence and always returns
 * an ExportOutcome.
 */

import ExcelJS from 'exceljs';
import type { Style, Workbook, Worksheet } from 'exceljs';
import * as fs from 'fs';
import * as path from 'path';
import {
  ColumnAdjustWarning,
  ExportError,
  ExportStateError,
  SaveError,
  TableShapeError,
  TemplateCorruptError,
  TemplateNotFoundError,
  WriteError,
  errorMessage,
} from './errors.js';
import { applyColumnWidths, computeColumnWidths, measureCellText, type MeasureText } from './column-width.js';
import type { CellScalar, ExportOutcome, ExportRequest, Table } from './types.js';
import { toWallClockUtc } from '../utils/date-helpers.js';
import { loggers, type Logger } from '../utils/logger.js';

export type ExportStage =
  | 'unloaded'
  | 'template_loaded'
  | 'data_cleared'
  | 'data_written'
  | 'saved'
  | 'failed';

export const HEADER_FILL_ARGB = 'FFD3D3D3';

export const NO_DATA_MESSAGE = 'No data to export';

export interface TemplateExporterOptions {
  logger?: Logger;
  measureText?: MeasureText;
}

export class TemplateExporter {
  private stage: ExportStage = 'unloaded';
  private failure: ExportError | null = null;
  private workbook: Workbook | null = null;
  private worksheet: Worksheet | null = null;
  private rowStyles: Map<number, Partial<Style>> = new Map();
  private writtenColumns: number[] = [];
  private readonly logger: Logger;
  private readonly measureText: MeasureText;

  constructor(
    private readonly request: ExportRequest,
    options: TemplateExporterOptions = {},
  ) {
    this.logger = (options.logger ?? loggers.export).child({
      view: request.entry.viewName,
    });
    this.measureText = options.measureText ?? measureCellText;
  }

  get currentStage(): ExportStage {
    return this.stage;
  }

  get failureReason(): ExportError | null {
    return this.failure;
  }

  // --------------------------------------------------------------------------
  // Steps
  // --------------------------------------------------------------------------

  async loadTemplate(): Promise<void> {
    this.expectStage('unloaded');
    const { templatePath, options } = this.request;

    await this.step(async () => {
      const stat = await fs.promises.stat(templatePath).catch(() => null);
      if (!stat || !stat.isFile()) {
        throw new TemplateNotFoundError(templatePath);
      }

      const workbook = new ExcelJS.Workbook();
      try {
        await workbook.xlsx.readFile(templatePath);
      } catch (error) {
        throw new TemplateCorruptError(templatePath, errorMessage(error));
      }

      this.workbook = workbook;
      this.worksheet = this.selectSheet(workbook, options.sheetName);
      this.stage = 'template_loaded';
      this.logger.info(`Template loaded: ${templatePath}`, { sheet: this.worksheet.name });
    });
  }

  /**
   * Deletes rows from the anchor to the sheet's last row. Rows below shift
   * up; rows above the anchor are not touched.
   */
  clearExistingData(): void {
    this.expectStage('template_loaded');
    const sheet = this.requireSheet();
    const { entry, options } = this.request;

    this.stepSync(() => {
      if (options.preserveFormatting) {
        this.captureRowStyles(sheet, entry.anchorRow);
      }

      const lastRow = sheet.rowCount;
      if (options.clearExisting && lastRow >= entry.anchorRow) {
        const count = lastRow - entry.anchorRow + 1;
        sheet.spliceRows(entry.anchorRow, count);
        this.logger.info(`Cleared rows ${entry.anchorRow}-${lastRow}`);
      }
      this.stage = 'data_cleared';
    });
  }

  writeData(table: Table): void {
    this.expectStage('data_cleared');
    const sheet = this.requireSheet();
    const { entry, options } = this.request;

    this.stepSync(() => {
      table.rows.forEach((row, index) => {
        if (row.length !== table.columns.length) {
          throw new TableShapeError(index, table.columns.length, row.length);
        }
      });

      try {
        let rowNumber = entry.anchorRow;

        if (options.includeHeaders) {
          table.columns.forEach((name, offset) => {
            const cell = sheet.getCell(rowNumber, entry.anchorCol + offset);
            cell.value = name;
            cell.font = { bold: true };
            cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } };
          });
          rowNumber++;
        }

        for (const row of table.rows) {
          row.forEach((value, offset) => {
            const col = entry.anchorCol + offset;
            const cell = sheet.getCell(rowNumber, col);
            const style = this.rowStyles.get(col);
            if (style) {
              cell.style = { ...style };
            }
            cell.value = toSheetValue(value);
          });
          rowNumber++;
        }
      } catch (error) {
        throw new WriteError(errorMessage(error));
      }

      this.writtenColumns = table.columns.map((_, offset) => entry.anchorCol + offset);
      this.stage = 'data_written';
      this.logger.info(`Wrote ${table.rows.length} row(s)`, {
        anchor: `${entry.anchorRow},${entry.anchorCol}`,
        headers: options.includeHeaders,
      });
    });
  }

  /**
   * Never fails the export: widths are applied only when every cell could
   * be measured, otherwise the template's widths stay and a warning is
   * logged.
   */
  autoAdjustColumns(): void {
    this.expectStage('data_written');
    const sheet = this.requireSheet();

    try {
      const widths = computeColumnWidths(sheet, this.writtenColumns, this.measureText);
      applyColumnWidths(sheet, widths);
      this.logger.debug('Column widths adjusted', { columns: this.writtenColumns.length });
    } catch (error) {
      const warning = new ColumnAdjustWarning(errorMessage(error));
      this.logger.warn(warning.message);
    }
  }

  async save(): Promise<void> {
    this.expectStage('data_written');
    const workbook = this.requireWorkbook();
    const { outputPath } = this.request;

    await this.step(async () => {
      try {
        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        await workbook.xlsx.writeFile(outputPath);
      } catch (error) {
        throw new SaveError(outputPath, errorMessage(error));
      }
      this.stage = 'saved';
      this.logger.info(`Saved ${outputPath}`);
    });
  }

  // --------------------------------------------------------------------------
  // Pipeline
  // --------------------------------------------------------------------------

  async export(table: Table): Promise<ExportOutcome> {
    const { entry, outputPath, options } = this.request;

    if (table.rows.length === 0) {
      this.logger.warn(NO_DATA_MESSAGE);
      return {
        viewName: entry.viewName,
        success: false,
        status: 'empty',
        message: NO_DATA_MESSAGE,
      };
    }

    try {
      await this.loadTemplate();
      this.clearExistingData();
      this.writeData(table);
      if (options.autoAdjustColumns) {
        this.autoAdjustColumns();
      }
      await this.save();

      return {
        viewName: entry.viewName,
        success: true,
        status: 'success',
        message: `Exported ${table.rows.length} row(s) to ${outputPath}`,
        outputPath,
        recordCount: table.rows.length,
      };
    } catch (error) {
      const failure = this.failure ?? toExportError(error);
      this.logger.error('Export failed', failure);
      return {
        viewName: entry.viewName,
        success: false,
        status: 'failed',
        message: failure.message,
        errorCode: failure.code,
      };
    } finally {
      this.release();
    }
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private selectSheet(workbook: Workbook, sheetName: string): Worksheet {
    const named = workbook.getWorksheet(sheetName);
    if (named) return named;

    const sheets = workbook.worksheets;
    if (sheets.length === 0) {
      this.logger.warn(`Template has no sheets, adding '${sheetName}'`);
      return workbook.addWorksheet(sheetName);
    }

    const activeTab = workbook.views?.[0]?.activeTab ?? 0;
    const fallback = sheets[activeTab] ?? sheets[0];
    const originalName = fallback.name;
    try {
      fallback.name = sheetName;
      this.logger.warn(`Sheet '${sheetName}' not found, using '${originalName}' renamed to '${sheetName}'`);
    } catch (error) {
      this.logger.warn(`Sheet '${sheetName}' not found, using '${originalName}' (rename failed: ${errorMessage(error)})`);
    }
    return fallback;
  }

  private captureRowStyles(sheet: Worksheet, rowNumber: number): void {
    this.rowStyles.clear();
    if (rowNumber > sheet.rowCount) return;

    sheet.getRow(rowNumber).eachCell({ includeEmpty: true }, (cell, col) => {
      if (col >= this.request.entry.anchorCol && Object.keys(cell.style).length > 0) {
        this.rowStyles.set(col, { ...cell.style });
      }
    });
  }

  private expectStage(expected: ExportStage): void {
    if (this.stage !== expected) {
      throw new ExportStateError(expected, this.stage);
    }
  }

  private requireWorkbook(): Workbook {
    if (!this.workbook) {
      throw new ExportStateError('template_loaded', this.stage);
    }
    return this.workbook;
  }

  private requireSheet(): Worksheet {
    if (!this.worksheet) {
      throw new ExportStateError('template_loaded', this.stage);
    }
    return this.worksheet;
  }

  private async step(fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  private stepSync(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  private fail(error: unknown): void {
    this.failure = toExportError(error);
    this.stage = 'failed';
  }

  private release(): void {
    this.workbook = null;
    this.worksheet = null;
    this.rowStyles.clear();
  }
}

/**
 * Table dates carry local wall-clock time (as pg parses `date` and
 * `timestamp` columns); the cell gets the same wall-clock reading.
 */
export function toSheetValue(value: CellScalar): CellScalar {
  return value instanceof Date ? toWallClockUtc(value) : value;
}

function toExportError(error: unknown): ExportError {
  if (error instanceof ExportError) return error;
  return new ExportError('UNEXPECTED', errorMessage(error));
}

/**
 * Convenience wrapper: one exporter per request.
 */
export async function exportTableToTemplate(
  table: Table,
  request: ExportRequest,
  options?: TemplateExporterOptions,
): Promise<ExportOutcome> {
  return new TemplateExporter(request, options).export(table);
}
