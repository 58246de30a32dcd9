import type { ExportErrorCode } from './types.js';

// ============================================================================
// Error Classes
// ============================================================================

export class ExportError extends Error {
  constructor(
    public code: ExportErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ExportError';
  }
}

/**
 * One skipped configuration line. Collected on the registry, never thrown
 * out of the loader.
 */
export class ConfigParseError extends ExportError {
  constructor(
    public line: number,
    public reason: string,
    public key?: string,
  ) {
    super('CONFIG_PARSE', `Line ${line}${key ? ` (${key})` : ''}: ${reason}`);
    this.name = 'ConfigParseError';
  }
}

export class ViewNotConfiguredError extends ExportError {
  constructor(public viewName: string) {
    super('VIEW_NOT_CONFIGURED', `Configuration not found for view '${viewName}'`);
    this.name = 'ViewNotConfiguredError';
  }
}

export class TemplateNotFoundError extends ExportError {
  constructor(public templatePath: string) {
    super('TEMPLATE_NOT_FOUND', `Template not found: ${templatePath}`);
    this.name = 'TemplateNotFoundError';
  }
}

export class TemplateCorruptError extends ExportError {
  constructor(
    public templatePath: string,
    detail: string,
  ) {
    super('TEMPLATE_CORRUPT', `Template could not be read: ${templatePath} (${detail})`);
    this.name = 'TemplateCorruptError';
  }
}

export class DataSourceError extends ExportError {
  constructor(
    message: string,
    public driverMessage?: string,
  ) {
    super('DATA_SOURCE', driverMessage ? `${message}: ${driverMessage}` : message);
    this.name = 'DataSourceError';
  }
}

export class WriteError extends ExportError {
  constructor(detail: string) {
    super('WRITE_FAILED', `Failed to write data: ${detail}`);
    this.name = 'WriteError';
  }
}

export class SaveError extends ExportError {
  constructor(
    public outputPath: string,
    detail: string,
  ) {
    super('SAVE_FAILED', `Failed to save workbook to ${outputPath}: ${detail}`);
    this.name = 'SaveError';
  }
}

/** Logged only; column sizing never fails an export. */
export class ColumnAdjustWarning extends ExportError {
  constructor(detail: string) {
    super('COLUMN_ADJUST', `Column widths left unchanged: ${detail}`);
    this.name = 'ColumnAdjustWarning';
  }
}

export class ExportStateError extends ExportError {
  constructor(expected: string, actual: string) {
    super('INVALID_STATE', `Expected exporter state '${expected}', found '${actual}'`);
    this.name = 'ExportStateError';
  }
}

export class TableShapeError extends ExportError {
  constructor(
    public rowIndex: number,
    public expected: number,
    public actual: number,
  ) {
    super('TABLE_SHAPE', `Row ${rowIndex} has ${actual} values, expected ${expected}`);
    this.name = 'TableShapeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
