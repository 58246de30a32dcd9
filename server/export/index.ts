export {
  type CellScalar,
  type Table,
  type ViewEntry,
  type AnchorDefaults,
  type ExportOptions,
  type ExportRequest,
  type ExportStatus,
  type ExportErrorCode,
  type ExportOutcome,
  DEFAULT_EXPORT_OPTIONS,
  createTable,
} from './types.js';

export {
  ExportError,
  ConfigParseError,
  ViewNotConfiguredError,
  TemplateNotFoundError,
  TemplateCorruptError,
  DataSourceError,
  WriteError,
  SaveError,
  ColumnAdjustWarning,
  ExportStateError,
  TableShapeError,
  errorMessage,
} from './errors.js';

export {
  type ExportStage,
  type TemplateExporterOptions,
  TemplateExporter,
  exportTableToTemplate,
  toSheetValue,
  HEADER_FILL_ARGB,
  NO_DATA_MESSAGE,
} from './template-exporter.js';

export {
  type MeasureText,
  MAX_COLUMN_WIDTH,
  COLUMN_PADDING,
  measureCellText,
  computeColumnWidths,
  applyColumnWidths,
} from './column-width.js';
