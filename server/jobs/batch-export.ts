/**
 * Batch Export
 *
 * Runs a list of configured views through the template exporter one at a
 * time. Every requested view gets exactly one outcome, in input order; a
 * failing view never stops the views after it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { ViewRegistry } from '../config/view-registry.js';
import { FALLBACK_ANCHOR } from '../config/view-registry.js';
import { withViewSource, type ViewDataSourceFactory } from '../connectors/postgres/view-source.js';
import { ExportError, TemplateNotFoundError, errorMessage } from '../export/errors.js';
import { NO_DATA_MESSAGE, TemplateExporter, type TemplateExporterOptions } from '../export/template-exporter.js';
import type {
  AnchorDefaults,
  ExportOptions,
  ExportOutcome,
  ExportRequest,
  Table,
  ViewEntry,
} from '../export/types.js';
import { formatTimestamp } from '../utils/date-helpers.js';
import { loggers, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface BatchDependencies {
  registry: ViewRegistry;
  openSource: ViewDataSourceFactory;
  templatesRoot: string;
  outputRoot: string;
  schema: string;
  logger?: Logger;
  exporter?: TemplateExporterOptions;
}

export type BatchPhase = 'started' | 'finished';

export interface BatchProgress {
  index: number;     // 1-based position in the batch
  total: number;
  viewName: string;
  phase: BatchPhase;
  outcome?: ExportOutcome;
}

export interface BatchOptions {
  exportOptions: ExportOptions;
  onProgress?: (progress: BatchProgress) => void;
  /** Checked between views only; an export already running completes. */
  signal?: AbortSignal;
  now?: () => Date;
}

export type BatchStatus = 'clean' | 'partial';

export interface BatchReport {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  outcomes: ExportOutcome[];
  successCount: number;
  emptyCount: number;
  failureCount: number;
  status: BatchStatus;
  cancelled: boolean;
}

const defaultLogger = loggers.batch;

// ============================================================================
// Single view
// ============================================================================

function failed(viewName: string, error: ExportError): ExportOutcome {
  return {
    viewName,
    success: false,
    status: 'failed',
    message: error.message,
    errorCode: error.code,
  };
}

function emptyOutcome(viewName: string): ExportOutcome {
  return { viewName, success: false, status: 'empty', message: NO_DATA_MESSAGE };
}

async function fileExists(filePath: string): Promise<boolean> {
  const stat = await fs.promises.stat(filePath).catch(() => null);
  return stat !== null && stat.isFile();
}

async function fetchTable(
  deps: BatchDependencies,
  viewName: string,
): Promise<Table> {
  return withViewSource(deps.openSource, source => source.fetchView(deps.schema, viewName));
}

/**
 * Resolve, fetch and export one configured view. Never throws.
 */
export async function exportView(
  viewName: string,
  deps: BatchDependencies,
  options: BatchOptions,
): Promise<ExportOutcome> {
  const logger = deps.logger ?? defaultLogger;

  try {
    const entry = deps.registry.get(viewName);
    if (!entry) {
      logger.warn(`Configuration not found for ${viewName}`);
      return {
        viewName,
        success: false,
        status: 'failed',
        message: 'Configuration not found',
        errorCode: 'VIEW_NOT_CONFIGURED',
      };
    }

    // Checked before any connection is opened
    const templatePath = path.resolve(deps.templatesRoot, entry.templateName);
    if (!(await fileExists(templatePath))) {
      logger.warn(`Template not found for ${viewName}: ${templatePath}`);
      return failed(viewName, new TemplateNotFoundError(entry.templateName));
    }

    const table = await fetchTable(deps, viewName);
    if (table.rows.length === 0) {
      logger.warn(`${viewName} returned no rows`);
      return emptyOutcome(viewName);
    }

    const now = options.now?.() ?? new Date();
    const outputName = deps.registry.generateOutputFilename(viewName, now);
    const request: ExportRequest = {
      entry,
      templatePath,
      outputPath: path.resolve(deps.outputRoot, outputName),
      options: options.exportOptions,
    };

    return await new TemplateExporter(request, deps.exporter).export(table);
  } catch (error) {
    const exportError = error instanceof ExportError
      ? error
      : new ExportError('UNEXPECTED', errorMessage(error));
    logger.error(`Export of ${viewName} failed`, exportError);
    return failed(viewName, exportError);
  }
}

// ============================================================================
// Batch
// ============================================================================

export function summarizeOutcomes(outcomes: ExportOutcome[]): Pick<
  BatchReport,
  'successCount' | 'emptyCount' | 'failureCount' | 'status'
> {
  const successCount = outcomes.filter(o => o.status === 'success').length;
  const emptyCount = outcomes.filter(o => o.status === 'empty').length;
  const failureCount = outcomes.filter(o => o.status === 'failed' || o.status === 'cancelled').length;
  return {
    successCount,
    emptyCount,
    failureCount,
    status: failureCount === 0 ? 'clean' : 'partial',
  };
}

export async function runBatchExport(
  viewNames: Iterable<string>,
  deps: BatchDependencies,
  options: BatchOptions,
): Promise<BatchReport> {
  const logger = deps.logger ?? defaultLogger;
  const runId = uuidv4();
  const startedAt = new Date();
  const names = Array.from(new Set(viewNames));
  const outcomes: ExportOutcome[] = [];
  let cancelled = false;

  logger.info(`Batch ${runId} started`, { views: names.length });

  for (const [i, viewName] of names.entries()) {
    const index = i + 1;

    if (options.signal?.aborted) {
      cancelled = true;
      outcomes.push({
        viewName,
        success: false,
        status: 'cancelled',
        message: 'Cancelled before export',
        errorCode: 'CANCELLED',
      });
      continue;
    }

    options.onProgress?.({ index, total: names.length, viewName, phase: 'started' });
    const outcome = await exportView(viewName, deps, options);
    outcomes.push(outcome);
    options.onProgress?.({ index, total: names.length, viewName, phase: 'finished', outcome });
  }

  const summary = summarizeOutcomes(outcomes);
  const report: BatchReport = {
    runId,
    startedAt,
    finishedAt: new Date(),
    outcomes,
    ...summary,
    cancelled,
  };

  logger.info(`Batch ${runId} finished: ${summary.status}`, {
    success: summary.successCount,
    empty: summary.emptyCount,
    failed: summary.failureCount,
  });
  return report;
}

// ============================================================================
// Ad hoc export (explicit template file, no registry entry needed)
// ============================================================================

export interface AdHocExportRequest {
  viewName: string;
  templatePath: string;
  /** Full output path; wins over `outputDir`. */
  outputPath?: string;
  outputDir?: string;
  anchor?: AnchorDefaults;
}

export async function runAdHocExport(
  request: AdHocExportRequest,
  deps: Pick<BatchDependencies, 'openSource' | 'schema' | 'logger' | 'exporter'>,
  options: Omit<BatchOptions, 'signal' | 'onProgress'>,
): Promise<ExportOutcome> {
  const logger = deps.logger ?? defaultLogger;
  const { viewName } = request;

  try {
    const templatePath = path.resolve(request.templatePath);
    if (!(await fileExists(templatePath))) {
      return failed(viewName, new TemplateNotFoundError(request.templatePath));
    }

    const now = options.now?.() ?? new Date();
    const outputPath = path.resolve(
      request.outputPath ??
      path.join(request.outputDir ?? '.', `output_${formatTimestamp(now)}.xlsx`),
    );

    const anchor = request.anchor ?? FALLBACK_ANCHOR;
    const entry: ViewEntry = Object.freeze({
      viewName,
      templateName: path.basename(templatePath),
      outputPattern: path.basename(outputPath),
      anchorRow: anchor.row,
      anchorCol: anchor.col,
    });

    const table = await withViewSource(deps.openSource, source => source.fetchView(deps.schema, viewName));
    if (table.rows.length === 0) {
      return emptyOutcome(viewName);
    }

    return await new TemplateExporter(
      { entry, templatePath, outputPath, options: options.exportOptions },
      deps.exporter,
    ).export(table);
  } catch (error) {
    const exportError = error instanceof ExportError
      ? error
      : new ExportError('UNEXPECTED', errorMessage(error));
    logger.error(`Export of ${viewName} failed`, exportError);
    return failed(viewName, exportError);
  }
}
