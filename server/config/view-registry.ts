/**
 * View Registry
 *
 * Parses the flat `key=value` configuration text into view definitions:
 *
 *   SALES_REPORT=sales_template.xlsx:sales_{date}.xlsx:B3
 *
 * Reserved keys (connection and global export settings) are consumed by
 * app-config.ts and skipped here. Malformed lines are dropped with a
 * diagnostic; loading never throws.
 */

import { parseAnchor, type AnchorParse } from './anchor-parser.js';
import { ConfigParseError, ViewNotConfiguredError } from '../export/errors.js';
import type { AnchorDefaults, ViewEntry } from '../export/types.js';
import { formatDate, formatTime, formatTimestamp } from '../utils/date-helpers.js';
import { loggers, type Logger } from '../utils/logger.js';

export const RESERVED_KEY_PREFIXES = [
  'DB_',
  'TEMPLATES_',
  'OUTPUT_',
  'DEFAULT_',
  'AUTO_',
  'PRESERVE_',
  'SHEET_',
  'INCLUDE_',
  'CLEAR_',
] as const;

export const TEMPLATE_EXTENSIONS = ['.xlsx', '.xlsm'] as const;

export const FALLBACK_ANCHOR: AnchorDefaults = { row: 2, col: 1 };

const FORBIDDEN_SEQUENCES = ['..', '/', '\\', '$', '%', '~'];

// ============================================================================
// Stage 1: raw line parsing
// ============================================================================

export interface RawViewEntry {
  viewName: string;
  templateName: string;
  outputPattern: string;
  anchor: AnchorParse;
}

export type LineParse =
  | { kind: 'entry'; entry: RawViewEntry }
  | { kind: 'skip' }
  | { kind: 'reserved'; key: string; value: string }
  | { kind: 'error'; error: ConfigParseError };

export function isReservedKey(key: string): boolean {
  return RESERVED_KEY_PREFIXES.some(prefix => key.startsWith(prefix));
}

export function hasTemplateExtension(name: string): boolean {
  const lower = name.toLowerCase();
  return TEMPLATE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Split a configuration line into key and value, dotenv style: `export `
 * prefixes and matching surrounding quotes are dropped.
 */
export function splitKeyValue(line: string): { key: string; value: string } | null {
  const eq = line.indexOf('=');
  if (eq === -1) return null;

  let key = line.slice(0, eq).trim();
  if (key.startsWith('export ')) {
    key = key.slice('export '.length).trim();
  }

  let value = line.slice(eq + 1).trim();
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      value = value.slice(1, -1).trim();
    }
  }

  return { key, value };
}

export function parseViewLine(line: string, lineNumber: number): LineParse {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return { kind: 'skip' };
  }

  const kv = splitKeyValue(trimmed);
  if (!kv) {
    return { kind: 'error', error: new ConfigParseError(lineNumber, "missing '='") };
  }

  const { key, value } = kv;
  if (!key) {
    return { kind: 'error', error: new ConfigParseError(lineNumber, 'empty key') };
  }
  if (isReservedKey(key)) {
    return { kind: 'reserved', key, value };
  }

  const fail = (reason: string): LineParse => ({
    kind: 'error',
    error: new ConfigParseError(lineNumber, reason, key),
  });

  if (!value.includes(':')) {
    return fail("value has no ':' separator");
  }
  const forbidden = FORBIDDEN_SEQUENCES.find(seq => value.includes(seq));
  if (forbidden) {
    return fail(`value contains forbidden sequence '${forbidden}'`);
  }

  const colon = value.indexOf(':');
  const templateName = value.slice(0, colon).trim();
  const [patternPart, anchorPart] = value.slice(colon + 1).split(':');
  const outputPattern = patternPart.trim();

  if (!templateName) {
    return fail('template name is empty');
  }
  if (!hasTemplateExtension(templateName)) {
    return fail(`template '${templateName}' is not a ${TEMPLATE_EXTENSIONS.join('/')} file`);
  }
  if (!outputPattern) {
    return fail('output pattern is empty');
  }

  return {
    kind: 'entry',
    entry: {
      viewName: key,
      templateName,
      outputPattern,
      anchor: parseAnchor(anchorPart),
    },
  };
}

// ============================================================================
// Stage 2: merge against defaults and freeze
// ============================================================================

export function normalizeDefaults(defaults?: Partial<AnchorDefaults>): AnchorDefaults {
  const row = defaults?.row;
  const col = defaults?.col;
  return {
    row: row !== undefined && isPositiveInteger(row) ? row : FALLBACK_ANCHOR.row,
    col: col !== undefined && isPositiveInteger(col) ? col : FALLBACK_ANCHOR.col,
  };
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n >= 1;
}

export function resolveViewEntry(raw: RawViewEntry, defaults: AnchorDefaults): ViewEntry {
  const anchor = raw.anchor.kind === 'anchor'
    ? { row: raw.anchor.row, col: raw.anchor.col }
    : defaults;

  return Object.freeze({
    viewName: raw.viewName,
    templateName: raw.templateName,
    outputPattern: raw.outputPattern,
    anchorRow: anchor.row,
    anchorCol: anchor.col,
  });
}

// ============================================================================
// Registry
// ============================================================================

export class ViewRegistry {
  private readonly entries: Map<string, ViewEntry>;

  constructor(
    entries: Iterable<ViewEntry> = [],
    public readonly diagnostics: readonly ConfigParseError[] = [],
  ) {
    this.entries = new Map();
    for (const entry of entries) {
      this.entries.set(entry.viewName, entry);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(viewName: string): boolean {
    return this.entries.has(viewName);
  }

  get(viewName: string): ViewEntry | undefined {
    return this.entries.get(viewName);
  }

  require(viewName: string): ViewEntry {
    const entry = this.entries.get(viewName);
    if (!entry) {
      throw new ViewNotConfiguredError(viewName);
    }
    return entry;
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): ViewEntry[] {
    return Array.from(this.entries.values());
  }

  /**
   * Substitutes `{date}`, `{timestamp}` and `{time}` in the view's output
   * pattern. Replacement is literal and unescaped; unknown tokens stay as
   * written.
   */
  generateOutputFilename(viewName: string, now: Date = new Date()): string {
    const entry = this.require(viewName);
    return applyFilenameTokens(entry.outputPattern, now);
  }
}

export function applyFilenameTokens(pattern: string, now: Date): string {
  return pattern
    .replaceAll('{date}', formatDate(now))
    .replaceAll('{timestamp}', formatTimestamp(now))
    .replaceAll('{time}', formatTime(now));
}

// ============================================================================
// Loader
// ============================================================================

export interface LoadViewRegistryOptions {
  defaults?: Partial<AnchorDefaults>;
  logger?: Logger;
}

const defaultLogger = loggers.config;

export function loadViewRegistry(
  source: string,
  options: LoadViewRegistryOptions = {},
): ViewRegistry {
  const logger = options.logger ?? defaultLogger;
  const defaults = normalizeDefaults(options.defaults);
  const entries = new Map<string, ViewEntry>();
  const diagnostics: ConfigParseError[] = [];

  source.split(/\r?\n/).forEach((line, index) => {
    const lineNumber = index + 1;
    const parsed = parseViewLine(line, lineNumber);

    switch (parsed.kind) {
      case 'skip':
      case 'reserved':
        return;
      case 'error':
        diagnostics.push(parsed.error);
        logger.warn(`Skipping configuration line: ${parsed.error.message}`);
        return;
      case 'entry': {
        const entry = resolveViewEntry(parsed.entry, defaults);
        if (entries.has(entry.viewName)) {
          const note = new ConfigParseError(lineNumber, 'redefines an earlier entry', entry.viewName);
          diagnostics.push(note);
          logger.warn(note.message);
        }
        const { anchor } = parsed.entry;
        if (anchor.kind === 'default' && anchor.reason) {
          logger.warn(`Anchor for ${entry.viewName} falls back to defaults: ${anchor.reason}`);
        }
        entries.set(entry.viewName, entry);
        logger.info(
          `Loaded view ${entry.viewName} = ${entry.templateName}:${entry.outputPattern} ` +
          `(anchor ${entry.anchorRow},${entry.anchorCol})`,
        );
        return;
      }
    }
  });

  logger.info(`Loaded ${entries.size} view(s)`, { skipped: diagnostics.length });
  return new ViewRegistry(entries.values(), diagnostics);
}
