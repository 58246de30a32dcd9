/**
 * Application Config
 *
 * Global settings read from the same `key=value` file that holds the view
 * definitions. Process environment variables win over file values, as
 * with dotenv's default (non-override) behaviour.
 */

import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { loadViewRegistry, normalizeDefaults, ViewRegistry } from './view-registry.js';
import { DEFAULT_EXPORT_OPTIONS, type ExportOptions } from '../export/types.js';
import { loggers } from '../utils/logger.js';

const logger = loggers.config;

export const DEFAULT_CONFIG_FILE = 'view_export.env';

export interface DatabaseSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  schema: string;
}

export interface AppConfig {
  configPath: string;
  db: DatabaseSettings;
  templatesFolder: string;
  outputFolder: string;
  defaultStartRow: number;
  defaultStartCol: number;
  exportOptions: ExportOptions;
  views: ViewRegistry;
}

export interface LoadAppConfigOptions {
  envPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Raw configuration text; read from `envPath` when omitted. */
  source?: string;
}

const DEFAULTS = {
  DB_HOST: 'localhost',
  DB_PORT: '5432',
  DB_NAME: 'postgres',
  DB_USER: 'postgres',
  DB_PASSWORD: '',
  DB_SCHEMA: 'public',
  TEMPLATES_FOLDER: './templates',
  OUTPUT_FOLDER: './output',
  DEFAULT_START_ROW: '2',
  DEFAULT_START_COL: '1',
  AUTO_ADJUST_COLUMNS: 'true',
  PRESERVE_FORMATTING: 'true',
  INCLUDE_HEADERS: 'false',
  CLEAR_EXISTING: 'true',
  SHEET_NAME: 'Data',
} as const;

type SettingKey = keyof typeof DEFAULTS;

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return fallback;
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return fallback;
  const n = parseInt(value, 10);
  return n >= 1 ? n : fallback;
}

function readSource(envPath: string): string {
  if (!fs.existsSync(envPath)) {
    logger.warn(`Configuration file not found: ${envPath}`);
    return '';
  }
  return fs.readFileSync(envPath, 'utf-8');
}

export function loadAppConfig(options: LoadAppConfigOptions = {}): AppConfig {
  const envPath = path.resolve(options.envPath ?? DEFAULT_CONFIG_FILE);
  const env = options.env ?? process.env;
  const source = options.source ?? readSource(envPath);
  const fileValues = dotenv.parse(source);

  const setting = (key: SettingKey): string => {
    const fromEnv = env[key];
    if (fromEnv !== undefined) return fromEnv;
    return fileValues[key] ?? DEFAULTS[key];
  };

  const baseDir = path.dirname(envPath);
  const defaults = normalizeDefaults({
    row: parsePositiveInt(setting('DEFAULT_START_ROW'), 2),
    col: parsePositiveInt(setting('DEFAULT_START_COL'), 1),
  });

  const views = loadViewRegistry(source, { defaults, logger });

  const config: AppConfig = {
    configPath: envPath,
    db: {
      host: setting('DB_HOST'),
      port: parsePositiveInt(setting('DB_PORT'), 5432),
      database: setting('DB_NAME'),
      user: setting('DB_USER'),
      password: setting('DB_PASSWORD'),
      schema: setting('DB_SCHEMA') || DEFAULTS.DB_SCHEMA,
    },
    templatesFolder: path.resolve(baseDir, setting('TEMPLATES_FOLDER')),
    outputFolder: path.resolve(baseDir, setting('OUTPUT_FOLDER')),
    defaultStartRow: defaults.row,
    defaultStartCol: defaults.col,
    exportOptions: {
      clearExisting: parseBoolean(setting('CLEAR_EXISTING'), DEFAULT_EXPORT_OPTIONS.clearExisting),
      includeHeaders: parseBoolean(setting('INCLUDE_HEADERS'), DEFAULT_EXPORT_OPTIONS.includeHeaders),
      autoAdjustColumns: parseBoolean(setting('AUTO_ADJUST_COLUMNS'), DEFAULT_EXPORT_OPTIONS.autoAdjustColumns),
      preserveFormatting: parseBoolean(setting('PRESERVE_FORMATTING'), DEFAULT_EXPORT_OPTIONS.preserveFormatting),
      sheetName: setting('SHEET_NAME').trim() || DEFAULT_EXPORT_OPTIONS.sheetName,
    },
    views,
  };

  logger.info(`Configuration loaded from ${envPath}`, {
    views: views.size,
    templatesFolder: config.templatesFolder,
    outputFolder: config.outputFolder,
  });

  return config;
}
