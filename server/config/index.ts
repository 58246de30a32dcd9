/**
 * Configuration Module
 *
 * Barrel export for the application settings and the view registry
 */

export {
  // Types
  type AppConfig,
  type DatabaseSettings,
  type LoadAppConfigOptions,

  // Loading
  DEFAULT_CONFIG_FILE,
  loadAppConfig,
  parseBoolean,
  parsePositiveInt,
} from './app-config.js';

export {
  type AnchorParse,
  parseAnchor,
  columnLettersToIndex,
  MAX_ROWS,
  MAX_COLUMNS,
} from './anchor-parser.js';

export {
  type RawViewEntry,
  type LineParse,
  type LoadViewRegistryOptions,
  RESERVED_KEY_PREFIXES,
  TEMPLATE_EXTENSIONS,
  FALLBACK_ANCHOR,
  ViewRegistry,
  loadViewRegistry,
  parseViewLine,
  resolveViewEntry,
  normalizeDefaults,
  applyFilenameTokens,
  isReservedKey,
  hasTemplateExtension,
  splitKeyValue,
} from './view-registry.js';
