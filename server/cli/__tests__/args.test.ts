import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../args.js';

describe('parseCliArgs', () => {
  it('falls back to help without arguments', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help', positionals: [] });
    expect(parseCliArgs(['--help'])).toEqual({ command: 'help', positionals: [] });
    expect(parseCliArgs(['-h'])).toEqual({ command: 'help', positionals: [] });
  });

  it('collects view names for export', () => {
    expect(parseCliArgs(['export', 'sales_view', 'orders_view'])).toEqual({
      command: 'export',
      positionals: ['sales_view', 'orders_view'],
    });
  });

  it('accepts flag values as separate tokens or after =', () => {
    const args = parseCliArgs(['export', '--config', 'custom.env', '--schema=reporting', 'sales_view']);

    expect(args.configPath).toBe('custom.env');
    expect(args.schema).toBe('reporting');
    expect(args.positionals).toEqual(['sales_view']);
  });

  it('parses export-file options', () => {
    expect(
      parseCliArgs([
        'export-file',
        '--view',
        'sales_view',
        '--template',
        'templates/sales.xlsx',
        '--output=out/sales.xlsx',
        '--headers',
      ]),
    ).toEqual({
      command: 'export-file',
      positionals: [],
      view: 'sales_view',
      template: 'templates/sales.xlsx',
      output: 'out/sales.xlsx',
      includeHeaders: true,
    });
  });

  it('requires --view and --template for export-file', () => {
    expect(() => parseCliArgs(['export-file', '--view', 'sales_view'])).toThrow(
      'export-file needs --view and --template',
    );
  });

  it('requires exactly one view for db-columns', () => {
    expect(parseCliArgs(['db-columns', 'sales_view']).positionals).toEqual(['sales_view']);
    expect(() => parseCliArgs(['db-columns'])).toThrow('db-columns needs exactly one view name');
    expect(() => parseCliArgs(['db-columns', 'a', 'b'])).toThrow(CliUsageError);
  });

  it('accepts test-connection with a config path', () => {
    expect(parseCliArgs(['test-connection', '--config', 'prod.env'])).toEqual({
      command: 'test-connection',
      positionals: [],
      configPath: 'prod.env',
    });
  });

  it('rejects unknown commands and options', () => {
    expect(() => parseCliArgs(['publish'])).toThrow('Unknown command: publish');
    expect(() => parseCliArgs(['export', '--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseCliArgs(['export', '--toString=x'])).toThrow('Unknown option: --toString=x');
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['views', '--config'])).toThrow('Missing value for --config');
    expect(() => parseCliArgs(['views', '--config='])).toThrow('Missing value for --config');
  });
});
