import { describe, it, expect } from 'vitest';
import {
  applyFilenameTokens,
  loadViewRegistry,
  parseViewLine,
  resolveViewEntry,
  splitKeyValue,
  ViewRegistry,
} from '../view-registry.js';
import { ViewNotConfiguredError } from '../../export/errors.js';

const CONFIG = `
# connection
DB_HOST=localhost
DB_PORT=5432
TEMPLATES_FOLDER=./templates
DEFAULT_START_ROW=2

SALES_REPORT=sales_template.xlsx:sales_{date}.xlsx:B3
inventory_view=inventory.xlsx:inventory_{timestamp}.xlsx:4,2
plain_view = plain.xlsx : plain.xlsx
bad_anchor=anchored.xlsx:anchored.xlsx:xyz
no_separator=template.xlsx
wrong_ext=template.csv:out.csv
traversal=../secret.xlsx:out.xlsx
env_marker=$HOME.xlsx:out.xlsx
empty_pattern=template.xlsx:
`;

describe('loadViewRegistry', () => {
  const registry = loadViewRegistry(CONFIG, { defaults: { row: 2, col: 1 } });

  it('accepts valid entries in file order', () => {
    expect(registry.names()).toEqual(['SALES_REPORT', 'inventory_view', 'plain_view', 'bad_anchor']);
    expect(registry.size).toBe(4);
  });

  it('parses template, pattern and cell-style anchor', () => {
    expect(registry.get('SALES_REPORT')).toEqual({
      viewName: 'SALES_REPORT',
      templateName: 'sales_template.xlsx',
      outputPattern: 'sales_{date}.xlsx',
      anchorRow: 3,
      anchorCol: 2,
    });
  });

  it('parses row,col anchors', () => {
    const entry = registry.get('inventory_view');
    expect(entry?.anchorRow).toBe(4);
    expect(entry?.anchorCol).toBe(2);
  });

  it('trims whitespace and applies defaults when no anchor is given', () => {
    expect(registry.get('plain_view')).toEqual({
      viewName: 'plain_view',
      templateName: 'plain.xlsx',
      outputPattern: 'plain.xlsx',
      anchorRow: 2,
      anchorCol: 1,
    });
  });

  it('keeps entries whose anchor is malformed, using the defaults', () => {
    const entry = registry.get('bad_anchor');
    expect(entry?.anchorRow).toBe(2);
    expect(entry?.anchorCol).toBe(1);
  });

  it('never registers reserved keys', () => {
    expect(registry.has('DB_HOST')).toBe(false);
    expect(registry.has('TEMPLATES_FOLDER')).toBe(false);
    expect(registry.has('DEFAULT_START_ROW')).toBe(false);
  });

  it('skips malformed lines and records a diagnostic for each', () => {
    for (const key of ['no_separator', 'wrong_ext', 'traversal', 'env_marker', 'empty_pattern']) {
      expect(registry.has(key)).toBe(false);
    }
    expect(registry.diagnostics.map(d => d.key)).toEqual([
      'no_separator',
      'wrong_ext',
      'traversal',
      'env_marker',
      'empty_pattern',
    ]);
  });

  it('is case-sensitive on view names', () => {
    expect(registry.has('sales_report')).toBe(false);
  });

  it('returns an empty registry for a source without entries', () => {
    const empty = loadViewRegistry('# nothing here\n\nDB_HOST=db\n');
    expect(empty.size).toBe(0);
    expect(empty.diagnostics).toHaveLength(0);
  });

  it('uses the caller defaults for entries without an anchor', () => {
    const custom = loadViewRegistry('v=t.xlsx:o.xlsx', { defaults: { row: 5, col: 3 } });
    expect(custom.get('v')?.anchorRow).toBe(5);
    expect(custom.get('v')?.anchorCol).toBe(3);
  });

  it('replaces invalid defaults with row 2, column 1', () => {
    const custom = loadViewRegistry('v=t.xlsx:o.xlsx', { defaults: { row: 0, col: -4 } });
    expect(custom.get('v')?.anchorRow).toBe(2);
    expect(custom.get('v')?.anchorCol).toBe(1);
  });

  it('lets a repeated key replace the earlier definition', () => {
    const custom = loadViewRegistry('v=a.xlsx:a.xlsx\nw=w.xlsx:w.xlsx\nv=b.xlsx:b.xlsx');
    expect(custom.names()).toEqual(['v', 'w']);
    expect(custom.get('v')?.templateName).toBe('b.xlsx');
    expect(custom.diagnostics).toHaveLength(1);
    expect(custom.diagnostics[0].line).toBe(3);
  });

  it('accepts .xlsm templates and ignores extension case', () => {
    const custom = loadViewRegistry('m=Macro.XLSM:out.xlsx');
    expect(custom.get('m')?.templateName).toBe('Macro.XLSM');
  });
});

describe('parseViewLine', () => {
  it('skips blank and comment lines', () => {
    expect(parseViewLine('', 1)).toEqual({ kind: 'skip' });
    expect(parseViewLine('   # comment', 1)).toEqual({ kind: 'skip' });
  });

  it('reports lines without "="', () => {
    const parsed = parseViewLine('just text', 7);
    expect(parsed.kind).toBe('error');
    if (parsed.kind === 'error') {
      expect(parsed.error.line).toBe(7);
      expect(parsed.error.reason).toBe("missing '='");
    }
  });

  it('flags reserved keys separately from entries', () => {
    expect(parseViewLine('OUTPUT_FOLDER=./out', 1)).toEqual({
      kind: 'reserved',
      key: 'OUTPUT_FOLDER',
      value: './out',
    });
  });

  it('ignores anchor segments beyond the third', () => {
    const parsed = parseViewLine('v=t.xlsx:o.xlsx:C5:extra', 1);
    expect(parsed.kind).toBe('entry');
    if (parsed.kind === 'entry') {
      expect(parsed.entry.anchor).toEqual({ kind: 'anchor', row: 5, col: 3 });
    }
  });
});

describe('splitKeyValue', () => {
  it('splits on the first "=" only', () => {
    expect(splitKeyValue('a=b=c')).toEqual({ key: 'a', value: 'b=c' });
  });

  it('drops export prefixes and surrounding quotes', () => {
    expect(splitKeyValue('export v="t.xlsx:o.xlsx"')).toEqual({ key: 'v', value: 't.xlsx:o.xlsx' });
  });
});

describe('resolveViewEntry', () => {
  it('freezes the resolved entry', () => {
    const entry = resolveViewEntry(
      { viewName: 'v', templateName: 't.xlsx', outputPattern: 'o.xlsx', anchor: { kind: 'default' } },
      { row: 2, col: 1 },
    );
    expect(Object.isFrozen(entry)).toBe(true);
  });
});

describe('generateOutputFilename', () => {
  const registry = new ViewRegistry([
    { viewName: 'dated', templateName: 't.xlsx', outputPattern: 'report_{date}.xlsx', anchorRow: 2, anchorCol: 1 },
    { viewName: 'stamped', templateName: 't.xlsx', outputPattern: 'r_{timestamp}_{time}.xlsx', anchorRow: 2, anchorCol: 1 },
    { viewName: 'static', templateName: 't.xlsx', outputPattern: 'fixed_{unknown}.xlsx', anchorRow: 2, anchorCol: 1 },
  ]);
  const now = new Date(2026, 2, 5, 9, 7, 3);

  it('substitutes the date token', () => {
    expect(registry.generateOutputFilename('dated', now)).toBe('report_2026-03-05.xlsx');
  });

  it('substitutes timestamp and time tokens', () => {
    expect(registry.generateOutputFilename('stamped', now)).toBe('r_20260305_090703_090703.xlsx');
  });

  it('leaves unknown tokens verbatim and is stable over time', () => {
    const later = new Date(2027, 0, 1);
    expect(registry.generateOutputFilename('static', now)).toBe('fixed_{unknown}.xlsx');
    expect(registry.generateOutputFilename('static', later)).toBe('fixed_{unknown}.xlsx');
  });

  it("uses today's date when no time is given", () => {
    const today = new Date();
    const pad = (n: number) => String(n).padStart(2, '0');
    const expected = `report_${today.getFullYear()}-${pad(today.getMonth() + 1)}-${pad(today.getDate())}.xlsx`;
    expect(registry.generateOutputFilename('dated')).toBe(expected);
  });

  it('throws ViewNotConfiguredError for unknown views', () => {
    expect(() => registry.generateOutputFilename('missing')).toThrow(ViewNotConfiguredError);
  });

  it('replaces every occurrence of a token', () => {
    expect(applyFilenameTokens('{date}/{date}', now)).toBe('2026-03-05/2026-03-05');
  });
});
