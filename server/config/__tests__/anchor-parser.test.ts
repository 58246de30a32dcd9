import { describe, it, expect } from 'vitest';
import { columnLettersToIndex, parseAnchor } from '../anchor-parser.js';

describe('parseAnchor', () => {
  it('parses row,col pairs', () => {
    expect(parseAnchor('2,3')).toEqual({ kind: 'anchor', row: 2, col: 3 });
    expect(parseAnchor(' 10 , 4 ')).toEqual({ kind: 'anchor', row: 10, col: 4 });
  });

  it('parses cell references as row then column', () => {
    expect(parseAnchor('B3')).toEqual({ kind: 'anchor', row: 3, col: 2 });
    expect(parseAnchor('a1')).toEqual({ kind: 'anchor', row: 1, col: 1 });
  });

  it('uses base-26 with A=1 for column letters', () => {
    expect(parseAnchor('ZZ1')).toEqual({ kind: 'anchor', row: 1, col: 702 });
    expect(parseAnchor('AA7')).toEqual({ kind: 'anchor', row: 7, col: 27 });
  });

  it('falls back to defaults for malformed anchors', () => {
    expect(parseAnchor('xyz').kind).toBe('default');
    expect(parseAnchor('3').kind).toBe('default');
    expect(parseAnchor('2,x').kind).toBe('default');
    expect(parseAnchor('-1,2').kind).toBe('default');
    expect(parseAnchor('B').kind).toBe('default');
    expect(parseAnchor('3B').kind).toBe('default');
  });

  it('rejects zero and out-of-range coordinates', () => {
    expect(parseAnchor('0,1').kind).toBe('default');
    expect(parseAnchor('1,0').kind).toBe('default');
    expect(parseAnchor('A0').kind).toBe('default');
    expect(parseAnchor('XFE1').kind).toBe('default');
    expect(parseAnchor('A1048577').kind).toBe('default');
    expect(parseAnchor('XFD1048576')).toEqual({ kind: 'anchor', row: 1048576, col: 16384 });
  });

  it('returns a default without a reason when no anchor is given', () => {
    expect(parseAnchor(undefined)).toEqual({ kind: 'default' });
    expect(parseAnchor('   ')).toEqual({ kind: 'default' });
  });
});

describe('columnLettersToIndex', () => {
  it('converts letters to 1-based indexes', () => {
    expect(columnLettersToIndex('A')).toBe(1);
    expect(columnLettersToIndex('Z')).toBe(26);
    expect(columnLettersToIndex('AZ')).toBe(52);
    expect(columnLettersToIndex('zz')).toBe(702);
  });

  it('throws on non-letters', () => {
    expect(() => columnLettersToIndex('A1')).toThrow(RangeError);
  });
});
