import { describe, it, expect } from 'vitest';
import { CsvParseError, escapeCsvField, formatCsv, parseCsv } from './csv';

describe('escapeCsvField', () => {
  it('leaves plain text unquoted', () => {
    expect(escapeCsvField('Engine Problem')).toBe('Engine Problem');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsvField('Brakes, front')).toBe('"Brakes, front"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
  });
});

describe('formatCsv', () => {
  it('joins rows with LF and ends with a newline', () => {
    expect(formatCsv([['a', 'b'], ['1', 'x,y']])).toBe('a,b\n1,"x,y"\n');
  });
});

describe('parseCsv', () => {
  it('parses quoted fields with embedded commas, quotes and newlines', () => {
    const rows = parseCsv('id,notes\n1,"a, ""b""\nc"\n2,plain\n');

    expect(rows).toEqual([
      { line: 1, fields: ['id', 'notes'] },
      { line: 2, fields: ['1', 'a, "b"\nc'] },
      { line: 4, fields: ['2', 'plain'] },
    ]);
  });

  it('accepts CRLF line endings and a missing trailing newline', () => {
    expect(parseCsv('a,b\r\n1,2').map((r) => r.fields)).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('keeps empty trailing fields', () => {
    expect(parseCsv('1,x,\n')[0].fields).toEqual(['1', 'x', '']);
  });

  it('skips blank lines and a UTF-8 BOM', () => {
    expect(parseCsv('\uFEFFa\n\nb\n').map((r) => r.fields)).toEqual([['a'], ['b']]);
  });

  it('rejects an unterminated quoted field', () => {
    expect(() => parseCsv('a\n"open')).toThrow(CsvParseError);
    expect(() => parseCsv('a\n"open')).toThrow('Unterminated quoted field (line 2)');
  });

  it('rejects text after a closing quote', () => {
    expect(() => parseCsv('id,notes\n1,"ab"c\n')).toThrow('Unexpected character after closing quote (line 2)');
    expect(parseCsv('"ab",c\r\n"d"\n').map((r) => r.fields)).toEqual([['ab', 'c'], ['d']]);
  });

  it('reverses formatCsv', () => {
    const rows = [
      ['id', 'notes'],
      ['1', 'Customer said: "noise, then smoke"\nCall back'],
    ];
    expect(parseCsv(formatCsv(rows)).map((r) => r.fields)).toEqual(rows);
  });
});
