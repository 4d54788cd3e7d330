import { formatCsvRow, parseCsv, parseRecords } from '../lib/csv.js';

describe('parseCsv', () => {
  it('returns an empty table for empty input', () => {
    expect(parseCsv('')).toEqual({ header: [], rows: [] });
  });

  it('keys rows by header with CRLF line endings', () => {
    expect(parseCsv('a,b\r\n1,2\r\n')).toEqual({ header: ['a', 'b'], rows: [{ a: '1', b: '2' }] });
  });

  it('handles a final line without a line break', () => {
    expect(parseCsv('tenant_name,domain_prefix\nContoso,contoso').rows).toEqual([
      { tenant_name: 'Contoso', domain_prefix: 'contoso' },
    ]);
  });

  it('reports the columns a short row lacks', () => {
    expect(() => parseCsv('a,b,c\n1,2,3\n1')).toThrow(
      'Malformed CSV: row 2 is missing columns: b, c',
    );
  });

  it('keeps empty trailing fields that are present', () => {
    expect(parseCsv('a,b,c\n1,,').rows).toEqual([{ a: '1', b: '', c: '' }]);
  });

  it('trims header names and strips a BOM', () => {
    expect(parseCsv('\uFEFF tenant_name , exo_quantity\nX,3').header).toEqual([
      'tenant_name',
      'exo_quantity',
    ]);
  });

  it('skips blank lines', () => {
    expect(parseCsv('a,b\n\n1,2\n\n').rows).toEqual([{ a: '1', b: '2' }]);
  });
});

describe('parseRecords', () => {
  it('handles quoted fields with commas and doubled quotes', () => {
    expect(parseRecords('"Smith, John","He said ""hi"""\n')).toEqual([
      ['Smith, John', 'He said "hi"'],
    ]);
  });

  it('keeps line breaks inside quotes', () => {
    expect(parseRecords('a\n"line1\nline2"\n')).toEqual([['a'], ['line1\nline2']]);
  });

  it('supports another delimiter', () => {
    expect(parseRecords('a;b\n1;2', ';')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('throws on an unterminated quote', () => {
    expect(() => parseRecords('a\n"oops')).toThrow(
      'Malformed CSV: unterminated quoted field in record 2',
    );
  });
});

describe('formatCsvRow', () => {
  it('joins plain fields and ends with CRLF', () => {
    expect(formatCsvRow(['Contoso', 'contoso', 'admin@contoso.onmicrosoft.com', 'Xy12'])).toBe(
      'Contoso,contoso,admin@contoso.onmicrosoft.com,Xy12\r\n',
    );
  });

  it('quotes fields with delimiters, quotes or line breaks', () => {
    expect(formatCsvRow(['Contoso, Inc.', 'P@ss"w', 'two\nlines'])).toBe(
      '"Contoso, Inc.","P@ss""w","two\nlines"\r\n',
    );
  });

  it('stringifies numbers', () => {
    expect(formatCsvRow([1, 'a'])).toBe('1,a\r\n');
  });

  it('produces text parseRecords reads back', () => {
    const fields = ['Contoso, Inc.', 'say "hi"', 'plain'];
    expect(parseRecords(formatCsvRow(fields))).toEqual([fields]);
  });
});
