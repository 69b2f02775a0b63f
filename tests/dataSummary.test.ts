import { describe, expect, it } from 'vitest';
import {
  detectDelimiter,
  inferColumnType,
  parseDelimited,
  summarizeCsv,
  summarizeRows
} from '../src/server/charts/dataSummary';
import { FileValidationError } from '../src/shared/utils/errors';

describe('parseDelimited', () => {
  it('honors quoted fields, escaped quotes and CRLF', () => {
    expect(parseDelimited('a,"b ""q"", c"\r\nd,e\r\n', ',')).toEqual([
      ['a', 'b "q", c'],
      ['d', 'e']
    ]);
  });

  it('drops blank lines', () => {
    expect(parseDelimited('x,y\n\n1,2\n,\n', ',')).toEqual([
      ['x', 'y'],
      ['1', '2']
    ]);
  });
});

describe('detectDelimiter', () => {
  it('picks the delimiter that splits the header most', () => {
    expect(detectDelimiter('a;b;c\n1;2;3')).toBe(';');
    expect(detectDelimiter('a\tb\n1\t2')).toBe('\t');
    expect(detectDelimiter('single\n1')).toBe(',');
  });
});

describe('inferColumnType', () => {
  it('treats blank cells as missing', () => {
    expect(inferColumnType(['1', '', '2.5'])).toBe('numeric');
    expect(inferColumnType(['', ' '])).toBe('text');
  });

  it('recognizes dates but not bare numbers as datetime', () => {
    expect(inferColumnType(['2024-01-05', '2024-02-10'])).toBe('datetime');
    expect(inferColumnType(['2024', '2025'])).toBe('numeric');
  });

  it('separates categories from free text', () => {
    const categories = Array.from({ length: 30 }, (_, i) => ['red', 'green', 'blue'][i % 3]);
    const freeText = Array.from({ length: 25 }, (_, i) => `comment number ${i}`);

    expect(inferColumnType(categories)).toBe('categorical');
    expect(inferColumnType(freeText)).toBe('text');
  });
});

describe('summarizeCsv', () => {
  it('summarizes columns, types and numeric stats', () => {
    const summary = summarizeCsv(
      'region,amount,date\nnorth,"1,200",2024-01-05\nsouth,300,2024-02-10\n'
    );

    expect(summary).toEqual({
      columns: ['region', 'amount', 'date'],
      row_count: 2,
      column_types: { region: 'categorical', amount: 'numeric', date: 'datetime' },
      stats: { amount: { min: 300, max: 1200, mean: 750 } },
      preview_rows: [
        ['north', '1,200', '2024-01-05'],
        ['south', '300', '2024-02-10']
      ]
    });
  });

  it('strips a byte order mark and names blank headers', () => {
    const summary = summarizeCsv('\uFEFFname,\nx,1\n');

    expect(summary.columns).toEqual(['name', 'column_2']);
  });

  it('keeps only the first five rows in the preview', () => {
    const rows = Array.from({ length: 8 }, (_, i) => `${i},${i * 2}`).join('\n');
    const summary = summarizeCsv(`a,b\n${rows}\n`);

    expect(summary.row_count).toBe(8);
    expect(summary.preview_rows).toHaveLength(5);
    expect(summary.stats.b).toEqual({ min: 0, max: 14, mean: 7 });
  });

  it('computes stats over more rows than fit in an argument list', () => {
    const rows = Array.from({ length: 250_000 }, (_, i) => `${i},${i % 100}`).join('\n');
    const summary = summarizeCsv(`id,value\n${rows}\n`);

    expect(summary.row_count).toBe(250_000);
    expect(summary.stats.id).toEqual({ min: 0, max: 249_999, mean: 124_999.5 });
    expect(summary.stats.value).toEqual({ min: 0, max: 99, mean: 49.5 });
  });

  it('rejects empty files and header-only files', () => {
    expect(() => summarizeCsv('')).toThrow(FileValidationError);
    expect(() => summarizeCsv('\n\n')).toThrow('File is empty');
    expect(() => summarizeCsv('a,b\n')).toThrow('File has a header but no data rows');
  });
});

describe('summarizeRows', () => {
  it('summarizes rows read from a spreadsheet', () => {
    const summary = summarizeRows([
      ['month', 'revenue'],
      ['2024-01-01', '120'],
      ['2024-02-01', '80']
    ]);

    expect(summary.column_types).toEqual({ month: 'datetime', revenue: 'numeric' });
    expect(summary.stats.revenue).toEqual({ min: 80, max: 120, mean: 100 });
  });
});
