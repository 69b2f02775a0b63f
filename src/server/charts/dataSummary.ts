// ============================================
// Data Summary
// Column semantics inferred from delimited text
// ============================================

import type { ColumnType, DataSummary, NumericColumnStats } from '../../shared/types';
import { FileValidationError, ErrorCode } from '../../shared/utils/errors';

const PREVIEW_ROWS = 5;
const CATEGORICAL_MAX_UNIQUE = 20;
const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];

/**
 * Split delimited text into rows, honoring double-quoted fields
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '') {
      inQuotes = true;
    } else if (char === delimiter) {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  // Blank lines carry no data
  return rows.filter(cells => cells.some(cell => cell.trim() !== ''));
}

/**
 * The candidate that splits the header line into the most columns
 */
export function detectDelimiter(text: string): string {
  const headerLine = text.split(/\r?\n/, 1)[0] ?? '';
  let best = ',';
  let bestCount = 0;

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const count = headerLine.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }

  return best;
}

function toNumber(value: string): number | null {
  const normalized = value.trim().replace(/,/g, '');
  if (normalized === '') return null;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

function looksLikeDate(value: string): boolean {
  const trimmed = value.trim();
  // Plain numbers parse as years; they belong to numeric
  if (!/[-/:]/.test(trimmed)) return false;
  return !Number.isNaN(Date.parse(trimmed));
}

export function inferColumnType(values: string[]): ColumnType {
  const present = values.map(value => value.trim()).filter(value => value !== '');
  if (present.length === 0) {
    return 'text';
  }

  if (present.every(value => toNumber(value) !== null)) {
    return 'numeric';
  }

  if (present.every(looksLikeDate)) {
    return 'datetime';
  }

  const unique = new Set(present).size;
  if (unique <= CATEGORICAL_MAX_UNIQUE || unique / present.length <= 0.5) {
    return 'categorical';
  }

  return 'text';
}

function numericStats(values: string[]): NumericColumnStats {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let sum = 0;
  let count = 0;

  for (const value of values) {
    const parsed = toNumber(value);
    if (parsed === null) continue;
    if (parsed < min) min = parsed;
    if (parsed > max) max = parsed;
    sum += parsed;
    count++;
  }

  return {
    min,
    max,
    mean: Math.round((sum / count) * 1000) / 1000
  };
}

/**
 * Summarize an uploaded CSV: header, row count, per-column type,
 * numeric stats and a short preview.
 */
export function summarizeCsv(text: string): DataSummary {
  const content = text.replace(/^\uFEFF/, '');
  return summarizeRows(parseDelimited(content, detectDelimiter(content)));
}

/**
 * Summarize a table whose first row is the header
 */
export function summarizeRows(rows: string[][]): DataSummary {
  if (rows.length === 0) {
    throw new FileValidationError(ErrorCode.FILE_CONTENT_INVALID, 'File is empty');
  }

  const header = rows[0].map((name, index) => name.trim() || `column_${index + 1}`);
  const dataRows = rows.slice(1);

  if (dataRows.length === 0) {
    throw new FileValidationError(ErrorCode.FILE_CONTENT_INVALID, 'File has a header but no data rows');
  }

  const columnTypes: Record<string, ColumnType> = {};
  const stats: Record<string, NumericColumnStats> = {};

  header.forEach((column, index) => {
    const values = dataRows.map(row => row[index] ?? '');
    const type = inferColumnType(values);
    columnTypes[column] = type;
    if (type === 'numeric') {
      stats[column] = numericStats(values);
    }
  });

  return {
    columns: header,
    row_count: dataRows.length,
    column_types: columnTypes,
    stats,
    preview_rows: dataRows.slice(0, PREVIEW_ROWS)
  };
}
