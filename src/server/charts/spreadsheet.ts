// ============================================
// Spreadsheet Reader
// First worksheet of an .xlsx workbook as rows of text
// ============================================

import ExcelJS from 'exceljs';
import type { DataSummary } from '../../shared/types';
import { summarizeRows } from './dataSummary';
import { ErrorCode, FileValidationError } from '../../shared/utils/errors';
import { logger, errorMessage } from '../../shared/utils/logger';

/**
 * Render any cell value the way it reads in the sheet
 */
export function cellToString(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== 'object') return String(value);

  if ('richText' in value) {
    return value.richText.map(part => part.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? '' : cellToString(value.result);
  }
  // Error cells (#DIV/0!, #N/A) carry no usable data
  return '';
}

export async function readWorkbookRows(data: Buffer): Promise<string[][]> {
  const workbook = new ExcelJS.Workbook();

  try {
    await workbook.xlsx.load(data);
  } catch (error) {
    logger.warn('Unreadable workbook', { error: errorMessage(error) });
    throw new FileValidationError(ErrorCode.FILE_CONTENT_INVALID, 'Spreadsheet could not be read');
  }

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    return [];
  }

  const width = worksheet.columnCount;
  const rows: string[][] = [];

  worksheet.eachRow({ includeEmpty: false }, row => {
    const cells: string[] = [];
    for (let column = 1; column <= width; column++) {
      cells.push(cellToString(row.getCell(column).value));
    }
    if (cells.some(cell => cell.trim() !== '')) {
      rows.push(cells);
    }
  });

  return rows;
}

export async function summarizeWorkbook(data: Buffer): Promise<DataSummary> {
  return summarizeRows(await readWorkbookRows(data));
}
