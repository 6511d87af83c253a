import { extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import { InputLoadError, errorMessage } from '../errors.js';
import { exists } from '../util/fs.js';
import { toVulnerabilityRecord, type VulnerabilityRecord } from './vulnerability.js';

async function readWorksheet(filePath: string): Promise<Worksheet | undefined> {
  const workbook = new ExcelJS.Workbook();
  if (extname(filePath).toLowerCase() === '.csv') {
    return workbook.csv.readFile(filePath);
  }
  await workbook.xlsx.readFile(filePath);
  return workbook.worksheets[0];
}

/**
 * Load scan rows from the first worksheet of an .xlsx file (or a .csv).
 * The first row holds the headers; they are trimmed before matching.
 */
export async function loadVulnerabilities(filePath: string): Promise<VulnerabilityRecord[]> {
  if (!(await exists(filePath))) {
    throw new InputLoadError(`Input file not found: ${filePath}`, filePath);
  }

  let sheet: Worksheet | undefined;
  try {
    sheet = await readWorksheet(filePath);
  } catch (err) {
    throw new InputLoadError(`Failed to read spreadsheet ${filePath}: ${errorMessage(err)}`, filePath);
  }
  if (!sheet) {
    throw new InputLoadError(`Spreadsheet has no worksheets: ${filePath}`, filePath);
  }

  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
    const header = cell.text.trim();
    if (header) headers.set(colNumber, header);
  });

  const records: VulnerabilityRecord[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    if (!row.hasValues) continue;

    const cells: Record<string, string> = {};
    for (const [colNumber, header] of headers) {
      cells[header] = row.getCell(colNumber).text;
    }
    records.push(toVulnerabilityRecord(cells, rowNumber - 2));
  }

  return records;
}
