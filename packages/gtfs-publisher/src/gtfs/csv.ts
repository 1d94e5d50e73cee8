/**
 * Delimited text reading and writing for GTFS files
 *
 * GTFS files are comma separated with an optional UTF-8 byte order mark,
 * either line ending, and RFC 4180 quoting.
 */

import type { CsvRow } from '../core/types/index.js';

const BOM = '\uFEFF';

/**
 * Split text into records of raw cell values
 */
function tokenize(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = text.startsWith(BOM) ? 1 : 0;

  const endRecord = () => {
    record.push(cell);
    // Blank lines carry a single empty cell
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
    cell = '';
  };

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += char;
      }
      i++;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(cell);
      cell = '';
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') {
        i++;
      }
      endRecord();
    } else {
      cell += char;
    }
    i++;
  }

  if (cell !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse delimited text into rows keyed by the header line.
 *
 * Header names are trimmed. Rows shorter than the header read missing
 * cells as empty strings; extra cells are dropped.
 */
export function parseCsv(text: string): CsvRow[] {
  const [header, ...records] = tokenize(text);
  if (!header) {
    return [];
  }

  const columns = header.map((name) => name.trim());

  return records.map((values) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = values[index] ?? '';
    });
    return row;
  });
}

function quoteCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialize rows to comma separated text with a header line
 */
export function toCsv(
  columns: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, string | number>>>
): string {
  const lines = [columns.map(quoteCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => quoteCell(row[column] ?? '')).join(','));
  }
  return lines.join('\n');
}
