import * as XLSX from 'xlsx';
import type { CellValue, DataRow, DataTable, LoadResult, ValidationResult } from '../types';
import { errorMessage } from './errors';

export const MAX_FILE_SIZE_MB = 10;
export const MAX_FILE_SIZE_BYTES = MAX_FILE_SIZE_MB * 1024 * 1024;
export const SUPPORTED_EXTENSIONS = ['csv', 'xlsx', 'xls'] as const;
export const NO_DATA = 'No data loaded.';

const SAMPLE_SIZE = 3;
const SAMPLE_MAX_CHARS = 30;

export const getExtension = (fileName: string): string => {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
};

const isSupported = (extension: string): boolean =>
  SUPPORTED_EXTENSIONS.some((supported) => supported === extension);

const toCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'boolean' || value instanceof Date) return value;
  return String(value);
};

const isBlank = (value: unknown): boolean => value === null || value === undefined || String(value).trim() === '';

// Blank headers become "Unnamed: i"; repeated names get a ".n" suffix.
const normalizeHeaders = (raw: unknown[]): string[] => {
  const seen = new Map<string, number>();
  return raw.map((value, index) => {
    const base = isBlank(value) ? `Unnamed: ${index}` : String(value).trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
};

// xlsx is a zip archive, xls an OLE2 compound document.
const WORKBOOK_SIGNATURES = [
  [0x50, 0x4b, 0x03, 0x04],
  [0xd0, 0xcf, 0x11, 0xe0],
];

const hasWorkbookSignature = (data: Uint8Array): boolean =>
  WORKBOOK_SIGNATURES.some((signature) => signature.every((byte, i) => data[i] === byte));

// Number of fields up to the last non-blank one.
const fieldCount = (row: unknown[]): number => {
  let count = row.length;
  while (count > 0 && isBlank(row[count - 1])) count -= 1;
  return count;
};

/**
 * First CSV data row carrying values past the last header. Rows are
 * numbered from 1, header included.
 */
export const findRaggedRow = (matrix: unknown[][]): { row: number; expected: number; actual: number } | null => {
  const expected = fieldCount(matrix[0] ?? []);
  for (let i = 1; i < matrix.length; i += 1) {
    const actual = fieldCount(matrix[i]);
    if (actual > expected) return { row: i + 1, expected, actual };
  }
  return null;
};

export const formatCell = (value: CellValue): string => {
  if (value === null) return '';
  if (value instanceof Date) {
    return value.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '');
  }
  return String(value);
};

/**
 * Inferred column type, named after the dtypes analysts already know:
 * int64, float64, bool, datetime64[ns], object.
 */
export const inferColumnType = (values: CellValue[]): string => {
  const present = values.filter((v): v is Exclude<CellValue, null> => v !== null);
  if (present.length === 0) return 'object';
  if (present.every((v) => typeof v === 'number')) {
    return present.every((v) => Number.isInteger(v)) ? 'int64' : 'float64';
  }
  if (present.every((v) => typeof v === 'boolean')) return 'bool';
  if (present.every((v) => v instanceof Date)) return 'datetime64[ns]';
  return 'object';
};

/**
 * Handles data file loading, validation, and schema extraction.
 * Supports CSV and Excel files up to 10MB.
 */
export class DataLoader {
  validate(fileName: string, sizeBytes: number): ValidationResult {
    if (sizeBytes > MAX_FILE_SIZE_BYTES) {
      return { ok: false, error: `File size exceeds ${MAX_FILE_SIZE_MB}MB limit. Please upload a smaller file.` };
    }
    if (!isSupported(getExtension(fileName))) {
      return { ok: false, error: 'Unsupported file type. Please upload a CSV or XLSX file.' };
    }
    return { ok: true, error: '' };
  }

  load(data: Uint8Array, fileName: string): LoadResult {
    const extension = getExtension(fileName);
    if (!isSupported(extension)) {
      return { ok: false, message: 'Unsupported file format.', table: null };
    }

    if (extension !== 'csv' && !hasWorkbookSignature(data)) {
      return { ok: false, message: 'Error parsing file: File is not a valid Excel workbook.', table: null };
    }

    let matrix: unknown[][];
    try {
      const workbook =
        extension === 'csv'
          ? XLSX.read(Buffer.from(data).toString('utf8'), { type: 'string', cellDates: true })
          : XLSX.read(Buffer.from(data), { type: 'buffer', cellDates: true });
      const sheetName = workbook.SheetNames[0];
      const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
      matrix = worksheet
        ? XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null, blankrows: false })
        : [];
    } catch (error) {
      console.error(`[DataLoader] Failed to parse ${fileName}:`, errorMessage(error));
      return { ok: false, message: `Error parsing file: ${errorMessage(error)}`, table: null };
    }

    if (matrix.length === 0) {
      return { ok: false, message: 'The file is empty or has no valid data.', table: null };
    }

    if (extension === 'csv') {
      const ragged = findRaggedRow(matrix);
      if (ragged) {
        const message = `Error parsing file: Expected ${ragged.expected} fields in row ${ragged.row}, saw ${ragged.actual}`;
        console.error(`[DataLoader] Failed to parse ${fileName}:`, message);
        return { ok: false, message, table: null };
      }
    }

    const headers = normalizeHeaders(matrix[0]);
    const rows: DataRow[] = matrix.slice(1).map((rowData) =>
      headers.reduce<DataRow>((row, header, index) => {
        row[header] = toCell(rowData[index]);
        return row;
      }, {}),
    );

    if (rows.length === 0) {
      return { ok: false, message: 'The uploaded file is empty.', table: null };
    }

    console.info(`[DataLoader] Parsed ${fileName}: ${rows.length} rows x ${headers.length} columns`);
    return {
      ok: true,
      message: `Successfully loaded ${rows.length} rows and ${headers.length} columns.`,
      table: { headers, rows },
    };
  }

  /**
   * Per-column type, non-null count and sample values, as a prompt fragment
   * for the planner.
   */
  schema(table: DataTable | null): string {
    if (!table) return NO_DATA;

    const total = table.rows.length;
    const lines = ['COLUMNS AND DATA TYPES:'];
    for (const column of table.headers) {
      const values = table.rows.map((row) => row[column] ?? null);
      const nonNull = values.filter((v) => v !== null);
      const samples = nonNull
        .slice(0, SAMPLE_SIZE)
        .map((v) => formatCell(v).slice(0, SAMPLE_MAX_CHARS))
        .join(', ');
      lines.push(`  - ${column} (${inferColumnType(values)}): ${nonNull.length}/${total} non-null | Sample: [${samples}]`);
    }
    return lines.join('\n');
  }

  info(table: DataTable | null): string {
    if (!table) return NO_DATA;
    return [
      `Total Rows: ${table.rows.length}`,
      `Total Columns: ${table.headers.length}`,
      `Column Names: ${table.headers.join(', ')}`,
    ].join('\n');
  }
}

export const head = (table: DataTable, n = 5): DataTable => ({
  headers: [...table.headers],
  rows: table.rows.slice(0, Math.max(0, n)),
});

// CSV-like rendering of a table for prompts, capped at `maxRows`.
export const tableToText = (table: DataTable, maxRows = 50): string => {
  if (table.rows.length === 0) {
    return 'No data to display.';
  }
  const header = table.headers.join(',');
  const rows = table.rows.slice(0, maxRows).map((row) => table.headers.map((h) => formatCell(row[h] ?? null)).join(','));
  const more = table.rows.length > maxRows ? [`... (${table.rows.length - maxRows} more rows)`] : [];
  return [header, ...rows, ...more].join('\n');
};
