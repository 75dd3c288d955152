// src/sinks/csv_export.ts
import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { SinkError, describeError } from '../errors';
import type { CellValue, OutputTable } from '../matching/types';
import { ensureDir, utcDay } from '../utils';
import { RECORD_COLUMNS, recordRow, type LabelledRecord, type TableSink } from './sink';

export function toCsv(headers: readonly string[], rows: readonly CellValue[][]): string {
  return Papa.unparse({ fields: [...headers], data: rows.map(row => [...row]) });
}

function writeCsv(file: string, headers: readonly string[], rows: readonly CellValue[][]): string {
  try {
    ensureDir(path.dirname(file));
    fs.writeFileSync(file, toCsv(headers, rows), 'utf8');
  } catch (err) {
    throw new SinkError('csv', `could not write ${file}: ${describeError(err)}`, { cause: err });
  }
  console.log('[csv] wrote', { file, rows: rows.length });
  return file;
}

/** `<dir>/consolidated_<YYYY-MM-DD>.csv`; the same day overwrites. */
export class CsvTableSink implements TableSink {
  readonly name = 'csv';
  lastFile: string | null = null;

  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async publish(table: OutputTable): Promise<void> {
    const file = path.join(this.dir, `consolidated_${utcDay(this.now())}.csv`);
    this.lastFile = writeCsv(file, table.headers, table.rows);
  }
}

/** Raw records of one source as `<dir>/<label>_<YYYY-MM-DD>.csv`. */
export function writeSourceCsv(dir: string, label: string, records: readonly LabelledRecord[], at: Date = new Date()): string {
  const file = path.join(dir, `${label}_${utcDay(at)}.csv`);
  return writeCsv(file, RECORD_COLUMNS, records.map(recordRow));
}
