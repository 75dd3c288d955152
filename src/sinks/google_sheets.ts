// src/sinks/google_sheets.ts
import { google } from 'googleapis';
import type { SheetConfig } from '../config';
import { SinkError, describeError } from '../errors';
import type { CellValue, OutputTable } from '../matching/types';
import { RECORD_COLUMNS, recordRow, type LabelledRecord, type TableSink } from './sink';

export type WorksheetInfo = {
  sheetId: number;
  title: string;
  rowCount: number;
  columnCount: number;
};

type SheetCell = string | number;

/** The handful of Sheets/Drive calls the sink needs. */
export interface SheetsApi {
  findSpreadsheetByTitle(title: string): Promise<string | null>;
  listWorksheets(spreadsheetId: string): Promise<WorksheetInfo[]>;
  addWorksheet(spreadsheetId: string, title: string, rows: number, columns: number): Promise<WorksheetInfo>;
  resizeWorksheet(spreadsheetId: string, sheetId: number, rows: number, columns: number): Promise<void>;
  clearWorksheet(spreadsheetId: string, title: string): Promise<void>;
  readValues(spreadsheetId: string, range: string): Promise<SheetCell[][]>;
  writeValues(spreadsheetId: string, range: string, values: SheetCell[][]): Promise<void>;
  appendValues(spreadsheetId: string, range: string, values: SheetCell[][]): Promise<void>;
}

export const MIN_ROWS = 1000;
export const MIN_COLUMNS = 26;

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets', 'https://www.googleapis.com/auth/drive.readonly'];

export function quoteSheet(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export function toSheetValues(rows: readonly CellValue[][]): SheetCell[][] {
  return rows.map(row => row.map(cell => cell ?? ''));
}

function toSheetCell(value: unknown): SheetCell {
  if (typeof value === 'number' || typeof value === 'string') return value;
  return value === null || value === undefined ? '' : String(value);
}

/** googleapis client authenticated with a service-account key file. */
export function createSheetsApi(credentialsPath: string): SheetsApi {
  const auth = new google.auth.GoogleAuth({ keyFile: credentialsPath, scopes: SCOPES });
  const sheets = google.sheets({ version: 'v4', auth });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async findSpreadsheetByTitle(title) {
      const escaped = title.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
      const res = await drive.files.list({
        q: `name = '${escaped}' and mimeType = 'application/vnd.google-apps.spreadsheet' and trashed = false`,
        fields: 'files(id, name)',
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      });
      return res.data.files?.[0]?.id ?? null;
    },

    async listWorksheets(spreadsheetId) {
      const res = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties' });
      return (res.data.sheets ?? []).flatMap(sheet => {
        const props = sheet.properties;
        if (!props || typeof props.sheetId !== 'number' || !props.title) return [];
        return [
          {
            sheetId: props.sheetId,
            title: props.title,
            rowCount: props.gridProperties?.rowCount ?? 0,
            columnCount: props.gridProperties?.columnCount ?? 0,
          },
        ];
      });
    },

    async addWorksheet(spreadsheetId, title, rows, columns) {
      const res = await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [{ addSheet: { properties: { title, gridProperties: { rowCount: rows, columnCount: columns } } } }],
        },
      });
      const sheetId = res.data.replies?.[0]?.addSheet?.properties?.sheetId;
      if (typeof sheetId !== 'number') throw new SinkError('sheets', `worksheet "${title}" was not created`);
      return { sheetId, title, rowCount: rows, columnCount: columns };
    },

    async resizeWorksheet(spreadsheetId, sheetId, rows, columns) {
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [
            {
              updateSheetProperties: {
                properties: { sheetId, gridProperties: { rowCount: rows, columnCount: columns } },
                fields: 'gridProperties.rowCount,gridProperties.columnCount',
              },
            },
          ],
        },
      });
    },

    async clearWorksheet(spreadsheetId, title) {
      await sheets.spreadsheets.values.clear({ spreadsheetId, range: quoteSheet(title) });
    },

    async readValues(spreadsheetId, range) {
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
      const rows: unknown[][] = res.data.values ?? [];
      return rows.map(row => row.map(toSheetCell));
    },

    async writeValues(spreadsheetId, range, values) {
      await sheets.spreadsheets.values.update({ spreadsheetId, range, valueInputOption: 'RAW', requestBody: { values } });
    },

    async appendValues(spreadsheetId, range, values) {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values },
      });
    },
  };
}

/**
 * Consolidated table on one worksheet (cleared and rewritten each run), plus an optional
 * append-only history worksheet of raw records.
 */
export class GoogleSheetsSink implements TableSink {
  readonly name = 'sheets';
  private spreadsheetId: string | null = null;

  constructor(
    private readonly api: SheetsApi,
    private readonly config: Pick<SheetConfig, 'spreadsheetId' | 'docTitle' | 'worksheet' | 'historyWorksheet'>,
  ) {}

  /** Configured id when it opens, the spreadsheet titled `docTitle` otherwise. */
  async resolveSpreadsheet(): Promise<string> {
    if (this.spreadsheetId) return this.spreadsheetId;

    const { spreadsheetId, docTitle } = this.config;
    if (spreadsheetId) {
      try {
        await this.api.listWorksheets(spreadsheetId);
        this.spreadsheetId = spreadsheetId;
        return spreadsheetId;
      } catch (err) {
        console.warn('[sheets] could not open spreadsheet by id, searching by title', {
          spreadsheetId,
          docTitle,
          error: describeError(err),
        });
      }
    }

    const found = await this.api.findSpreadsheetByTitle(docTitle);
    if (!found) {
      throw new SinkError('sheets', `spreadsheet "${docTitle}" not found or not shared with the service account`);
    }
    this.spreadsheetId = found;
    return found;
  }

  private async worksheet(spreadsheetId: string, title: string): Promise<WorksheetInfo> {
    const existing = (await this.api.listWorksheets(spreadsheetId)).find(ws => ws.title === title);
    if (existing) return existing;
    console.log('[sheets] creating worksheet', { title });
    return this.api.addWorksheet(spreadsheetId, title, MIN_ROWS, MIN_COLUMNS);
  }

  async publish(table: OutputTable): Promise<void> {
    await this.guard('publish', async () => {
      const spreadsheetId = await this.resolveSpreadsheet();
      const title = this.config.worksheet;
      const ws = await this.worksheet(spreadsheetId, title);

      const rows = Math.max(MIN_ROWS, table.rows.length + 10);
      const columns = Math.max(MIN_COLUMNS, table.headers.length);
      if (ws.rowCount < rows || ws.columnCount < columns) {
        await this.api.resizeWorksheet(spreadsheetId, ws.sheetId, Math.max(rows, ws.rowCount), Math.max(columns, ws.columnCount));
      }

      await this.api.clearWorksheet(spreadsheetId, title);
      await this.api.writeValues(spreadsheetId, `${quoteSheet(title)}!A1`, [table.headers, ...toSheetValues(table.rows)]);
      console.log('[sheets] published', { worksheet: title, rows: table.rows.length, columns: table.headers.length });
    });
  }

  /** Appends raw records under a fixed header; a worksheet with a differing header is cleared first. */
  async appendHistory(records: readonly LabelledRecord[]): Promise<void> {
    const title = this.config.historyWorksheet;
    if (!title || records.length === 0) return;

    await this.guard('history append', async () => {
      const spreadsheetId = await this.resolveSpreadsheet();
      await this.worksheet(spreadsheetId, title);

      const header: string[] = [...RECORD_COLUMNS];
      const current = (await this.api.readValues(spreadsheetId, `${quoteSheet(title)}!1:1`))[0] ?? [];
      if (current.length !== header.length || current.some((cell, i) => cell !== header[i])) {
        // rows under an old header no longer line up with the columns
        if (current.length > 0) console.warn('[sheets] history header changed, clearing worksheet', { worksheet: title });
        await this.api.clearWorksheet(spreadsheetId, title);
        await this.api.writeValues(spreadsheetId, `${quoteSheet(title)}!A1`, [header]);
      }

      await this.api.appendValues(spreadsheetId, `${quoteSheet(title)}!A1`, toSheetValues(records.map(recordRow)));
      console.log('[sheets] history appended', { worksheet: title, rows: records.length });
    });
  }

  private async guard(action: string, work: () => Promise<void>) {
    try {
      await work();
    } catch (err) {
      if (err instanceof SinkError) throw err;
      throw new SinkError('sheets', `${action} failed: ${describeError(err)}`, { cause: err });
    }
  }
}
