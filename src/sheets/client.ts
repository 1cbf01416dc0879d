/**
 * Google Sheets storage for the upsert sink.
 *
 * Authenticates with a service account and exposes one worksheet of a
 * spreadsheet as a SheetTable.
 */

import { google, type sheets_v4 } from "googleapis";

import { parseServiceAccount } from "../config.js";
import { sheetsLogger } from "../logger.js";

import type { CellValue, CellWrite, SheetTable } from "../types/index.js";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];
const NEW_SHEET_ROWS = 1000;
const NEW_SHEET_MIN_COLUMNS = 20;
const UPDATED_RANGE_ROW_PATTERN = /![A-Z]+(\d+)(?::[A-Z]+\d+)?$/;

// ============================================================================
// A1 Notation
// ============================================================================

/**
 * Column letter for a 0-based index: 0 -> A, 25 -> Z, 26 -> AA
 */
export function columnLetter(index: number): string {
  let letters = "";
  let remaining = index + 1;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

/**
 * Quote a worksheet title for use in a range
 */
export function quoteSheetName(name: string): string {
  return `'${name.replaceAll("'", "''")}'`;
}

/**
 * Row number from an append response range such as "'oura_data'!A5:P5"
 */
export function parseUpdatedRow(updatedRange: string): number | null {
  const match = UPDATED_RANGE_ROW_PATTERN.exec(updatedRange);
  return match?.[1] !== undefined ? Number.parseInt(match[1], 10) : null;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

// ============================================================================
// Client
// ============================================================================

/**
 * The Sheets v4 calls the table makes; `sheets_v4.Sheets` satisfies it
 */
export interface SpreadsheetsApi {
  spreadsheets: {
    get(
      params: sheets_v4.Params$Resource$Spreadsheets$Get
    ): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate): Promise<unknown>;
    values: {
      get(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Get
      ): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      update(params: sheets_v4.Params$Resource$Spreadsheets$Values$Update): Promise<unknown>;
      batchUpdate(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Batchupdate
      ): Promise<unknown>;
      append(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Append
      ): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
    };
  };
}

/**
 * Build a Sheets API client from service-account JSON
 */
export function createSheetsApi(credentialsJson: string): sheets_v4.Sheets {
  const account = parseServiceAccount(credentialsJson);
  const auth = new google.auth.JWT({
    email: account.client_email,
    key: account.private_key,
    scopes: SCOPES,
  });
  return google.sheets({ version: "v4", auth });
}

export class GoogleSheetTable implements SheetTable {
  constructor(
    private api: SpreadsheetsApi,
    private spreadsheetId: string,
    readonly name: string
  ) {}

  private range(suffix = ""): string {
    return `${quoteSheetName(this.name)}${suffix}`;
  }

  async ensure(header: readonly string[]): Promise<boolean> {
    const metadata = await this.api.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties.title",
    });
    const titles = (metadata.data.sheets ?? []).map((sheet) => sheet.properties?.title);
    if (titles.includes(this.name)) {
      return false;
    }

    sheetsLogger.info({ worksheet: this.name, columns: header.length }, "Creating worksheet");
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            addSheet: {
              properties: {
                title: this.name,
                gridProperties: {
                  rowCount: NEW_SHEET_ROWS,
                  columnCount: Math.max(NEW_SHEET_MIN_COLUMNS, header.length),
                },
              },
            },
          },
        ],
      },
    });
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: this.range("!A1"),
      valueInputOption: "RAW",
      requestBody: { values: [[...header]] },
    });
    return true;
  }

  async readAll(): Promise<string[][]> {
    const response = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: this.range(),
    });
    const values: unknown[][] = response.data.values ?? [];
    const rows = values.map((row) => row.map(cellText));
    sheetsLogger.debug({ worksheet: this.name, rows: rows.length }, "Read worksheet");
    return rows;
  }

  async updateCells(rowNumber: number, cells: CellWrite[]): Promise<void> {
    if (cells.length === 0) {
      return;
    }
    await this.api.spreadsheets.values.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        valueInputOption: "RAW",
        data: cells.map((cell) => ({
          range: this.range(`!${columnLetter(cell.column)}${String(rowNumber)}`),
          values: [[cell.value]],
        })),
      },
    });
  }

  async appendRow(values: CellValue[]): Promise<number> {
    const response = await this.api.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: this.range("!A1"),
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: [values] },
    });

    const updatedRange = response.data.updates?.updatedRange ?? "";
    const rowNumber = parseUpdatedRow(updatedRange);
    if (rowNumber === null) {
      throw new Error(`Append to ${this.name} returned no row range (got "${updatedRange}")`);
    }
    return rowNumber;
  }
}
