import { google, type sheets_v4 } from "googleapis";
import type { OAuth2Client } from "googleapis-common";
import { errorMessage } from "@/lib/errors";
import { errorForStatus, networkFailure, parseRetryAfter } from "./http";

export type SheetsClient = sheets_v4.Sheets;
export type SheetCell = string | number;

/**
 * OAuth client holding a bare access token. Obtaining and refreshing the
 * token is the credential provider's business.
 */
export function getAuthClient(accessToken: string): OAuth2Client {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  return auth;
}

export function getSheetsClient(accessToken: string, timeoutMs = 30_000): SheetsClient {
  return google.sheets({ version: "v4", auth: getAuthClient(accessToken), timeout: timeoutMs });
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/**
 * Map a googleapis (gaxios) failure onto the sync error taxonomy. Errors
 * without an HTTP response are network failures.
 */
export function toSheetsError(err: unknown) {
  const response = field(err, "response");
  const status = field(response, "status");
  if (typeof status !== "number") {
    return networkFailure("SHEET", err);
  }
  const headers = field(response, "headers");
  const retryAfter = field(headers, "retry-after");
  return errorForStatus(
    "SHEET",
    status,
    `Google Sheets API error ${status}: ${errorMessage(err)}`,
    parseRetryAfter(typeof retryAfter === "string" ? retryAfter : undefined)
  );
}

/**
 * Read a specific range from a Google Sheet.
 * Returns rows as string[][].
 */
export async function readRange(
  sheets: SheetsClient,
  sheetId: string,
  range: string
): Promise<string[][]> {
  const response = await sheets.spreadsheets.values
    .get({
      spreadsheetId: sheetId,
      range,
      valueRenderOption: "UNFORMATTED_VALUE",
      dateTimeRenderOption: "FORMATTED_STRING",
    })
    .catch((err: unknown) => {
      throw toSheetsError(err);
    });

  const rows = response.data.values;
  if (!rows || rows.length === 0) {
    return [];
  }

  // Normalize all values to strings
  return rows.map((row) =>
    row.map((cell) => (cell === null || cell === undefined ? "" : String(cell)))
  );
}

export interface RowUpdate {
  range: string;
  values: SheetCell[];
}

/** Overwrite several single-row ranges in one request. */
export async function batchUpdateRows(
  sheets: SheetsClient,
  sheetId: string,
  updates: RowUpdate[]
): Promise<void> {
  try {
    await sheets.spreadsheets.values.batchUpdate({
      spreadsheetId: sheetId,
      requestBody: {
        valueInputOption: "RAW",
        data: updates.map((u) => ({ range: u.range, values: [u.values] })),
      },
    });
  } catch (err) {
    throw toSheetsError(err);
  }
}

/**
 * Append rows below the table. Returns the A1 range the rows landed in,
 * e.g. `Leads!A7:G8`.
 */
export async function appendRows(
  sheets: SheetsClient,
  sheetId: string,
  range: string,
  rows: SheetCell[][]
): Promise<string | null> {
  const response = await sheets.spreadsheets.values
    .append({
      spreadsheetId: sheetId,
      range,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: rows },
    })
    .catch((err: unknown) => {
      throw toSheetsError(err);
    });
  return response.data.updates?.updatedRange ?? null;
}
