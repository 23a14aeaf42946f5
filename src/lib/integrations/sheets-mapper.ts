// Sheet layout, one deal per row:
// A name | B phone | C email | D budget | E deal id | F status | G updated at

import { formatISO, isValid, parseISO } from "date-fns";
import type { SyncRecord } from "@/lib/sync/types";
import type { SheetCell } from "./sheets";

export const LAST_COLUMN = "G";

export interface SheetRange {
  /** Sheet name exactly as written in the range, quotes included. */
  sheetName: string;
  startColumn: string;
  startRow: number;
}

const RANGE_PATTERN = /^(?:(.+)!)?([A-Za-z]+)(\d+)?(?::[A-Za-z]+\d*)?$/;

/**
 * Parse `Leads!A2:G` style ranges. A bare sheet name, or a range without a
 * start row, starts at row 1.
 */
export function parseSheetRange(range: string): SheetRange {
  const bang = range.lastIndexOf("!");
  if (bang === -1 && !/[\d:]/.test(range)) {
    return { sheetName: range.trim(), startColumn: "A", startRow: 1 };
  }
  if (bang !== -1 && !range.slice(bang + 1).trim()) {
    return { sheetName: range.slice(0, bang), startColumn: "A", startRow: 1 };
  }
  const match = RANGE_PATTERN.exec(range.trim());
  if (!match) {
    throw new Error(`Unsupported sheet range: ${range}`);
  }
  return {
    sheetName: match[1] ?? "",
    startColumn: match[2].toUpperCase(),
    startRow: match[3] ? parseInt(match[3], 10) : 1,
  };
}

function prefixed(sheetName: string, a1: string): string {
  return sheetName ? `${sheetName}!${a1}` : a1;
}

export function rowRange(sheetName: string, rowNumber: number): string {
  return prefixed(sheetName, `A${rowNumber}:${LAST_COLUMN}${rowNumber}`);
}

export function appendRange(sheetName: string): string {
  return prefixed(sheetName, `A:${LAST_COLUMN}`);
}

/** First row number of an append response range such as `Leads!A7:G8`. */
export function firstUpdatedRow(updatedRange: string): number | null {
  const a1 = updatedRange.slice(updatedRange.lastIndexOf("!") + 1);
  const match = /^[A-Za-z]+(\d+)/.exec(a1);
  return match ? parseInt(match[1], 10) : null;
}

function parseBudget(value: string): number {
  const cleaned = value.replace(/[\s,]/g, "");
  return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : 0;
}

function parseUpdatedAt(value: string): Date {
  if (!value) return new Date(0);
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : new Date(0);
}

/**
 * Map one sheet row to a record. Entirely blank rows map to null.
 */
export function rowToRecord(row: string[], rowNumber: number): SyncRecord | null {
  const cell = (index: number) => (row[index] ?? "").trim();
  if (row.every((value) => !value.trim())) return null;

  const dealId = cell(4);
  return {
    rowId: String(rowNumber),
    externalId: dealId || undefined,
    name: cell(0),
    phone: cell(1),
    email: cell(2),
    dealFields: {
      budget: parseBudget(cell(3)),
      status: cell(5),
    },
    lastModified: parseUpdatedAt(cell(6)),
    sourceOfTruth: "SHEET",
  };
}

export function recordToRow(record: SyncRecord): SheetCell[] {
  const budget = record.dealFields.budget;
  const status = record.dealFields.status;
  return [
    record.name,
    record.phone,
    record.email,
    typeof budget === "number" ? budget : 0,
    record.externalId ?? "",
    typeof status === "string" ? status : "",
    record.lastModified.getTime() > 0 ? formatISO(record.lastModified) : "",
  ];
}
