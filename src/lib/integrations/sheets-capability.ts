import { CapabilityContractError } from "@/lib/errors";
import type { RateLimiter } from "@/lib/sync/rate-limiter";
import type {
  Batch,
  CredentialProvider,
  SheetCapability,
  SyncRecord,
  WriteResult,
} from "@/lib/sync/types";
import { batchFailure, withRetry } from "./http";
import {
  appendRange,
  firstUpdatedRow,
  parseSheetRange,
  recordToRow,
  rowRange,
  rowToRecord,
} from "./sheets-mapper";
import { appendRows, batchUpdateRows, getSheetsClient, readRange, type SheetsClient } from "./sheets";

export interface GoogleSheetsCapabilityOptions {
  sheetId: string;
  /** Range the table lives in; writes go to the same tab. */
  range: string;
  credentials: CredentialProvider;
  /** Gates reads; writes are gated per batch by the sync engine. */
  limiter?: RateLimiter;
  timeoutMs?: number;
}

export class GoogleSheetsCapability implements SheetCapability {
  constructor(private readonly options: GoogleSheetsCapabilityOptions) {}

  private async client(): Promise<SheetsClient> {
    const token = await this.options.credentials.getToken("SHEET");
    return getSheetsClient(token, this.options.timeoutMs);
  }

  async read(range: string): Promise<SyncRecord[]> {
    const { startRow } = parseSheetRange(range);
    const sheets = await this.client();

    const rows = await withRetry(async () => {
      await this.options.limiter?.acquire("SHEET");
      return readRange(sheets, this.options.sheetId, range);
    });

    const records: SyncRecord[] = [];
    rows.forEach((row, index) => {
      const record = rowToRecord(row, startRow + index);
      if (record) records.push(record);
    });
    return records;
  }

  async writeBatch(batch: Batch): Promise<WriteResult[]> {
    if (batch.backend !== "SHEET") {
      throw new CapabilityContractError("SHEET", `Sheets capability got a ${batch.backend} batch`);
    }
    if (batch.records.length === 0) return [];

    const sheets = await this.client();
    return batch.kind === "create"
      ? this.append(sheets, batch.records)
      : this.update(sheets, batch.records);
  }

  private async append(sheets: SheetsClient, records: SyncRecord[]): Promise<WriteResult[]> {
    const { sheetName } = parseSheetRange(this.options.range);

    let updatedRange: string | null;
    try {
      updatedRange = await appendRows(
        sheets,
        this.options.sheetId,
        appendRange(sheetName),
        records.map(recordToRow)
      );
    } catch (err) {
      return batchFailure(err, records.length);
    }

    const firstRow = updatedRange ? firstUpdatedRow(updatedRange) : null;
    if (firstRow === null) {
      throw new CapabilityContractError("SHEET", `Append response has no usable range: ${updatedRange ?? "none"}`);
    }
    return records.map((_, i): WriteResult => ({ ok: true, id: String(firstRow + i) }));
  }

  private async update(sheets: SheetsClient, records: SyncRecord[]): Promise<WriteResult[]> {
    const { sheetName } = parseSheetRange(this.options.range);
    const results: (WriteResult | null)[] = records.map((record): WriteResult | null =>
      record.rowId && /^\d+$/.test(record.rowId)
        ? null
        : { ok: false, kind: "REJECTED", message: "Sheet update needs a row number" }
    );

    const writable = records.filter((_, i) => results[i] === null);
    if (writable.length > 0) {
      try {
        await batchUpdateRows(
          sheets,
          this.options.sheetId,
          writable.map((record) => ({
            range: rowRange(sheetName, parseInt(record.rowId ?? "0", 10)),
            values: recordToRow(record),
          }))
        );
      } catch (err) {
        const failures = batchFailure(err, writable.length);
        let next = 0;
        return results.map((result) => result ?? failures[next++]);
      }
    }

    return results.map((result, i): WriteResult => result ?? { ok: true, id: records[i].rowId ?? "" });
  }
}
