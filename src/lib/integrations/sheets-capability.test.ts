import { beforeEach, describe, expect, it, vi } from "vitest";
import { StaticCredentialProvider } from "@/lib/credentials";
import { CapabilityContractError, RequestRejected } from "@/lib/errors";
import { RateLimiter } from "@/lib/sync/rate-limiter";
import { FakeClock, makeRecord } from "@/test/fakes";
import { GoogleSheetsCapability } from "./sheets-capability";
import { appendRows, batchUpdateRows, getSheetsClient, readRange } from "./sheets";

vi.mock("./sheets", () => ({
  getSheetsClient: vi.fn(() => ({})),
  readRange: vi.fn(),
  appendRows: vi.fn(),
  batchUpdateRows: vi.fn(),
}));

function capability(limiter?: RateLimiter) {
  return new GoogleSheetsCapability({
    sheetId: "sheet-1",
    range: "Leads!A2:G",
    credentials: new StaticCredentialProvider({ SHEET: "test-secret" }),
    limiter,
  });
}

beforeEach(() => {
  vi.mocked(readRange).mockReset();
  vi.mocked(appendRows).mockReset();
  vi.mocked(batchUpdateRows).mockReset();
});

describe("GoogleSheetsCapability.read", () => {
  it("numbers rows from the start of the range and skips blank ones", async () => {
    const limiter = new RateLimiter({
      buckets: { SHEET: { capacity: 5, refillPerSecond: 1 }, CRM: { capacity: 5, refillPerSecond: 1 } },
      maxWaitMs: 0,
      clock: new FakeClock(),
    });
    vi.mocked(readRange).mockResolvedValueOnce([
      ["Ann", "", "ann@x.com", "100", "1000", "New", ""],
      ["", "", ""],
      ["Bob", "79120000000", "", "", "", "", ""],
    ]);

    const records = await capability(limiter).read("Leads!A2:G");

    expect(records.map((r) => [r.rowId, r.name, r.externalId])).toEqual([
      ["2", "Ann", "1000"],
      ["4", "Bob", undefined],
    ]);
    expect(getSheetsClient).toHaveBeenCalledWith("test-secret", undefined);
    expect(readRange).toHaveBeenCalledWith({}, "sheet-1", "Leads!A2:G");
    expect(limiter.budget("SHEET").callsInWindow).toBe(1);
  });
});

describe("GoogleSheetsCapability.writeBatch", () => {
  it("appends new rows and returns their row numbers", async () => {
    vi.mocked(appendRows).mockResolvedValueOnce("Leads!A7:G8");
    const records = [makeRecord({ name: "Ann" }), makeRecord({ name: "Bob" })];

    const results = await capability().writeBatch({ backend: "SHEET", kind: "create", records });

    expect(results).toEqual([
      { ok: true, id: "7" },
      { ok: true, id: "8" },
    ]);
    expect(vi.mocked(appendRows).mock.calls[0][2]).toBe("Leads!A:G");
    expect(vi.mocked(appendRows).mock.calls[0][3].map((row) => row[0])).toEqual(["Ann", "Bob"]);
  });

  it("fails the pass when the append response has no range", async () => {
    vi.mocked(appendRows).mockResolvedValueOnce(null);

    await expect(
      capability().writeBatch({ backend: "SHEET", kind: "create", records: [makeRecord()] })
    ).rejects.toThrow(new CapabilityContractError("SHEET", "Append response has no usable range: none"));
  });

  it("overwrites rows by number and rejects records without one", async () => {
    vi.mocked(batchUpdateRows).mockResolvedValueOnce(undefined);
    const records = [makeRecord({ rowId: "5" }), makeRecord({ rowId: undefined })];

    const results = await capability().writeBatch({ backend: "SHEET", kind: "update", records });

    expect(results).toEqual([
      { ok: true, id: "5" },
      { ok: false, kind: "REJECTED", message: "Sheet update needs a row number" },
    ]);
    expect(vi.mocked(batchUpdateRows).mock.calls[0][2].map((u) => u.range)).toEqual(["Leads!A5:G5"]);
  });

  it("reports a rejected request against every written record", async () => {
    vi.mocked(batchUpdateRows).mockRejectedValueOnce(new RequestRejected("SHEET", "Invalid range", 400));
    const records = [makeRecord({ rowId: "x" }), makeRecord({ rowId: "5" })];

    const results = await capability().writeBatch({ backend: "SHEET", kind: "update", records });

    expect(results).toEqual([
      { ok: false, kind: "REJECTED", message: "Sheet update needs a row number" },
      { ok: false, kind: "REJECTED", message: "Invalid range" },
    ]);
  });

  it("refuses batches meant for the CRM", async () => {
    await expect(capability().writeBatch({ backend: "CRM", kind: "create", records: [] })).rejects.toBeInstanceOf(
      CapabilityContractError
    );
  });
});
