import { parseISO } from "date-fns";
import { describe, expect, it } from "vitest";
import { makeRecord } from "@/test/fakes";
import { appendRange, firstUpdatedRow, parseSheetRange, recordToRow, rowRange, rowToRecord } from "./sheets-mapper";

describe("parseSheetRange", () => {
  it("reads sheet name, column and start row", () => {
    expect(parseSheetRange("Leads!A2:G")).toEqual({ sheetName: "Leads", startColumn: "A", startRow: 2 });
    expect(parseSheetRange("'Deals 2024'!b3:G100")).toEqual({
      sheetName: "'Deals 2024'",
      startColumn: "B",
      startRow: 3,
    });
  });

  it("starts bare names and open ranges at row 1", () => {
    expect(parseSheetRange("Leads")).toEqual({ sheetName: "Leads", startColumn: "A", startRow: 1 });
    expect(parseSheetRange("Leads!")).toEqual({ sheetName: "Leads", startColumn: "A", startRow: 1 });
    expect(parseSheetRange("A:G")).toEqual({ sheetName: "", startColumn: "A", startRow: 1 });
  });

  it("rejects ranges it cannot place", () => {
    expect(() => parseSheetRange("Leads!2:5")).toThrow("Unsupported sheet range: Leads!2:5");
  });
});

describe("ranges", () => {
  it("builds row and append ranges", () => {
    expect(rowRange("Leads", 5)).toBe("Leads!A5:G5");
    expect(appendRange("Leads")).toBe("Leads!A:G");
    expect(appendRange("")).toBe("A:G");
  });

  it("reads the first row of an append result", () => {
    expect(firstUpdatedRow("Leads!A7:G8")).toBe(7);
    expect(firstUpdatedRow("'My Sheet'!A12:G12")).toBe(12);
    expect(firstUpdatedRow("Leads")).toBeNull();
  });
});

describe("rowToRecord", () => {
  it("maps columns A to G", () => {
    const row = ["Ann ", "+7 912 345-67-89", "ann@x.com", "12 500", "1000", "New", "2024-05-01T12:00:00Z"];

    expect(rowToRecord(row, 2)).toEqual({
      rowId: "2",
      externalId: "1000",
      name: "Ann",
      phone: "+7 912 345-67-89",
      email: "ann@x.com",
      dealFields: { budget: 12500, status: "New" },
      lastModified: new Date("2024-05-01T12:00:00Z"),
      sourceOfTruth: "SHEET",
    });
  });

  it("fills short rows with defaults", () => {
    const record = rowToRecord(["Bob"], 9);

    expect(record).toMatchObject({ rowId: "9", name: "Bob", email: "", phone: "" });
    expect(record?.externalId).toBeUndefined();
    expect(record?.dealFields).toEqual({ budget: 0, status: "" });
    expect(record?.lastModified.getTime()).toBe(0);
  });

  it("skips blank rows", () => {
    expect(rowToRecord([], 3)).toBeNull();
    expect(rowToRecord(["", "  "], 3)).toBeNull();
  });

  it("treats non-numeric budgets and bad dates as empty", () => {
    const record = rowToRecord(["Ann", "", "", "about 5k", "", "", "yesterday"], 4);

    expect(record?.dealFields.budget).toBe(0);
    expect(record?.lastModified.getTime()).toBe(0);
  });
});

describe("recordToRow", () => {
  it("writes the seven columns", () => {
    const lastModified = new Date("2024-05-01T12:00:00Z");
    const row = recordToRow(
      makeRecord({ externalId: "1000", phone: "79123456789", dealFields: { budget: 100, status: "New" }, lastModified })
    );

    expect(row.slice(0, 6)).toEqual(["Ann", "79123456789", "ann@example.com", 100, "1000", "New"]);
    expect(parseISO(String(row[6])).getTime()).toBe(lastModified.getTime());
  });

  it("leaves unknown values blank", () => {
    const row = recordToRow(makeRecord({ dealFields: { budget: "n/a" }, lastModified: new Date(0) }));

    expect(row).toEqual(["Ann", "", "ann@example.com", 0, "", "", ""]);
  });
});
