import { describe, expect, it } from "vitest";
import { at, makeRecord } from "@/test/fakes";
import { RecordMatcher } from "./matcher";
import type { SyncStateEntry } from "./types";

function entry(key: string, overrides: Partial<SyncStateEntry> = {}): SyncStateEntry {
  const [email, phone] = key.split("|");
  return { key, email, phone, lastSyncedHash: "h", lastSyncedAt: at(0), ...overrides };
}

const matcher = new RecordMatcher();

describe("RecordMatcher", () => {
  it("treats every record as unmatched against empty state", () => {
    const records = [makeRecord({ email: "a@x.com" }), makeRecord({ email: "b@x.com" })];

    const result = matcher.match(records, []);

    expect(result.unmatchedSource).toEqual(records);
    expect(result.linked).toEqual([]);
    expect(result.unmatchedState).toEqual([]);
  });

  it("links on the exact fingerprint after normalization", () => {
    const record = makeRecord({ email: " A@X.com ", phone: "8 (912) 345-67-89" });
    const state = entry("a@x.com|79123456789");

    const result = matcher.match([record], [state]);

    expect(result.linked).toEqual([{ source: record, entry: state }]);
  });

  it("falls back to either identifying field when the other changed", () => {
    const byEmail = makeRecord({ email: "a@x.com", phone: "79990000000" });
    const byPhone = makeRecord({ email: "new@x.com", phone: "79120000000" });
    const emailEntry = entry("a@x.com|79110000000");
    const phoneEntry = entry("old@x.com|79120000000");

    const result = matcher.match([byEmail, byPhone], [emailEntry, phoneEntry]);

    expect(result.linked.map((l) => [l.source, l.entry.key])).toEqual([
      [byEmail, "a@x.com|79110000000"],
      [byPhone, "old@x.com|79120000000"],
    ]);
    expect(result.ambiguous).toEqual([]);
  });

  it("links the most recently synced candidate and flags the others", () => {
    const record = makeRecord({ email: "e@x.com", phone: "79120000001" });
    const older = entry("e@x.com|", { lastSyncedAt: at(1000) });
    const newer = entry("|79120000001", { lastSyncedAt: at(5000) });

    const result = matcher.match([record], [older, newer]);

    expect(result.linked).toEqual([{ source: record, entry: newer }]);
    expect(result.ambiguous).toEqual([{ source: record, chosen: newer, rejected: [older] }]);
    expect(result.unmatchedState).toEqual([older]);
  });

  it("gives the same links whichever side supplies the records", () => {
    const sheetRow = makeRecord({ email: "s@x.com", rowId: "2" });
    const crmLead = makeRecord({ email: "S@x.com", externalId: "1000", sourceOfTruth: "CRM" });
    const state = [entry("s@x.com|", { rowId: "2", externalId: "1000" })];

    const fromSheet = matcher.match([sheetRow], state);
    const fromCrm = matcher.match([crmLead], state);

    expect(fromSheet.linked[0].entry).toBe(state[0]);
    expect(fromCrm.linked[0].entry).toBe(state[0]);
  });

  it("reports later records sharing an email or phone as duplicates", () => {
    const first = makeRecord({ email: "d@x.com", phone: "79120000000" });
    const sameEmail = makeRecord({ email: "D@x.com" });
    const samePhone = makeRecord({ email: "other@x.com", phone: "+7 912 000 00 00" });

    const result = matcher.match([first, sameEmail, samePhone], []);

    expect(result.unmatchedSource).toEqual([first]);
    expect(result.duplicates).toEqual([
      { record: sameEmail, duplicateOf: first },
      { record: samePhone, duplicateOf: first },
    ]);
  });

  it("never links records without email or phone", () => {
    const blank = makeRecord({ email: "", phone: "", externalId: "1000" });

    const result = matcher.match([blank], [entry("|", { externalId: "1000" })]);

    expect(result.unmatchedSource).toEqual([blank]);
    expect(result.linked).toEqual([]);
  });

  it("falls back to the stored id when both identifying fields changed", () => {
    const record = makeRecord({ email: "renamed@x.com", phone: "79000000000", externalId: "1007" });
    const state = entry("old@x.com|79110000000", { externalId: "1007" });

    const result = matcher.match([record], [state]);

    expect(result.linked).toEqual([{ source: record, entry: state }]);
  });

  it("leaves unclaimed state entries unmatched", () => {
    const kept = entry("k@x.com|");
    const gone = entry("gone@x.com|");

    const result = matcher.match([makeRecord({ email: "k@x.com" })], [kept, gone]);

    expect(result.unmatchedState).toEqual([gone]);
  });
});
