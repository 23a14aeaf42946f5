import { describe, expect, it } from "vitest";
import { makeRecord } from "@/test/fakes";
import {
  contentHash,
  fingerprintKey,
  fingerprintOf,
  isEmptyFingerprint,
  normalizeEmail,
  normalizePhone,
} from "./fingerprint";

describe("normalizeEmail", () => {
  it("lowercases and strips whitespace", () => {
    expect(normalizeEmail("  Ann.Lee @Example.COM ")).toBe("ann.lee@example.com");
  });

  it("maps missing values to an empty string", () => {
    expect(normalizeEmail(undefined)).toBe("");
    expect(normalizeEmail(null)).toBe("");
  });
});

describe("normalizePhone", () => {
  it("keeps digits only", () => {
    expect(normalizePhone("+7 (912) 345-67-89")).toBe("79123456789");
  });

  it("rewrites a leading 8 on eleven digits", () => {
    expect(normalizePhone("8 (912) 345-67-89")).toBe("79123456789");
  });

  it("prefixes ten-digit numbers", () => {
    expect(normalizePhone("9123456789")).toBe("79123456789");
  });

  it("leaves other lengths alone", () => {
    expect(normalizePhone("+44 20 7946 0958")).toBe("442079460958");
    expect(normalizePhone("ext. 12")).toBe("12");
  });
});

describe("fingerprint", () => {
  it("joins normalized email and phone", () => {
    const fp = fingerprintOf({ email: "A@x.com", phone: "" });
    expect(fp).toEqual({ email: "a@x.com", phone: "" });
    expect(fingerprintKey(fp)).toBe("a@x.com|");
  });

  it("is empty only when both fields are", () => {
    expect(isEmptyFingerprint({ email: "", phone: "" })).toBe(true);
    expect(isEmptyFingerprint({ email: "", phone: "7" })).toBe(false);
  });
});

describe("contentHash", () => {
  it("ignores ids, timestamps and formatting of identifying fields", () => {
    const sheet = makeRecord({ rowId: "2", email: "A@x.com", phone: "8 912 345 67 89", name: " Ann " });
    const crm = makeRecord({
      externalId: "1000",
      email: "a@x.com",
      phone: "79123456789",
      name: "Ann",
      lastModified: new Date(0),
      sourceOfTruth: "CRM",
    });

    expect(contentHash(sheet)).toBe(contentHash(crm));
  });

  it("ignores the order of deal fields but not their values", () => {
    const a = makeRecord({ dealFields: { budget: 100, status: "New" } });
    const b = makeRecord({ dealFields: { status: "New", budget: 100 } });
    const c = makeRecord({ dealFields: { budget: 101, status: "New" } });

    expect(contentHash(a)).toBe(contentHash(b));
    expect(contentHash(a)).not.toBe(contentHash(c));
    expect(contentHash(a)).toMatch(/^[0-9a-f]{64}$/);
  });
});
