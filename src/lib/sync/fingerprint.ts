import CryptoJS from "crypto-js";
import type { DealFieldValue, Fingerprint, RecordRef, SyncRecord } from "./types";

export function normalizeEmail(raw: string | null | undefined): string {
  if (!raw) return "";
  return raw.replace(/\s+/g, "").toLowerCase();
}

/**
 * Digits only. Russian numbers are brought to the 7XXXXXXXXXX form:
 * a leading 8 on 11 digits becomes 7, bare 10-digit numbers get a 7 prefix.
 */
export function normalizePhone(raw: string | null | undefined): string {
  if (!raw) return "";
  let digits = raw.replace(/\D+/g, "");
  if (digits.length === 11 && digits.startsWith("8")) {
    digits = `7${digits.slice(1)}`;
  }
  if (digits.length === 10) {
    digits = `7${digits}`;
  }
  return digits;
}

export function fingerprintOf(record: Pick<SyncRecord, "email" | "phone">): Fingerprint {
  return {
    email: normalizeEmail(record.email),
    phone: normalizePhone(record.phone),
  };
}

export function fingerprintKey(fp: Fingerprint): string {
  return `${fp.email}|${fp.phone}`;
}

export function isEmptyFingerprint(fp: Fingerprint): boolean {
  return fp.email === "" && fp.phone === "";
}

export function recordKey(record: SyncRecord): string {
  return fingerprintKey(fingerprintOf(record));
}

function canonicalDealFields(fields: Record<string, DealFieldValue>): [string, DealFieldValue][] {
  return Object.keys(fields)
    .sort()
    .map((key) => [key, fields[key]]);
}

/**
 * SHA-256 over the mapped fields. Ids and timestamps are left out so the same
 * content hashes identically whichever backend it was read from.
 */
export function contentHash(record: SyncRecord): string {
  const fp = fingerprintOf(record);
  const canonical = JSON.stringify([
    record.name.trim(),
    fp.email,
    fp.phone,
    canonicalDealFields(record.dealFields),
  ]);
  return CryptoJS.SHA256(canonical).toString(CryptoJS.enc.Hex);
}

export function toRecordRef(record: SyncRecord, key = recordKey(record)): RecordRef {
  return {
    key,
    rowId: record.rowId,
    externalId: record.externalId,
    name: record.name,
  };
}
