// Identity correspondence between fetched records and the last-known SyncState

import { fingerprintKey, fingerprintOf, isEmptyFingerprint } from "./fingerprint";
import type { SyncRecord, SyncStateEntry } from "./types";

export interface LinkedPair {
  source: SyncRecord;
  entry: SyncStateEntry;
}

/** Several state entries matched one record; only `chosen` was linked. */
export interface AmbiguousMatch {
  source: SyncRecord;
  chosen: SyncStateEntry;
  rejected: SyncStateEntry[];
}

export interface DuplicateSource {
  record: SyncRecord;
  duplicateOf: SyncRecord;
}

export interface MatchResult {
  linked: LinkedPair[];
  unmatchedSource: SyncRecord[];
  /** Entries no record claimed, including those rejected as ambiguous. */
  unmatchedState: SyncStateEntry[];
  ambiguous: AmbiguousMatch[];
  duplicates: DuplicateSource[];
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V) {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

export class RecordMatcher {
  match(sourceRecords: readonly SyncRecord[], stateEntries: readonly SyncStateEntry[]): MatchResult {
    const byKey = new Map<string, SyncStateEntry>();
    const byEmail = new Map<string, SyncStateEntry[]>();
    const byPhone = new Map<string, SyncStateEntry[]>();
    const byExternalId = new Map<string, SyncStateEntry>();

    for (const entry of stateEntries) {
      byKey.set(entry.key, entry);
      if (entry.email) pushTo(byEmail, entry.email, entry);
      if (entry.phone) pushTo(byPhone, entry.phone, entry);
      if (entry.externalId && !byExternalId.has(entry.externalId)) {
        byExternalId.set(entry.externalId, entry);
      }
    }

    const linkedKeys = new Set<string>();
    const flaggedKeys = new Set<string>();
    const isAvailable = (entry: SyncStateEntry) =>
      !linkedKeys.has(entry.key) && !flaggedKeys.has(entry.key);

    const seenEmail = new Map<string, SyncRecord>();
    const seenPhone = new Map<string, SyncRecord>();

    const result: MatchResult = {
      linked: [],
      unmatchedSource: [],
      unmatchedState: [],
      ambiguous: [],
      duplicates: [],
    };

    const link = (source: SyncRecord, entry: SyncStateEntry) => {
      linkedKeys.add(entry.key);
      result.linked.push({ source, entry });
    };

    for (const record of sourceRecords) {
      const fp = fingerprintOf(record);

      // Nothing to identify the record by: always a create
      if (isEmptyFingerprint(fp)) {
        result.unmatchedSource.push(record);
        continue;
      }

      const earlier =
        (fp.email ? seenEmail.get(fp.email) : undefined) ??
        (fp.phone ? seenPhone.get(fp.phone) : undefined);
      if (earlier) {
        result.duplicates.push({ record, duplicateOf: earlier });
        continue;
      }
      if (fp.email) seenEmail.set(fp.email, record);
      if (fp.phone) seenPhone.set(fp.phone, record);

      const exact = byKey.get(fingerprintKey(fp));
      if (exact && isAvailable(exact)) {
        link(record, exact);
        continue;
      }

      // One identifying field changed: compare email OR phone
      const candidates = new Map<string, SyncStateEntry>();
      for (const entry of fp.email ? byEmail.get(fp.email) ?? [] : []) {
        if (isAvailable(entry)) candidates.set(entry.key, entry);
      }
      for (const entry of fp.phone ? byPhone.get(fp.phone) ?? [] : []) {
        if (isAvailable(entry)) candidates.set(entry.key, entry);
      }

      if (candidates.size === 0) {
        const byId = record.externalId ? byExternalId.get(record.externalId) : undefined;
        if (byId && isAvailable(byId)) {
          link(record, byId);
        } else {
          result.unmatchedSource.push(record);
        }
        continue;
      }

      const ranked = [...candidates.values()].sort(
        (a, b) => b.lastSyncedAt.getTime() - a.lastSyncedAt.getTime()
      );
      const [chosen, ...rejected] = ranked;
      link(record, chosen);

      if (rejected.length > 0) {
        for (const entry of rejected) flaggedKeys.add(entry.key);
        result.ambiguous.push({ source: record, chosen, rejected });
      }
    }

    result.unmatchedState = stateEntries.filter((entry) => !linkedKeys.has(entry.key));
    return result;
  }
}
