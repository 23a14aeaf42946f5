export type Backend = "SHEET" | "CRM";

export type SyncDirection = "SHEET_TO_CRM" | "CRM_TO_SHEET";

export const SYNC_DIRECTIONS: readonly SyncDirection[] = ["SHEET_TO_CRM", "CRM_TO_SHEET"];

export type DealFieldValue = string | number | boolean | null;

/**
 * A contact/deal as seen by one backend. `externalId` is the CRM lead id,
 * `rowId` the 1-based spreadsheet row number.
 */
export interface SyncRecord {
  externalId?: string;
  rowId?: string;
  name: string;
  email: string;
  phone: string;
  dealFields: Record<string, DealFieldValue>;
  lastModified: Date;
  sourceOfTruth: Backend;
}

export interface Fingerprint {
  email: string;
  phone: string;
}

export interface SyncStateEntry {
  key: string;
  email: string;
  phone: string;
  rowId?: string;
  externalId?: string;
  lastSyncedHash: string;
  lastSyncedAt: Date;
}

export interface ChangeSet {
  toCreateInCrm: SyncRecord[];
  toUpdateInCrm: SyncRecord[];
  toCreateInSheet: SyncRecord[];
  toUpdateInSheet: SyncRecord[];
}

export type BatchKind = "create" | "update";

export interface Batch {
  backend: Backend;
  kind: BatchKind;
  records: SyncRecord[];
}

export type BatchSizeLimits = Record<Backend, number>;

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export type WriteFailureKind = "TRANSIENT" | "RATE_LIMITED" | "REJECTED";

export type WriteResult =
  | { ok: true; id: string }
  | { ok: false; kind: WriteFailureKind; message: string; retryAfterMs?: number };

export interface CrmFilter {
  pipelineId: number;
}

export interface SheetReadCapability {
  read(range: string): Promise<SyncRecord[]>;
}

export interface SheetWriteCapability {
  writeBatch(batch: Batch): Promise<WriteResult[]>;
}

export interface CrmReadCapability {
  read(filter: CrmFilter): Promise<SyncRecord[]>;
}

export interface CrmWriteCapability {
  writeBatch(batch: Batch): Promise<WriteResult[]>;
}

export type SheetCapability = SheetReadCapability & SheetWriteCapability;
export type CrmCapability = CrmReadCapability & CrmWriteCapability;

export interface CredentialProvider {
  getToken(backend: Backend): Promise<string>;
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export type SkipReason =
  | "unchanged"
  | "deleted-upstream"
  | "ambiguous-match"
  | "duplicate-source"
  | "newer-on-destination"
  | "missing-on-destination"
  | "linked-existing"
  | "unidentifiable";

export type FailureKind = WriteFailureKind | "ABORTED" | "CANCELLED";

export interface RecordRef {
  key: string;
  rowId?: string;
  externalId?: string;
  name?: string;
}

export interface SkippedEntry extends RecordRef {
  reason: SkipReason;
}

export interface FailedEntry extends RecordRef {
  kind: FailureKind;
  message: string;
}

export interface ConflictEntry extends RecordRef {
  winner: Backend;
  overwritten: SyncRecord;
}

export type PassStatus = "completed" | "aborted" | "dropped";

export interface SyncReport {
  runId: string;
  direction: SyncDirection;
  status: PassStatus;
  created: number;
  updated: number;
  skipped: SkippedEntry[];
  failed: FailedEntry[];
  conflicts: ConflictEntry[];
  startedAt: Date;
  durationMs: number;
  error?: string;
}

export type PassPhase =
  | "IDLE"
  | "FETCHING"
  | "MATCHING"
  | "PLANNING"
  | "WRITING"
  | "DONE"
  | "FAILED_ABORT";

export interface PassProgress {
  runId: string | null;
  phase: PassPhase;
  batchIndex: number;
  batchCount: number;
}

export interface SyncTrigger {
  onTick(direction: SyncDirection): Promise<SyncReport>;
}
