import { randomUUID } from "node:crypto";
import { Mutex } from "async-mutex";
import {
  CapabilityContractError,
  RateLimitExceeded,
  TransientWriteError,
  errorMessage,
  isFatal,
} from "@/lib/errors";
import { BatchPlanner, emptyChangeSet } from "./batch-planner";
import {
  contentHash,
  fingerprintKey,
  fingerprintOf,
  isEmptyFingerprint,
  recordKey,
  toRecordRef,
} from "./fingerprint";
import { syncLogger, type SyncLogger } from "./logger";
import { RecordMatcher } from "./matcher";
import { systemClock, type Clock, type RateLimiter } from "./rate-limiter";
import type { SyncRunStore, SyncStateStore } from "./state-store";
import {
  SYNC_DIRECTIONS,
  type Backend,
  type Batch,
  type BatchSizeLimits,
  type ChangeSet,
  type CredentialProvider,
  type CrmCapability,
  type CrmFilter,
  type FailureKind,
  type PassPhase,
  type PassProgress,
  type SheetCapability,
  type SkipReason,
  type SyncDirection,
  type SyncRecord,
  type SyncReport,
  type SyncStateEntry,
  type SyncTrigger,
  type WriteResult,
} from "./types";

export interface SyncEngineOptions {
  sheet: SheetCapability;
  crm: CrmCapability;
  credentials: CredentialProvider;
  state: SyncStateStore;
  runs?: SyncRunStore;
  limiter: RateLimiter;
  sheetRange: string;
  crmFilter: CrmFilter;
  batchSizes: BatchSizeLimits;
  /** Attempts per record for transient write failures, first try included. */
  maxWriteAttempts?: number;
  retryDelayMs?: number;
  matcher?: RecordMatcher;
  planner?: BatchPlanner;
  logger?: SyncLogger;
  clock?: Clock;
  newRunId?: () => string;
}

/** What a planned write means for SyncState once it succeeds. */
interface PendingWrite {
  source: SyncRecord;
  previousKey?: string;
}

interface PassContext {
  runId: string;
  direction: SyncDirection;
  source: Backend;
  destination: Backend;
  report: SyncReport;
  pending: Map<SyncRecord, PendingWrite>;
  linkBacks: SyncRecord[];
}

type WriteMode = "sync" | "link-back";

function otherSide(backend: Backend): Backend {
  return backend === "SHEET" ? "CRM" : "SHEET";
}

function sourceOf(direction: SyncDirection): Backend {
  return direction === "SHEET_TO_CRM" ? "SHEET" : "CRM";
}

function emptyReport(runId: string, direction: SyncDirection, startedAt: Date): SyncReport {
  return {
    runId,
    direction,
    status: "completed",
    created: 0,
    updated: 0,
    skipped: [],
    failed: [],
    conflicts: [],
    startedAt,
    durationMs: 0,
  };
}

function idleProgress(): PassProgress {
  return { runId: null, phase: "IDLE", batchIndex: 0, batchCount: 0 };
}

/** The id a backend knows a record by. */
function idOn(backend: Backend, record: Pick<SyncRecord, "rowId" | "externalId">): string | undefined {
  return backend === "CRM" ? record.externalId : record.rowId;
}

export class SyncEngine implements SyncTrigger {
  private readonly sheet: SheetCapability;
  private readonly crm: CrmCapability;
  private readonly credentials: CredentialProvider;
  private readonly state: SyncStateStore;
  private readonly runs?: SyncRunStore;
  private readonly limiter: RateLimiter;
  private readonly sheetRange: string;
  private readonly crmFilter: CrmFilter;
  private readonly batchSizes: BatchSizeLimits;
  private readonly maxWriteAttempts: number;
  private readonly retryDelayMs: number;
  private readonly matcher: RecordMatcher;
  private readonly planner: BatchPlanner;
  private readonly logger: SyncLogger;
  private readonly clock: Clock;
  private readonly newRunId: () => string;

  private readonly passLocks: Record<SyncDirection, Mutex> = {
    SHEET_TO_CRM: new Mutex(),
    CRM_TO_SHEET: new Mutex(),
  };
  private readonly stateLock = new Mutex();
  private readonly progress: Record<SyncDirection, PassProgress> = {
    SHEET_TO_CRM: idleProgress(),
    CRM_TO_SHEET: idleProgress(),
  };
  private shuttingDown = false;

  constructor(options: SyncEngineOptions) {
    this.sheet = options.sheet;
    this.crm = options.crm;
    this.credentials = options.credentials;
    this.state = options.state;
    this.runs = options.runs;
    this.limiter = options.limiter;
    this.sheetRange = options.sheetRange;
    this.crmFilter = options.crmFilter;
    this.batchSizes = options.batchSizes;
    this.maxWriteAttempts = Math.max(1, options.maxWriteAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.matcher = options.matcher ?? new RecordMatcher();
    this.planner = options.planner ?? new BatchPlanner();
    this.logger = options.logger ?? syncLogger;
    this.clock = options.clock ?? systemClock;
    this.newRunId = options.newRunId ?? randomUUID;
  }

  /**
   * Run one pass. Never throws: every outcome, including an aborted pass or a
   * trigger dropped because the direction is already running, is a report.
   */
  async run(direction: SyncDirection): Promise<SyncReport> {
    const runId = this.newRunId();
    const startedAt = new Date(this.clock.now());
    const lock = this.passLocks[direction];

    if (this.shuttingDown || lock.isLocked()) {
      const report = emptyReport(runId, direction, startedAt);
      report.status = "dropped";
      report.error = this.shuttingDown
        ? "Sync engine is shutting down"
        : `A ${direction} pass is already running`;
      this.logger.warn(runId, report.error);
      return report;
    }

    return lock.runExclusive(() => this.execute(runId, direction, startedAt));
  }

  onTick(direction: SyncDirection): Promise<SyncReport> {
    return this.run(direction);
  }

  getStatus(direction: SyncDirection): PassProgress {
    return { ...this.progress[direction] };
  }

  isRunning(direction: SyncDirection): boolean {
    return this.passLocks[direction].isLocked();
  }

  /**
   * Stop accepting passes. Running passes finish their current batch and
   * report the rest as cancelled; resolves once both directions are idle.
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    await Promise.all(SYNC_DIRECTIONS.map((direction) => this.passLocks[direction].waitForUnlock()));
  }

  private setPhase(ctx: PassContext, phase: PassPhase, batchIndex = 0, batchCount = 0) {
    this.progress[ctx.direction] = { runId: ctx.runId, phase, batchIndex, batchCount };
  }

  private async execute(runId: string, direction: SyncDirection, startedAt: Date): Promise<SyncReport> {
    const source = sourceOf(direction);
    const ctx: PassContext = {
      runId,
      direction,
      source,
      destination: otherSide(source),
      report: emptyReport(runId, direction, startedAt),
      pending: new Map(),
      linkBacks: [],
    };

    this.logger.info(runId, `Starting ${direction} pass`);

    try {
      this.setPhase(ctx, "FETCHING");
      await this.credentials.getToken("SHEET");
      await this.credentials.getToken("CRM");
      const [sourceRecords, destinationRecords] = await Promise.all([
        this.readSide(ctx.source),
        this.readSide(ctx.destination),
      ]);
      const entries = await this.state.all();
      this.logger.info(
        runId,
        `Fetched ${sourceRecords.length} ${ctx.source} and ${destinationRecords.length} ${ctx.destination} records, ${entries.length} state entries`
      );

      this.setPhase(ctx, "MATCHING");
      const changes = await this.reconcile(ctx, sourceRecords, destinationRecords, entries);

      this.setPhase(ctx, "PLANNING");
      const batches = this.planner.plan(changes, this.batchSizes);

      await this.writeBatches(ctx, batches, "sync");

      // Handed over to writeBatches, which reports whatever it cannot write
      const linkBacks = ctx.linkBacks.splice(0);
      if (linkBacks.length > 0) {
        const linkBatches = this.planner.plan({ ...emptyChangeSet(), toUpdateInSheet: linkBacks }, this.batchSizes);
        await this.writeBatches(ctx, linkBatches, "link-back");
      }

      this.setPhase(ctx, "DONE");
    } catch (err) {
      this.setPhase(ctx, "FAILED_ABORT");
      ctx.report.status = "aborted";
      const message = errorMessage(err);
      ctx.report.error = message;
      for (const record of ctx.linkBacks.splice(0)) {
        this.fail(ctx, record, "ABORTED", message, "link-back");
      }
      this.logger.error(runId, `Pass aborted: ${message}`);
    }

    return this.finalize(ctx);
  }

  private async finalize(ctx: PassContext): Promise<SyncReport> {
    const { report } = ctx;
    report.durationMs = this.clock.now() - report.startedAt.getTime();

    this.logger.info(
      ctx.runId,
      `${ctx.direction} ${report.status}: created ${report.created}, updated ${report.updated}, ` +
        `skipped ${report.skipped.length}, failed ${report.failed.length}, conflicts ${report.conflicts.length} ` +
        `(${report.durationMs}ms)`
    );

    if (this.runs) {
      try {
        await this.runs.record(report);
      } catch (err) {
        this.logger.error(ctx.runId, `Failed to persist run report: ${errorMessage(err)}`);
      }
    }
    return report;
  }

  private async readSide(backend: Backend): Promise<SyncRecord[]> {
    const records =
      backend === "SHEET"
        ? await this.sheet.read(this.sheetRange)
        : await this.crm.read(this.crmFilter);

    for (const record of records) {
      if (!idOn(backend, record)) {
        throw new CapabilityContractError(backend, `${backend} read returned a record without its ${backend} id`);
      }
    }
    return records;
  }

  // -------------------------------------------------------------------------
  // Reconciliation
  // -------------------------------------------------------------------------

  private skip(ctx: PassContext, record: SyncRecord, reason: SkipReason, key?: string) {
    ctx.report.skipped.push({ ...toRecordRef(record, key), reason });
  }

  private async reconcile(
    ctx: PassContext,
    sourceRecords: SyncRecord[],
    destinationRecords: SyncRecord[],
    entries: SyncStateEntry[]
  ): Promise<ChangeSet> {
    const changes = emptyChangeSet();
    const destination = ctx.destination;
    const toUpdate = destination === "CRM" ? changes.toUpdateInCrm : changes.toUpdateInSheet;
    const toCreate = destination === "CRM" ? changes.toCreateInCrm : changes.toCreateInSheet;

    const destById = new Map<string, SyncRecord>();
    const destByExternalId = new Map<string, SyncRecord>();
    for (const record of destinationRecords) {
      const id = idOn(destination, record);
      if (id) destById.set(id, record);
      if (record.externalId) destByExternalId.set(record.externalId, record);
    }

    // Sheet rows move when rows are inserted above them; the deal id column
    // is the stabler handle, the row number the fallback.
    const findDestination = (entry: SyncStateEntry): SyncRecord | undefined => {
      if (destination === "SHEET") {
        return (
          (entry.externalId ? destByExternalId.get(entry.externalId) : undefined) ??
          (entry.rowId ? destById.get(entry.rowId) : undefined)
        );
      }
      return entry.externalId ? destById.get(entry.externalId) : undefined;
    };

    const queueWrite = (list: SyncRecord[], write: SyncRecord, pending: PendingWrite) => {
      list.push(write);
      ctx.pending.set(write, pending);
    };

    const asUpdate = (source: SyncRecord, target: SyncRecord): SyncRecord =>
      destination === "CRM"
        ? { ...source, externalId: target.externalId }
        : { ...source, rowId: target.rowId };

    const match = this.matcher.match(sourceRecords, entries);

    // Linked pairs
    const linkedDestIds = new Set<string>();
    for (const { source, entry } of match.linked) {
      const target = findDestination(entry);
      if (target) {
        const targetId = idOn(destination, target);
        if (targetId) linkedDestIds.add(targetId);
      }

      const sourceHash = contentHash(source);
      if (sourceHash === entry.lastSyncedHash) {
        this.skip(ctx, source, "unchanged", entry.key);
        continue;
      }
      if (!target) {
        this.skip(ctx, source, "missing-on-destination", entry.key);
        continue;
      }

      const targetHash = contentHash(target);
      if (targetHash === sourceHash) {
        await this.recordLink(source, this.linkIds(ctx, source, idOn(destination, target)), entry.key);
        this.skip(ctx, source, "unchanged", entry.key);
        continue;
      }

      if (targetHash !== entry.lastSyncedHash) {
        const syncedAt = entry.lastSyncedAt.getTime();
        const bothChangedSinceSync =
          source.lastModified.getTime() > syncedAt && target.lastModified.getTime() > syncedAt;

        if (!bothChangedSinceSync && target.lastModified.getTime() > source.lastModified.getTime()) {
          this.skip(ctx, source, "newer-on-destination", entry.key);
          continue;
        }
        // Both contents moved off the synced one, whatever the timestamps
        // say. The running direction wins; the overwritten side stays on record.
        ctx.report.conflicts.push({
          ...toRecordRef(source, entry.key),
          winner: ctx.source,
          overwritten: target,
        });
      }

      queueWrite(toUpdate, asUpdate(source, target), { source, previousKey: entry.key });
    }

    for (const { record } of match.duplicates) {
      this.skip(ctx, record, "duplicate-source");
    }

    const rejectedKeys = new Set(match.ambiguous.flatMap((a) => a.rejected.map((entry) => entry.key)));
    for (const entry of match.unmatchedState) {
      const reason: SkipReason = rejectedKeys.has(entry.key) ? "ambiguous-match" : "deleted-upstream";
      ctx.report.skipped.push({
        key: entry.key,
        rowId: entry.rowId,
        externalId: entry.externalId,
        reason,
      });
    }
    for (const ambiguous of match.ambiguous) {
      this.logger.warn(
        ctx.runId,
        `Ambiguous match for ${recordKey(ambiguous.source)}: linked ${ambiguous.chosen.key}, ` +
          `left ${ambiguous.rejected.map((entry) => entry.key).join(", ")} for review`
      );
    }

    // Unmatched source records: adopt an existing destination record before
    // creating a new one
    const identifiable: SyncRecord[] = [];
    for (const record of match.unmatchedSource) {
      if (!isEmptyFingerprint(fingerprintOf(record))) {
        identifiable.push(record);
        continue;
      }
      const alreadyThere =
        destination === "CRM"
          ? Boolean(record.externalId)
          : Boolean(record.externalId && destByExternalId.has(record.externalId));
      if (alreadyThere) {
        this.skip(ctx, record, "unidentifiable");
      } else {
        queueWrite(toCreate, this.asCreate(ctx, record), { source: record });
      }
    }

    const candidates = destinationRecords.filter((record) => {
      const id = idOn(destination, record);
      return id !== undefined && !linkedDestIds.has(id);
    });
    const candidateByKey = new Map<string, SyncRecord>();
    const candidateEntries: SyncStateEntry[] = [];
    for (const record of candidates) {
      const fp = fingerprintOf(record);
      // Keyed by destination id so records sharing a fingerprint stay distinct
      const key = `${destination}:${idOn(destination, record)}`;
      candidateByKey.set(key, record);
      candidateEntries.push({
        key,
        email: fp.email,
        phone: fp.phone,
        rowId: record.rowId,
        externalId: record.externalId,
        lastSyncedHash: contentHash(record),
        lastSyncedAt: record.lastModified,
      });
    }

    const adoption = this.matcher.match(identifiable, candidateEntries);
    for (const { source, entry } of adoption.linked) {
      const target = candidateByKey.get(entry.key);
      if (!target) continue;
      if (entry.lastSyncedHash === contentHash(source)) {
        await this.recordLink(source, this.linkIds(ctx, source, idOn(destination, target)));
        this.skip(ctx, source, "linked-existing");
      } else {
        queueWrite(toUpdate, asUpdate(source, target), { source });
      }
    }
    for (const record of adoption.unmatchedSource) {
      queueWrite(toCreate, this.asCreate(ctx, record), { source: record });
    }

    return changes;
  }

  private asCreate(ctx: PassContext, source: SyncRecord): SyncRecord {
    return ctx.destination === "CRM"
      ? { ...source, externalId: undefined }
      : { ...source, rowId: undefined };
  }

  private linkIds(
    ctx: PassContext,
    source: SyncRecord,
    destinationId: string | undefined
  ): { rowId?: string; externalId?: string } {
    return ctx.destination === "CRM"
      ? { rowId: source.rowId, externalId: destinationId }
      : { rowId: destinationId, externalId: source.externalId };
  }

  /** Read-modify-write of one state entry, serialized across both directions. */
  private async recordLink(
    source: SyncRecord,
    ids: { rowId?: string; externalId?: string },
    previousKey?: string
  ) {
    const fp = fingerprintOf(source);
    if (isEmptyFingerprint(fp)) return;
    const key = fingerprintKey(fp);

    await this.stateLock.runExclusive(async () => {
      const existing = await this.state.get(previousKey ?? key);
      const entry: SyncStateEntry = {
        key,
        email: fp.email,
        phone: fp.phone,
        rowId: ids.rowId ?? existing?.rowId,
        externalId: ids.externalId ?? existing?.externalId,
        lastSyncedHash: contentHash(source),
        lastSyncedAt: new Date(this.clock.now()),
      };
      if (previousKey && previousKey !== key) {
        await this.state.rekey(previousKey, entry);
      } else {
        await this.state.upsert(entry);
      }
    });
  }

  // -------------------------------------------------------------------------
  // Writing
  // -------------------------------------------------------------------------

  private fail(ctx: PassContext, record: SyncRecord, kind: FailureKind, message: string, mode: WriteMode) {
    const source = ctx.pending.get(record)?.source ?? record;
    ctx.report.failed.push({
      ...toRecordRef(source),
      rowId: record.rowId,
      externalId: record.externalId,
      kind,
      message: mode === "link-back" ? `link-back: ${message}` : message,
    });
  }

  private async writeBatches(ctx: PassContext, batches: Batch[], mode: WriteMode) {
    const rateLimited = new Set<Backend>();

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];

      if (this.shuttingDown) {
        for (const rest of batches.slice(i)) {
          for (const record of rest.records) {
            this.fail(ctx, record, "CANCELLED", "Pass cancelled by shutdown", mode);
          }
        }
        this.logger.warn(ctx.runId, `Shutdown requested, ${batches.length - i} batches not written`);
        return;
      }

      this.setPhase(ctx, "WRITING", i + 1, batches.length);

      if (rateLimited.has(batch.backend)) {
        for (const record of batch.records) {
          this.fail(ctx, record, "RATE_LIMITED", `${batch.backend} rate limit reached earlier in this pass`, mode);
        }
        continue;
      }

      let results: WriteResult[];
      try {
        await this.limiter.acquire(batch.backend);
        results = await this.submit(batch);
      } catch (err) {
        if (err instanceof RateLimitExceeded) {
          rateLimited.add(batch.backend);
          this.logger.warn(ctx.runId, err.message);
          for (const record of batch.records) {
            this.fail(ctx, record, "RATE_LIMITED", err.message, mode);
          }
          continue;
        }
        for (const rest of batches.slice(i)) {
          for (const record of rest.records) {
            this.fail(ctx, record, "ABORTED", errorMessage(err), mode);
          }
        }
        throw err;
      }

      for (let j = 0; j < batch.records.length; j++) {
        const record = batch.records[j];
        const result = results[j];
        if (!result.ok) {
          this.fail(ctx, record, result.kind, result.message, mode);
          continue;
        }
        if (mode === "sync") {
          await this.onWritten(ctx, batch, record, result.id);
        }
      }
    }
  }

  private async onWritten(ctx: PassContext, batch: Batch, record: SyncRecord, id: string) {
    const pending = ctx.pending.get(record);
    const source = pending?.source ?? record;

    await this.recordLink(source, this.linkIds(ctx, source, id), pending?.previousKey);

    if (batch.kind === "create") {
      ctx.report.created++;
      if (ctx.destination === "CRM" && source.rowId && source.externalId !== id) {
        ctx.linkBacks.push({ ...source, externalId: id });
      }
    } else {
      ctx.report.updated++;
    }
  }

  /**
   * Write one batch, retrying transient failures of the records that did not
   * go through. A result count that does not match the batch aborts the pass.
   */
  private async submit(batch: Batch): Promise<WriteResult[]> {
    const writer = batch.backend === "SHEET" ? this.sheet : this.crm;
    const settled = new Map<number, WriteResult>();
    let pending = batch.records.map((_, index) => index);

    for (let attempt = 1; attempt <= this.maxWriteAttempts && pending.length > 0; attempt++) {
      if (attempt > 1) {
        if (this.retryDelayMs > 0) {
          await this.clock.sleep(this.retryDelayMs * 2 ** (attempt - 2));
        }
        try {
          await this.limiter.acquire(batch.backend);
        } catch (err) {
          if (!(err instanceof RateLimitExceeded)) throw err;
          for (const index of pending) {
            settled.set(index, { ok: false, kind: "RATE_LIMITED", message: err.message });
          }
          break;
        }
      }

      const attemptRecords = pending.map((index) => batch.records[index]);
      let results: WriteResult[];
      try {
        results = await writer.writeBatch({ ...batch, records: attemptRecords });
      } catch (err) {
        if (isFatal(err)) throw err;
        const retryAfterMs =
          err instanceof TransientWriteError || err instanceof RateLimitExceeded ? err.retryAfterMs : undefined;
        const failure: WriteResult = {
          ok: false,
          kind: err instanceof RateLimitExceeded ? "RATE_LIMITED" : "TRANSIENT",
          message: errorMessage(err),
          retryAfterMs,
        };
        results = attemptRecords.map(() => failure);
      }

      if (results.length !== attemptRecords.length) {
        throw new CapabilityContractError(
          batch.backend,
          `${batch.backend} returned ${results.length} results for a batch of ${attemptRecords.length}`
        );
      }

      const retry: number[] = [];
      results.forEach((result, j) => {
        const index = pending[j];
        if (!result.ok) {
          this.limiter.onResponse(batch.backend, result.retryAfterMs);
          if (result.kind !== "REJECTED" && attempt < this.maxWriteAttempts) {
            retry.push(index);
            return;
          }
        }
        settled.set(index, result);
      });
      pending = retry;
    }

    return batch.records.map(
      (_, index): WriteResult =>
        settled.get(index) ?? { ok: false, kind: "TRANSIENT", message: "No result after retries" }
    );
  }
}
