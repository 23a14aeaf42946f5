import type { Backend, Batch, BatchKind, BatchSizeLimits, ChangeSet, SyncRecord } from "./types";

const PLAN_ORDER: { field: keyof ChangeSet; backend: Backend; kind: BatchKind }[] = [
  { field: "toCreateInCrm", backend: "CRM", kind: "create" },
  { field: "toUpdateInCrm", backend: "CRM", kind: "update" },
  { field: "toCreateInSheet", backend: "SHEET", kind: "create" },
  { field: "toUpdateInSheet", backend: "SHEET", kind: "update" },
];

export function emptyChangeSet(): ChangeSet {
  return { toCreateInCrm: [], toUpdateInCrm: [], toCreateInSheet: [], toUpdateInSheet: [] };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class BatchPlanner {
  /**
   * Splits a change set into homogeneous batches: one backend, one kind,
   * at most `maxBatchSize[backend]` records, ChangeSet order preserved.
   */
  plan(changes: ChangeSet, maxBatchSize: BatchSizeLimits): Batch[] {
    for (const backend of ["SHEET", "CRM"] as const) {
      const size = maxBatchSize[backend];
      if (!Number.isInteger(size) || size < 1) {
        throw new RangeError(`Batch size for ${backend} must be a positive integer, got ${size}`);
      }
    }

    const batches: Batch[] = [];
    for (const { field, backend, kind } of PLAN_ORDER) {
      const records: SyncRecord[] = changes[field];
      for (const group of chunk(records, maxBatchSize[backend])) {
        batches.push({ backend, kind, records: group });
      }
    }
    return batches;
  }
}
