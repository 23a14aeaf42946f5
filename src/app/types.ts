import type { SyncLogger } from "@/lib/sync/logger";
import type { SyncRunStore } from "@/lib/sync/state-store";
import type {
  CrmFilter,
  CrmReadCapability,
  PassProgress,
  SheetReadCapability,
  SyncDirection,
  SyncReport,
} from "@/lib/sync/types";

/** The part of SyncEngine the HTTP surface drives. */
export interface SyncRunner {
  run(direction: SyncDirection): Promise<SyncReport>;
  getStatus(direction: SyncDirection): PassProgress;
  isRunning(direction: SyncDirection): boolean;
}

export interface AppDeps {
  engine: SyncRunner;
  runs?: SyncRunStore;
  sheet: SheetReadCapability;
  crm: CrmReadCapability;
  sheetRange: string;
  crmFilter: CrmFilter;
  logger?: SyncLogger;
}
