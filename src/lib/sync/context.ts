import type { AppConfig } from "@/lib/config";
import { TokenFileCredentialProvider } from "@/lib/credentials";
import { openDatabase, type SqliteDatabase } from "@/lib/db";
import { AmoCrmCapability } from "@/lib/integrations/amocrm-capability";
import { GoogleSheetsCapability } from "@/lib/integrations/sheets-capability";
import { SyncEngine } from "./engine";
import { syncLogger, type SyncLogger } from "./logger";
import { RateLimiter } from "./rate-limiter";
import { SqliteSyncRunStore, SqliteSyncStateStore } from "./state-store";
import type { CrmFilter } from "./types";

export interface SyncContext {
  db: SqliteDatabase;
  engine: SyncEngine;
  limiter: RateLimiter;
  sheet: GoogleSheetsCapability;
  crm: AmoCrmCapability;
  runs: SqliteSyncRunStore;
  sheetRange: string;
  crmFilter: CrmFilter;
}

/** Wire the production capabilities, stores and engine from configuration. */
export function createSyncContext(config: AppConfig, logger: SyncLogger = syncLogger): SyncContext {
  const db = openDatabase(config.databaseUrl);
  const limiter = new RateLimiter(config.rateLimits);
  const credentials = new TokenFileCredentialProvider({
    crmAccessToken: config.amo.accessToken,
    googleTokenFile: config.sheets.tokenFile,
    encryptionKey: config.sheets.encryptionKey,
  });

  const sheet = new GoogleSheetsCapability({
    sheetId: config.sheets.sheetId,
    range: config.sheets.range,
    credentials,
    limiter,
    timeoutMs: config.httpTimeoutMs,
  });
  const crm = new AmoCrmCapability({
    baseUrl: config.amo.baseUrl,
    pipelineId: config.amo.pipelineId,
    statusId: config.amo.statusId,
    credentials,
    limiter,
    timeoutMs: config.httpTimeoutMs,
  });

  const runs = new SqliteSyncRunStore(db);
  const crmFilter: CrmFilter = { pipelineId: config.amo.pipelineId };

  const engine = new SyncEngine({
    sheet,
    crm,
    credentials,
    state: new SqliteSyncStateStore(db),
    runs,
    limiter,
    sheetRange: config.sheets.range,
    crmFilter,
    batchSizes: config.batchSizes,
    maxWriteAttempts: config.maxWriteAttempts,
    logger,
  });

  return { db, engine, limiter, sheet, crm, runs, sheetRange: config.sheets.range, crmFilter };
}
