/**
 * Run a single sync pass and print its report.
 *
 * Usage:  npx tsx scripts/sync-once.ts sheet-to-crm|crm-to-sheet
 */

import "dotenv/config";
import { loadConfig } from "../src/lib/config";
import { createSyncContext } from "../src/lib/sync/context";
import type { SyncDirection } from "../src/lib/sync/types";

const DIRECTIONS: Record<string, SyncDirection | undefined> = {
  "sheet-to-crm": "SHEET_TO_CRM",
  "crm-to-sheet": "CRM_TO_SHEET",
};

async function main() {
  const arg = process.argv[2] ?? "";
  const direction = DIRECTIONS[arg];
  if (!direction) {
    console.error(`Usage: tsx scripts/sync-once.ts ${Object.keys(DIRECTIONS).join("|")}`);
    process.exitCode = 2;
    return;
  }

  const ctx = createSyncContext(loadConfig());
  try {
    const report = await ctx.engine.run(direction);

    console.log(`\n${report.direction} ${report.status} in ${report.durationMs}ms`);
    console.log(`   Created:   ${report.created}`);
    console.log(`   Updated:   ${report.updated}`);
    console.log(`   Skipped:   ${report.skipped.length}`);
    console.log(`   Failed:    ${report.failed.length}`);
    console.log(`   Conflicts: ${report.conflicts.length}`);
    for (const failure of report.failed.slice(0, 20)) {
      console.log(`   ✗ ${failure.key} [${failure.kind}] ${failure.message}`);
    }
    if (report.error) {
      console.error(`\n❌ ${report.error}`);
    }
    if (report.status !== "completed") {
      process.exitCode = 1;
    }
  } finally {
    ctx.db.close();
  }
}

main().catch((err) => {
  console.error("❌ Failed:", err);
  process.exit(1);
});
