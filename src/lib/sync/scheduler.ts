import { errorMessage } from "@/lib/errors";
import { syncLogger, type SyncLogger } from "./logger";
import { SYNC_DIRECTIONS, type SyncDirection, type SyncTrigger } from "./types";

export type ScheduleIntervals = Record<SyncDirection, number>;

/** Push every 2 minutes, pull every 5. */
export const DEFAULT_INTERVALS: ScheduleIntervals = {
  SHEET_TO_CRM: 2 * 60 * 1000,
  CRM_TO_SHEET: 5 * 60 * 1000,
};

/**
 * Fires each direction on its own interval. Overlap handling lives in the
 * trigger: a tick landing on a running pass comes back as a dropped report.
 */
export class ScheduleDriver {
  private readonly timers = new Map<SyncDirection, ReturnType<typeof setInterval>>();

  constructor(
    private readonly trigger: SyncTrigger,
    private readonly intervals: ScheduleIntervals = DEFAULT_INTERVALS,
    private readonly logger: SyncLogger = syncLogger
  ) {}

  start() {
    for (const direction of SYNC_DIRECTIONS) {
      if (this.timers.has(direction)) continue;
      const timer = setInterval(() => {
        void this.tick(direction);
      }, this.intervals[direction]);
      this.timers.set(direction, timer);
    }
  }

  stop() {
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
  }

  get running(): boolean {
    return this.timers.size > 0;
  }

  async tick(direction: SyncDirection): Promise<void> {
    try {
      const report = await this.trigger.onTick(direction);
      if (report.status === "dropped") {
        this.logger.warn(report.runId, `Scheduled ${direction} tick dropped: ${report.error ?? "busy"}`);
      }
    } catch (err) {
      this.logger.error("scheduler", `Scheduled ${direction} tick failed: ${errorMessage(err)}`);
    }
  }
}
