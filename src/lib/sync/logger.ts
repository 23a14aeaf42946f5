type LogSink = Pick<Console, "log" | "warn" | "error">;

export class SyncLogger {
  constructor(private readonly sink: LogSink = console) {}

  error(runId: string, message: string) {
    this.sink.error(`[Sync ${runId}] ERROR: ${message}`);
  }

  warn(runId: string, message: string) {
    this.sink.warn(`[Sync ${runId}] WARN: ${message}`);
  }

  info(runId: string, message: string) {
    this.sink.log(`[Sync ${runId}] ${message}`);
  }
}

export const syncLogger = new SyncLogger();

export const silentLogger = new SyncLogger({
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});
