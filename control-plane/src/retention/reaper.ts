import { purgedRunsCounter } from "../metrics/metrics.js";
import type { RunStateStore } from "../store/types.js";

export class RetentionReaper {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly runs: RunStateStore,
    private readonly activeRunIds: () => ReadonlySet<string>,
    private readonly retentionMs: number,
    private readonly intervalMs: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  start(): void {
    this.timer = setInterval(() => {
      this.tick().catch((error) => {
        console.error("retention purge failed", error);
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - this.retentionMs);
    const purged = await this.runs.purgeTerminalRuns(cutoff, this.activeRunIds());
    if (purged > 0) {
      purgedRunsCounter.inc(purged);
      console.log(`purged ${purged} finished runs older than ${cutoff.toISOString()}`);
    }
    return purged;
  }
}
