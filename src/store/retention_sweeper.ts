import type Database from "better-sqlite3";

import { TOMBSTONE } from "../contracts/subscription";
import type { GroupCatalog } from "./group_catalog";
import type { Clock, RosterJournal } from "./roster_journal";
import type { StoreLogger } from "./store_logger";

// Largest delay setInterval honours; anything above fires after 1 ms.
export const MAX_SWEEP_INTERVAL_MS = 2 ** 31 - 1;

export type SweepOptions = {
  tombstoneRetentionMs: number;
  pruneEmptyGroups: boolean;
  pruneOrphanJournal: boolean;
};

export type SweepReport = {
  cutoff: string;
  purgedEntries: number;
  prunedGroups: number;
  prunedJournalRows: number;
};

/**
 * Purges tombstoned roster rows once their last journal entry is older than
 * the retention window. Failures are logged and leave the rows for the next run.
 *
 * Journal timestamps are normalised to ISO form before comparing, since rows
 * written by older deployments use SQLite's `YYYY-MM-DD HH:MM:SS`.
 */
export class RetentionSweeper {
  private timer: NodeJS.Timeout | null = null;
  private readonly purgeTombstones: Database.Statement<[number, string]>;

  constructor(
    private readonly db: Database.Database,
    private readonly deps: { journal: RosterJournal; groups: GroupCatalog },
    private readonly options: SweepOptions,
    private readonly log: StoreLogger,
    private readonly clock: Clock
  ) {
    this.purgeTombstones = db.prepare<[number, string]>(`
      DELETE FROM rosteritem
      WHERE (subscription & ?) != 0
        AND ifnull((
          SELECT strftime('%Y-%m-%dT%H:%M:%fZ', j.timestamp) FROM journal j
          WHERE j.userid = rosteritem.userid AND j.contactid = rosteritem.contactid
          ORDER BY j.entry DESC
          LIMIT 1
        ), '') < ?
    `);
  }

  sweep(): SweepReport | null {
    const cutoff = new Date(this.clock().getTime() - this.options.tombstoneRetentionMs).toISOString();

    try {
      const report = this.db.transaction((): SweepReport => {
        const purgedEntries = this.purgeTombstones.run(TOMBSTONE, cutoff).changes;
        const prunedGroups = this.options.pruneEmptyGroups ? this.deps.groups.removeEmpty() : 0;
        const prunedJournalRows = this.options.pruneOrphanJournal
          ? this.deps.journal.pruneOrphans()
          : 0;
        return { cutoff, purgedEntries, prunedGroups, prunedJournalRows };
      }).immediate();

      this.log.info({ evt: "roster.sweep.completed", ...report }, "roster.sweep.completed");
      return report;
    } catch (error) {
      this.log.error(
        { evt: "roster.sweep.failed", cutoff, error: String(error) },
        "roster.sweep.failed"
      );
      return null;
    }
  }

  start(intervalMs: number): void {
    if (this.timer || intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.sweep();
    }, Math.min(intervalMs, MAX_SWEEP_INTERVAL_MS));
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
