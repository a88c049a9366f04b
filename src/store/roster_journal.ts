import type Database from "better-sqlite3";

export type Clock = () => Date;

export type JournalEntry = {
  entryNo: number;
  ownerId: number;
  contactId: number;
  timestamp: string;
  operation: string;
};

type JournalRow = {
  entry: number;
  userid: number;
  contactid: number;
  timestamp: string;
  operation: string;
};

/**
 * Append-only change log. `entry` is a single AUTOINCREMENT sequence across
 * every pair, so its value is the roster version clock.
 *
 * Inside `coalesce()` a pair gets at most one row: later appends for the same
 * pair extend that row's operation text instead of inserting, so one store
 * call moves a contact's version forward exactly once.
 */
export class RosterJournal {
  private openUnit: Map<string, number> | null = null;
  private readonly insertEntry: Database.Statement<[number, number, string, string]>;
  private readonly extendEntry: Database.Statement<[string, number]>;
  private readonly selectHighWater: Database.Statement<[number], { ver: number | null }>;
  private readonly selectPair: Database.Statement<[number, number], JournalRow>;

  constructor(
    private readonly db: Database.Database,
    private readonly clock: Clock
  ) {
    this.insertEntry = db.prepare<[number, number, string, string]>(
      "INSERT INTO journal (userid, contactid, timestamp, operation) VALUES (?, ?, ?, ?)"
    );
    this.extendEntry = db.prepare<[string, number]>(
      "UPDATE journal SET operation = operation || '; ' || ? WHERE entry = ?"
    );
    this.selectHighWater = db.prepare<[number], { ver: number | null }>(
      "SELECT max(entry) AS ver FROM journal WHERE userid = ?"
    );
    this.selectPair = db.prepare<[number, number], JournalRow>(
      "SELECT entry, userid, contactid, timestamp, operation FROM journal WHERE userid = ? AND contactid = ? ORDER BY entry"
    );
  }

  coalesce<T>(fn: () => T): T {
    if (this.openUnit) return fn();
    this.openUnit = new Map();
    try {
      return fn();
    } finally {
      this.openUnit = null;
    }
  }

  append(ownerId: number, contactId: number, operation: string): number {
    const key = `${ownerId}:${contactId}`;
    const pending = this.openUnit?.get(key);
    if (pending !== undefined) {
      this.extendEntry.run(operation, pending);
      return pending;
    }

    const result = this.insertEntry.run(ownerId, contactId, this.clock().toISOString(), operation);
    const entryNo = Number(result.lastInsertRowid);
    this.openUnit?.set(key, entryNo);
    return entryNo;
  }

  highWaterMark(ownerId: number): number {
    return this.selectHighWater.get(ownerId)?.ver ?? 0;
  }

  entriesFor(ownerId: number, contactId: number): JournalEntry[] {
    return this.selectPair.all(ownerId, contactId).map((row) => ({
      entryNo: row.entry,
      ownerId: row.userid,
      contactId: row.contactid,
      timestamp: row.timestamp,
      operation: row.operation,
    }));
  }

  // Drops history of pairs that no longer have a roster row.
  pruneOrphans(): number {
    return this.db.prepare(`
      DELETE FROM journal
      WHERE NOT EXISTS (
        SELECT 1 FROM rosteritem r
        WHERE r.userid = journal.userid AND r.contactid = journal.contactid
      )
    `).run().changes;
  }
}
