import type Database from "better-sqlite3";

import { TOMBSTONE, isTombstoned } from "../contracts/subscription";
import type { RemoveOutcome } from "../contracts/roster";
import { RosterStoreError } from "./roster_store_error";
import type { RosterJournal } from "./roster_journal";

export type RosterViewRow = {
  contactId: number;
  jid: string;
  name: string | null;
  subscription: number;
  version: number;
};

type ViewRow = {
  contactid: number;
  jid: string;
  name: string | null;
  subscription: number;
  version: number;
};

// A pair's version is its newest journal entry, 0 for items that predate the journal.
const VIEW_SELECT = `
  SELECT
    r.contactid AS contactid,
    jmc.jid AS jid,
    r.name AS name,
    r.subscription AS subscription,
    ifnull((
      SELECT max(j.entry) FROM journal j
      WHERE j.userid = r.userid AND j.contactid = r.contactid
    ), 0) AS version
  FROM rosteritem r
  JOIN jidmap jmc ON jmc.jidid = r.contactid
`;

const toViewRow = (row: ViewRow): RosterViewRow => ({
  contactId: row.contactid,
  jid: row.jid,
  name: row.name,
  subscription: row.subscription,
  version: row.version,
});

const describeName = (name: string | null) => name ?? "<NULL>";

/**
 * Read model over rosteritem joined with the journal, and the only write path
 * into rosteritem. Each write intent journals the pair in the same
 * transaction as the row change.
 */
export class RosterView {
  private readonly selectOwner: Database.Statement<[number], ViewRow>;
  private readonly selectOne: Database.Statement<[number, number], ViewRow>;
  private readonly selectSince: Database.Statement<[number, number], ViewRow>;
  private readonly insertRow: Database.Statement<[number, number, string | null, number]>;
  private readonly updateRow: Database.Statement<[string | null, number, number, number]>;
  private readonly tombstoneRow: Database.Statement<[number, number, number]>;
  private readonly deleteRow: Database.Statement<[number, number]>;
  private readonly selectContacts: Database.Statement<[number], { contactid: number }>;

  constructor(
    db: Database.Database,
    private readonly journal: RosterJournal
  ) {
    this.selectOwner = db.prepare<[number], ViewRow>(
      `${VIEW_SELECT} WHERE r.userid = ? ORDER BY version, r.contactid`
    );
    this.selectOne = db.prepare<[number, number], ViewRow>(
      `${VIEW_SELECT} WHERE r.userid = ? AND r.contactid = ?`
    );
    this.selectSince = db.prepare<[number, number], ViewRow>(
      `SELECT * FROM (${VIEW_SELECT} WHERE r.userid = ?) WHERE version > ? ORDER BY version, contactid`
    );
    this.insertRow = db.prepare<[number, number, string | null, number]>(
      "INSERT INTO rosteritem (userid, contactid, name, subscription) VALUES (?, ?, ?, ?)"
    );
    this.updateRow = db.prepare<[string | null, number, number, number]>(
      "UPDATE rosteritem SET name = ?, subscription = ? WHERE userid = ? AND contactid = ?"
    );
    this.tombstoneRow = db.prepare<[number, number, number]>(
      "UPDATE rosteritem SET subscription = subscription | ? WHERE userid = ? AND contactid = ?"
    );
    this.deleteRow = db.prepare<[number, number]>(
      "DELETE FROM rosteritem WHERE userid = ? AND contactid = ?"
    );
    this.selectContacts = db.prepare<[number], { contactid: number }>(
      "SELECT contactid FROM rosteritem WHERE userid = ? ORDER BY contactid"
    );
  }

  list(ownerId: number): RosterViewRow[] {
    return this.selectOwner.all(ownerId).map(toViewRow);
  }

  listSince(ownerId: number, version: number): RosterViewRow[] {
    return this.selectSince.all(ownerId, version).map(toViewRow);
  }

  get(ownerId: number, contactId: number): RosterViewRow | null {
    const row = this.selectOne.get(ownerId, contactId);
    return row ? toViewRow(row) : null;
  }

  contactIds(ownerId: number): number[] {
    return this.selectContacts.all(ownerId).map((row) => row.contactid);
  }

  addItem(ownerId: number, contactId: number, name: string | null, subscription: number): void {
    this.journal.append(ownerId, contactId, `INSERT ${describeName(name)}, ${subscription}`);
    this.insertRow.run(ownerId, contactId, name, subscription);
  }

  /** Journals the values being replaced, then writes the new ones. */
  updateItem(
    ownerId: number,
    prior: RosterViewRow,
    next: { name: string | null; subscription: number }
  ): void {
    this.journal.append(
      ownerId,
      prior.contactId,
      `UPDATE ${describeName(prior.name)} ${prior.subscription}`
    );
    const result = this.updateRow.run(next.name, next.subscription, ownerId, prior.contactId);
    if (result.changes === 0) {
      throw new RosterStoreError({
        code: "inconsistent_state",
        operation: "roster.updateItem",
        message: `Roster item ${prior.jid} disappeared during update`,
      });
    }
  }

  /**
   * First removal tombstones the item so versioned clients still see it go;
   * removing a tombstoned item deletes the row without a journal entry.
   */
  removeItem(ownerId: number, contactId: number): RemoveOutcome {
    const current = this.get(ownerId, contactId);
    if (!current) return "absent";

    if (isTombstoned(current.subscription)) {
      this.deleteRow.run(ownerId, contactId);
      return "deleted";
    }

    this.journal.append(
      ownerId,
      contactId,
      `DELETE ${describeName(current.name)} ${current.subscription}`
    );
    this.tombstoneRow.run(TOMBSTONE, ownerId, contactId);
    return "tombstoned";
  }
}
