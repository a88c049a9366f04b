import type Database from "better-sqlite3";

import { RosterStoreError, asStoreError, isUniqueViolation } from "./roster_store_error";
import type { RosterJournal } from "./roster_journal";

export type GroupRef = {
  groupId: number;
  name: string;
};

type GroupRow = { groupid: number; name: string };
type MemberRow = { contactid: number; name: string };

export class GroupCatalog {
  private readonly selectGroup: Database.Statement<[number, string], { groupid: number }>;
  private readonly insertGroup: Database.Statement<[number, string]>;
  private readonly selectMemberships: Database.Statement<[number, number], GroupRow>;
  private readonly selectOwnerMemberships: Database.Statement<[number], MemberRow>;
  private readonly insertMember: Database.Statement<[number, number]>;
  private readonly deleteMembers: Database.Statement<[number, number, string], { groupid: number }>;

  constructor(
    private readonly db: Database.Database,
    private readonly journal: RosterJournal
  ) {
    this.selectGroup = db.prepare<[number, string], { groupid: number }>(
      "SELECT groupid FROM rostergroup WHERE userid = ? AND name = ?"
    );
    this.insertGroup = db.prepare<[number, string]>(
      "INSERT INTO rostergroup (userid, name) VALUES (?, ?)"
    );
    this.selectMemberships = db.prepare<[number, number], GroupRow>(`
      SELECT rg.groupid, rg.name
      FROM rostergroup rg
      JOIN groupitem gi ON gi.groupid = rg.groupid
      WHERE rg.userid = ? AND gi.contactid = ?
      ORDER BY rg.name
    `);
    this.selectOwnerMemberships = db.prepare<[number], MemberRow>(`
      SELECT gi.contactid, rg.name
      FROM rostergroup rg
      JOIN groupitem gi ON gi.groupid = rg.groupid
      WHERE rg.userid = ?
      ORDER BY rg.name
    `);
    this.insertMember = db.prepare<[number, number]>(
      "INSERT OR IGNORE INTO groupitem (groupid, contactid) VALUES (?, ?)"
    );
    this.deleteMembers = db.prepare<[number, number, string], { groupid: number }>(`
      DELETE FROM groupitem
      WHERE contactid = ?
        AND groupid IN (
          SELECT groupid FROM rostergroup
          WHERE userid = ? AND groupid IN (SELECT value FROM json_each(?))
        )
      RETURNING groupid
    `);
  }

  findGroup(ownerId: number, name: string): number | null {
    return this.selectGroup.get(ownerId, name)?.groupid ?? null;
  }

  resolveGroup(ownerId: number, name: string): number {
    const existing = this.findGroup(ownerId, name);
    if (existing !== null) return existing;

    try {
      return Number(this.insertGroup.run(ownerId, name).lastInsertRowid);
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw asStoreError("rostergroup.resolve", error);
      }
    }

    const winner = this.findGroup(ownerId, name);
    if (winner === null) {
      throw new RosterStoreError({
        code: "inconsistent_state",
        operation: "rostergroup.resolve",
        message: `Group ${name} conflicted on insert but could not be re-read`,
      });
    }
    return winner;
  }

  membersOf(ownerId: number, contactId: number): GroupRef[] {
    return this.selectMemberships
      .all(ownerId, contactId)
      .map((row) => ({ groupId: row.groupid, name: row.name }));
  }

  groupsByContact(ownerId: number): Map<number, string[]> {
    const byContact = new Map<number, string[]>();
    for (const row of this.selectOwnerMemberships.all(ownerId)) {
      const names = byContact.get(row.contactid) ?? [];
      names.push(row.name);
      byContact.set(row.contactid, names);
    }
    return byContact;
  }

  /** Idempotent; only a new membership bumps the contact's version. */
  addMember(ownerId: number, group: GroupRef, contactId: number): boolean {
    const inserted = this.insertMember.run(group.groupId, contactId).changes > 0;
    if (inserted) {
      this.journal.append(ownerId, contactId, `GRPADD ${group.name}`);
    }
    return inserted;
  }

  removeMembers(ownerId: number, contactId: number, groups: GroupRef[]): number {
    if (groups.length === 0) return 0;

    const ids = JSON.stringify(groups.map((group) => group.groupId));
    const deleted = new Set(
      this.deleteMembers.all(contactId, ownerId, ids).map((row) => row.groupid)
    );

    for (const group of groups) {
      if (deleted.has(group.groupId)) {
        this.journal.append(ownerId, contactId, `GRPDEL ${group.name}`);
      }
    }
    return deleted.size;
  }

  removeEmpty(): number {
    return this.db.prepare(`
      DELETE FROM rostergroup
      WHERE NOT EXISTS (SELECT 1 FROM groupitem gi WHERE gi.groupid = rostergroup.groupid)
    `).run().changes;
  }

  // Memberships left here belong to contacts without a roster row, so nothing is journaled.
  dropOwnerGroups(ownerId: number): number {
    this.db
      .prepare("DELETE FROM groupitem WHERE groupid IN (SELECT groupid FROM rostergroup WHERE userid = ?)")
      .run(ownerId);
    return this.db.prepare("DELETE FROM rostergroup WHERE userid = ?").run(ownerId).changes;
  }
}
