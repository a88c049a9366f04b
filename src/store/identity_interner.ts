import type Database from "better-sqlite3";

import { RosterStoreError, asStoreError, isUniqueViolation } from "./roster_store_error";

type JidRow = { jidid: number };

/**
 * Maps bare addresses to the small integer ids every other table keys on.
 * Ids are allocated once and never change.
 */
export class IdentityInterner {
  private readonly selectId: Database.Statement<[string], JidRow>;
  private readonly insertJid: Database.Statement<[string]>;

  constructor(private readonly db: Database.Database) {
    this.selectId = db.prepare<[string], JidRow>("SELECT jidid FROM jidmap WHERE jid = ?");
    this.insertJid = db.prepare<[string]>("INSERT INTO jidmap (jid) VALUES (?)");
  }

  lookup(address: string): number | null {
    try {
      return this.selectId.get(address)?.jidid ?? null;
    } catch (error) {
      throw asStoreError("jidmap.lookup", error);
    }
  }

  resolve(address: string): number {
    if (address.length === 0) {
      throw new RosterStoreError({
        code: "identity_resolution_failure",
        operation: "jidmap.resolve",
        message: "Cannot intern an empty address",
      });
    }

    const existing = this.lookup(address);
    if (existing !== null) return existing;

    try {
      return Number(this.insertJid.run(address).lastInsertRowid);
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw asStoreError("jidmap.resolve", error);
      }
    }

    // Another connection inserted the same address first.
    const winner = this.lookup(address);
    if (winner === null) {
      throw new RosterStoreError({
        code: "identity_resolution_failure",
        operation: "jidmap.resolve",
        message: `Address ${address} conflicted on insert but could not be re-read`,
      });
    }
    return winner;
  }
}
