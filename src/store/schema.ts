import type Database from "better-sqlite3";

import { asStoreError } from "./roster_store_error";
import type { StoreLogger } from "./store_logger";

const SCHEMA: string[] = [
  `CREATE TABLE IF NOT EXISTS jidmap (
    jidid INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
    jid TEXT NOT NULL,
    UNIQUE (jid)
  )`,
  `CREATE TABLE IF NOT EXISTS rosteritem (
    userid INTEGER NOT NULL REFERENCES jidmap(jidid),
    contactid INTEGER NOT NULL REFERENCES jidmap(jidid),
    name TEXT,
    subscription INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (userid, contactid)
  )`,
  `CREATE TABLE IF NOT EXISTS rostergroup (
    groupid INTEGER PRIMARY KEY NOT NULL,
    userid INTEGER NOT NULL REFERENCES jidmap(jidid),
    name TEXT NOT NULL,
    UNIQUE (userid, name)
  )`,
  `CREATE TABLE IF NOT EXISTS groupitem (
    groupid INTEGER NOT NULL REFERENCES rostergroup(groupid),
    contactid INTEGER NOT NULL REFERENCES jidmap(jidid),
    PRIMARY KEY (groupid, contactid)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_groupitem_contact ON groupitem(contactid)`,
  `CREATE TABLE IF NOT EXISTS journal (
    entry INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
    userid INTEGER NOT NULL REFERENCES jidmap(jidid),
    contactid INTEGER NOT NULL REFERENCES jidmap(jidid),
    timestamp TEXT NOT NULL,
    operation TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_journal_pair ON journal(userid, contactid, entry)`,
];

// Earlier deployments journaled through a `roster` view and triggers; the
// store journals every write itself, so those would double-count.
const LEGACY_JOURNALING: string[] = [
  "DROP TRIGGER IF EXISTS roster_ver_add_item",
  "DROP TRIGGER IF EXISTS roster_ver_upd_item",
  "DROP TRIGGER IF EXISTS roster_ver_rem_item",
  "DROP TRIGGER IF EXISTS roster_ver_del_item",
  "DROP TRIGGER IF EXISTS roster_ver_add_grp",
  "DROP TRIGGER IF EXISTS roster_ver_del_grp",
  "DROP VIEW IF EXISTS roster",
];

const isAlreadyExists = (error: unknown) =>
  error instanceof Error && /already exists|already another table or index/i.test(error.message);

const tableExists = (db: Database.Database, name: string) =>
  db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?").get(name) !== undefined;

/**
 * Creates the roster tables. Databases written before versioning existed kept
 * live items in a plain `roster` table; that table is carried over as
 * `rosteritem`, and its items start at version 0. Databases from the
 * trigger-based versioning layout keep their tables and journal, minus the
 * view and triggers.
 */
export function installSchema(db: Database.Database, log: StoreLogger): void {
  const statements: string[] = [...LEGACY_JOURNALING];
  if (tableExists(db, "roster") && !tableExists(db, "rosteritem")) {
    statements.push("ALTER TABLE roster RENAME TO rosteritem");
  }
  statements.push(...SCHEMA);

  for (const sql of statements) {
    try {
      db.exec(sql);
    } catch (error) {
      if (isAlreadyExists(error)) {
        log.debug({ evt: "roster.schema.exists", sql }, "roster.schema.exists");
        continue;
      }
      log.error({ evt: "roster.schema.failed", sql, error: String(error) }, "roster.schema.failed");
      throw asStoreError("installSchema", error);
    }
  }

  log.info({ evt: "roster.schema.ready" }, "roster.schema.ready");
}
