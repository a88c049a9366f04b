import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";

import { storeConfigDefaults } from "../src/config/store_config";
import { installSchema } from "../src/store/schema";
import { SqliteRosterStore } from "../src/store/sqlite_roster_store";
import { makeClock, makeLogger } from "./helpers/store";

const tableNames = (db: Database.Database) =>
  db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name);

describe("Schema bootstrap", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "rosterver-schema-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the roster tables and can run again", () => {
    const db = new Database(":memory:");
    const { log, entries } = makeLogger();
    try {
      installSchema(db, log);
      installSchema(db, log);
      expect(tableNames(db)).toEqual(["groupitem", "jidmap", "journal", "rostergroup", "rosteritem"]);
      expect(entries.filter((entry) => entry.message === "roster.schema.ready")).toHaveLength(2);
    } finally {
      db.close();
    }
  });

  it("carries items from a pre-versioning roster table at version 0", async () => {
    const dbPath = join(dir, "legacy.db");
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE jidmap (jidid INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL, jid VARCHAR(255) NOT NULL, UNIQUE (jid));
      CREATE TABLE roster (
        userid INTEGER NOT NULL,
        contactid INTEGER NOT NULL,
        name VARCHAR(255),
        subscription INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (userid, contactid)
      );
      INSERT INTO jidmap (jid) VALUES ('u@x'), ('c@x');
      INSERT INTO roster (userid, contactid, name, subscription) VALUES (1, 2, 'Carol', 3);
    `);
    legacy.close();

    const store = new SqliteRosterStore(storeConfigDefaults(dbPath), { log: makeLogger().log });
    try {
      expect(await store.load("u@x")).toEqual([
        { jid: "c@x", name: "Carol", subscription: 3, groups: [], version: 0, removed: false },
      ]);

      const updated = await store.upsert("u@x", { jid: "c@x", name: "Carol" }, { respectSubscription: false });
      expect(updated.version).toBe(1);
    } finally {
      store.close();
    }
  });

  it("takes over a database from the trigger-based versioning layout", async () => {
    const dbPath = join(dir, "versioned.db");
    const versioned = new Database(dbPath);
    versioned.exec(`
      CREATE TABLE jidmap (jidid INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL, jid VARCHAR(255) NOT NULL, UNIQUE (jid));
      CREATE TABLE rosteritem (
        userid INTEGER NOT NULL,
        contactid INTEGER NOT NULL,
        name VARCHAR(255),
        subscription INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (userid, contactid)
      );
      CREATE TABLE rostergroup (groupid INTEGER PRIMARY KEY NOT NULL, userid INTEGER NOT NULL, name VARCHAR(255), UNIQUE (userid, name));
      CREATE TABLE groupitem (groupid INTEGER NOT NULL, contactid INTEGER NOT NULL, PRIMARY KEY (groupid, contactid));
      CREATE TABLE journal (
        entry INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
        userid INTEGER NOT NULL,
        contactid INTEGER NOT NULL,
        timestamp DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
        operation VARCHAR(255) NOT NULL
      );
      CREATE VIEW roster AS
        SELECT r.userid AS userid, r.contactid AS contactid, name, subscription, jmc.jid AS jid
        FROM rosteritem r INNER JOIN jidmap jmc ON jmc.jidid = r.contactid;
      CREATE TRIGGER roster_ver_add_item INSTEAD OF INSERT ON roster
      BEGIN
        INSERT INTO journal(userid, contactid, operation) VALUES (NEW.userid, NEW.contactid, 'INSERT');
        INSERT INTO rosteritem VALUES (NEW.userid, NEW.contactid, NEW.name, NEW.subscription);
      END;
      CREATE TRIGGER roster_ver_add_grp AFTER INSERT ON groupitem
      BEGIN
        INSERT INTO journal(userid, contactid, operation)
          SELECT userid, NEW.contactid, 'GRPADD ' || name FROM rostergroup WHERE groupid = NEW.groupid;
      END;
      CREATE TRIGGER roster_ver_del_grp AFTER DELETE ON groupitem
      BEGIN
        INSERT INTO journal(userid, contactid, operation)
          SELECT userid, OLD.contactid, 'GRPDEL ' || name FROM rostergroup WHERE groupid = OLD.groupid;
      END;

      INSERT INTO jidmap (jid) VALUES ('u@x'), ('c@x'), ('d@x');
      INSERT INTO rosteritem VALUES (1, 2, 'Carol', 259), (1, 3, 'Dana', 257);
      INSERT INTO journal (userid, contactid, timestamp, operation) VALUES
        (1, 2, '2026-02-26 12:30:00', 'DELETE Carol 3'),
        (1, 3, '2026-02-25 11:00:00', 'DELETE Dana 1');
    `);
    versioned.close();

    // The startup sweep runs at 2026-03-01T12:00Z, so the cutoff is 2026-02-26T12:00Z.
    const store = new SqliteRosterStore(storeConfigDefaults(dbPath), {
      log: makeLogger().log,
      clock: makeClock().clock,
    });
    try {
      expect(await store.load("u@x")).toEqual([
        { jid: "c@x", name: "Carol", subscription: 259, groups: [], version: 1, removed: true },
      ]);

      const added = await store.upsert(
        "u@x",
        { jid: "e@x", name: "Eve", groups: ["Friends"] },
        { respectSubscription: true }
      );
      expect(added.version).toBe(3);
      expect(store.journalFor("u@x", "e@x").map((entry) => entry.operation)).toEqual([
        "INSERT Eve, 0; GRPADD Friends",
      ]);
    } finally {
      store.close();
    }

    const reopened = new Database(dbPath);
    try {
      const leftovers = reopened
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type IN ('trigger', 'view') ORDER BY name"
        )
        .all();
      expect(leftovers).toEqual([]);
    } finally {
      reopened.close();
    }
  });

  it("refuses to open without a database path", () => {
    let caught: unknown;
    try {
      new SqliteRosterStore(storeConfigDefaults(""), { log: makeLogger().log });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: "not_configured", operation: "open" });
  });
});
