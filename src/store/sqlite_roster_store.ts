import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import type { StoreConfig } from "../config/store_config";
import type { RemoveOutcome, RosterItem, RosterItemInput, RosterSync } from "../contracts/roster";
import { clearTombstone, isTombstoned } from "../contracts/subscription";
import { GroupCatalog } from "./group_catalog";
import { IdentityInterner } from "./identity_interner";
import { RetentionSweeper, type SweepReport } from "./retention_sweeper";
import { RosterJournal, type Clock, type JournalEntry } from "./roster_journal";
import type { RosterStore, UpsertOptions } from "./roster_store";
import { RosterStoreError, asStoreError } from "./roster_store_error";
import { RosterView, type RosterViewRow } from "./roster_view";
import { installSchema } from "./schema";
import { createDefaultLogger, type StoreLogger } from "./store_logger";

type StoreOptions = {
  log?: StoreLogger;
  clock?: Clock;
};

const uniqueNames = (names: string[] = []) => Array.from(new Set(names));

function openDatabase(config: StoreConfig): Database.Database {
  if (!config.dbPath) {
    throw new RosterStoreError({
      code: "not_configured",
      operation: "open",
      message: "No roster database configured",
    });
  }

  try {
    if (config.dbPath !== ":memory:") {
      fs.mkdirSync(dirname(config.dbPath), { recursive: true });
    }
    const db = new Database(config.dbPath);
    db.pragma("foreign_keys = ON");
    db.pragma(`busy_timeout = ${Math.floor(config.busyTimeoutMs)}`);
    if (config.dbPath !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    return db;
  } catch (error) {
    throw asStoreError("open", error);
  }
}

export class SqliteRosterStore implements RosterStore {
  readonly supportsVersioning = true;

  private db: Database.Database;
  private log: StoreLogger;
  private interner: IdentityInterner;
  private journal: RosterJournal;
  private groups: GroupCatalog;
  private view: RosterView;
  private sweeper: RetentionSweeper;

  constructor(config: StoreConfig, options: StoreOptions = {}) {
    this.log = options.log ?? createDefaultLogger();
    const clock = options.clock ?? (() => new Date());

    this.db = openDatabase(config);
    installSchema(this.db, this.log);

    this.interner = new IdentityInterner(this.db);
    this.journal = new RosterJournal(this.db, clock);
    this.groups = new GroupCatalog(this.db, this.journal);
    this.view = new RosterView(this.db, this.journal);
    this.sweeper = new RetentionSweeper(
      this.db,
      { journal: this.journal, groups: this.groups },
      {
        tombstoneRetentionMs: config.tombstoneRetentionMs,
        pruneEmptyGroups: config.pruneEmptyGroups,
        pruneOrphanJournal: config.pruneOrphanJournal,
      },
      this.log,
      clock
    );

    this.log.info({ evt: "roster.store.opened", dbPath: config.dbPath }, "roster.store.opened");

    // Purge on start; the interval sweep is optional.
    this.sweeper.sweep();
    this.sweeper.start(config.sweepIntervalMs);
  }

  async load(owner: string): Promise<RosterItem[]> {
    this.log.debug({ evt: "roster.load", owner }, "roster.load");
    return this.read("load", () => {
      const ownerId = this.interner.lookup(owner);
      if (ownerId === null) return [];
      return this.withGroups(ownerId, this.view.list(ownerId));
    });
  }

  async loadOne(owner: string, contact: string): Promise<RosterItem | null> {
    return this.read("loadOne", () => {
      const ownerId = this.interner.lookup(owner);
      const contactId = this.interner.lookup(contact);
      if (ownerId === null || contactId === null) return null;
      return this.readItem(ownerId, contactId);
    });
  }

  /**
   * Changes since `sinceVersion`, or the whole roster when the client has no
   * usable version (none given, or one this store never issued).
   */
  async loadSince(owner: string, sinceVersion: number | null): Promise<RosterSync> {
    return this.read("loadSince", (): RosterSync => {
      const ownerId = this.interner.lookup(owner);
      if (ownerId === null) return { kind: "full", version: 0, items: [] };

      const version = this.journal.highWaterMark(ownerId);
      if (
        sinceVersion === null
        || !Number.isInteger(sinceVersion)
        || sinceVersion < 0
        || sinceVersion > version
      ) {
        return { kind: "full", version, items: this.withGroups(ownerId, this.view.list(ownerId)) };
      }
      return {
        kind: "delta",
        version,
        items: this.withGroups(ownerId, this.view.listSince(ownerId, sinceVersion)),
      };
    });
  }

  async rosterVersion(owner: string): Promise<number> {
    return this.read("rosterVersion", () => {
      const ownerId = this.interner.lookup(owner);
      return ownerId === null ? 0 : this.journal.highWaterMark(ownerId);
    });
  }

  async upsert(owner: string, item: RosterItemInput, options: UpsertOptions): Promise<RosterItem> {
    const ownerId = this.resolveAddress("upsert", owner);
    const contactId = this.resolveAddress("upsert", item.jid);
    const name = item.name ?? null;
    const requested = clearTombstone(item.subscription ?? 0);
    const desired = uniqueNames(item.groups);

    const result = this.mutate("upsert", () => {
      const existing = this.view.get(ownerId, contactId);

      const current = this.groups.membersOf(ownerId, contactId);
      const desiredSet = new Set(desired);
      this.groups.removeMembers(
        ownerId,
        contactId,
        current.filter((group) => !desiredSet.has(group.name))
      );

      if (existing) {
        // Only a caller-supplied state can bring a tombstoned item back.
        const subscription = options.respectSubscription
          ? requested
          : existing.subscription;
        this.view.updateItem(ownerId, existing, { name, subscription });
      } else {
        this.view.addItem(ownerId, contactId, name, requested);
      }

      const currentNames = new Set(current.map((group) => group.name));
      for (const groupName of desired) {
        if (currentNames.has(groupName)) continue;
        const groupId = this.groups.resolveGroup(ownerId, groupName);
        this.groups.addMember(ownerId, { groupId, name: groupName }, contactId);
      }

      const committed = this.readItem(ownerId, contactId);
      if (!committed) {
        throw new RosterStoreError({
          code: "inconsistent_state",
          operation: "upsert",
          message: `Roster item ${item.jid} missing after write`,
        });
      }
      return committed;
    });

    this.log.debug(
      {
        evt: "roster.upsert",
        owner,
        contact: item.jid,
        respectSubscription: options.respectSubscription,
        version: result.version,
      },
      "roster.upsert"
    );
    return result;
  }

  async remove(owner: string, contact: string): Promise<RemoveOutcome> {
    this.requireAddress("remove", owner);
    this.requireAddress("remove", contact);

    const ownerId = this.interner.lookup(owner);
    const contactId = this.interner.lookup(contact);
    if (ownerId === null || contactId === null) return "absent";

    const outcome = this.mutate("remove", () => {
      this.groups.removeMembers(ownerId, contactId, this.groups.membersOf(ownerId, contactId));
      return this.view.removeItem(ownerId, contactId);
    });

    this.log.debug({ evt: "roster.remove", owner, contact, outcome }, "roster.remove");
    return outcome;
  }

  /**
   * Removes every item of the owner's roster (live items are tombstoned,
   * tombstoned ones deleted) and drops the owner's groups.
   */
  async wipe(owner: string): Promise<number> {
    this.requireAddress("wipe", owner);
    const ownerId = this.interner.lookup(owner);
    if (ownerId === null) return 0;

    const removed = this.mutate("wipe", () => {
      let count = 0;
      for (const contactId of this.view.contactIds(ownerId)) {
        this.groups.removeMembers(ownerId, contactId, this.groups.membersOf(ownerId, contactId));
        if (this.view.removeItem(ownerId, contactId) !== "absent") count += 1;
      }
      this.groups.dropOwnerGroups(ownerId);
      return count;
    });

    this.log.info({ evt: "roster.wipe", owner, removed }, "roster.wipe");
    return removed;
  }

  journalFor(owner: string, contact: string): JournalEntry[] {
    return this.read("journalFor", () => {
      const ownerId = this.interner.lookup(owner);
      const contactId = this.interner.lookup(contact);
      if (ownerId === null || contactId === null) return [];
      return this.journal.entriesFor(ownerId, contactId);
    });
  }

  purgeTombstones(): SweepReport | null {
    return this.sweeper.sweep();
  }

  close() {
    this.sweeper.stop();
    this.db.close();
  }

  private requireAddress(operation: string, address: string) {
    if (address.trim().length === 0) {
      throw new RosterStoreError({
        code: "identity_resolution_failure",
        operation,
        message: "Roster operations need a non-empty owner and contact address",
      });
    }
  }

  private resolveAddress(operation: string, address: string): number {
    this.requireAddress(operation, address);
    return this.interner.resolve(address);
  }

  private readItem(ownerId: number, contactId: number): RosterItem | null {
    const row = this.view.get(ownerId, contactId);
    if (!row) return null;
    const groups = this.groups.membersOf(ownerId, contactId).map((group) => group.name);
    return this.toRosterItem(row, groups);
  }

  private withGroups(ownerId: number, rows: RosterViewRow[]): RosterItem[] {
    const byContact = this.groups.groupsByContact(ownerId);
    return rows.map((row) => this.toRosterItem(row, byContact.get(row.contactId) ?? []));
  }

  private toRosterItem(row: RosterViewRow, groups: string[]): RosterItem {
    return {
      jid: row.jid,
      name: row.name,
      subscription: row.subscription,
      groups,
      version: row.version,
      removed: isTombstoned(row.subscription),
    };
  }

  // Writes commit together or not at all; a pair gets one journal row per call.
  private mutate<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(() => this.journal.coalesce(fn)).immediate();
    } catch (error) {
      const wrapped = asStoreError(operation, error);
      this.log.warn(
        { evt: "roster.mutation.rolled_back", operation, code: wrapped.code, error: wrapped.message },
        "roster.mutation.rolled_back"
      );
      throw wrapped;
    }
  }

  // Reads run in one deferred transaction so the item/journal join sees a single snapshot.
  private read<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      throw asStoreError(operation, error);
    }
  }
}
