import { describe, it, expect, beforeAll, afterAll } from "vitest";
import Fastify from "fastify";

import { buildApp } from "../src/app";
import type { RosterItem, RosterSync } from "../src/contracts/roster";
import { rosterRoutes } from "../src/routes/roster";
import type { RosterStore } from "../src/store/roster_store";
import { RosterStoreError } from "../src/store/roster_store_error";
import { makeStore } from "./helpers/store";

const makeApp = () => {
  const { store } = makeStore();
  const app = buildApp(store, { logger: false });
  return { app, store };
};

// Every write fails as if the stored state contradicted itself.
class ConflictingStore implements RosterStore {
  readonly supportsVersioning = true;

  private conflict(operation: string): never {
    throw new RosterStoreError({
      code: "inconsistent_state",
      operation,
      message: `${operation} saw no row after writing`,
    });
  }

  async load(): Promise<RosterItem[]> {
    return [];
  }

  async loadOne(): Promise<RosterItem | null> {
    return null;
  }

  async loadSince(): Promise<RosterSync> {
    return { kind: "full", version: 0, items: [] };
  }

  async rosterVersion(): Promise<number> {
    return 0;
  }

  async upsert(): Promise<RosterItem> {
    return this.conflict("upsert");
  }

  async remove(): Promise<"absent"> {
    return this.conflict("remove");
  }

  async wipe(): Promise<number> {
    return this.conflict("wipe");
  }
}

describe("/v1/rosters routes", () => {
  const { app, store } = makeApp();

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    store.close();
  });

  it("stores an item and returns it with its version", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/v1/rosters/u@x/items/c@x",
      payload: { name: "Carol", subscription: 3, groups: ["Friends"], respect_subscription: true },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      jid: "c@x",
      name: "Carol",
      subscription: 3,
      groups: ["Friends"],
      version: 1,
      removed: false,
    });
  });

  it("serves the full roster, then deltas", async () => {
    const full = await app.inject({ method: "GET", url: "/v1/rosters/u@x" });
    expect(full.statusCode).toBe(200);
    expect(full.json()).toMatchObject({ version: "1", kind: "full" });
    expect(full.json().items).toHaveLength(1);

    const empty = await app.inject({ method: "GET", url: "/v1/rosters/u@x?ver=" });
    expect(empty.json()).toMatchObject({ version: "1", kind: "full" });

    const upToDate = await app.inject({ method: "GET", url: "/v1/rosters/u@x?ver=1" });
    expect(upToDate.json()).toEqual({ version: "1", kind: "delta", items: [] });
  });

  it("reports a removal as a tombstone in the next delta", async () => {
    const removed = await app.inject({ method: "DELETE", url: "/v1/rosters/u@x/items/c@x" });
    expect(removed.statusCode).toBe(200);
    expect(removed.json()).toEqual({ outcome: "tombstoned" });

    const delta = await app.inject({ method: "GET", url: "/v1/rosters/u@x?ver=1" });
    expect(delta.json()).toEqual({
      version: "2",
      kind: "delta",
      items: [
        { jid: "c@x", name: "Carol", subscription: 259, groups: [], version: 2, removed: true },
      ],
    });

    const again = await app.inject({ method: "DELETE", url: "/v1/rosters/u@x/items/c@x" });
    expect(again.json()).toEqual({ outcome: "deleted" });

    const gone = await app.inject({ method: "GET", url: "/v1/rosters/u@x/items/c@x" });
    expect(gone.statusCode).toBe(404);
    expect(gone.json()).toEqual({ error: "not_found" });
  });

  it("rejects unknown body keys", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/v1/rosters/u@x/items/d@x",
      payload: { name: "Dana", nickname: "D" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "invalid_request",
      message: "Unrecognized keys in request",
      unrecognizedKeys: ["nickname"],
    });
  });

  it("rejects a non-numeric version", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/rosters/u@x?ver=abc" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("wipes a roster only when confirmed", async () => {
    await app.inject({
      method: "PUT",
      url: "/v1/rosters/w@x/items/e@x",
      payload: { name: "Eve" },
    });

    const unconfirmed = await app.inject({ method: "DELETE", url: "/v1/rosters/w@x", payload: {} });
    expect(unconfirmed.statusCode).toBe(400);

    const confirmed = await app.inject({
      method: "DELETE",
      url: "/v1/rosters/w@x",
      payload: { confirm: true },
    });
    expect(confirmed.statusCode).toBe(204);

    const item = await app.inject({ method: "GET", url: "/v1/rosters/w@x/items/e@x" });
    expect(item.json()).toMatchObject({ jid: "e@x", removed: true });
  });

  it("answers preflight requests", async () => {
    const res = await app.inject({ method: "OPTIONS", url: "/v1/rosters/u@x" });
    expect(res.statusCode).toBe(204);
  });
});

// Reads hand back an item the contract does not allow.
class MalformedStore extends ConflictingStore {
  async loadOne(): Promise<RosterItem | null> {
    return { jid: "c@x", name: "Carol", subscription: 3, groups: [""], version: -1, removed: false };
  }
}

describe("roster route errors", () => {
  it("maps store conflicts to 409", async () => {
    const app = Fastify({ logger: false });
    app.register(rosterRoutes, { prefix: "/v1", store: new ConflictingStore() });
    await app.ready();

    try {
      const res = await app.inject({
        method: "PUT",
        url: "/v1/rosters/u@x/items/c@x",
        payload: { name: "Carol" },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        error: "inconsistent_state",
        operation: "upsert",
        message: "upsert saw no row after writing",
      });
    } finally {
      await app.close();
    }
  });
});

describe("roster response contract", () => {
  it("refuses to send an item that breaks the contract", async () => {
    const app = Fastify({ logger: false });
    app.register(rosterRoutes, { prefix: "/v1", store: new MalformedStore() });
    await app.ready();

    try {
      const res = await app.inject({ method: "GET", url: "/v1/rosters/u@x/items/c@x" });

      expect(res.statusCode).toBe(500);
      expect(res.json().error).toBe("schema_invalid");
      expect(Object.keys(res.json().details.fieldErrors).sort()).toEqual(["groups", "version"]);
    } finally {
      await app.close();
    }
  });
});

describe("/healthz", () => {
  it("reports roster versioning support", async () => {
    const { app, store } = makeApp();
    await app.ready();

    try {
      const res = await app.inject({ method: "GET", url: "/healthz" });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ ok: true, service: "rosterver", rosterVersioning: true });
    } finally {
      await app.close();
      store.close();
    }
  });
});
