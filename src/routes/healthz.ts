import type { FastifyInstance } from "fastify";

import type { RosterStore } from "../store/roster_store";

export async function healthRoutes(app: FastifyInstance, opts: { store: RosterStore }) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "rosterver",
    rosterVersioning: opts.store.supportsVersioning,
    ts: new Date().toISOString(),
  }));
}
