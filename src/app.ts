import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";

import { healthRoutes } from "./routes/healthz";
import { rosterRoutes } from "./routes/roster";
import type { RosterStore } from "./store/roster_store";

export function buildApp(store: RosterStore, options: FastifyServerOptions = {}) {
  const app = Fastify(options);

  // Internal surface for the roster-management layer; not exposed to clients.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes, { store });
  app.register(rosterRoutes, { prefix: "/v1", store });

  return app;
}
