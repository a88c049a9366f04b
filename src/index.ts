import pino from "pino";

import { buildApp } from "./app";
import { loadServerConfig } from "./config/store_config";
import { SqliteRosterStore } from "./store/sqlite_roster_store";

const isDev = process.env.NODE_ENV !== "production";

const log = pino({
  level: process.env.LOG_LEVEL ?? (isDev ? "debug" : "info"),
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDev && process.env.PINO_PRETTY === "1"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

async function main() {
  const config = loadServerConfig();
  const store = new SqliteRosterStore(config.store, { log: log.child({ component: "roster-store" }) });

  const app = buildApp(store, { logger: log });

  app.addHook("onClose", async () => {
    store.close();
  });

  const shutdown = () => {
    app.close().then(
      () => process.exit(0),
      (err) => {
        app.log.error(err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  log.error({ evt: "rosterver.startup_failed", err }, "rosterver.startup_failed");
  process.exit(1);
});
