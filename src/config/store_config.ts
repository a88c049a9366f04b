import { config as loadEnv } from "dotenv";

import { MAX_SWEEP_INTERVAL_MS } from "../store/retention_sweeper";
import { RosterStoreError } from "../store/roster_store_error";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type StoreConfig = {
  dbPath: string;
  tombstoneRetentionMs: number;
  // 0 disables the periodic sweep; the startup sweep always runs.
  sweepIntervalMs: number;
  pruneEmptyGroups: boolean;
  pruneOrphanJournal: boolean;
  busyTimeoutMs: number;
};

export type ServerConfig = {
  port: number;
  store: StoreConfig;
};

type Env = Record<string, string | undefined>;

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

export const DEFAULT_TOMBSTONE_RETENTION_MS = 72 * HOUR_MS;
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export const isTruthy = (value?: string) =>
  value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase());

const readNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

export function storeConfigDefaults(dbPath: string): StoreConfig {
  return {
    dbPath,
    tombstoneRetentionMs: DEFAULT_TOMBSTONE_RETENTION_MS,
    sweepIntervalMs: 0,
    pruneEmptyGroups: false,
    pruneOrphanJournal: false,
    busyTimeoutMs: DEFAULT_BUSY_TIMEOUT_MS,
  };
}

export function loadStoreConfig(env: Env = process.env): StoreConfig {
  const dbPath = env.ROSTER_DB_PATH?.trim();
  if (!dbPath) {
    throw new RosterStoreError({
      code: "not_configured",
      operation: "loadStoreConfig",
      message: "ROSTER_DB_PATH must be set to a database file (or :memory:).",
    });
  }

  return {
    dbPath,
    tombstoneRetentionMs:
      readNumber(env.ROSTER_TOMBSTONE_RETENTION_HOURS, DEFAULT_TOMBSTONE_RETENTION_MS / HOUR_MS) * HOUR_MS,
    sweepIntervalMs: Math.min(
      readNumber(env.ROSTER_SWEEP_INTERVAL_MINUTES, 0) * MINUTE_MS,
      MAX_SWEEP_INTERVAL_MS
    ),
    pruneEmptyGroups: isTruthy(env.ROSTER_PRUNE_EMPTY_GROUPS),
    pruneOrphanJournal: isTruthy(env.ROSTER_PRUNE_ORPHAN_JOURNAL),
    busyTimeoutMs: readNumber(env.ROSTER_BUSY_TIMEOUT_MS, DEFAULT_BUSY_TIMEOUT_MS),
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: Number(env.PORT ?? 3333) || 3333,
    store: loadStoreConfig(env),
  };
}
