import type { RemoveOutcome, RosterItem, RosterItemInput, RosterSync } from "../contracts/roster";

export type UpsertOptions = {
  // true: write the caller's subscription bitmask (client roster set, or a
  // subscription state transition). false: keep what is stored and report it.
  respectSubscription: boolean;
};

export interface RosterStore {
  readonly supportsVersioning: boolean;

  load(owner: string): Promise<RosterItem[]>;
  loadOne(owner: string, contact: string): Promise<RosterItem | null>;
  loadSince(owner: string, sinceVersion: number | null): Promise<RosterSync>;
  rosterVersion(owner: string): Promise<number>;

  upsert(owner: string, item: RosterItemInput, options: UpsertOptions): Promise<RosterItem>;
  remove(owner: string, contact: string): Promise<RemoveOutcome>;
  wipe(owner: string): Promise<number>;
}
