import type { RosterStore } from "../store/roster_store";

export const ROSTERVER_NAMESPACE = "urn:xmpp:features:rosterver";
export const ROSTERVER_FEATURE = `<ver xmlns='${ROSTERVER_NAMESPACE}'/>`;

// What the server knows about a stream when it builds its feature list.
export type StreamSession = {
  isServer: boolean;
  authenticatedJid: string | null;
};

/**
 * Stream feature announcing roster versioning (RFC 6121 2.6.1). Offered only
 * on authenticated client streams of a store that keeps versions.
 */
export function rosterVersioningFeature(
  session: StreamSession,
  store: Pick<RosterStore, "supportsVersioning">
): string | null {
  if (!store.supportsVersioning) return null;
  if (session.isServer || !session.authenticatedJid) return null;
  return ROSTERVER_FEATURE;
}
