import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import {
  AddressSchema,
  RosterItemPutRequestSchema,
  RosterItemSchema,
  RosterQuerySchema,
  RosterSyncResponseSchema,
  RosterWipeRequestSchema,
} from "../contracts/roster";
import type { RosterStore } from "../store/roster_store";
import { RosterStoreError } from "../store/roster_store_error";

type OwnerParams = { owner: string };
type ItemParams = { owner: string; contact: string };

const STATUS_BY_CODE: Record<RosterStoreError["code"], number> = {
  not_configured: 500,
  storage_failure: 500,
  identity_resolution_failure: 400,
  inconsistent_state: 409,
};

const extractUnrecognizedKeys = (error: z.ZodError) => {
  const unrecognized = new Set<string>();
  for (const issue of error.issues) {
    if (issue.code === "unrecognized_keys") {
      for (const key of issue.keys) {
        unrecognized.add(key);
      }
    }
  }
  return Array.from(unrecognized);
};

const sendInvalid = (reply: FastifyReply, error: z.ZodError) => {
  const unrecognizedKeys = extractUnrecognizedKeys(error);
  if (unrecognizedKeys.length > 0) {
    return reply.code(400).send({
      error: "invalid_request",
      message: "Unrecognized keys in request",
      unrecognizedKeys,
    });
  }
  return reply.code(400).send({
    error: "invalid_request",
    details: error.flatten(),
  });
};

// Store output is checked against the contract before it leaves the server.
const sendValidated = <T>(reply: FastifyReply, schema: z.ZodType<T>, body: T) => {
  const validation = schema.safeParse(body);
  if (!validation.success) {
    return reply.code(500).send({
      error: "schema_invalid",
      details: validation.error.flatten(),
    });
  }
  return reply.code(200).send(validation.data);
};

export async function rosterRoutes(
  app: FastifyInstance,
  opts: { store: RosterStore }
) {
  const { store } = opts;

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof RosterStoreError) {
      const status = STATUS_BY_CODE[error.code];
      req.log.warn({ evt: "roster.request.failed", code: error.code, operation: error.operation }, error.message);
      return reply.code(status).send(error.toJSON());
    }
    req.log.error({ evt: "roster.request.error", error: String(error) }, "roster.request.error");
    return reply.code(500).send({ error: "internal_error" });
  });

  app.options("/rosters/:owner", async (_req, reply) => reply.code(204).send());
  app.options("/rosters/:owner/items/:contact", async (_req, reply) => reply.code(204).send());

  app.get<{ Params: OwnerParams }>("/rosters/:owner", async (req, reply) => {
    const owner = AddressSchema.safeParse(req.params.owner);
    if (!owner.success) return sendInvalid(reply, owner.error);

    const query = RosterQuerySchema.safeParse(req.query);
    if (!query.success) return sendInvalid(reply, query.error);

    // An empty ver means the client supports versioning but holds no roster yet.
    const ver = query.data.ver;
    const since = ver === undefined || ver === "" ? null : Number(ver);

    const sync = await store.loadSince(owner.data, since);
    return sendValidated(reply, RosterSyncResponseSchema, {
      version: String(sync.version),
      kind: sync.kind,
      items: sync.items,
    });
  });

  app.get<{ Params: ItemParams }>("/rosters/:owner/items/:contact", async (req, reply) => {
    const owner = AddressSchema.safeParse(req.params.owner);
    if (!owner.success) return sendInvalid(reply, owner.error);
    const contact = AddressSchema.safeParse(req.params.contact);
    if (!contact.success) return sendInvalid(reply, contact.error);

    const item = await store.loadOne(owner.data, contact.data);
    if (!item) {
      return reply.code(404).send({ error: "not_found" });
    }
    return sendValidated(reply, RosterItemSchema, item);
  });

  app.put<{ Params: ItemParams }>("/rosters/:owner/items/:contact", async (req, reply) => {
    const owner = AddressSchema.safeParse(req.params.owner);
    if (!owner.success) return sendInvalid(reply, owner.error);
    const contact = AddressSchema.safeParse(req.params.contact);
    if (!contact.success) return sendInvalid(reply, contact.error);

    const parsed = RosterItemPutRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendInvalid(reply, parsed.error);

    const item = await store.upsert(
      owner.data,
      {
        jid: contact.data,
        name: parsed.data.name,
        subscription: parsed.data.subscription,
        groups: parsed.data.groups,
      },
      { respectSubscription: parsed.data.respect_subscription ?? false }
    );

    req.log.info(
      { evt: "roster.item.saved", owner: owner.data, contact: contact.data, version: item.version },
      "roster.item.saved"
    );
    return sendValidated(reply, RosterItemSchema, item);
  });

  app.delete<{ Params: ItemParams }>("/rosters/:owner/items/:contact", async (req, reply) => {
    const owner = AddressSchema.safeParse(req.params.owner);
    if (!owner.success) return sendInvalid(reply, owner.error);
    const contact = AddressSchema.safeParse(req.params.contact);
    if (!contact.success) return sendInvalid(reply, contact.error);

    const outcome = await store.remove(owner.data, contact.data);
    return reply.code(200).send({ outcome });
  });

  app.delete<{ Params: OwnerParams }>("/rosters/:owner", async (req, reply) => {
    const owner = AddressSchema.safeParse(req.params.owner);
    if (!owner.success) return sendInvalid(reply, owner.error);

    const parsed = RosterWipeRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendInvalid(reply, parsed.error);

    const removed = await store.wipe(owner.data);
    req.log.info({ evt: "roster.wiped", owner: owner.data, removed }, "roster.wiped");
    return reply.code(204).send();
  });
}
