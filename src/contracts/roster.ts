import { z } from "zod";

import { SUBSCRIPTION_MASK } from "./subscription";

export const AddressSchema = z.string().trim().min(1).max(3071);

const GroupNameSchema = z.string().min(1).max(255);

export const RosterItemSchema = z.object({
  jid: AddressSchema,
  name: z.string().max(255).nullable(),
  subscription: z.number().int().min(0),
  groups: z.array(GroupNameSchema),
  version: z.number().int().min(0),
  removed: z.boolean(),
}).strict();

export type RosterItem = z.infer<typeof RosterItemSchema>;

// What a caller asks the store to hold for one contact.
export type RosterItemInput = {
  jid: string;
  name?: string | null;
  subscription?: number;
  groups?: string[];
};

export const RosterItemPutRequestSchema = z.object({
  name: z.string().max(255).nullable().optional(),
  subscription: z.number().int().min(0).max(SUBSCRIPTION_MASK).optional(),
  groups: z.array(GroupNameSchema).max(100).optional(),
  respect_subscription: z.boolean().optional(),
}).strict();

export const RosterQuerySchema = z.object({
  ver: z.string().regex(/^\d*$/).optional(),
}).strict();

export const RosterWipeRequestSchema = z.object({
  confirm: z.literal(true),
}).strict();

export type RosterSync = {
  kind: "full" | "delta";
  version: number;
  items: RosterItem[];
};

// Versions travel as opaque strings on the wire.
export const RosterSyncResponseSchema = z.object({
  version: z.string().regex(/^\d+$/),
  kind: z.enum(["full", "delta"]),
  items: z.array(RosterItemSchema),
}).strict();

export type RemoveOutcome = "tombstoned" | "deleted" | "absent";
