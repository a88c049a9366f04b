// Subscription state as stored in rosteritem.subscription.
export const SUB_TO = 0x01;
export const SUB_FROM = 0x02;
export const SUB_PENDING_OUT = 0x04;
export const SUB_PENDING_IN = 0x08;
// Logically removed, kept until the retention sweep purges the row.
export const TOMBSTONE = 0x100;

export const SUBSCRIPTION_MASK = SUB_TO | SUB_FROM | SUB_PENDING_OUT | SUB_PENDING_IN;

export const isTombstoned = (bitmask: number) => (bitmask & TOMBSTONE) !== 0;

export const clearTombstone = (bitmask: number) => bitmask & ~TOMBSTONE;
