import { z } from "zod";
import type { Direction, FilterBehavior, Message } from "../types/contracts.js";
import { ConfigError } from "./errors.js";

export interface DirectionalFilter {
  behavior: FilterBehavior;
  individualIds: ReadonlySet<string>;
  chatWhitelist: ReadonlySet<string>;
  chatBlacklist: ReadonlySet<string>;
}

export type ContactFilter = Readonly<Record<Direction, Readonly<DirectionalFilter>>>;

const Ids = z.array(z.string().trim().min(1)).default([]);

const DirectionalSchema = z.object({
  behavior: z.enum(["none", "whitelist", "blacklist"]).default("none"),
  ids: Ids,
  chatWhitelist: Ids,
  chatBlacklist: Ids
}).strict();

export const ContactFilterSchema = z.object({
  inbound: DirectionalSchema.default({}),
  outbound: DirectionalSchema.default({})
}).strict();

export type ContactFilterInput = z.input<typeof ContactFilterSchema>;

function directional(p: z.output<typeof DirectionalSchema>): Readonly<DirectionalFilter> {
  return Object.freeze({
    behavior: p.behavior,
    individualIds: new Set(p.ids),
    chatWhitelist: new Set(p.chatWhitelist),
    chatBlacklist: new Set(p.chatBlacklist)
  });
}

export function buildContactFilter(input: unknown = {}): ContactFilter {
  const parsed = ContactFilterSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`invalid contact filter: ${issues.join("; ")}`);
  }
  return Object.freeze({
    inbound: directional(parsed.data.inbound),
    outbound: directional(parsed.data.outbound)
  });
}

export const OPEN_FILTER: ContactFilter = buildContactFilter();

/**
 * Decides whether a message passes the filter for its direction.
 *
 * Chat-level lists decide first: a non-empty chat whitelist admits exactly
 * its chats, and a blacklisted chat is rejected. Only when neither applies
 * does the individual behavior for the sender take over.
 */
export function admit(
  message: Pick<Message, "direction" | "chatId" | "senderId">,
  filter: ContactFilter
): boolean {
  const f = filter[message.direction];

  if (f.chatWhitelist.size > 0) return f.chatWhitelist.has(message.chatId);
  if (f.chatBlacklist.has(message.chatId)) return false;

  switch (f.behavior) {
    case "whitelist":
      return f.individualIds.has(message.senderId);
    case "blacklist":
      return !f.individualIds.has(message.senderId);
    case "none":
      return true;
  }
}

/** Outbound rules applied to a send target, which is both the chat and the individual. */
export function admitRecipient(recipient: string, filter: ContactFilter): boolean {
  const id = recipient.trim();
  return admit({ direction: "outbound", chatId: id, senderId: id }, filter);
}

/** Holds the live filter; reconfiguration replaces it whole. */
export class FilterHolder {
  private filter: ContactFilter;

  constructor(initial: ContactFilter = OPEN_FILTER) {
    this.filter = initial;
  }

  current(): ContactFilter {
    return this.filter;
  }

  swap(next: ContactFilter): ContactFilter {
    const prev = this.filter;
    this.filter = next;
    return prev;
  }
}
