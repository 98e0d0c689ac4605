import { nanoid } from "nanoid";
import type { Ack, Result, SendPayload } from "../types/contracts.js";
import type { SendError } from "../core/errors.js";

export type RecipientKind = "email" | "phone";

export interface SendContext {
  signal?: AbortSignal;
}

/** One delivery backend. Implementations report failures as values, not throws. */
export interface Sender {
  readonly name: string;
  supports(kind: RecipientKind): boolean;
  send(recipient: string, payload: SendPayload, ctx?: SendContext): Promise<Result<Ack, SendError>>;
}

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_CHARS = /^\+?[\d\s().-]+$/;

/** Email address, or a phone number of 10 to 15 digits. */
export function recipientKind(recipient: string): RecipientKind | null {
  const r = recipient.trim();
  if (EMAIL.test(r)) return "email";
  if (PHONE_CHARS.test(r)) {
    const digits = r.replace(/\D/g, "").length;
    if (digits >= 10 && digits <= 15) return "phone";
  }
  return null;
}

export function makeAck(backend: string, recipient: string): Ack {
  return { id: nanoid(), backend, recipient, sentAt: new Date().toISOString() };
}
