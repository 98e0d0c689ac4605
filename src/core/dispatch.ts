import pino from "pino";
import type { Logger } from "pino";
import type { Message } from "../types/contracts.js";
import { CallbackError } from "./errors.js";

export type Subscriber = (message: Message) => void | Promise<void>;

export interface DeliveryReport {
  delivered: boolean;
  failures: number;
}

export class DispatchQueue {
  private subscribers: Subscriber[] = [];
  private generation = "";
  private lastDeliveredId = 0;
  private log: Logger;
  private onError: (err: CallbackError) => void;

  constructor(args: { logger?: Logger; onError?: (err: CallbackError) => void } = {}) {
    this.log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
    this.onError = args.onError ?? (() => {});
  }

  subscribe(cb: Subscriber): () => void {
    this.subscribers.push(cb);
    return () => {
      this.subscribers = this.subscribers.filter((s) => s !== cb);
    };
  }

  get subscriberCount(): number {
    return this.subscribers.length;
  }

  /** Ids restart with a new source generation. */
  resetGeneration(generation: string): void {
    this.generation = generation;
    this.lastDeliveredId = 0;
  }

  get position(): { generation: string; lastDeliveredId: number } {
    return { generation: this.generation, lastDeliveredId: this.lastDeliveredId };
  }

  async deliver(message: Message): Promise<DeliveryReport> {
    if (message.id <= this.lastDeliveredId) {
      this.log.debug({ messageId: message.id, lastDeliveredId: this.lastDeliveredId }, "dispatch: already delivered");
      return { delivered: false, failures: 0 };
    }
    this.lastDeliveredId = message.id;

    let failures = 0;
    for (const cb of [...this.subscribers]) {
      try {
        await cb(message);
      } catch (cause) {
        failures++;
        const err = new CallbackError(message.id, { cause });
        this.log.error({ err: cause, messageId: message.id }, "dispatch: subscriber failed");
        this.onError(err);
      }
    }
    return { delivered: true, failures };
  }
}
