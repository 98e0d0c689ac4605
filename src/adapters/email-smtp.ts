import path from "node:path";
import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { Ack, Result, SendPayload } from "../types/contracts.js";
import { SendError, errorMessage } from "../core/errors.js";
import { makeAck } from "../outbound/sender.js";
import type { RecipientKind, Sender } from "../outbound/sender.js";

export interface SmtpSettings {
  host: string;
  port: number;
  user?: string;
  pass?: string;
}

export interface EmailSenderOptions {
  from: string;
  subject?: string;
  smtp?: SmtpSettings;
  transport?: Transporter;
}

/** Relays sends by email. Phone recipients are not reachable this way. */
export class EmailSender implements Sender {
  readonly name = "email";
  private transport: Transporter;
  private from: string;
  private subject: string;

  constructor(opts: EmailSenderOptions) {
    this.from = opts.from;
    this.subject = opts.subject ?? "New message";
    if (opts.transport) {
      this.transport = opts.transport;
    } else if (opts.smtp) {
      const { host, port, user, pass } = opts.smtp;
      this.transport = nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        auth: user ? { user, pass } : undefined
      });
    } else {
      throw new TypeError("EmailSender needs smtp settings or a transport");
    }
  }

  supports(kind: RecipientKind): boolean {
    return kind === "email";
  }

  async send(recipient: string, payload: SendPayload): Promise<Result<Ack, SendError>> {
    try {
      if (payload.type === "text") {
        await this.transport.sendMail({ from: this.from, to: recipient, subject: this.subject, text: payload.text });
      } else {
        const filename = path.basename(payload.path);
        await this.transport.sendMail({
          from: this.from,
          to: recipient,
          subject: this.subject,
          text: filename,
          attachments: [{ filename, path: payload.path }]
        });
      }
    } catch (err) {
      return { ok: false, error: new SendError("backend_failed", `smtp: ${errorMessage(err)}`, { cause: err }) };
    }
    return { ok: true, value: makeAck(this.name, recipient) };
  }
}
