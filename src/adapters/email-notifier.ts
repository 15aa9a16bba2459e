/**
 * EmailNotifier — plain-text email over SMTP (STARTTLS) via nodemailer.
 */

import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { Notifier } from "../events/notifier.js";

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface EmailNotifierOptions {
  from: string;
  to: string;
  password: string;
  host: string;
  port: number;
  /** Injected transport (tests). Defaults to an SMTP transport. */
  transporter?: MailTransport;
}

export class EmailNotifier implements Notifier {
  private readonly from: string;
  private readonly to: string;
  private readonly transporter: MailTransport;

  constructor(opts: EmailNotifierOptions) {
    this.from = opts.from;
    this.to = opts.to;
    this.transporter =
      opts.transporter ??
      nodemailer.createTransport({
        host: opts.host,
        port: opts.port,
        secure: opts.port === 465,
        requireTLS: opts.port !== 465,
        auth: { user: opts.from, pass: opts.password },
      });
  }

  async notify(title: string, body: string): Promise<void> {
    await this.transporter.sendMail({
      from: this.from,
      to: this.to,
      subject: title,
      text: body,
    });
  }
}
