import nodemailer from 'nodemailer';
import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import type { OutboundMessage } from '../core/types.js';
import { DeliveryFailedError } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';

/** Outbound channel for a fully rendered message. Rejects with `DeliveryFailedError`. */
export interface MailTransport {
  send(message: OutboundMessage): Promise<void>;
}

export interface SmtpConfig {
  relay: string;
  port: number;
  secure: boolean;
  username?: string;
  password?: string;
  timeoutMs: number;
}

function createSmtpTransporter(cfg: SmtpConfig) {
  return nodemailer.createTransport({
    host: cfg.relay,
    port: cfg.port,
    secure: cfg.secure,
    auth: cfg.username !== undefined ? { user: cfg.username, pass: cfg.password } : undefined,
    connectionTimeout: cfg.timeoutMs,
    greetingTimeout: cfg.timeoutMs,
    socketTimeout: cfg.timeoutMs,
  });
}

export class SmtpMailTransport implements MailTransport {
  private readonly transporter: ReturnType<typeof createSmtpTransporter>;

  constructor(private readonly cfg: SmtpConfig) {
    this.transporter = createSmtpTransporter(cfg);
  }

  async send(message: OutboundMessage): Promise<void> {
    let rejected: unknown[];
    try {
      const info = await this.transporter.sendMail(message);
      rejected = info.rejected;
      getLogger().debug({ messageId: info.messageId, relay: this.cfg.relay }, 'relay accepted message');
    } catch (err) {
      throw new DeliveryFailedError(`SMTP delivery via ${this.cfg.relay} failed`, err);
    }
    if (rejected.length > 0) {
      throw new DeliveryFailedError(`Relay ${this.cfg.relay} rejected recipient ${message.to}`);
    }
  }

  /** Opens a connection and authenticates without sending anything. */
  async verify(): Promise<boolean> {
    try {
      return await this.transporter.verify();
    } catch (err) {
      throw new DeliveryFailedError(`Cannot connect or authenticate to ${this.cfg.relay}`, err);
    }
  }
}

/**
 * Writes each message as an RFC 822 `.eml` file into `outboxDir` instead of
 * relaying it.
 */
export class FileMailTransport implements MailTransport {
  private readonly transporter = nodemailer.createTransport({
    streamTransport: true,
    buffer: true,
    newline: 'unix',
  });

  constructor(private readonly outboxDir: string) {}

  async send(message: OutboundMessage): Promise<void> {
    try {
      const info = await this.transporter.sendMail(message);
      if (!Buffer.isBuffer(info.message)) {
        throw new Error('stream transport did not buffer the message');
      }
      await fs.mkdir(this.outboxDir, { recursive: true });
      const file = path.join(this.outboxDir, `${Date.now()}-${randomUUID()}.eml`);
      await fs.writeFile(file, info.message);
      getLogger().info({ file }, 'notification written to outbox');
    } catch (err) {
      throw new DeliveryFailedError(`Failed to write message to outbox ${this.outboxDir}`, err);
    }
  }
}
