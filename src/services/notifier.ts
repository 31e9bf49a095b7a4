import type { NotificationBatch, OutboundMessage } from '../core/types.js';
import type { MailTransport } from './mailTransport.js';
import { getLogger } from '../utils/logging.js';
import { notificationsSentTotal } from '../metrics/index.js';

export interface NotifierOptions {
  transport: MailTransport;
  from: string;
  to: string;
  subjectPrefix: string;
}

/** One line per incident, `<occurredAt> <description>`, in batch order. */
export function renderSummary(batch: NotificationBatch): string {
  return batch
    .map((incident) => `${incident.occurredAt} ${incident.description.replace(/\s*\r?\n\s*/g, ' ')}\n`)
    .join('');
}

export function renderSubject(prefix: string, count: number): string {
  return `${prefix}: ${count} new incident${count === 1 ? '' : 's'}`;
}

export class Notifier {
  constructor(private readonly opts: NotifierOptions) {}

  buildMessage(batch: NotificationBatch): OutboundMessage {
    return {
      from: this.opts.from,
      to: this.opts.to,
      subject: renderSubject(this.opts.subjectPrefix, batch.length),
      text: renderSummary(batch),
    };
  }

  /**
   * Sends the whole batch as a single message. Rejects with
   * `DeliveryFailedError` from the transport; nothing is retried here.
   */
  async notify(batch: NotificationBatch): Promise<void> {
    if (batch.length === 0) {
      throw new Error('Notifier invoked with an empty batch');
    }
    const message = this.buildMessage(batch);
    try {
      await this.opts.transport.send(message);
    } catch (err) {
      notificationsSentTotal.inc({ adapter: this.opts.transport.constructor.name, status: 'failed' });
      throw err;
    }
    notificationsSentTotal.inc({ adapter: this.opts.transport.constructor.name, status: 'sent' });
    getLogger().info({ to: message.to, count: batch.length }, 'notification sent');
  }
}
