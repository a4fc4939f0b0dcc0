import { v4 as uuid } from 'uuid';
import type { FeedbackRepository } from '../repositories/types';
import type { FeedbackRecord } from '../types/user';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { systemClock, type Clock } from '../utils/time';
import type { FallbackEmailSender } from './emailSender';

export interface FeedbackContext {
  userId?: string | null;
  ipAddress?: string | null;
  userAgent?: string | null;
  referer?: string | null;
}

export class FeedbackService {
  constructor(
    private readonly feedback: FeedbackRepository,
    private readonly mailer: FallbackEmailSender,
    private readonly inbox: string,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * The record is stored before delivery is attempted; a failed delivery leaves it undelivered
   */
  async submit(content: string, context: FeedbackContext = {}): Promise<FeedbackRecord> {
    const record = await this.feedback.insert({
      id: uuid(),
      user_id: context.userId ?? null,
      content: content.trim(),
      ip_address: context.ipAddress ?? null,
      user_agent: context.userAgent ?? null,
      referer: context.referer ?? null,
      created_at: this.clock().toISOString(),
      delivered: false,
      delivery_channel: null,
    });

    try {
      const channel = await this.mailer.deliver({
        to: this.inbox,
        subject: `User feedback ${record.created_at.slice(0, 16).replace('T', ' ')}`,
        text: formatFeedback(record),
      });
      return await this.feedback.update(record.id, { delivered: true, delivery_channel: channel });
    } catch (err) {
      await Logger.logWarning('Feedback', 'Feedback stored but not delivered', {
        UserID: record.user_id ?? undefined,
        RelatedTo: record.id,
        Exception: errorMessage(err),
      });
      return record;
    }
  }

  list(): Promise<FeedbackRecord[]> {
    return this.feedback.list();
  }

  // One message listing every stored item; false when there is nothing to send
  async sendSummary(): Promise<boolean> {
    const items = await this.feedback.list();
    if (items.length === 0) return false;

    const body = items.map((item, i) => `#${i + 1}\n${formatFeedback(item)}`).join('\n\n---\n\n');
    await this.mailer.deliver({
      to: this.inbox,
      subject: `Feedback summary (${items.length} items)`,
      text: body,
    });
    return true;
  }
}

function formatFeedback(item: FeedbackRecord): string {
  return [
    `Time: ${item.created_at}`,
    `User: ${item.user_id ?? 'guest'}`,
    `IP: ${item.ip_address ?? 'unknown'}`,
    `User agent: ${item.user_agent ?? 'unknown'}`,
    `Page: ${item.referer ?? 'unknown'}`,
    '',
    item.content,
  ].join('\n');
}
