import { createLogger } from '@visitor-kiosk/core';

const log = createLogger('NotificationRouter');

export interface NotificationAdapter {
  name: string;
  send(notification: NotificationPayload): Promise<NotificationResult>;
}

export type Channel = 'EMAIL' | 'SMS';

export interface NotificationPayload {
  subject: string;
  message: string;
  recipients: string[];
  channels?: Channel[];
  /** Extra context for logs, e.g. visitor name or visit id. */
  metadata?: Record<string, string>;
}

export interface NotificationResult {
  success: boolean;
  channel: string;
  sentCount: number;
  error?: string;
}

export { ConsoleNotificationAdapter } from './adapters/console.js';
export { SendGridEmailAdapter, type SendGridConfig, type MailSender } from './adapters/sendgrid-email.js';

export class NotificationRouter {
  private adapters: NotificationAdapter[] = [];
  private channelMap: Map<Channel, NotificationAdapter> = new Map();

  register(adapter: NotificationAdapter): void {
    this.adapters.push(adapter);
  }

  registerChannel(channel: Channel, adapter: NotificationAdapter): void {
    this.channelMap.set(channel, adapter);
    if (!this.adapters.includes(adapter)) {
      this.adapters.push(adapter);
    }
  }

  get adapterNames(): string[] {
    return this.adapters.map((a) => a.name);
  }

  async notify(payload: NotificationPayload): Promise<NotificationResult[]> {
    const results: NotificationResult[] = [];

    if (payload.channels && payload.channels.length > 0 && this.channelMap.size > 0) {
      // Channel-based routing: only dispatch to requested channels
      for (const channel of payload.channels) {
        const adapter = this.channelMap.get(channel);
        if (adapter) {
          log.debug({ channel, adapter: adapter.name }, 'Routing notification');
          results.push(await adapter.send({ ...payload, channels: [channel] }));
        } else {
          log.warn({ channel, subject: payload.subject }, 'No adapter registered for channel; notification dropped');
        }
      }
    } else {
      // No channel adapters: broadcast to everything registered
      for (const adapter of this.adapters) {
        results.push(await adapter.send(payload));
      }
    }

    return results;
  }
}
