import sgMail from '@sendgrid/mail';
import { createLogger, errorMessage } from '@visitor-kiosk/core';
import type { NotificationAdapter, NotificationPayload, NotificationResult } from '../index.js';

const log = createLogger('SendGridEmailAdapter');

export interface SendGridConfig {
  apiKey?: string;
  fromEmail?: string;
}

/** The part of the SendGrid client the adapter calls. */
export interface MailSender {
  send(message: { to: string; from: string; subject: string; text: string }): Promise<unknown>;
}

export class SendGridEmailAdapter implements NotificationAdapter {
  name = 'SendGrid Email';

  private sender: MailSender | null = null;
  private fromEmail: string;

  constructor(config: SendGridConfig, sender?: MailSender) {
    this.fromEmail = config.fromEmail || 'reception@visitor-kiosk.local';

    if (sender) {
      this.sender = sender;
    } else if (config.apiKey) {
      sgMail.setApiKey(config.apiKey);
      this.sender = sgMail;
    } else {
      log.info('SENDGRID_API_KEY not set, using console fallback');
    }
  }

  async send(notification: NotificationPayload): Promise<NotificationResult> {
    if (notification.channels && !notification.channels.includes('EMAIL')) {
      return { success: true, channel: 'EMAIL', sentCount: 0 };
    }

    const recipients = notification.recipients;

    if (!this.sender) {
      console.log(`\n[EMAIL FALLBACK] ${notification.subject}`);
      console.log(`  Message: ${notification.message}`);
      console.log(`  Recipients: ${recipients.join(', ')}`);
      return { success: true, channel: 'EMAIL', sentCount: recipients.length };
    }

    let sentCount = 0;
    let lastError: string | undefined;
    for (const to of recipients) {
      try {
        await this.sender.send({
          to,
          from: this.fromEmail,
          subject: notification.subject,
          text: notification.message,
        });
        sentCount++;
      } catch (err) {
        lastError = errorMessage(err);
        log.error({ to, error: lastError }, 'Failed to send');
      }
    }

    return { success: sentCount > 0, channel: 'EMAIL', sentCount, error: lastError };
  }
}
