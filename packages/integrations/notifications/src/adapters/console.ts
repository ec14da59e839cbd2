import type { NotificationAdapter, NotificationPayload, NotificationResult } from '../index.js';

export class ConsoleNotificationAdapter implements NotificationAdapter {
  name = 'Console (Dev)';

  async send(notification: NotificationPayload): Promise<NotificationResult> {
    console.log(`\n📨 NOTIFICATION: ${notification.subject}`);
    console.log(`   To: ${notification.recipients.join(', ') || 'nobody'}`);
    console.log(`   Channels: ${(notification.channels || ['ALL']).join(', ')}`);
    console.log(`   Message: ${notification.message}`);
    console.log(`   Time: ${new Date().toISOString()}\n`);

    return {
      success: true,
      channel: 'CONSOLE',
      sentCount: notification.recipients.length,
    };
  }
}
