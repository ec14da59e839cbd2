/**
 * Notification templates for host messages.
 * Used by the notify-host route to format e-mail and SMS text.
 */

export interface NotificationTemplate {
  id: string;
  name: string;
  channel: 'sms' | 'email';
  subject?: string; // email only
  body: string;
  variables: string[];
}

// Variable interpolation: {{variableName}}
export function renderTemplate(template: NotificationTemplate, vars: Record<string, string>): {
  subject?: string;
  body: string;
} {
  const fill = (text: string) =>
    text.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
      Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match,
    );

  return {
    subject: template.subject === undefined ? undefined : fill(template.subject),
    body: fill(template.body),
  };
}

// --- Host Templates ---

export const HOST_VISITOR_ARRIVED_EMAIL: NotificationTemplate = {
  id: 'host-visitor-arrived-email',
  name: 'Visitor Arrived (Email)',
  channel: 'email',
  subject: 'Your visitor {{visitorName}} has arrived',
  body: `Hello {{hostName}},

{{visitorName}} has checked in at reception and is waiting for you.

Purpose of visit: {{purpose}}
Checked in: {{timestamp}}

Please come to the lobby to meet your visitor.`,
  variables: ['hostName', 'visitorName', 'purpose', 'timestamp'],
};

export const HOST_VISITOR_ARRIVED_SMS: NotificationTemplate = {
  id: 'host-visitor-arrived-sms',
  name: 'Visitor Arrived (SMS)',
  channel: 'sms',
  body: '{{visitorName}} has checked in at reception to see you. Purpose: {{purpose}}',
  variables: ['visitorName', 'purpose'],
};
