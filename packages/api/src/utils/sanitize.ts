/**
 * Input sanitization for free text the kiosk stores and later shows on the
 * admin dashboard or in host e-mails.
 */

const HTML_TAG_RE = /<\/?[^>]+(>|$)/g;

/** Strip all HTML tags. For fields that never hold markup (names, purposes). */
export function stripHtml(input: string): string {
  return input.replace(HTML_TAG_RE, '').trim();
}

/**
 * Strip tags from a string answer; anything else passes through untouched
 * so the caller's own required-field check sees it.
 */
export function sanitizeAnswer(input: unknown): unknown {
  return typeof input === 'string' ? stripHtml(input) : input;
}
