/**
 * Conversational check-in interview.
 *
 * The interview walks a fixed list of fields in order. It keeps no session:
 * the caller sends the answers collected so far with every step and gets the
 * updated answers back.
 */

import type { CheckinDetails } from './types.js';

export type InterviewField = 'full_name' | 'email' | 'phone' | 'id_number' | 'host_email' | 'purpose';

/** Answers collected so far, keyed by field name. Unanswered fields are absent or empty. */
export type InterviewState = Record<string, string>;

export interface FieldSpec {
  field: InterviewField;
  prompt: string;
  optional: boolean;
}

export interface StepResult {
  next_prompt: string;
  next_field: InterviewField | null;
  conversation_state: InterviewState;
  is_complete: boolean;
  errors: string[] | null;
}

export const CHECKIN_FIELDS: readonly FieldSpec[] = [
  { field: 'full_name', prompt: 'What is your full name?', optional: false },
  { field: 'email', prompt: 'What is your email address? (You may skip)', optional: true },
  { field: 'phone', prompt: 'And your phone number? (optional)', optional: true },
  { field: 'id_number', prompt: 'Do you have an ID or passport number to provide? (optional)', optional: true },
  { field: 'host_email', prompt: 'Who are you visiting today? Please provide their email.', optional: false },
  { field: 'purpose', prompt: 'What is the purpose of your visit?', optional: false },
];

export const COMPLETION_PROMPT =
  'Thank you, your check-in data is almost complete. Please scan your ID, if required.';

/** Stored in place of an answer when the visitor skips an optional field. */
export const SKIPPED_VALUE = '(skipped)';

const SKIP_WORDS = new Set(['skip', 'none', 'n/a', 'no']);

// Only the e-mail answers are checked inline; the rest go through validateField.
const ANSWER_CHECKS: Partial<Record<InterviewField, (answer: string) => string | null>> = {
  email: (answer) => (answer.includes('@') ? null : 'Invalid email format.'),
  host_email: (answer) => (answer.includes('@') ? null : 'Please provide a valid email for the host.'),
};

export function findPendingField(state: InterviewState): FieldSpec | undefined {
  return CHECKIN_FIELDS.find((spec) => !state[spec.field]);
}

export function isSkipAnswer(answer: string): boolean {
  return SKIP_WORDS.has(answer.trim().toLowerCase());
}

/**
 * Apply one raw answer to the interview.
 *
 * The answer fills the first unanswered field. An invalid e-mail is still
 * stored; the problem is reported in `errors` and the caller decides whether
 * to ask again. An empty answer leaves the state as it is.
 */
export function step(state: InterviewState, input: string): StepResult {
  const answers: InterviewState = { ...state };
  const pending = findPendingField(answers);

  if (!pending) {
    return completed(answers);
  }

  const answer = input.trim();
  if (!answer) {
    return {
      next_prompt: pending.prompt,
      next_field: pending.field,
      conversation_state: answers,
      is_complete: false,
      errors: null,
    };
  }

  const errors: string[] = [];
  if (pending.optional && isSkipAnswer(answer)) {
    answers[pending.field] = SKIPPED_VALUE;
  } else {
    answers[pending.field] = answer;
    const error = ANSWER_CHECKS[pending.field]?.(answer);
    if (error) errors.push(error);
  }

  const upcoming = findPendingField(answers);
  if (!upcoming) {
    return { ...completed(answers), errors: errors.length > 0 ? errors : null };
  }

  return {
    next_prompt: upcoming.prompt,
    next_field: upcoming.field,
    conversation_state: answers,
    is_complete: false,
    errors: errors.length > 0 ? errors : null,
  };
}

function completed(answers: InterviewState): StepResult {
  return {
    next_prompt: COMPLETION_PROMPT,
    next_field: null,
    conversation_state: answers,
    is_complete: true,
    errors: null,
  };
}

/** Trimmed answer, or null for anything missing, blank, or skipped. */
export function answerValue(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed === SKIPPED_VALUE) return null;
  return trimmed;
}

/**
 * Normalize a finalize payload. Returns null when a field the visit row
 * cannot do without (visitor name, host e-mail) is missing.
 */
export function toCheckinDetails(payload: Record<string, unknown>): CheckinDetails | null {
  const fullName = answerValue(payload.full_name);
  const hostEmail = answerValue(payload.host_email);
  if (!fullName || !hostEmail) return null;

  return {
    full_name: fullName,
    email: answerValue(payload.email),
    phone: answerValue(payload.phone),
    id_number: answerValue(payload.id_number),
    purpose: answerValue(payload.purpose),
    host_email: hostEmail,
  };
}
