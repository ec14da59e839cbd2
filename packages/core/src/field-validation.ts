/**
 * Per-field rules for real-time form validation.
 * Fields without a rule are always valid.
 */

export interface FieldValidationResult {
  field: string;
  value: string;
  is_valid: boolean;
  errors: string[] | null;
}

type FieldRule = (value: string) => string | null;

const DIGITS_RE = /^\d+$/;

const FIELD_RULES = new Map<string, FieldRule>([
  ['email', (value) => (value.includes('@') ? null : 'Invalid email format.')],
  [
    'phone',
    (value) =>
      DIGITS_RE.test(value) && value.length >= 7 && value.length <= 15
        ? null
        : 'Invalid phone number; must be 7-15 digits.',
  ],
  ['id_number', (value) => ([...value].length >= 3 ? null : 'ID must be at least 3 characters.')],
]);

export function validateField(field: string, value: string): FieldValidationResult {
  const error = FIELD_RULES.get(field)?.(value) ?? null;
  return {
    field,
    value,
    is_valid: error === null,
    errors: error === null ? null : [error],
  };
}
