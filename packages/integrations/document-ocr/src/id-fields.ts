export interface IdFields {
  full_name?: string;
  id_number?: string;
  dob?: string;
}

const NAME_RE = /^(?:full\s+name|name)\s*[:.]?\s+(.+)$/i;
const ID_LABEL_RE = /\b(?:id|document|passport|licen[cs]e)\s*(?:no|number|#)?\.?\s*[:#]?\s*((?=[A-Z-]*\d)[A-Z0-9-]{5,})\b/i;
const ID_TOKEN_RE = /^(?=[A-Z0-9]*\d)(?=[A-Z0-9]*[A-Z])[A-Z0-9]{6,12}$/;
const DOB_RE = /\b(?:dob|date\s+of\s+birth|birth\s*date)\s*[:.]?\s*(\d{4}-\d{2}-\d{2}|\d{2}[/.-]\d{2}[/.-]\d{4})/i;

export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Pick name, document number and date of birth out of OCR lines.
 *
 * Labeled values win. Without a label, the first mixed letter-and-digit
 * token of 6 to 12 characters is taken as the document number.
 */
export function extractIdFields(lines: string[]): IdFields {
  const fields: IdFields = {};

  for (const line of lines) {
    if (!fields.full_name) {
      const name = NAME_RE.exec(line);
      if (name) fields.full_name = name[1].trim();
    }
    if (!fields.dob) {
      const dob = DOB_RE.exec(line);
      if (dob) fields.dob = dob[1];
    }
    if (!fields.id_number) {
      const id = ID_LABEL_RE.exec(line);
      if (id) fields.id_number = id[1];
    }
  }

  if (!fields.id_number) {
    for (const line of lines) {
      const token = line.split(/\s+/).find((word) => ID_TOKEN_RE.test(word));
      if (token) {
        fields.id_number = token;
        break;
      }
    }
  }

  return fields;
}
