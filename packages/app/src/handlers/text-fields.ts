/** Keyword and field extraction shared by the reference handlers. */

const EMAIL_PATTERN = /[^\s@,;:<>()]+@[^\s@,;:<>()]+\.[^\s@,;:<>()]+/;
const MRN_PATTERN = /\bMR\d{6}\b/i;
const APPOINTMENT_ID_PATTERN = /\bAPT\d{6}\b/i;

/** Format a sequence number as `PREFIX000042`. */
export function sequenceId(prefix: string, n: number): string {
  return `${prefix}${String(n).padStart(6, '0')}`;
}

export function hasKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((k) => lower.includes(k));
}

/** First email address in the text, lowercased, without trailing sentence punctuation. */
export function findEmail(text: string): string | undefined {
  const match = EMAIL_PATTERN.exec(text);
  return match ? match[0].replace(/\.+$/, '').toLowerCase() : undefined;
}

export function findMrn(text: string): string | undefined {
  return MRN_PATTERN.exec(text)?.[0].toUpperCase();
}

export function findAppointmentId(text: string): string | undefined {
  return APPOINTMENT_ID_PATTERN.exec(text)?.[0].toUpperCase();
}

/**
 * Read `label: value` fields from lines or comma-separated segments.
 * Labels are matched case-insensitively; the first occurrence wins.
 */
export function readFields(text: string, labels: readonly string[]): Partial<Record<string, string>> {
  const fields: Partial<Record<string, string>> = {};
  for (const segment of text.split(/[\n,]/)) {
    const match = /\b([a-z]+)\s*:\s*(.+?)\s*$/i.exec(segment);
    if (!match) continue;
    const label = match[1]?.toLowerCase();
    const value = match[2];
    if (label && value && labels.includes(label) && fields[label] === undefined) {
      fields[label] = value;
    }
  }
  return fields;
}
