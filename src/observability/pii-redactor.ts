/**
 * PII Redactor
 *
 * Customer identities are phone-derived, so nothing that reaches the
 * logs may carry a full number or an email address.
 */

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_REGEX = /(\+?\d[\d\s\-().]{7,}\d)/g;
const CREDIT_CARD_REGEX = /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g;

/** Redact emails, card numbers and phone numbers from free text. */
export function redactPII(input: string): string {
  return input
    .replace(EMAIL_REGEX, '[EMAIL_REDACTED]')
    .replace(CREDIT_CARD_REGEX, '[CC_REDACTED]')
    .replace(PHONE_REGEX, '[PHONE_REDACTED]');
}

/**
 * Mask a canonical identity for logging: keeps a leading `+` with the
 * first two digits and the last four digits.
 *
 * `+573001234567` → `+57******4567`
 */
export function maskIdentity(identity: string): string {
  const hasPlus = identity.startsWith('+');
  const digits = hasPlus ? identity.slice(1) : identity;
  if (digits.length <= 6) return '*'.repeat(digits.length);
  const head = digits.slice(0, 2);
  const tail = digits.slice(-4);
  return `${hasPlus ? '+' : ''}${head}${'*'.repeat(digits.length - 6)}${tail}`;
}

/** Truncate and redact a message body for log previews. */
export function previewText(text: string, max = 80): string {
  const redacted = redactPII(text);
  return redacted.length > max ? `${redacted.slice(0, max)}…` : redacted;
}
