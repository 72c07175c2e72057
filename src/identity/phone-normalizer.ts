/**
 * Identity Normalizer
 *
 * Canonicalizes phone-like strings from any transport (WhatsApp wrappers,
 * CRM exports, hand-typed local numbers) into one `+<cc><national>` key.
 */

import { IdentityErrorKind, IdentityResult, NumberingPlan } from './types';
import { ValidationError } from '../resilience/errors';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';

export const DEFAULT_MOBILE_PREFIXES: ReadonlySet<string> = new Set([
  '300', '301', '302', '303', '304', '305',
  '310', '311', '312', '313', '314', '315',
  '316', '317', '318', '319',
  '320', '321', '322', '323', '324', '325',
  '350', '351',
]);

export const DEFAULT_NUMBERING_PLAN: NumberingPlan = {
  countryCode: '57',
  nationalLength: 10,
  mobileLeadingDigit: '3',
  mobilePrefixes: DEFAULT_MOBILE_PREFIXES,
  transportPrefixes: ['whatsapp:', 'messenger:', 'sms:', 'tel:'],
};

export class PhoneNormalizer {
  private readonly log = logger.child({ component: 'phone-normalizer' });
  private readonly plan: NumberingPlan;

  constructor(plan: Partial<NumberingPlan> = {}) {
    this.plan = { ...DEFAULT_NUMBERING_PLAN, ...plan };
  }

  normalize(raw: string): IdentityResult {
    const original = raw;
    if (!raw || !raw.trim()) {
      return this.reject(original, 'empty', 'Empty identity', '', '');
    }

    const digits = this.clean(raw);
    if (!digits) {
      return this.reject(original, 'no_digits', 'Identity contains no digits', '', '');
    }

    const [countryCode, nationalNumber] = this.extractComponents(digits);
    const failure = this.validateNational(nationalNumber);
    if (failure) {
      return this.reject(original, failure.kind, failure.message, countryCode, nationalNumber);
    }

    const identity = `+${countryCode}${nationalNumber}`;
    this.log.debug({ identity: maskIdentity(identity) }, 'Identity normalized');
    return { valid: true, identity, original, countryCode, nationalNumber };
  }

  /** Strip transport wrappers and every non-digit character. */
  private clean(raw: string): string {
    let value = raw.trim();
    const lower = value.toLowerCase();
    for (const prefix of this.plan.transportPrefixes) {
      if (lower.startsWith(prefix)) {
        value = value.slice(prefix.length);
        break;
      }
    }
    return value.replace(/\D/g, '');
  }

  /**
   * Split digits into country code and national number.
   *
   * - `573001234567`  → (57, 3001234567)
   * - `3001234567`    → (57, 3001234567)
   * - `03001234567`   → (57, 3001234567), trunk zero dropped
   * - longer strings keep their last `nationalLength` digits
   */
  private extractComponents(digits: string): [string, string] {
    const { countryCode, nationalLength } = this.plan;
    let rest = digits;

    if (rest.startsWith(countryCode)) {
      const remaining = rest.slice(countryCode.length);
      if (remaining.length === nationalLength) {
        return [countryCode, remaining];
      }
      if (remaining.length === nationalLength - 1) {
        this.log.warn({ length: remaining.length }, 'Identity looks truncated after country code');
        return [countryCode, remaining];
      }
    }

    if (rest.startsWith('0')) {
      rest = rest.slice(1);
    }

    if (rest.length === nationalLength) {
      return [countryCode, rest];
    }

    if (rest.length > nationalLength) {
      return [countryCode, rest.slice(-nationalLength)];
    }

    return [countryCode, rest];
  }

  private validateNational(national: string): { kind: IdentityErrorKind; message: string } | null {
    const { nationalLength, mobileLeadingDigit, mobilePrefixes } = this.plan;
    if (national.length !== nationalLength) {
      return {
        kind: 'invalid_length',
        message: `Invalid length: ${national.length} (expected ${nationalLength})`,
      };
    }
    if (!national.startsWith(mobileLeadingDigit)) {
      return {
        kind: 'not_mobile',
        message: `Not a mobile number (must start with ${mobileLeadingDigit})`,
      };
    }
    const prefix = national.slice(0, 3);
    if (!mobilePrefixes.has(prefix)) {
      this.log.warn({ prefix }, 'Unrecognized mobile operator prefix; accepting');
    }
    return null;
  }

  private reject(
    original: string,
    errorKind: IdentityErrorKind,
    errorMessage: string,
    countryCode: string,
    nationalNumber: string,
  ): IdentityResult {
    this.log.info({ errorKind }, 'Identity rejected');
    return {
      valid: false,
      identity: '',
      original,
      countryCode,
      nationalNumber,
      errorKind,
      errorMessage,
    };
  }
}

const defaultNormalizer = new PhoneNormalizer();

/** Canonicalize or throw a `ValidationError`. */
export function normalizeIdentity(raw: string, normalizer: PhoneNormalizer = defaultNormalizer): string {
  const result = normalizer.normalize(raw);
  if (!result.valid) {
    throw new ValidationError(result.errorKind ?? 'invalid_length', raw, result.errorMessage ?? 'invalid identity');
  }
  return result.identity;
}

export function isValidIdentity(raw: string, normalizer: PhoneNormalizer = defaultNormalizer): boolean {
  return normalizer.normalize(raw).valid;
}
