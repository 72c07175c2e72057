/** Why a raw identity was rejected */
export type IdentityErrorKind = 'empty' | 'no_digits' | 'invalid_length' | 'not_mobile';

/** Outcome of canonicalizing a raw phone-like string */
export interface IdentityResult {
  valid: boolean;
  /** Canonical identity (`+<cc><national>`), empty when invalid */
  identity: string;
  original: string;
  countryCode: string;
  nationalNumber: string;
  errorKind?: IdentityErrorKind;
  errorMessage?: string;
}

/** Numbering-plan rules for the home country */
export interface NumberingPlan {
  countryCode: string;
  nationalLength: number;
  /** Leading digit every mobile national number carries */
  mobileLeadingDigit: string;
  /** Known operator prefixes; unknown ones are accepted with a warning */
  mobilePrefixes: ReadonlySet<string>;
  /** Transport wrappers stripped before parsing (e.g. `whatsapp:`) */
  transportPrefixes: readonly string[];
}
