import { PhoneNormalizer, normalizeIdentity, isValidIdentity } from '../../src/identity/phone-normalizer';
import { ValidationError } from '../../src/resilience/errors';

describe('PhoneNormalizer', () => {
  let normalizer: PhoneNormalizer;

  beforeEach(() => {
    normalizer = new PhoneNormalizer();
  });

  describe('normalize', () => {
    it('should map syntactic variants of one number to the same identity', () => {
      const variants = [
        '+57 300 123 4567',
        'whatsapp:+573001234567',
        '573001234567',
        '3001234567',
        '03001234567',
        '(300) 123-4567',
        'WhatsApp:+57 300 123 4567',
      ];
      const identities = variants.map((v) => normalizer.normalize(v).identity);
      expect(new Set(identities)).toEqual(new Set(['+573001234567']));
    });

    it('should split country code and national number', () => {
      const result = normalizer.normalize('+57 300 123 4567');
      expect(result.valid).toBe(true);
      expect(result.countryCode).toBe('57');
      expect(result.nationalNumber).toBe('3001234567');
      expect(result.original).toBe('+57 300 123 4567');
    });

    it('should be idempotent on an already canonical identity', () => {
      const once = normalizer.normalize('whatsapp:+573001234567').identity;
      expect(normalizer.normalize(once).identity).toBe(once);
    });

    it('should keep the last national digits of an over-long string', () => {
      expect(normalizer.normalize('0057 300 123 4567').identity).toBe('+573001234567');
    });

    it('should accept an unknown operator prefix', () => {
      expect(normalizer.normalize('3991234567').identity).toBe('+573991234567');
    });

    it('should reject an empty identity', () => {
      const result = normalizer.normalize('   ');
      expect(result.valid).toBe(false);
      expect(result.identity).toBe('');
      expect(result.errorKind).toBe('empty');
    });

    it('should reject input without digits', () => {
      expect(normalizer.normalize('whatsapp:abc').errorKind).toBe('no_digits');
    });

    it('should reject a short number', () => {
      const result = normalizer.normalize('12345');
      expect(result.errorKind).toBe('invalid_length');
      expect(result.errorMessage).toBe('Invalid length: 5 (expected 10)');
    });

    it('should reject a landline', () => {
      const result = normalizer.normalize('6012345678');
      expect(result.errorKind).toBe('not_mobile');
      expect(result.errorMessage).toBe('Not a mobile number (must start with 3)');
    });

    it('should honour a different numbering plan', () => {
      const mx = new PhoneNormalizer({ countryCode: '52', mobileLeadingDigit: '5', mobilePrefixes: new Set(['551']) });
      expect(mx.normalize('+52 551 234 5678').identity).toBe('+525512345678');
    });
  });

  describe('normalizeIdentity', () => {
    it('should return the canonical identity', () => {
      expect(normalizeIdentity('tel:300-123-4567')).toBe('+573001234567');
    });

    it('should throw a ValidationError carrying the kind', () => {
      expect.assertions(3);
      expect(() => normalizeIdentity('')).toThrow(ValidationError);
      try {
        normalizeIdentity('123');
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) {
          expect(err.kind).toBe('invalid_length');
        }
      }
    });
  });

  describe('isValidIdentity', () => {
    it('should report validity without throwing', () => {
      expect(isValidIdentity('+573001234567')).toBe(true);
      expect(isValidIdentity('not a phone')).toBe(false);
    });
  });
});
