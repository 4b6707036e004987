import { CountryProfile, FieldValidator, ValidationOutcome } from '../types';

/**
 * Confirms that something shaped like the country's tax ID appears in the
 * text. Format presence only: no checksum is verified.
 */
export class TaxIdValidator implements FieldValidator {
  readonly kind = 'TAX_ID';

  check(text: string, profile: CountryProfile): ValidationOutcome {
    const match = profile.taxIdPattern.exec(text);
    if (!match) {
      return Object.freeze({
        kind: this.kind,
        passed: false,
        message: `${profile.taxIdLabel} not found in document`,
      });
    }
    return Object.freeze({
      kind: this.kind,
      passed: true,
      message: `${profile.taxIdLabel} format found: ${match[0]} (format only, not checksum-verified)`,
      value: match[0],
    });
  }
}
