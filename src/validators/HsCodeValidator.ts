import { CountryProfile, FieldValidator, ValidationOutcome } from '../types';

// 4 digits, optional separator, 2 digits, then optionally a separator and up
// to 4 more digits. Never part of a longer run of digits.
const HS_CODE_PATTERN = /(?<!\d)\d{4}[.-]?\d{2}(?:[.-]?\d{1,4})?(?!\d)/g;

export function findHsCodes(text: string): string[] {
  return [...text.matchAll(HS_CODE_PATTERN)].map(m => m[0]);
}

/** Blank out every tax ID of the profile's format so its digit groups are not read as codes. */
function maskTaxIds(text: string, pattern: RegExp): string {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return text.replace(new RegExp(pattern.source, flags), ' ');
}

/** Heuristic: prices or dates written as 1234.56 can also match. */
export class HsCodeValidator implements FieldValidator {
  readonly kind = 'HS_CODE';

  check(text: string, profile: CountryProfile): ValidationOutcome {
    const codes = findHsCodes(maskTaxIds(text, profile.taxIdPattern));
    if (codes.length === 0) {
      return Object.freeze({
        kind: this.kind,
        passed: false,
        message: 'No HS/NCM code found in document',
      });
    }
    return Object.freeze({
      kind: this.kind,
      passed: true,
      message: `HS/NCM codes found: ${codes.length} (first: ${codes[0]})`,
      value: codes[0],
    });
  }
}
