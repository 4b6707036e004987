import { CountryProfile, FieldValidator, ValidationOutcome } from '../types';

/** Incoterms 2020, in the order used to break ties between several terms. */
export const INCOTERMS_2020 = [
  'EXW', 'FCA', 'CPT', 'CIP', 'DAP', 'DPU', 'DDP', 'FAS', 'FOB', 'CFR', 'CIF',
] as const;

export type Incoterm = (typeof INCOTERMS_2020)[number];

export class IncotermValidator implements FieldValidator {
  readonly kind = 'INCOTERM';

  // Plain substring test on the upper-cased text; the first term in
  // INCOTERMS_2020 order wins, wherever it sits in the document.
  check(text: string, _profile: CountryProfile): ValidationOutcome {
    const upper = text.toUpperCase();
    const term = INCOTERMS_2020.find(t => upper.includes(t));
    if (!term) {
      return Object.freeze({
        kind: this.kind,
        passed: false,
        message: 'No Incoterm (2020) found in document',
      });
    }
    return Object.freeze({
      kind: this.kind,
      passed: true,
      message: `Incoterm found: ${term}`,
      value: term,
    });
  }
}
