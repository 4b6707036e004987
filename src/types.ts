export type CheckKind = 'TAX_ID' | 'INCOTERM' | 'HS_CODE';
export type Severity = 'CRITICAL' | 'WARNING';

export interface CountryProfile {
  readonly country: string;
  readonly taxIdPattern: RegExp;
  readonly taxIdLabel: string;
  readonly requiredFields: readonly string[];
  /** ISO 4217 code the invoice is expected to be issued in. */
  readonly currency: string;
}

export interface ValidationOutcome {
  readonly kind: CheckKind;
  readonly passed: boolean;
  readonly message: string;
  /** First extracted value, when the check found one. */
  readonly value?: string;
}

export interface FieldValidator {
  readonly kind: CheckKind;
  check(text: string, profile: CountryProfile): ValidationOutcome;
}

export interface ValidationReport {
  readonly country: string;
  readonly critical: readonly string[];
  readonly warnings: readonly string[];
  readonly passed: readonly string[];
  /** Every outcome, in check execution order. */
  readonly outcomes: readonly ValidationOutcome[];
}

export type AuditVerdict =
  | { readonly status: 'PASSED' }
  | { readonly status: 'FAILED'; readonly criticalCount: number }
  | { readonly status: 'NEEDS_REVIEW'; readonly warningCount: number };

export type Narrative =
  | { readonly status: 'AVAILABLE'; readonly text: string }
  | { readonly status: 'UNAVAILABLE'; readonly reason: string };

export interface AuditResult {
  readonly profile: CountryProfile;
  readonly report: ValidationReport;
  readonly verdict: AuditVerdict;
  /** Share of checks passed, 0–100. Informational; never changes the verdict. */
  readonly score: number;
  readonly narrative: Narrative;
  readonly timestamp: Date;
  readonly documentName: string;
}

export interface ReviewRequest {
  /** Document text, already cut to the reviewer's input limit. */
  text: string;
  country: string;
  critical: readonly string[];
  warnings: readonly string[];
  profile?: Pick<CountryProfile, 'taxIdLabel' | 'requiredFields' | 'currency'>;
}

export interface ContextualReviewer {
  review(request: ReviewRequest, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface LLMAdapter {
  complete(prompt: string, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface DocumentTextExtractor {
  extract(content: Uint8Array, documentName: string): Promise<string>;
}
