import { defaultCatalog, RuleCatalog } from './catalog';
import { EmptyDocumentError } from './errors';
import { createLogger } from './logger';
import {
  AuditVerdict,
  CheckKind,
  FieldValidator,
  Severity,
  ValidationOutcome,
  ValidationReport,
} from './types';
import { HsCodeValidator, IncotermValidator, TaxIdValidator } from './validators';

const logger = createLogger('engine');

/** Checks always run, and are reported, in this order. */
export const CHECK_ORDER: readonly CheckKind[] = ['TAX_ID', 'INCOTERM', 'HS_CODE'];

/** Failure severity per check. Fixed policy: not configurable per audit. */
export const SEVERITY: Readonly<Record<CheckKind, Severity>> = Object.freeze({
  TAX_ID: 'CRITICAL',
  INCOTERM: 'CRITICAL',
  HS_CODE: 'WARNING',
});

export type ValidatorSet = Readonly<Record<CheckKind, FieldValidator>>;

export interface ValidationEngineOptions {
  catalog?: RuleCatalog;
  /** Replacements for individual checks, keyed by the check they stand in for. */
  validators?: Partial<Record<CheckKind, FieldValidator>>;
}

export class ValidationEngine {
  private readonly catalog: RuleCatalog;
  private readonly validators: ValidatorSet;

  constructor(options: ValidationEngineOptions = {}) {
    this.catalog = options.catalog ?? defaultCatalog();
    const overrides = options.validators ?? {};
    for (const kind of CHECK_ORDER) {
      const replacement = overrides[kind];
      if (replacement && replacement.kind !== kind) {
        throw new Error(`Validator registered for ${kind} checks ${replacement.kind}`);
      }
    }
    this.validators = Object.freeze({
      TAX_ID: overrides.TAX_ID ?? new TaxIdValidator(),
      INCOTERM: overrides.INCOTERM ?? new IncotermValidator(),
      HS_CODE: overrides.HS_CODE ?? new HsCodeValidator(),
    });
  }

  getCatalog(): RuleCatalog {
    return this.catalog;
  }

  /**
   * Return a new engine that uses `validator` for its check kind. Order and
   * severity stay as they are.
   */
  withValidator(validator: FieldValidator): ValidationEngine {
    return new ValidationEngine({
      catalog: this.catalog,
      validators: { ...this.validators, [validator.kind]: validator },
    });
  }

  /**
   * Run every check over `text` with the country's profile and bucket the
   * outcomes. Missing fields are findings in the report; only structurally
   * invalid input throws.
   *
   * @throws {EmptyDocumentError} when `text` is empty or whitespace-only
   * @throws {UnknownCountryError} when `country` is not in the catalog
   */
  validate(text: string, country: string): ValidationReport {
    if (text.trim().length === 0) throw new EmptyDocumentError();
    const profile = this.catalog.profileFor(country);

    const critical: string[] = [];
    const warnings: string[] = [];
    const passed: string[] = [];
    const outcomes: ValidationOutcome[] = [];

    for (const kind of CHECK_ORDER) {
      const outcome = Object.freeze({ ...this.validators[kind].check(text, profile) });
      outcomes.push(outcome);
      logger.debug('Check complete', { country: profile.country, kind, passed: outcome.passed });

      if (outcome.passed) {
        passed.push(outcome.message);
      } else if (SEVERITY[kind] === 'CRITICAL') {
        critical.push(outcome.message);
      } else {
        warnings.push(outcome.message);
      }
    }

    return Object.freeze({
      country: profile.country,
      critical: Object.freeze(critical),
      warnings: Object.freeze(warnings),
      passed: Object.freeze(passed),
      outcomes: Object.freeze(outcomes),
    });
  }
}

/** Critical dominates warning; counts are never weighted against each other. */
export function deriveVerdict(report: ValidationReport): AuditVerdict {
  if (report.critical.length > 0) return { status: 'FAILED', criticalCount: report.critical.length };
  if (report.warnings.length > 0) return { status: 'NEEDS_REVIEW', warningCount: report.warnings.length };
  return { status: 'PASSED' };
}

export function complianceScore(report: ValidationReport): number {
  if (report.outcomes.length === 0) return 100;
  const passed = report.outcomes.filter(o => o.passed).length;
  return Math.round((passed / report.outcomes.length) * 100);
}

export function describeVerdict(verdict: AuditVerdict): string {
  switch (verdict.status) {
    case 'PASSED':
      return 'PASSED';
    case 'FAILED':
      return `FAILED (${verdict.criticalCount} critical)`;
    case 'NEEDS_REVIEW':
      return `NEEDS REVIEW (${verdict.warningCount} ${verdict.warningCount === 1 ? 'warning' : 'warnings'})`;
  }
}
