import { config } from './config';
import { ExternalReviewUnavailableError, ExtractionFailureError } from './errors';
import { createLogger } from './logger';
import { truncateForReview } from './review';
import {
  AuditResult,
  ContextualReviewer,
  CountryProfile,
  DocumentTextExtractor,
  Narrative,
  ValidationReport,
} from './types';
import { complianceScore, deriveVerdict, describeVerdict, ValidationEngine } from './ValidationEngine';

const logger = createLogger('orchestrator');

export interface AuditOrchestratorOptions {
  engine?: ValidationEngine;
  /** Contextual-review collaborator. Without one every narrative is unavailable. */
  reviewer?: ContextualReviewer;
  /** Defaults to `config.reviewTimeoutMs`. */
  reviewTimeoutMs?: number;
  /** Defaults to `config.reviewMaxChars`. */
  reviewMaxChars?: number;
  /** Needed only by `auditDocument`. */
  extractor?: DocumentTextExtractor;
  clock?: () => Date;
}

export interface AuditOptions {
  documentName?: string;
  timestamp?: Date;
}

export class AuditOrchestrator {
  private engine: ValidationEngine;
  private reviewer: ContextualReviewer | null;
  private extractor: DocumentTextExtractor | null;
  private reviewTimeoutMs: number;
  private reviewMaxChars: number;
  private clock: () => Date;

  constructor(options: AuditOrchestratorOptions = {}) {
    this.engine = options.engine ?? new ValidationEngine();
    this.reviewer = options.reviewer ?? null;
    this.extractor = options.extractor ?? null;
    this.reviewTimeoutMs = options.reviewTimeoutMs ?? config.reviewTimeoutMs;
    this.reviewMaxChars = options.reviewMaxChars ?? config.reviewMaxChars;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Rules-based validation plus the contextual review, merged into one result.
   * A failed or slow review leaves the narrative unavailable; the rules-based
   * report and verdict are returned regardless.
   *
   * @throws {EmptyDocumentError}
   * @throws {UnknownCountryError}
   */
  async audit(text: string, country: string, options: AuditOptions = {}): Promise<AuditResult> {
    const documentName = options.documentName ?? 'unnamed document';
    const report = this.engine.validate(text, country);
    const profile = this.engine.getCatalog().profileFor(country);
    logger.info('Rules check complete', {
      country: profile.country,
      documentName,
      characters: text.length,
      critical: report.critical.length,
      warnings: report.warnings.length,
    });

    const narrative = await this.runReview(text, profile, report);
    const verdict = deriveVerdict(report);
    logger.info('Audit complete', { documentName, verdict: describeVerdict(verdict), narrative: narrative.status });

    return {
      profile,
      report,
      verdict,
      score: complianceScore(report),
      narrative,
      timestamp: options.timestamp ?? this.clock(),
      documentName,
    };
  }

  /**
   * Extract text with the configured extractor, then audit it. Extractor
   * errors reach the caller unchanged.
   */
  async auditDocument(
    document: { name: string; content: Uint8Array },
    country: string,
    options: Omit<AuditOptions, 'documentName'> = {}
  ): Promise<AuditResult> {
    if (!this.extractor) {
      throw new ExtractionFailureError(document.name, 'No document text extractor configured');
    }
    const text = await this.extractor.extract(document.content, document.name);
    logger.debug('Text extracted', { documentName: document.name, characters: text.length });
    return this.audit(text, country, { ...options, documentName: document.name });
  }

  private async runReview(text: string, profile: CountryProfile, report: ValidationReport): Promise<Narrative> {
    if (!this.reviewer) {
      const missing = new ExternalReviewUnavailableError('not_configured', 'no contextual reviewer configured');
      logger.debug('Skipping contextual review', { reason: missing.reason });
      return { status: 'UNAVAILABLE', reason: missing.message };
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExternalReviewUnavailableError('timeout', `review timed out after ${this.reviewTimeoutMs} ms`));
      }, this.reviewTimeoutMs);
    });

    const request = {
      text: truncateForReview(text, this.reviewMaxChars),
      country: profile.country,
      critical: report.critical,
      warnings: report.warnings,
      profile,
    };

    try {
      const reply = await Promise.race([
        this.reviewer.review(request, { signal: controller.signal }),
        timeout,
      ]);
      return { status: 'AVAILABLE', text: reply };
    } catch (err) {
      const failure = err instanceof ExternalReviewUnavailableError
        ? err
        : new ExternalReviewUnavailableError(
            'failure',
            `review failed: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err }
          );
      logger.warn('Contextual review unavailable, returning rules-only result', {
        reason: failure.reason,
        error: failure.message,
      });
      return { status: 'UNAVAILABLE', reason: failure.message };
    } finally {
      clearTimeout(timer);
    }
  }
}
