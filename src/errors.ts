export type WatchdogErrorCode =
  | 'UNKNOWN_COUNTRY'
  | 'EMPTY_DOCUMENT'
  | 'EXTERNAL_REVIEW_UNAVAILABLE'
  | 'EXTRACTION_FAILURE'
  | 'INVALID_CATALOG';

export class WatchdogError extends Error {
  readonly code: WatchdogErrorCode;

  constructor(code: WatchdogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WatchdogError';
    this.code = code;
  }
}

export class UnknownCountryError extends WatchdogError {
  readonly country: string;
  readonly supported: readonly string[];

  constructor(country: string, supported: readonly string[]) {
    super('UNKNOWN_COUNTRY', `Unsupported country "${country}". Supported: ${supported.join(', ')}`);
    this.name = 'UnknownCountryError';
    this.country = country;
    this.supported = supported;
  }
}

export class EmptyDocumentError extends WatchdogError {
  constructor() {
    super('EMPTY_DOCUMENT', 'Document contains no extractable text');
    this.name = 'EmptyDocumentError';
  }
}

export type ReviewFailureReason = 'timeout' | 'failure' | 'not_configured';

export class ExternalReviewUnavailableError extends WatchdogError {
  readonly reason: ReviewFailureReason;

  constructor(reason: ReviewFailureReason, message: string, options?: { cause?: unknown }) {
    super('EXTERNAL_REVIEW_UNAVAILABLE', message, options);
    this.name = 'ExternalReviewUnavailableError';
    this.reason = reason;
  }
}

/** Thrown by text extractors; the audit core passes it through untouched. */
export class ExtractionFailureError extends WatchdogError {
  readonly documentName: string;

  constructor(documentName: string, message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILURE', message, options);
    this.name = 'ExtractionFailureError';
    this.documentName = documentName;
  }
}

export class CatalogError extends WatchdogError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_CATALOG', `Invalid country catalog:\n  ${issues.join('\n  ')}`);
    this.name = 'CatalogError';
    this.issues = issues;
  }
}
