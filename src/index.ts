export { RuleCatalog, defaultCatalog, CountryProfileDefinitionSchema } from './catalog';
export type { CountryProfileDefinition } from './catalog';
export { TaxIdValidator, IncotermValidator, HsCodeValidator, INCOTERMS_2020, findHsCodes } from './validators';
export type { Incoterm } from './validators';
export {
  ValidationEngine,
  CHECK_ORDER,
  SEVERITY,
  deriveVerdict,
  describeVerdict,
  complianceScore,
} from './ValidationEngine';
export type { ValidationEngineOptions, ValidatorSet } from './ValidationEngine';
export { AuditOrchestrator } from './AuditOrchestrator';
export type { AuditOrchestratorOptions, AuditOptions } from './AuditOrchestrator';
export { renderReport, reportFileName, buildReportArtifact, saveReport } from './ReportFormatter';
export type { ReportArtifact } from './ReportFormatter';
export { LLMReviewer, buildReviewPrompt, truncateForReview, REVIEW_SECTIONS } from './review';
export { GeminiAdapter, OpenAIAdapter, AnthropicAdapter, MockAdapter, autoDetectAdapter } from './adapters';
export type { MockAdapterOptions } from './adapters';
export {
  WatchdogError,
  UnknownCountryError,
  EmptyDocumentError,
  ExternalReviewUnavailableError,
  ExtractionFailureError,
  CatalogError,
} from './errors';
export type { WatchdogErrorCode, ReviewFailureReason } from './errors';
export { createLogger } from './logger';
export type { Logger } from './logger';
export { config } from './config';
export type {
  CheckKind,
  Severity,
  CountryProfile,
  ValidationOutcome,
  FieldValidator,
  ValidationReport,
  AuditVerdict,
  Narrative,
  AuditResult,
  ReviewRequest,
  ContextualReviewer,
  LLMAdapter,
  DocumentTextExtractor,
} from './types';
