import { describe, it, expect, afterEach } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AuditResult,
  Narrative,
  ValidationEngine,
  buildReportArtifact,
  complianceScore,
  defaultCatalog,
  deriveVerdict,
  renderReport,
  reportFileName,
  saveReport,
} from '../../src';

const engine = new ValidationEngine();
const TIMESTAMP = new Date('2026-01-15T10:30:00.000Z');
const NARRATIVE = '## High Priority Issues\nNone.\n## Confidence Score\n90';

function auditResult(text: string, country: string, narrative: Narrative): AuditResult {
  const report = engine.validate(text, country);
  return {
    profile: defaultCatalog().profileFor(country),
    report,
    verdict: deriveVerdict(report),
    score: complianceScore(report),
    narrative,
    timestamp: TIMESTAMP,
    documentName: 'invoice-001.pdf',
  };
}

const passed = auditResult(
  'Exporter RUT 12.345.678-5\nIncoterm: FOB\nHS 8471.30.0000',
  'Chile',
  { status: 'AVAILABLE', text: NARRATIVE }
);

const failedRulesOnly = auditResult(
  'Commercial invoice for machine parts\nClassification 1234.56.78\nPayment by wire transfer',
  'Brazil',
  { status: 'UNAVAILABLE', reason: 'review timed out after 20 ms' }
);

describe('renderReport', () => {
  it('renders header, rules section and verbatim narrative in order', () => {
    expect(renderReport(passed)).toBe([
      'CUSTOMS INVOICE AUDIT REPORT',
      '='.repeat(28),
      'Generated: 2026-01-15T10:30:00.000Z',
      'Country: Chile',
      'Document: invoice-001.pdf',
      'Verdict: PASSED',
      'Compliance score: 100/100',
      '',
      'RULES-BASED VALIDATION',
      '-'.repeat(22),
      'Critical errors: 0 | Warnings: 0 | Passed: 3',
      '',
      'Critical errors:',
      '- none',
      '',
      'Warnings:',
      '- none',
      '',
      'Passed checks:',
      '- RUT format found: 12.345.678-5 (format only, not checksum-verified)',
      '- Incoterm found: FOB',
      '- HS/NCM codes found: 1 (first: 8471.30.0000)',
      '',
      'AI CONTEXTUAL REVIEW',
      '-'.repeat(20),
      '## High Priority Issues',
      'None.',
      '## Confidence Score',
      '90',
      '',
    ].join('\n'));
  });

  it('marks rules-only reports when the review is unavailable', () => {
    const lines = renderReport(failedRulesOnly).split('\n');
    expect(lines.slice(5, 8)).toEqual([
      'Verdict: FAILED (2 critical)',
      'Compliance score: 33/100',
      '',
    ]);
    expect(lines.slice(10, 15)).toEqual([
      'Critical errors: 2 | Warnings: 0 | Passed: 1',
      '',
      'Critical errors:',
      '- CNPJ not found in document',
      '- No Incoterm (2020) found in document',
    ]);
    expect(lines.slice(-2)).toEqual([
      'AI review unavailable (review timed out after 20 ms). This report contains rules-based results only.',
      '',
    ]);
  });

  it('renders identical results to identical bytes', () => {
    expect(renderReport(passed)).toBe(renderReport(passed));
    expect(buildReportArtifact(failedRulesOnly)).toEqual(buildReportArtifact(failedRulesOnly));
  });
});

describe('reportFileName', () => {
  it('stamps the country, the document and the UTC time', () => {
    expect(reportFileName(passed)).toBe('audit_chile_invoice-001-pdf_20260115T103000000Z.txt');
  });

  it('slugs multi-word country names', () => {
    const us = { ...passed, profile: defaultCatalog().profileFor('United States') };
    expect(reportFileName(us)).toBe('audit_united-states_invoice-001-pdf_20260115T103000000Z.txt');
  });

  it('keeps audits within the same second apart', () => {
    const later = { ...passed, timestamp: new Date('2026-01-15T10:30:00.250Z') };
    const other = { ...passed, documentName: 'Invoice 002.PDF' };
    expect(reportFileName(later)).toBe('audit_chile_invoice-001-pdf_20260115T103000250Z.txt');
    expect(reportFileName(other)).toBe('audit_chile_invoice-002-pdf_20260115T103000000Z.txt');
  });

  it('falls back when the document name has nothing to slug', () => {
    expect(reportFileName({ ...passed, documentName: '***' })).toBe('audit_chile_document_20260115T103000000Z.txt');
  });
});

describe('buildReportArtifact', () => {
  it('hashes the rendered content', () => {
    const artifact = buildReportArtifact(passed);
    expect(artifact.fileName).toBe('audit_chile_invoice-001-pdf_20260115T103000000Z.txt');
    expect(artifact.content).toBe(renderReport(passed));
    expect(artifact.sha256).toBe(crypto.createHash('sha256').update(artifact.content, 'utf8').digest('hex'));
  });
});

describe('saveReport', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes the artifact as UTF-8, creating the directory', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'watchdog-'));
    const target = path.join(dir, 'nested', 'reports');
    const artifact = buildReportArtifact(passed);

    const written = saveReport(artifact, target);

    expect(written).toBe(path.join(target, 'audit_chile_invoice-001-pdf_20260115T103000000Z.txt'));
    expect(fs.readFileSync(written, 'utf8')).toBe(artifact.content);
  });

  it('refuses to overwrite an existing report', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'watchdog-'));
    const artifact = buildReportArtifact(passed);
    const written = saveReport(artifact, dir);

    expect(() => saveReport({ ...artifact, content: 'replaced\n' }, dir)).toThrow(/EEXIST/);
    expect(fs.readFileSync(written, 'utf8')).toBe(artifact.content);
  });
});
