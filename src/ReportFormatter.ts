import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { config } from './config';
import { AuditResult } from './types';
import { describeVerdict } from './ValidationEngine';

export interface ReportArtifact {
  fileName: string;
  content: string;
  /** Hex SHA-256 of the UTF-8 content. */
  sha256: string;
}

function heading(title: string, underline: string): string[] {
  return [title, underline.repeat(title.length)];
}

function itemize(title: string, items: readonly string[]): string[] {
  return [`${title}:`, ...(items.length === 0 ? ['- none'] : items.map(item => `- ${item}`))];
}

/**
 * Plain-text rendering of an audit. Depends only on `result`, so the same
 * result always renders to the same bytes.
 */
export function renderReport(result: AuditResult): string {
  const { report, narrative } = result;
  const lines = [
    ...heading('CUSTOMS INVOICE AUDIT REPORT', '='),
    `Generated: ${result.timestamp.toISOString()}`,
    `Country: ${result.profile.country}`,
    `Document: ${result.documentName}`,
    `Verdict: ${describeVerdict(result.verdict)}`,
    `Compliance score: ${result.score}/100`,
    '',
    ...heading('RULES-BASED VALIDATION', '-'),
    `Critical errors: ${report.critical.length} | Warnings: ${report.warnings.length} | Passed: ${report.passed.length}`,
    '',
    ...itemize('Critical errors', report.critical),
    '',
    ...itemize('Warnings', report.warnings),
    '',
    ...itemize('Passed checks', report.passed),
    '',
    ...heading('AI CONTEXTUAL REVIEW', '-'),
    narrative.status === 'AVAILABLE'
      ? narrative.text
      : `AI review unavailable (${narrative.reason}). This report contains rules-based results only.`,
  ];
  return lines.join('\n') + '\n';
}

function slugify(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
}

/** e.g. `audit_united-states_invoice-001-pdf_20260115T103000123Z.txt` */
export function reportFileName(result: AuditResult): string {
  const stamp = result.timestamp.toISOString().replace(/[-:.]/g, '');
  const document = slugify(result.documentName) || 'document';
  return `audit_${slugify(result.profile.country)}_${document}_${stamp}.txt`;
}

export function buildReportArtifact(result: AuditResult): ReportArtifact {
  const content = renderReport(result);
  return {
    fileName: reportFileName(result),
    content,
    sha256: crypto.createHash('sha256').update(content, 'utf8').digest('hex'),
  };
}

/**
 * Write the artifact under `dir` (default `config.reportDir`) and return its
 * path. An existing report is never overwritten; the write fails with EEXIST.
 */
export function saveReport(artifact: ReportArtifact, dir: string = config.reportDir): string {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, artifact.fileName);
  fs.writeFileSync(filePath, artifact.content, { encoding: 'utf8', flag: 'wx' });
  return filePath;
}
