import {
  AuditOrchestrator,
  LLMReviewer,
  MockAdapter,
  buildReportArtifact,
  describeVerdict,
  saveReport,
} from '../src';

const INVOICE = `COMMERCIAL INVOICE No. 2291
Exporter: Andes Components SpA, RUT 76.123.456-K
Consignee: Pacific Retail Ltd.
Terms of delivery: FOB Valparaiso
Item 1: Laptop computers, HS 8471.30.0000, 40 units
Total: USD 32,000.00`;

async function main(): Promise<void> {
  const reviewer = new LLMReviewer(new MockAdapter(
    '## High Priority Issues\nNone.\n## Medium Priority Issues\nInvoice currency is USD, CLP expected.\n' +
    '## Low Priority Issues\nNone.\n## Confidence Score\n80'
  ));
  const orchestrator = new AuditOrchestrator({ reviewer });

  const result = await orchestrator.audit(INVOICE, 'Chile', { documentName: 'invoice-2291.pdf' });
  console.log('Verdict:', describeVerdict(result.verdict));

  const artifact = buildReportArtifact(result);
  console.log('Saved:', saveReport(artifact), artifact.sha256);
}

main().catch(console.error);
