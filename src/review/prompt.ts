import { ReviewRequest } from '../types';

export const REVIEW_SECTIONS = [
  'High Priority Issues',
  'Medium Priority Issues',
  'Low Priority Issues',
  'Confidence Score',
] as const;

/** First `maxChars` characters of the document; the rule checks always see all of it. */
export function truncateForReview(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars);
}

function bulletList(items: readonly string[]): string {
  return items.length === 0 ? '- none' : items.map(item => `- ${item}`).join('\n');
}

export function buildReviewPrompt(request: ReviewRequest): string {
  const { profile } = request;
  const context = profile
    ? [
        `Expected tax ID: ${profile.taxIdLabel}`,
        `Expected currency: ${profile.currency}`,
        `Required fields: ${profile.requiredFields.join(', ')}`,
      ].join('\n')
    : '';

  return `You are a strict customs auditor reviewing a commercial invoice for import into ${request.country}.
${context}

An automated rules engine already ran format checks on this document.
Critical errors found by the rules engine:
${bulletList(request.critical)}

Warnings found by the rules engine:
${bulletList(request.warnings)}

Review the invoice for anything the rules engine cannot see: vague or generic goods descriptions, missing required fields, inconsistent quantities, values or currency, and missing parties or addresses. Do not repeat the rules-engine findings unless you have something to add.

Answer with these sections, in this order:
## ${REVIEW_SECTIONS[0]}
## ${REVIEW_SECTIONS[1]}
## ${REVIEW_SECTIONS[2]}
## ${REVIEW_SECTIONS[3]}
(a number from 0 to 100 for how confident you are in this review)

INVOICE TEXT:
${request.text}`;
}
