export { LLMReviewer } from './LLMReviewer';
export { buildReviewPrompt, truncateForReview, REVIEW_SECTIONS } from './prompt';
