import { ContextualReviewer, LLMAdapter, ReviewRequest } from '../types';
import { buildReviewPrompt } from './prompt';

/** Sends the review prompt through any LLMAdapter and returns its reply untouched. */
export class LLMReviewer implements ContextualReviewer {
  private adapter: LLMAdapter;

  constructor(adapter: LLMAdapter) {
    this.adapter = adapter;
  }

  async review(request: ReviewRequest, options?: { signal?: AbortSignal }): Promise<string> {
    const reply = await this.adapter.complete(buildReviewPrompt(request), options);
    if (reply.trim().length === 0) throw new Error('Reviewer returned an empty reply');
    return reply;
  }
}
