import { LLMAdapter } from '../types';

export interface MockAdapterOptions {
  /** Wait this long before answering; an abort signal cuts the wait short. */
  delayMs?: number;
  /** Reject every call with this error instead of answering. */
  failWith?: Error;
}

export class MockAdapter implements LLMAdapter {
  private responses: Map<string, string> = new Map();
  private defaultResponse: string;
  private options: MockAdapterOptions;
  readonly prompts: string[] = [];

  constructor(defaultResponse: string = 'No issues found.', options: MockAdapterOptions = {}) {
    this.defaultResponse = defaultResponse;
    this.options = options;
  }

  setResponse(promptContains: string, response: string): void {
    this.responses.set(promptContains, response);
  }

  async complete(prompt: string, options?: { signal?: AbortSignal }): Promise<string> {
    this.prompts.push(prompt);
    if (this.options.delayMs) await this.wait(this.options.delayMs, options?.signal);
    if (this.options.failWith) throw this.options.failWith;

    for (const [key, value] of this.responses) {
      if (prompt.includes(key)) return value;
    }
    return this.defaultResponse;
  }

  private wait(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('Aborted'));
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new Error('Aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
