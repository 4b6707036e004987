export { OpenAIAdapter } from './OpenAIAdapter';
export { AnthropicAdapter } from './AnthropicAdapter';
export { GeminiAdapter } from './GeminiAdapter';
export { MockAdapter } from './MockAdapter';
export type { MockAdapterOptions } from './MockAdapter';

import { config } from '../config';
import { LLMAdapter } from '../types';
import { AnthropicAdapter } from './AnthropicAdapter';
import { GeminiAdapter } from './GeminiAdapter';
import { MockAdapter } from './MockAdapter';
import { OpenAIAdapter } from './OpenAIAdapter';

export function autoDetectAdapter(): LLMAdapter {
  const model = config.defaultModel || undefined;
  if (config.geminiKey) return new GeminiAdapter(config.geminiKey, model);
  if (config.openaiKey) return new OpenAIAdapter(config.openaiKey, model);
  if (config.anthropicKey) return new AnthropicAdapter(config.anthropicKey, model);
  return new MockAdapter();
}
