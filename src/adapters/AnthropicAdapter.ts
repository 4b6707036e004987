import { z } from 'zod';
import { config } from '../config';
import { LLMAdapter } from '../types';

const MessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export class AnthropicAdapter implements LLMAdapter {
  private apiKey: string;
  private model: string;

  constructor(apiKey?: string, model: string = 'claude-sonnet-4-20250514') {
    this.apiKey = apiKey || config.anthropicKey;
    this.model = model;
    if (!this.apiKey) throw new Error('ANTHROPIC_API_KEY not set');
  }

  async complete(prompt: string, options?: { signal?: AbortSignal }): Promise<string> {
    const res = await fetch('https://api.anthropic.com/v1/messages', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: 4096,
        messages: [{ role: 'user', content: prompt }],
      }),
      signal: options?.signal,
    });

    if (!res.ok) throw new Error(`Anthropic API error: ${res.status}`);
    const data = MessageSchema.parse(await res.json());
    return data.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('');
  }
}
