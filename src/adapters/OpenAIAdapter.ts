import { z } from 'zod';
import { config } from '../config';
import { LLMAdapter } from '../types';

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

export class OpenAIAdapter implements LLMAdapter {
  private apiKey: string;
  private model: string;

  constructor(apiKey?: string, model: string = 'gpt-4o-mini') {
    this.apiKey = apiKey || config.openaiKey;
    this.model = model;
    if (!this.apiKey) throw new Error('OPENAI_API_KEY not set');
  }

  async complete(prompt: string, options?: { signal?: AbortSignal }): Promise<string> {
    const res = await fetch('https://api.openai.com/v1/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.2,
      }),
      signal: options?.signal,
    });

    if (!res.ok) throw new Error(`OpenAI API error: ${res.status}`);
    const data = ChatCompletionSchema.parse(await res.json());
    return data.choices[0].message.content ?? '';
  }
}
