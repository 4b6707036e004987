import { GoogleGenAI } from '@google/genai';
import { config } from '../config';
import { LLMAdapter } from '../types';

export class GeminiAdapter implements LLMAdapter {
  private ai: GoogleGenAI;
  private model: string;

  constructor(apiKey?: string, model: string = 'gemini-1.5-flash') {
    const key = apiKey || config.geminiKey;
    if (!key) throw new Error('GEMINI_API_KEY not set');
    this.ai = new GoogleGenAI({ apiKey: key });
    this.model = model;
  }

  async complete(prompt: string, options?: { signal?: AbortSignal }): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: prompt,
      config: {
        temperature: 0.2,
        abortSignal: options?.signal,
      },
    });
    return response.text ?? '';
  }
}
