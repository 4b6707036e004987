// Reads .env on import
import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function logLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw?.toLowerCase());
  return level ?? 'info';
}

export const config = {
  geminiKey: process.env.GEMINI_API_KEY || '',
  openaiKey: process.env.OPENAI_API_KEY || '',
  anthropicKey: process.env.ANTHROPIC_API_KEY || '',
  defaultModel: process.env.WATCHDOG_DEFAULT_MODEL || '',
  reviewTimeoutMs: positiveInt(process.env.WATCHDOG_REVIEW_TIMEOUT_MS, 30_000),
  reviewMaxChars: positiveInt(process.env.WATCHDOG_REVIEW_MAX_CHARS, 12_000),
  reportDir: process.env.WATCHDOG_REPORT_DIR || './reports',
  logLevel: logLevel(process.env.WATCHDOG_LOG_LEVEL),
};
