import path from 'path';

/**
 * Application configuration loaded from environment variables with defaults.
 * `server/index.ts` imports `dotenv/config` before calling `loadConfig`.
 */
export interface AppConfig {
  host: string;
  port: number;
  corsOrigins: string[];
  maxUploadBytes: number;
  uploadDir: string;
  promptsDir: string;
  debug: boolean;
  openai: {
    apiKey?: string;
    baseURL?: string;
    model: string;
  };
  gemini: {
    apiKey?: string;
    model: string;
  };
}

export const DEFAULT_EVALUATION_MODEL = 'gpt-5-mini';
export const DEFAULT_OCR_MODEL = 'gemini-2.0-flash';
const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://127.0.0.1:3000,null';

type Env = Record<string, string | undefined>;

export function sanitizeEnvValue(value?: string | null): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.replace(/\s+/g, '').trim() || undefined;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const maxUploadMb = parsePositiveInt(env.MAX_UPLOAD_MB, 16);

  return {
    host: env.HOST?.trim() || '0.0.0.0',
    port: parsePositiveInt(env.PORT, 5000),
    corsOrigins: (env.CORS_ORIGINS || DEFAULT_CORS_ORIGINS)
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    maxUploadBytes: maxUploadMb * 1024 * 1024,
    uploadDir: path.resolve(env.UPLOAD_DIR?.trim() || 'uploads'),
    promptsDir: path.resolve(env.PROMPTS_DIR?.trim() || 'prompts'),
    debug: env.APP_DEBUG === 'true',
    openai: {
      apiKey: sanitizeEnvValue(env.OPENAI_API_KEY),
      baseURL: env.OPENAI_BASE_URL?.trim() || undefined,
      model: env.EVALUATION_MODEL?.trim() || DEFAULT_EVALUATION_MODEL,
    },
    gemini: {
      apiKey: sanitizeEnvValue(env.GEMINI_API_KEY) ?? sanitizeEnvValue(env.GOOGLE_API_KEY),
      model: env.OCR_MODEL?.trim() || DEFAULT_OCR_MODEL,
    },
  };
}
