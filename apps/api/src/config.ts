// =============================================================================
// Calmpoint API — Environment configuration
// All env vars are validated at startup. Missing required vars cause a crash.
// =============================================================================

function required(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined || val === '') return fallback;
  const parsed = Number(val);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got "${val}"`);
  }
  return parsed;
}

function aiProvider(key: string): 'anthropic' | 'ollama' {
  const val = optional(key, 'anthropic');
  if (val !== 'anthropic' && val !== 'ollama') {
    throw new Error(`Environment variable ${key} must be "anthropic" or "ollama", got "${val}"`);
  }
  return val;
}

export const config = {
  // Server
  port: optionalInt('API_PORT', 3000),
  host: optional('API_HOST', '0.0.0.0'),
  nodeEnv: optional('NODE_ENV', 'development'),
  corsOrigin: optional('CORS_ORIGIN', 'http://localhost:8081'),

  // Database
  databaseUrl: required('DATABASE_URL'),
  dbPoolMax: optionalInt('DB_POOL_MAX', 10),

  // Auth — bearer tokens are verified against this secret; `sub` is the user id
  jwtSecret: required('JWT_SECRET'),

  // AI provider: 'anthropic' (cloud) or 'ollama' (local, OpenAI-compatible)
  aiProvider: aiProvider('AI_PROVIDER'),
  anthropicApiKey: process.env['ANTHROPIC_API_KEY'] ?? '',
  anthropicModel: optional('ANTHROPIC_MODEL', 'claude-3-5-sonnet-20240620'),
  ollamaBaseUrl: optional('OLLAMA_BASE_URL', 'http://localhost:11434'),
  ollamaModel: optional('OLLAMA_MODEL', 'llama3.1:8b'),
  llmTimeoutMs: optionalInt('LLM_TIMEOUT_MS', 20_000),

  // Chat sessions live in memory only; idle ones are swept after this long
  chatSessionIdleMinutes: optionalInt('CHAT_SESSION_IDLE_MINUTES', 60),

  // Regional crisis lookup falls back to this when no country is given
  crisisDefaultCountry: optional('CRISIS_DEFAULT_COUNTRY', 'India'),

  // Observability
  sentryDsn: process.env['SENTRY_DSN'] ?? '',

  get isDev(): boolean {
    return this.nodeEnv === 'development';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
  get isTest(): boolean {
    return this.nodeEnv === 'test';
  },
} as const;

export type AppConfig = typeof config;
