// ============================================================================
// TutorPath — Runtime configuration (environment driven)
// ============================================================================

export type ProviderPreference = 'auto' | 'ollama' | 'anthropic';

export interface LlmConfig {
  provider: ProviderPreference;
  ollamaUrl: string;
  ollamaModel: string;
  anthropicUrl: string;
  anthropicModel: string;
  anthropicApiKey?: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  llm: LlmConfig;
}

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173',
];

function parseProvider(value: string | undefined): ProviderPreference {
  if (value === 'ollama' || value === 'anthropic') return value;
  return 'auto';
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '8000') || 8000,
    host: env.HOST || '0.0.0.0',
    corsOrigins: parseList(env.CORS_ORIGINS, DEFAULT_CORS_ORIGINS),
    llm: {
      provider: parseProvider(env.LLM_PROVIDER),
      ollamaUrl: env.OLLAMA_URL || 'http://localhost:11434',
      ollamaModel: env.OLLAMA_MODEL || 'llama3.1:8b',
      anthropicUrl: 'https://api.anthropic.com/v1/messages',
      anthropicModel: env.ANTHROPIC_MODEL || 'claude-3-5-haiku-20241022',
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      maxTokens: 4000,
      timeoutMs: parseInt(env.LLM_TIMEOUT_MS || '60000') || 60000,
    },
  };
}
