// src/env.ts
import { z } from 'zod';

/** bool parser: accepts true/false and common string variants */
const bool = z
  .union([z.boolean(), z.string()])
  .transform(v => (typeof v === 'string' ? ['1', 'true', 'yes', 'on'].includes(v.toLowerCase()) : v));

const Url = z.string().url().transform(s => s.replace(/\/+$/, ''));

const Policy = z.enum(['partial', 'strict']);

export const PROVIDER_NAMES = ['openai', 'anthropic', 'google', 'ollama'] as const;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const Provider = z.enum(PROVIDER_NAMES);

const schema = z.object({
  // ── Runtime basics ──────────────────────────────────────────────────────────
  NODE_ENV: z.enum(['production', 'staging', 'development', 'test']).default('production'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // ── gRPC listener ──────────────────────────────────────────────────────────
  GRPC_HOST: z.string().default('0.0.0.0'),
  GRPC_PORT: z.coerce.number().int().min(0).max(65535).default(50051),
  GRPC_MAX_MESSAGE_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  GRPC_REFLECTION: bool.default(true),

  // ── Caller authentication ──────────────────────────────────────────────────
  GRPC_API_KEYS: z.string().optional(),
  GRPC_SECRET_API_KEY_1: z.string().optional(),
  GRPC_SECRET_API_KEY_2: z.string().optional(),
  AUTH_METADATA_KEY: z.string().regex(/^[a-z0-9_.-]+$/, 'must be a lower-case metadata key').default('api-key'),
  HEALTH_REQUIRES_AUTH: bool.default(false),

  // ── Batch orchestration ────────────────────────────────────────────────────
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  NOTE_FAILURE_POLICY: Policy.default('partial'),
  IMAGE_FAILURE_POLICY: Policy.default('partial'),
  AUDIO_FAILURE_POLICY: Policy.default('partial'),

  // ── Providers ──────────────────────────────────────────────────────────────
  RESPONSE_LANGUAGE: z.enum(['vi-VN', 'en-US']).default('vi-VN'),
  TEXT_PROVIDER: Provider.default('openai'),
  VISION_PROVIDER: Provider.default('openai'),
  TRANSCRIBE_PROVIDER: Provider.default('openai'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE: Url.default('https://api.openai.com'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_VISION_MODEL: z.string().default('gpt-4.1'),
  OPENAI_TRANSCRIBE_MODEL: z.string().default('gpt-4o-transcribe'),

  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_BASE: Url.default('https://api.anthropic.com'),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  ANTHROPIC_VISION_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(1024),

  GOOGLE_API_KEY: z.string().optional(),
  GOOGLE_BASE: Url.default('https://generativelanguage.googleapis.com'),
  GOOGLE_MODEL: z.string().default('gemini-2.0-flash'),
  GOOGLE_VISION_MODEL: z.string().default('gemini-2.0-flash'),
  GOOGLE_TRANSCRIBE_MODEL: z.string().default('gemini-2.5-pro-preview-06-05'),

  OLLAMA_HOST: Url.default('http://127.0.0.1:11434'),
  OLLAMA_MODEL: z.string().default('llama3.1'),
});

export type ProviderName = z.infer<typeof Provider>;
export type FailurePolicy = z.infer<typeof Policy>;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type ResponseLanguage = z.infer<typeof schema>['RESPONSE_LANGUAGE'];

export interface ApiKeyEntry {
  callerId: string;
  key: string;
}

/**
 * Parse the caller allow-list. `GRPC_API_KEYS` holds `caller=key` pairs or
 * bare keys separated by commas; the two numbered variables are appended.
 * Blank entries never become valid keys.
 */
export function parseApiKeys(list: string | undefined, ...extra: Array<string | undefined>): ApiKeyEntry[] {
  const raw = [...(list ?? '').split(','), ...extra.map(v => v ?? '')];
  const out: ApiKeyEntry[] = [];
  const seen = new Set<string>();
  for (const entry of raw) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    const callerId = eq > 0 ? trimmed.slice(0, eq).trim() : `key-${out.length + 1}`;
    const key = eq > 0 ? trimmed.slice(eq + 1).trim() : trimmed;
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push({ callerId, key });
  }
  return out;
}

export class ConfigError extends Error {
  constructor(readonly fieldErrors: Record<string, string[] | undefined>) {
    super(`Invalid env: ${Object.keys(fieldErrors).join(', ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  const v = parsed.data;

  return {
    nodeEnv: v.NODE_ENV,
    logLevel: v.LOG_LEVEL ?? (v.NODE_ENV === 'development' ? 'debug' : 'info'),

    grpc: {
      address: `${v.GRPC_HOST}:${v.GRPC_PORT}`,
      maxMessageBytes: v.GRPC_MAX_MESSAGE_BYTES,
      reflection: v.GRPC_REFLECTION,
    },

    auth: {
      metadataKey: v.AUTH_METADATA_KEY,
      apiKeys: parseApiKeys(v.GRPC_API_KEYS, v.GRPC_SECRET_API_KEY_1, v.GRPC_SECRET_API_KEY_2),
      healthRequiresAuth: v.HEALTH_REQUIRES_AUTH,
    },

    batch: {
      concurrency: v.BATCH_CONCURRENCY,
      itemTimeoutMs: v.PROVIDER_TIMEOUT_MS,
      policies: {
        notes: v.NOTE_FAILURE_POLICY,
        images: v.IMAGE_FAILURE_POLICY,
        audio: v.AUDIO_FAILURE_POLICY,
      },
    },

    providers: {
      language: v.RESPONSE_LANGUAGE,
      timeoutMs: v.PROVIDER_TIMEOUT_MS,
      text: v.TEXT_PROVIDER,
      vision: v.VISION_PROVIDER,
      transcription: v.TRANSCRIBE_PROVIDER,
      openai: {
        apiKey: v.OPENAI_API_KEY ?? '',
        base: v.OPENAI_BASE,
        model: v.OPENAI_MODEL,
        visionModel: v.OPENAI_VISION_MODEL,
        transcribeModel: v.OPENAI_TRANSCRIBE_MODEL,
      },
      anthropic: {
        apiKey: v.ANTHROPIC_API_KEY ?? '',
        base: v.ANTHROPIC_BASE,
        model: v.ANTHROPIC_MODEL,
        visionModel: v.ANTHROPIC_VISION_MODEL,
        maxTokens: v.ANTHROPIC_MAX_TOKENS,
      },
      google: {
        apiKey: v.GOOGLE_API_KEY ?? '',
        base: v.GOOGLE_BASE,
        model: v.GOOGLE_MODEL,
        visionModel: v.GOOGLE_VISION_MODEL,
        transcribeModel: v.GOOGLE_TRANSCRIBE_MODEL,
      },
      ollama: {
        host: v.OLLAMA_HOST,
        model: v.OLLAMA_MODEL,
      },
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
export type ProvidersConfig = AppConfig['providers'];
export type BatchConfig = AppConfig['batch'];
