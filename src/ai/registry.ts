// src/ai/registry.ts
import type { ProvidersConfig } from '../env.js';
import type { Capabilities, ProviderClient, ProviderName } from './types.js';
import { buildOpenAIProvider } from './providers/openai.js';
import { buildAnthropicProvider } from './providers/anthropic.js';
import { buildGoogleProvider } from './providers/google.js';
import { buildOllamaProvider } from './providers/ollama.js';

/*
 * Bind each capability to a vendor adapter once, at start-up.
 *
 *   TEXT_PROVIDER       → generateText
 *   VISION_PROVIDER     → analyzeImage
 *   TRANSCRIBE_PROVIDER → transcribeAudio
 *
 * A vendor that lacks the capability, or has no API key, is a boot error
 * rather than a per-item failure on every call.
 */

const BUILDERS: Record<ProviderName, (cfg: ProvidersConfig) => ProviderClient> = {
  openai: buildOpenAIProvider,
  anthropic: buildAnthropicProvider,
  google: buildGoogleProvider,
  ollama: buildOllamaProvider,
};

const KEY_ENV: Record<ProviderName, string | null> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
  ollama: null,
};

function hasKey(cfg: ProvidersConfig, name: ProviderName): boolean {
  return name === 'ollama' || Boolean(cfg[name].apiKey);
}

export class ProviderRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderRegistryError';
  }
}

export function createCapabilities(
  cfg: ProvidersConfig,
  builders: Record<ProviderName, (cfg: ProvidersConfig) => ProviderClient> = BUILDERS,
): Capabilities {
  const cache = new Map<ProviderName, ProviderClient>();

  function client(name: ProviderName): ProviderClient {
    const cached = cache.get(name);
    if (cached) return cached;
    if (!hasKey(cfg, name)) {
      throw new ProviderRegistryError(`${name} selected but ${KEY_ENV[name]} is not set`);
    }
    const built = builders[name](cfg);
    cache.set(name, built);
    return built;
  }

  const text = client(cfg.text);

  const vision = client(cfg.vision);
  const analyzeImage = vision.analyzeImage?.bind(vision);
  if (!analyzeImage) throw new ProviderRegistryError(`${vision.name} does not support image analysis`);

  const transcriber = client(cfg.transcription);
  const transcribeAudio = transcriber.transcribeAudio?.bind(transcriber);
  if (!transcribeAudio) throw new ProviderRegistryError(`${transcriber.name} does not support audio transcription`);

  return {
    generateText: (req, opts) => text.generateText(req, opts),
    analyzeImage,
    transcribeAudio,
  };
}

/** Names of the vendors bound to each capability (useful for boot logs). */
export function describeCapabilities(cfg: ProvidersConfig): Record<'text' | 'vision' | 'transcription', ProviderName> {
  return { text: cfg.text, vision: cfg.vision, transcription: cfg.transcription };
}
