// src/ai/providers/ollama.ts
import { z } from 'zod';
import type { ProvidersConfig } from '../../env.js';
import type { ProviderClient } from '../types.js';
import { postJson, toBase64 } from './utils.js';
import { composeImagePrompt, composeTextPrompt } from './prompt.js';

const GenerateResponse = z.object({ response: z.string() });

/** Local Ollama daemon; no key, multimodal models take base64 images. */
export function buildOllamaProvider(cfg: ProvidersConfig): ProviderClient {
  const { host, model } = cfg.ollama;
  const language = cfg.language;

  async function generate(body: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const json = await postJson(
      `${host}/api/generate`,
      {},
      { model, stream: false, options: { temperature: 0 }, ...body },
      GenerateResponse,
      { vendor: 'ollama', timeoutMs: cfg.timeoutMs, signal },
    );
    return json.response;
  }

  return {
    name: 'ollama',

    async generateText(req, opts) {
      const { system, user } = composeTextPrompt(req, language);
      return generate({ system, prompt: user }, opts?.signal);
    },

    async analyzeImage(req, opts) {
      const images = req.images.map((image) => toBase64(image.data));
      return generate({ prompt: composeImagePrompt(req, language), images }, opts?.signal);
    },
  };
}
