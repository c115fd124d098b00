// src/ai/providers/anthropic.ts
import { z } from 'zod';
import type { ProvidersConfig } from '../../env.js';
import { ProviderError } from '../../errors.js';
import type { ProviderClient } from '../types.js';
import { postJson, requireKey, toBase64 } from './utils.js';
import { composeImagePrompt, composeTextPrompt, imageCaption } from './prompt.js';

const ANTHROPIC_VERSION = '2023-06-01';

const MessageResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

function firstText(json: z.infer<typeof MessageResponse>): string {
  const text = json.content.find((b) => b.type === 'text')?.text;
  if (text === undefined) {
    throw new ProviderError('ProviderInvalidResponse', 'anthropic response has no text block');
  }
  return text;
}

/** Claude over the Messages API. No audio input, so no transcription. */
export function buildAnthropicProvider(cfg: ProvidersConfig): ProviderClient {
  const { apiKey, base, model, visionModel, maxTokens } = cfg.anthropic;
  const language = cfg.language;

  async function messages(selectedModel: string, body: Record<string, unknown>, signal?: AbortSignal) {
    const json = await postJson(
      `${base}/v1/messages`,
      { 'x-api-key': requireKey('anthropic', 'ANTHROPIC_API_KEY', apiKey), 'anthropic-version': ANTHROPIC_VERSION },
      { model: selectedModel, max_tokens: maxTokens, temperature: 0, ...body },
      MessageResponse,
      { vendor: 'anthropic', timeoutMs: cfg.timeoutMs, signal },
    );
    return firstText(json);
  }

  return {
    name: 'anthropic',

    async generateText(req, opts) {
      const { system, user } = composeTextPrompt(req, language);
      return messages(model, { system, messages: [{ role: 'user', content: user }] }, opts?.signal);
    },

    async analyzeImage(req, opts) {
      const content = [
        { type: 'text', text: composeImagePrompt(req, language) },
        ...req.images.flatMap((image, i) => [
          { type: 'text', text: imageCaption(i) },
          { type: 'image', source: { type: 'base64', media_type: image.mimeType, data: toBase64(image.data) } },
        ]),
      ];
      return messages(visionModel, { messages: [{ role: 'user', content }] }, opts?.signal);
    },
  };
}
