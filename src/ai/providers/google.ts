// src/ai/providers/google.ts
import { z } from 'zod';
import type { ProvidersConfig } from '../../env.js';
import type { ProviderClient } from '../types.js';
import { postJson, requireKey, toBase64 } from './utils.js';
import { composeGeminiTranscriptionPrompt, composeImagePrompt, composeTextPrompt, imageCaption } from './prompt.js';

const GenerateContentResponse = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) }).optional(),
      }),
    )
    .default([]),
});

type Part = { text: string } | { inlineData: { mimeType: string; data: string } };

export function buildGoogleProvider(cfg: ProvidersConfig): ProviderClient {
  const { apiKey, base, model, visionModel, transcribeModel } = cfg.google;
  const language = cfg.language;

  // Gemini answers with candidates → parts; an empty candidate list means "no text".
  async function generate(selectedModel: string, parts: Part[], signal?: AbortSignal): Promise<string> {
    const json = await postJson(
      `${base}/v1beta/models/${encodeURIComponent(selectedModel)}:generateContent`,
      { 'x-goog-api-key': requireKey('google', 'GOOGLE_API_KEY', apiKey) },
      { contents: [{ role: 'user', parts }] },
      GenerateContentResponse,
      { vendor: 'google', timeoutMs: cfg.timeoutMs, signal },
    );
    const first = json.candidates[0]?.content?.parts ?? [];
    return first.map((p) => p.text ?? '').join('');
  }

  return {
    name: 'google',

    async generateText(req, opts) {
      const { system, user } = composeTextPrompt(req, language);
      return generate(model, [{ text: `${system}\n\n${user}` }], opts?.signal);
    },

    async analyzeImage(req, opts) {
      return generate(
        visionModel,
        [
          { text: composeImagePrompt(req, language) },
          ...req.images.flatMap((image, i): Part[] => [
            { text: imageCaption(i) },
            { inlineData: { mimeType: image.mimeType, data: toBase64(image.data) } },
          ]),
        ],
        opts?.signal,
      );
    },

    async transcribeAudio(req, opts) {
      return generate(
        transcribeModel,
        [
          { text: composeGeminiTranscriptionPrompt(req, language) },
          { inlineData: { mimeType: req.mimeType, data: toBase64(req.audio) } },
        ],
        opts?.signal,
      );
    },
  };
}
