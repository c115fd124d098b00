// src/ai/providers/openai.ts
import { z } from 'zod';
import type { ProvidersConfig } from '../../env.js';
import type { ProviderClient } from '../types.js';
import { abortableFetch, postJson, requireKey, toBase64, type RequestOptions } from './utils.js';
import { audioExtension, composeImagePrompt, composeTextPrompt, composeTranscriptionPrompt, imageCaption } from './prompt.js';

const ChatCompletion = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

export function buildOpenAIProvider(cfg: ProvidersConfig): ProviderClient {
  const { apiKey, base, model, visionModel, transcribeModel } = cfg.openai;
  const language = cfg.language;

  function headers(): Record<string, string> {
    return { authorization: `Bearer ${requireKey('openai', 'OPENAI_API_KEY', apiKey)}` };
  }

  function opts(signal?: AbortSignal): RequestOptions {
    return { vendor: 'openai', timeoutMs: cfg.timeoutMs, signal };
  }

  async function chat(selectedModel: string, messages: unknown[], signal?: AbortSignal): Promise<string> {
    const json = await postJson(
      `${base}/v1/chat/completions`,
      headers(),
      { model: selectedModel, temperature: 0, messages },
      ChatCompletion,
      opts(signal),
    );
    return json.choices[0].message.content ?? '';
  }

  return {
    name: 'openai',

    async generateText(req, callOpts) {
      const { system, user } = composeTextPrompt(req, language);
      return chat(
        model,
        [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        callOpts?.signal,
      );
    },

    async analyzeImage(req, callOpts) {
      return chat(
        visionModel,
        [
          { role: 'system', content: composeImagePrompt(req, language) },
          {
            role: 'user',
            content: [
              { type: 'text', text: req.label },
              ...req.images.flatMap((image, i) => [
                { type: 'text', text: imageCaption(i) },
                { type: 'image_url', image_url: { url: `data:${image.mimeType};base64,${toBase64(image.data)}` } },
              ]),
            ],
          },
        ],
        callOpts?.signal,
      );
    },

    async transcribeAudio(req, callOpts) {
      const form = new FormData();
      form.append('file', new Blob([req.audio], { type: req.mimeType }), `audio.${audioExtension(req.mimeType)}`);
      form.append('model', transcribeModel);
      form.append('response_format', 'text');
      form.append('prompt', composeTranscriptionPrompt(req, language));
      return abortableFetch(
        `${base}/v1/audio/transcriptions`,
        { method: 'POST', headers: headers(), body: form },
        opts(callOpts?.signal),
        async (response) => (await response.text()).trim(),
      );
    },
  };
}
