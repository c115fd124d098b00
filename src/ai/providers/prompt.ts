// src/ai/providers/prompt.ts
import type { ResponseLanguage } from '../../env.js';
import type { AudioRequest, ImageRequest, TextRequest } from '../types.js';

const LANGUAGE_NAMES: Record<ResponseLanguage, string> = {
  'vi-VN': 'Vietnamese',
  'en-US': 'English',
};

export function languageName(language: ResponseLanguage): string {
  return LANGUAGE_NAMES[language];
}

export interface ComposedPrompt {
  system: string;
  user: string;
}

export function composeTextPrompt(req: TextRequest, language: ResponseLanguage): ComposedPrompt {
  const user = [`Label: ${req.label}`, req.sample ? `Sample:\n${req.sample}` : ''].filter(Boolean).join('\n\n');
  return {
    system: `${req.prompt}\n\nPlease respond in ${languageName(language)}.`,
    user,
  };
}

export function composeImagePrompt(req: ImageRequest, language: ResponseLanguage): string {
  return [req.prompt, `Label: ${req.label}`, `Please respond in ${languageName(language)}`].filter(Boolean).join('\n');
}

/** Caption sent ahead of the image at `index` so the model can refer to it. */
export function imageCaption(index: number): string {
  return `Image ${index + 1}`;
}

export function composeTranscriptionPrompt(req: AudioRequest, language: ResponseLanguage): string {
  const name = languageName(language);
  if (!req.prompt) {
    return `The audio will mainly be in ${name}, however, it may contain terminology from other languages; transcribe those parts in their own language.`;
  }
  return `${req.prompt}\nTranscribe the following audio to text in ${name}.`;
}

/**
 * Gemini gets the plain instruction by default and the mixed-language hint
 * after a caller prompt.
 */
export function composeGeminiTranscriptionPrompt(req: AudioRequest, language: ResponseLanguage): string {
  const name = languageName(language);
  if (!req.prompt) return `Transcribe the following audio to text in ${name}.`;
  return `${req.prompt}\nThe audio will mainly be in ${name}, however, it may contain terminology from other languages; transcribe those parts in their own language.`;
}

/** `audio/x-m4a` → `m4a`; used to name uploaded files. */
export function audioExtension(mimeType: string): string {
  const sub = mimeType.startsWith('audio/') ? mimeType.slice('audio/'.length) : '';
  const ext = sub.replace(/^x-/, '').split(/[;+]/)[0];
  return ext || 'mp3';
}
