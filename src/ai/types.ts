// src/ai/types.ts
import type { ProviderName } from '../env.js';

export type { ProviderName };

export interface TextRequest {
  /** Instruction context (the item's guide). */
  prompt: string;
  label: string;
  /** Optional seed content; empty when the caller sent none. */
  sample: string;
}

export interface ImageInput {
  data: Uint8Array;
  mimeType: string;
}

export interface ImageRequest {
  prompt: string;
  label: string;
  /** At least one; adapters send them in order, each captioned `Image N`. */
  images: ImageInput[];
}

export interface AudioRequest {
  prompt: string;
  label: string;
  audio: Uint8Array;
  mimeType: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * One adapter per vendor. Text generation is universal; the media
 * capabilities are present only where the vendor offers them.
 */
export interface ProviderClient {
  readonly name: ProviderName;
  generateText(req: TextRequest, opts?: CallOptions): Promise<string>;
  analyzeImage?(req: ImageRequest, opts?: CallOptions): Promise<string>;
  transcribeAudio?(req: AudioRequest, opts?: CallOptions): Promise<string>;
}

/** The capability surface the handlers depend on, already bound to vendors. */
export interface Capabilities {
  generateText(req: TextRequest, opts?: CallOptions): Promise<string>;
  analyzeImage(req: ImageRequest, opts?: CallOptions): Promise<string>;
  transcribeAudio(req: AudioRequest, opts?: CallOptions): Promise<string>;
}
