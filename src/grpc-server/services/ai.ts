// AI service implementation for gRPC
import type { UntypedServiceImplementation } from "@grpc/grpc-js";
import type { Logger } from "pino";
import type { Capabilities } from "../../ai/types.js";
import type { BatchConfig, FailurePolicy } from "../../env.js";
import { GatewayError } from "../../errors.js";
import { failures, processBatch, type BatchItem, type ItemInvoker, type ItemOutcome } from "../../orchestrator/batch.js";
import { unary, type CallContext } from "../util/call.js";
import {
  AudioTranscriptionRequest,
  HelloRequest,
  ImageAnalysisRequest,
  NoteGenerationRequest,
  parseRequest,
} from "./validation.js";

export interface ResponseItem {
  id: string;
  label: string;
  value?: string;
  error?: { kind: string; message: string };
}

export interface BatchResponse {
  items: ResponseItem[];
}

export interface AiServiceDeps {
  capabilities: Capabilities;
  batch: BatchConfig;
}

export function toResponseItem(outcome: ItemOutcome): ResponseItem {
  const { id, label, result } = outcome;
  return result.status === "success"
    ? { id, label, value: result.value }
    : { id, label, error: { kind: result.kind, message: result.message } };
}

/**
 * Run a validated batch and shape the wire response. Under `strict` the
 * first failed item (in input order) fails the whole call.
 */
async function runBatch<T extends BatchItem>(
  items: readonly T[],
  invoke: ItemInvoker<T>,
  policy: FailurePolicy,
  deps: AiServiceDeps,
  ctx: CallContext,
): Promise<BatchResponse> {
  ctx.log.info({ items: items.length, policy }, "batch received");
  const outcomes = await processBatch(items, invoke, {
    concurrency: deps.batch.concurrency,
    itemTimeoutMs: deps.batch.itemTimeoutMs,
    signal: ctx.signal,
    log: ctx.log,
  });

  const failed = failures(outcomes);
  for (const f of failed) {
    ctx.log.warn({ itemId: f.id, kind: f.result.kind, reason: f.result.message }, "item failed");
  }
  if (policy === "strict" && failed.length > 0) {
    const [first] = failed;
    throw new GatewayError(first.result.kind, `item ${first.id}: ${first.result.message}`);
  }

  ctx.log.info({ items: outcomes.length, failed: failed.length }, "batch completed");
  return { items: outcomes.map(toResponseItem) };
}

export async function sayHello(request: unknown, ctx: CallContext): Promise<{ message: string }> {
  const { name } = parseRequest(HelloRequest, request);
  ctx.log.info({ name }, "AiService.SayHello");
  return { message: `Hello ${name}! This is the AI gRPC gateway` };
}

export function noteGeneration(deps: AiServiceDeps) {
  return async (request: unknown, ctx: CallContext): Promise<BatchResponse> => {
    const { items } = parseRequest(NoteGenerationRequest, request);
    return runBatch(
      items,
      (item, signal) =>
        deps.capabilities.generateText({ prompt: item.guide, label: item.label, sample: item.sample }, { signal }),
      deps.batch.policies.notes,
      deps,
      ctx,
    );
  };
}

export function imageAnalysis(deps: AiServiceDeps) {
  return async (request: unknown, ctx: CallContext): Promise<BatchResponse> => {
    const { items } = parseRequest(ImageAnalysisRequest, request);
    return runBatch(
      items,
      (item, signal) =>
        deps.capabilities.analyzeImage(
          { prompt: item.prompt, label: item.label, images: item.images },
          { signal },
        ),
      deps.batch.policies.images,
      deps,
      ctx,
    );
  };
}

export function audioTranscription(deps: AiServiceDeps) {
  return async (request: unknown, ctx: CallContext): Promise<BatchResponse> => {
    const { items } = parseRequest(AudioTranscriptionRequest, request);
    return runBatch(
      items,
      (item, signal) =>
        deps.capabilities.transcribeAudio(
          { prompt: item.prompt, label: item.label, audio: item.audio, mimeType: item.mimeType },
          { signal },
        ),
      deps.batch.policies.audio,
      deps,
      ctx,
    );
  };
}

/**
 * AI service implementation
 *
 * - SayHello: echo, the minimal contract shape
 * - NoteGeneration: text generation per item (label, guide, sample)
 * - ImageAnalysis: vision model per item
 * - AudioTranscription: speech-to-text per item
 */
export function createAiServiceImpl(deps: AiServiceDeps, log: Logger): UntypedServiceImplementation {
  return {
    SayHello: unary("AiService.SayHello", log, sayHello),
    NoteGeneration: unary("AiService.NoteGeneration", log, noteGeneration(deps)),
    ImageAnalysis: unary("AiService.ImageAnalysis", log, imageAnalysis(deps)),
    AudioTranscription: unary("AiService.AudioTranscription", log, audioTranscription(deps)),
  };
}
