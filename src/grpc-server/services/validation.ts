import { z } from "zod";
import { GatewayError } from "../../errors.js";

// Requests arrive as proto-loader objects (defaults on, so missing strings
// are ""). Validate the envelope before anything reaches a provider.

const nonBlank = (message: string) => z.string().refine((s) => s.trim().length > 0, { message });

// ids and labels are echoed back verbatim, so they are checked, not trimmed.
const itemBase = {
  id: nonBlank("id is required"),
  label: nonBlank("label is required"),
};

const bytes = z
  .instanceof(Uint8Array, { message: "must be bytes" })
  .refine((b) => b.byteLength > 0, { message: "must not be empty" });

function mimeFamily(family: "image" | "audio", fallback: string) {
  return z
    .string()
    .default("")
    .transform((s) => s.trim().toLowerCase() || fallback)
    .refine((s) => s.startsWith(`${family}/`), { message: `must be an ${family}/* type` });
}

function uniqueIds<T extends { id: string }>(items: T[], ctx: z.RefinementCtx) {
  const seen = new Set<string>();
  items.forEach((item, index) => {
    if (seen.has(item.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "id"], message: `duplicate item id: ${item.id}` });
    }
    seen.add(item.id);
  });
}

function batchOf<S extends z.ZodType<{ id: string }, z.ZodTypeDef, unknown>>(item: S) {
  return z.object({ items: z.array(item).default([]).superRefine(uniqueIds) });
}

export const NoteItem = z.object({
  ...itemBase,
  guide: z.string().default(""),
  sample: z.string().default(""),
});

export const ImageItem = z
  .object({
    ...itemBase,
    prompt: z.string().default(""),
    images: z.array(bytes).min(1, { message: "at least one image is required" }).default([]),
    mimeTypes: z.array(mimeFamily("image", "image/png")).default([]),
  })
  .superRefine((item, ctx) => {
    const images = item.images.length;
    const types = item.mimeTypes.length;
    if (types > 1 && types !== images) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mimeTypes"],
        message: `expected 1 or ${images} mime types, got ${types}`,
      });
    }
  })
  // A single mime type covers every image.
  .transform(({ images, mimeTypes, ...rest }) => ({
    ...rest,
    images: images.map((data, i) => ({
      data,
      mimeType: mimeTypes[mimeTypes.length > 1 ? i : 0] ?? "image/png",
    })),
  }));

export const AudioItem = z.object({
  ...itemBase,
  prompt: z.string().default(""),
  audio: bytes,
  mimeType: mimeFamily("audio", "audio/mp3"),
});

export const NoteGenerationRequest = batchOf(NoteItem);
export const ImageAnalysisRequest = batchOf(ImageItem);
export const AudioTranscriptionRequest = batchOf(AudioItem);

export const HelloRequest = z.object({ name: z.string().default("") });

export type NoteItem = z.infer<typeof NoteItem>;
export type ImageItem = z.infer<typeof ImageItem>;
export type AudioItem = z.infer<typeof AudioItem>;

/** ["items", 1, "id"] → "items[1].id" */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, seg) => (typeof seg === "number" ? `${acc}[${seg}]` : acc ? `${acc}.${seg}` : seg),
    "",
  );
}

function describe(issue: z.ZodIssue): string {
  const where = formatPath(issue.path);
  return where ? `${where}: ${issue.message}` : issue.message;
}

/** Parse or throw InvalidArgument naming the first offending field. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, request: unknown): z.output<S> {
  const parsed = schema.safeParse(request ?? {});
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    throw new GatewayError("InvalidArgument", first ? describe(first) : "malformed request");
  }
  return parsed.data;
}
