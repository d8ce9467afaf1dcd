import { z } from "zod";

/**
 * Wire shapes for the generative-model API (Gemini `generateContent`).
 * Only the fields the control plane reads are modelled; anything else is dropped on parse.
 */

export const FunctionCall = z.object({
  name: z.string(),
  args: z.record(z.string(), z.unknown()).default({}),
});

export type FunctionCall = z.infer<typeof FunctionCall>;

export const FunctionResponse = z.object({
  name: z.string(),
  response: z.record(z.string(), z.unknown()),
});

export type FunctionResponse = z.infer<typeof FunctionResponse>;

export const Part = z.union([
  z.object({ text: z.string() }),
  z.object({ functionCall: FunctionCall }),
  z.object({ functionResponse: FunctionResponse }),
  z.object({ fileData: z.object({ mimeType: z.string(), fileUri: z.string() }) }),
  z.object({ inlineData: z.object({ mimeType: z.string(), data: z.string() }) }),
]);

export type Part = z.infer<typeof Part>;

export const Content = z.object({
  role: z.enum(["user", "model"]).default("model"),
  parts: z.array(Part).default([]),
});

export type Content = z.infer<typeof Content>;

export const GroundingSupport = z.object({
  segment: z.object({
    startIndex: z.number().int().nonnegative().optional(),
    endIndex: z.number().int().nonnegative(),
    text: z.string().optional(),
  }),
  groundingChunkIndices: z.array(z.number().int().nonnegative()).default([]),
  confidenceScores: z.array(z.number()).default([]),
});

export type GroundingSupport = z.infer<typeof GroundingSupport>;

export const GroundingChunk = z.object({
  web: z
    .object({
      uri: z.string().default(""),
      title: z.string().default(""),
    })
    .optional(),
});

export type GroundingChunk = z.infer<typeof GroundingChunk>;

export const GroundingMetadata = z.object({
  groundingSupports: z.array(GroundingSupport).optional(),
  groundingChunks: z.array(GroundingChunk).optional(),
  webSearchQueries: z.array(z.string()).optional(),
});

export type GroundingMetadata = z.infer<typeof GroundingMetadata>;

export const Candidate = z.object({
  content: Content.default({ role: "model", parts: [] }),
  finishReason: z.string().optional(),
  groundingMetadata: GroundingMetadata.optional(),
});

export type Candidate = z.infer<typeof Candidate>;

export const GenerateContentResponse = z.object({
  candidates: z.array(Candidate).default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

export type GenerateContentResponse = z.infer<typeof GenerateContentResponse>;

export function isFunctionCallPart(part: Part): part is Extract<Part, { functionCall: FunctionCall }> {
  return "functionCall" in part;
}

export function isTextPart(part: Part): part is Extract<Part, { text: string }> {
  return "text" in part;
}

export function textPart(text: string): Part {
  return { text };
}

export function functionResponsePart(name: string, response: Record<string, unknown>): Part {
  return { functionResponse: { name, response } };
}

/** First candidate's parts, or an empty list when the model returned nothing. */
export function responseParts(response: GenerateContentResponse): Part[] {
  return response.candidates[0]?.content.parts ?? [];
}

export function responseText(response: GenerateContentResponse): string {
  return responseParts(response)
    .filter(isTextPart)
    .map((part) => part.text)
    .join("");
}
