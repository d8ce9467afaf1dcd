import { z } from "zod";

export const DEFAULT_STYLE_MODE = "descriptive";

export const Attachment = z.union([
  z.object({ mimeType: z.string().min(1), fileUri: z.string().min(1) }),
  z.object({ mimeType: z.string().min(1), data: z.string().min(1) }),
]);

export type Attachment = z.infer<typeof Attachment>;

// Clients send either casing; the snake_case spelling wins when both are present.
const SNAKE_CASE_ALIASES: Record<string, string> = {
  chat_id: "chatId",
  system_instruction: "systemInstruction",
  style_mode: "styleMode",
  engage_workflow: "engageWorkflow",
};

function normalizeKeys(value: unknown): unknown {
  if (!value || typeof value !== "object" || Array.isArray(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const camel = SNAKE_CASE_ALIASES[key];
    if (camel) {
      out[camel] = entry;
    } else if (!(key in out)) {
      out[key] = entry;
    }
  }
  return out;
}

export const ChatRequest = z.preprocess(
  normalizeKeys,
  z.object({
    text: z.string().min(1).max(100_000),
    chatId: z.string().min(1).max(200).optional(),
    systemInstruction: z.string().max(20_000).optional(),
    styleMode: z.string().min(1).max(64).default(DEFAULT_STYLE_MODE),
    engageWorkflow: z.boolean().default(false),
    attachments: z.array(Attachment).max(10).default([]),
  })
);

export type ChatRequest = z.infer<typeof ChatRequest>;

/** Payload handed from the accepting route to the background task. */
export const ChatTaskInput = z.object({
  userId: z.string().min(1),
  chatId: z.string().min(1).optional(),
  text: z.string().min(1),
  styleMode: z.string().min(1).default(DEFAULT_STYLE_MODE),
  systemInstruction: z.string().optional(),
  engageWorkflow: z.boolean().default(false),
  attachments: z.array(Attachment).default([]),
});

export type ChatTaskInput = z.infer<typeof ChatTaskInput>;

export const TitleRequest = z.object({
  text: z.string().min(1).max(100_000),
});

export type TitleRequest = z.infer<typeof TitleRequest>;

export const UserIdHeader = z.string().trim().min(1).max(128);
