import { describe, it, expect } from "vitest";

import { ChatTaskInput } from "../src/contracts/chat";
import { IMPRECISE_LANGUAGE_TOOL, MEDICAL_CLAIMS_TOOL } from "../src/contracts/tools";
import {
  ChatService,
  DEFAULT_CHAT_TITLE,
  WORKFLOW_TRIGGER,
  buildPromptParts,
  cleanText,
  composeSystemInstruction,
  isWorkflowTrigger,
} from "../src/control-plane/chat_service";
import { ConfigurationMissingError } from "../src/control-plane/errors";
import { PromptCatalog } from "../src/control-plane/prompt_catalog";
import { MemoryConversationStore } from "../src/store/conversation_store";
import { RateLimiter } from "../src/verification/rate_limiter";
import { MemoryPromptSource, testPromptFiles } from "./helpers/memory_prompts";
import { ScriptedModels, callResponse, silentLogger, textResponse, type ScriptStep } from "./helpers/scripted_model";

class FailingHistoryStore extends MemoryConversationStore {
  async saveHistory(): Promise<void> {
    throw new Error("disk full");
  }
}

function makeService(
  script: Record<string, ScriptStep[]>,
  files = testPromptFiles(),
  store: MemoryConversationStore = new MemoryConversationStore()
) {
  let next = 0;
  const models = new ScriptedModels(script);
  const service = new ChatService({
    catalog: new PromptCatalog(new MemoryPromptSource(files)),
    store,
    modelFactory: models.factory,
    modelName: "test-model",
    rateLimiter: new RateLimiter({ logger: silentLogger }),
    logger: silentLogger,
    newId: () => `id-${++next}`,
  });
  return { service, models, store };
}

function task(overrides: Partial<ChatTaskInput> = {}): ChatTaskInput {
  return ChatTaskInput.parse({ userId: "u1", chatId: "chat-1", text: "Is coffee healthy?", ...overrides });
}

describe("text helpers", () => {
  it("collapses whitespace runs", () => {
    expect(cleanText("  Coffee\n\tcures   colds ")).toBe(" Coffee cures colds ");
  });

  it("spots the workflow phrase anywhere in the message", () => {
    expect(isWorkflowTrigger(`Here is my draft.\n\n${WORKFLOW_TRIGGER}`)).toBe(true);
    expect(isWorkflowTrigger("Please find all medical claims.")).toBe(false);
  });

  it("puts attachments ahead of the cleaned text", () => {
    expect(
      buildPromptParts({
        text: "Read  this",
        attachments: [
          { mimeType: "application/pdf", fileUri: "gs://bucket/report.pdf" },
          { mimeType: "image/png", data: "aGVsbG8=" },
        ],
      })
    ).toEqual([
      { fileData: { mimeType: "application/pdf", fileUri: "gs://bucket/report.pdf" } },
      { inlineData: { mimeType: "image/png", data: "aGVsbG8=" } },
      { text: "Read this" },
    ]);
  });

  it("appends a caller instruction to the role prompt", () => {
    expect(composeSystemInstruction("Role.", "  Be brief. ")).toBe("Role.\n\nBe brief.");
    expect(composeSystemInstruction("Role.", "   ")).toBe("Role.");
    expect(composeSystemInstruction("Role.")).toBe("Role.");
  });
});

describe("ChatService.runTask", () => {
  it("runs the conversation and writes the final progress update", async () => {
    const { service, models, store } = makeService({
      claims_identification: [textResponse("Coffee is fine in moderation.")],
    });

    const out = await service.runTask(task());

    expect(out.outputText).toBe("Coffee is fine in moderation.");
    expect(out.chatId).toBe("chat-1");

    const chat = await store.getChat("u1", "chat-1");
    expect(chat?.status).toBe("completed");
    expect(chat?.lastMessage).toBe("Coffee is fine in moderation.");
    expect(chat?.mode).toBe("descriptive");

    const spec = models.requests[0]?.spec;
    expect(spec?.systemInstruction).toBe("You check medical writing.");
    expect(spec?.tools).toEqual([
      {
        functionDeclarations: [
          { name: IMPRECISE_LANGUAGE_TOOL, description: "Find vague phrases.", parameters: { type: "OBJECT", properties: {} } },
          { name: MEDICAL_CLAIMS_TOOL, description: "Find claims.", parameters: { type: "OBJECT", properties: {} } },
        ],
      },
    ]);
    expect(spec?.toolConfig).toEqual({ functionCallingConfig: { mode: "AUTO" } });
  });

  it("engages the workflow when the message carries the trigger phrase", async () => {
    const { service, models } = makeService({ claims_identification: [textResponse("ok")] });

    await service.runTask(task({ text: `My essay.  ${WORKFLOW_TRIGGER}` }));

    expect(models.requests[0]?.spec.toolConfig).toEqual({
      functionCallingConfig: { mode: "ANY", allowedFunctionNames: [MEDICAL_CLAIMS_TOOL] },
    });
  });

  it("shows tool failures under the answer", async () => {
    const { service, store } = makeService({
      claims_identification: [callResponse({ name: MEDICAL_CLAIMS_TOOL, args: { identified_claims: 3 } })],
      imprecise_language_identification: [textResponse("Summary.")],
    });

    const out = await service.runTask(task());

    expect(out.outputText.startsWith("Summary.\nError when Identifying Medical Claims: invalid arguments")).toBe(true);
    expect((await store.getChat("u1", "chat-1"))?.lastMessage).toBe(out.outputText);
  });

  it("still completes the chat when the history cannot be saved", async () => {
    const { service, store } = makeService(
      { claims_identification: [textResponse("Coffee is fine in moderation.")] },
      testPromptFiles(),
      new FailingHistoryStore()
    );

    const out = await service.runTask(task());

    expect(out.outputText).toBe("Coffee is fine in moderation.");
    const chat = await store.getChat("u1", "chat-1");
    expect(chat?.status).toBe("completed");
    expect(chat?.lastMessage).toBe("Coffee is fine in moderation.");
  });

  it("fails before calling a model when a prompt is not configured", async () => {
    const files = testPromptFiles();
    delete files.verification_prompt;
    const { service, models } = makeService({}, files);

    await expect(service.runTask(task())).rejects.toBeInstanceOf(ConfigurationMissingError);
    expect(models.requests).toHaveLength(0);
  });
});

describe("ChatService.generateTitle", () => {
  it("fills the title prompt and trims the answer", async () => {
    const { service, models } = makeService({ chat_title: [textResponse("  Coffee and Colds \n")] });

    expect(await service.generateTitle("Does coffee\ncure colds?")).toBe("Coffee and Colds");
    expect(models.requests[0]?.request.contents).toEqual([
      { role: "user", parts: [{ text: "Title for: Does coffee cure colds?" }] },
    ]);
    expect(models.requests[0]?.spec.tools).toBeUndefined();
  });

  it("falls back to a default title on an empty answer", async () => {
    const { service } = makeService({ chat_title: [textResponse("   ")] });

    expect(await service.generateTitle("hello")).toBe(DEFAULT_CHAT_TITLE);
  });
});
