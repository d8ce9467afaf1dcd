import { randomUUID } from "node:crypto";

import type { ChatTaskInput } from "../contracts/chat";
import { responseText, textPart, type Part } from "../contracts/content";
import { createLogger, type Logger } from "../logger";
import type { GenerativeModelFactory } from "../providers/generative_model";
import type { ConversationStore } from "../store/conversation_store";
import type { RateLimiter } from "../verification/rate_limiter";
import { buildModelSpecs } from "./model_set";
import { runOrchestration, renderOutputText, type OrchestrationResult } from "./orchestrator";
import { reportProgress } from "./progress";
import { formatPrompt, PROMPT_KEYS, type PromptCatalog } from "./prompt_catalog";

export const WORKFLOW_TRIGGER =
  "Please find all medical claims and instances of imprecise language. Be thorough and complete.";

export const DEFAULT_CHAT_TITLE = "New chat";

/** Runs of whitespace collapse to a single space. */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ");
}

export function isWorkflowTrigger(text: string): boolean {
  return cleanText(text).includes(WORKFLOW_TRIGGER);
}

export function buildPromptParts(input: Pick<ChatTaskInput, "text" | "attachments">): Part[] {
  const parts: Part[] = input.attachments.map((attachment) =>
    "fileUri" in attachment
      ? { fileData: { mimeType: attachment.mimeType, fileUri: attachment.fileUri } }
      : { inlineData: { mimeType: attachment.mimeType, data: attachment.data } }
  );
  parts.push(textPart(cleanText(input.text)));
  return parts;
}

export function composeSystemInstruction(rolePrompt: string, extra?: string): string {
  const trimmed = extra?.trim();
  return trimmed ? `${rolePrompt}\n\n${trimmed}` : rolePrompt;
}

export type ChatServiceDeps = {
  catalog: PromptCatalog;
  store: ConversationStore;
  modelFactory: GenerativeModelFactory;
  modelName: string;
  rateLimiter: RateLimiter;
  verificationWorkers?: number;
  logger?: Logger;
  newId?: () => string;
};

export type ChatTaskResult = {
  outputText: string;
  chatId: string;
  result: OrchestrationResult;
};

export class ChatService {
  private readonly log: Logger;

  constructor(private readonly deps: ChatServiceDeps) {
    this.log = deps.logger ?? createLogger({ plane: "chat_service" });
  }

  /**
   * One full chat turn: prompts, orchestration, then the final progress write.
   * A missing prompt fails before any model is called.
   */
  async runTask(input: ChatTaskInput): Promise<ChatTaskResult> {
    const prompts = await this.deps.catalog.loadChatPrompts();
    const engageWorkflow = input.engageWorkflow || isWorkflowTrigger(input.text);

    this.log.info(
      {
        userId: input.userId,
        chatId: input.chatId ?? null,
        styleMode: input.styleMode,
        engageWorkflow,
        attachments: input.attachments.length,
      },
      "chat_task.started"
    );

    const result = await runOrchestration(
      {
        userId: input.userId,
        chatId: input.chatId,
        prompt: buildPromptParts(input),
        styleMode: input.styleMode,
        engageWorkflow,
        systemInstruction: composeSystemInstruction(prompts.rolePrompt, input.systemInstruction),
        verificationPrompt: prompts.verificationPrompt,
        toolDeclarations: prompts.toolDeclarations,
      },
      {
        modelFactory: this.deps.modelFactory,
        modelName: this.deps.modelName,
        rateLimiter: this.deps.rateLimiter,
        historyStore: this.deps.store,
        progressSink: this.deps.store,
        verificationWorkers: this.deps.verificationWorkers,
        logger: this.log,
        newId: this.deps.newId ?? randomUUID,
      }
    );

    const outputText = renderOutputText(result);
    await reportProgress(
      this.deps.store,
      this.log,
      { userId: input.userId, chatId: result.chatId },
      {
        styleMode: input.styleMode,
        outputText,
        processedClaims: result.processedClaims,
        processedInstances: result.processedInstances,
        isFinal: true,
      }
    );

    this.log.info(
      { userId: input.userId, chatId: result.chatId, errors: result.errors.length },
      "chat_task.completed"
    );

    return { outputText, chatId: result.chatId, result };
  }

  async generateTitle(text: string): Promise<string> {
    const template = await this.deps.catalog.getPrompt(PROMPT_KEYS.chatTitle);
    const spec = buildModelSpecs({
      model: this.deps.modelName,
      toolDeclarations: [],
      engageWorkflow: false,
    }).output;
    const model = this.deps.modelFactory({ ...spec, label: "chat_title" });

    const response = await model.generateContent({
      contents: [{ role: "user", parts: [textPart(formatPrompt(template, { input_text: cleanText(text) }))] }],
    });
    const title = responseText(response).trim();
    return title || DEFAULT_CHAT_TITLE;
  }
}
