import { randomUUID } from "node:crypto";

import type { ImpreciseLanguageInstance, ProcessedClaim } from "../contracts/claims";
import {
  functionResponsePart,
  isFunctionCallPart,
  isTextPart,
  responseParts,
  type Content,
  type GenerateContentResponse,
  type Part,
} from "../contracts/content";
import { decodeToolCall, type DecodedToolCall, type ToolName, type ToolResponse } from "../contracts/tools";
import { createLogger, type Logger } from "../logger";
import type {
  FunctionDeclaration,
  GenerativeModel,
  GenerativeModelFactory,
} from "../providers/generative_model";
import { startChat, type ChatSession } from "../providers/chat_session";
import type { HistoryStore, ProgressSink } from "../store/conversation_store";
import type { RateLimiter } from "../verification/rate_limiter";
import { DEFAULT_VERIFICATION_WORKERS, VerificationPool } from "../verification/verification_pool";
import { UnresolvedFunctionError, errorMessage } from "./errors";
import { buildModelSet, type ConversationPhase, type ModelSet } from "./model_set";
import { loadHistoryOrEmpty, persistHistory } from "./progress";
import { dispatchToolCall, type ToolContext } from "./tool_dispatch";

export const UNRESOLVED_FUNCTION_TEXT = "Could not resolve appropriate function and determine an answer.";
export const EMPTY_RESPONSE_TEXT = "No response was generated. Please try again.";
export const APOLOGY_PREFIX = "Please try again. An unexpected error occurred.";

export type OrchestrationError =
  | { kind: "tool_execution"; tool: ToolName; message: string }
  | { kind: "unresolved_function"; name: string; message: string }
  | { kind: "generation_failed"; message: string };

export type ConversationSession = {
  id: string;
  turns: Content[];
  phase: ConversationPhase;
  roundIndex: number;
};

export type OrchestrationRequest = {
  userId: string;
  chatId?: string;
  prompt: Part[];
  styleMode: string;
  engageWorkflow: boolean;
  systemInstruction?: string;
  verificationPrompt: string;
  toolDeclarations: FunctionDeclaration[];
  saveSessionHistory?: boolean;
};

export type OrchestrationDeps = {
  modelFactory: GenerativeModelFactory;
  modelName: string;
  rateLimiter: RateLimiter;
  historyStore: HistoryStore;
  progressSink: ProgressSink;
  verificationWorkers?: number;
  logger?: Logger;
  newId?: () => string;
};

export type OrchestrationResult = {
  outputText: string;
  chatId: string;
  processedClaims: ProcessedClaim[] | null;
  processedInstances: ImpreciseLanguageInstance[] | null;
  errors: OrchestrationError[];
  session: ConversationSession;
};

type RoundOutcome =
  | { terminal: true; outputText: string }
  | { terminal: false; toolResponses: ToolResponse[] };

type LoopState = {
  phase: ConversationPhase;
  roundIndex: number;
  processedClaims: ProcessedClaim[] | null;
  processedInstances: ImpreciseLanguageInstance[] | null;
  errors: OrchestrationError[];
};

function appendById<T extends { id: string }>(existing: T[] | null, incoming: T[]): T[] {
  const merged = new Map((existing ?? []).map((item) => [item.id, item] as const));
  for (const item of incoming) merged.set(item.id, item);
  return [...merged.values()];
}

/**
 * Which model answers the next tool-response round. The first round hands over to
 * imprecise-language identification; every later one goes to the tool-free output model.
 */
export function nextPhase(roundIndex: number): Exclude<ConversationPhase, "claims_identification"> {
  return roundIndex === 0 ? "imprecise_language_identification" : "free_form";
}

function modelForPhase(models: ModelSet, phase: ConversationPhase): GenerativeModel {
  switch (phase) {
    case "claims_identification":
      return models.claims;
    case "imprecise_language_identification":
      return models.impreciseLanguage;
    case "free_form":
      return models.output;
  }
}

/** Parts are handled in order; the first non-call part ends the conversation. */
async function runRound(
  response: GenerateContentResponse,
  state: LoopState,
  toolContext: ToolContext,
  log: Logger
): Promise<RoundOutcome> {
  const parts = responseParts(response);
  if (parts.length === 0) {
    log.warn({ phase: state.phase, roundIndex: state.roundIndex }, "orchestrator.empty_response");
    return { terminal: true, outputText: EMPTY_RESPONSE_TEXT };
  }

  const toolResponses: ToolResponse[] = [];
  for (const part of parts) {
    if (!isFunctionCallPart(part)) {
      return { terminal: true, outputText: isTextPart(part) ? part.text : "" };
    }

    // The output model carries no tools, so any call it makes has nowhere to go.
    const decoded: DecodedToolCall =
      state.phase === "free_form"
        ? { kind: "unresolved", name: part.functionCall.name }
        : decodeToolCall(part.functionCall);

    if (decoded.kind === "unresolved") {
      const error = new UnresolvedFunctionError(decoded.name);
      state.errors.push({ kind: "unresolved_function", name: decoded.name, message: error.message });
      log.warn(
        { phase: state.phase, roundIndex: state.roundIndex, functionName: decoded.name },
        "orchestrator.unresolved_function"
      );
      return { terminal: true, outputText: UNRESOLVED_FUNCTION_TEXT };
    }

    const outcome = await dispatchToolCall(decoded, toolContext);
    toolResponses.push(outcome.toolResponse);
    if (outcome.error) {
      state.errors.push({
        kind: "tool_execution",
        tool: outcome.toolResponse.name,
        message: outcome.error.message,
      });
    }
    if (outcome.processedClaims) {
      state.processedClaims = appendById(state.processedClaims, outcome.processedClaims);
    }
    if (outcome.processedInstances) {
      state.processedInstances = appendById(state.processedInstances, outcome.processedInstances);
    }
  }
  return { terminal: false, toolResponses };
}

/**
 * Drive one user message through the tool-calling loop until a model answers with text.
 *
 * Tool failures are collected in `errors` and never end the loop. Transport failures end it
 * with an apology as the output text. History is persisted either way when requested; a
 * store failure on load or save is logged and does not fail the run.
 */
export async function runOrchestration(
  request: OrchestrationRequest,
  deps: OrchestrationDeps
): Promise<OrchestrationResult> {
  const newId = deps.newId ?? randomUUID;
  const chatId = request.chatId ?? newId();
  const log = deps.logger ?? createLogger({ plane: "orchestrator", chatId });

  const target = { userId: request.userId, chatId };
  const history = request.chatId ? await loadHistoryOrEmpty(deps.historyStore, log, target) : [];

  const models = buildModelSet(deps.modelFactory, {
    model: deps.modelName,
    systemInstruction: request.systemInstruction,
    toolDeclarations: request.toolDeclarations,
    engageWorkflow: request.engageWorkflow,
  });

  const toolContext: ToolContext = {
    userId: request.userId,
    chatId,
    styleMode: request.styleMode,
    engageWorkflow: request.engageWorkflow,
    verificationPrompt: request.verificationPrompt,
    verificationPool: new VerificationPool({
      model: models.verification,
      rateLimiter: deps.rateLimiter,
      logger: log,
    }),
    verificationWorkers: deps.verificationWorkers ?? DEFAULT_VERIFICATION_WORKERS,
    progressSink: deps.progressSink,
    log,
    newId,
  };

  const state: LoopState = {
    phase: "claims_identification",
    roundIndex: 0,
    processedClaims: null,
    processedInstances: null,
    errors: [],
  };
  let session: ChatSession = startChat(modelForPhase(models, state.phase), history);
  let outputText = "";

  try {
    let response = await session.sendMessage(request.prompt);

    for (;;) {
      const outcome = await runRound(response, state, toolContext, log);
      if (outcome.terminal) {
        outputText = outcome.outputText;
        break;
      }

      state.phase = nextPhase(state.roundIndex);
      session = startChat(modelForPhase(models, state.phase), session.history);
      log.info(
        {
          roundIndex: state.roundIndex,
          toolResponses: outcome.toolResponses.length,
          nextModel: session.modelLabel,
        },
        "orchestrator.round_completed"
      );
      state.roundIndex += 1;

      response = await session.sendMessage(
        outcome.toolResponses.map((toolResponse) =>
          functionResponsePart(toolResponse.name, toolResponse.response)
        )
      );
    }
  } catch (error) {
    const message = errorMessage(error);
    state.errors.push({ kind: "generation_failed", message });
    log.error({ phase: state.phase, roundIndex: state.roundIndex, error: message }, "orchestrator.generation_failed");
    outputText = `${APOLOGY_PREFIX} ${message}`;
  }

  const turns = session.history;
  if (request.saveSessionHistory ?? true) {
    await persistHistory(deps.historyStore, log, target, turns);
  }

  log.info(
    {
      phase: state.phase,
      roundIndex: state.roundIndex,
      turns: turns.length,
      claims: state.processedClaims?.length ?? 0,
      instances: state.processedInstances?.length ?? 0,
      errors: state.errors.length,
    },
    "orchestrator.completed"
  );

  return {
    outputText,
    chatId,
    processedClaims: state.processedClaims,
    processedInstances: state.processedInstances,
    errors: state.errors,
    session: { id: chatId, turns, phase: state.phase, roundIndex: state.roundIndex },
  };
}

/** Tool failures are shown to the user after the model's answer, one per line. */
export function renderOutputText(result: Pick<OrchestrationResult, "outputText" | "errors">): string {
  const toolErrors = result.errors.flatMap((error) =>
    error.kind === "tool_execution" ? [`\n${error.message}`] : []
  );
  return result.outputText + toolErrors.join("");
}
