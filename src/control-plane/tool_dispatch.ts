import { randomUUID } from "node:crypto";

import { structureClaimsAnalysis } from "../claims/structure_claims";
import {
  isClaimAnalysis,
  type ImpreciseLanguageInstance,
  type ProcessedClaim,
} from "../contracts/claims";
import {
  IMPRECISE_LANGUAGE_TOOL,
  MEDICAL_CLAIMS_TOOL,
  type DecodedToolCall,
  type ToolArgs,
  type ToolName,
  type ToolResponse,
  type ToolSuccessPayload,
} from "../contracts/tools";
import type { Logger } from "../logger";
import type { ProgressSink } from "../store/conversation_store";
import type { VerificationPool } from "../verification/verification_pool";
import { ToolExecutionError, errorMessage } from "./errors";
import { reportProgress } from "./progress";
import { formatPrompt } from "./prompt_catalog";

export type ToolContext = {
  userId: string;
  chatId: string;
  styleMode: string;
  engageWorkflow: boolean;
  verificationPrompt: string;
  verificationPool: VerificationPool;
  verificationWorkers: number;
  progressSink: ProgressSink;
  log: Logger;
  newId?: () => string;
};

type HandlerResult = {
  payload: ToolSuccessPayload;
  processedClaims?: ProcessedClaim[];
  processedInstances?: ImpreciseLanguageInstance[];
};

type ToolHandler<K extends ToolName> = (args: ToolArgs[K], ctx: ToolContext) => Promise<HandlerResult>;

export type DispatchOutcome = {
  toolResponse: ToolResponse;
  processedClaims?: ProcessedClaim[];
  processedInstances?: ImpreciseLanguageInstance[];
  error?: ToolExecutionError;
};

export const PROCEED_INSTRUCTION = "Proceed";

const ENGAGED_NEXT_STEPS: Record<ToolName, string> = {
  [MEDICAL_CLAIMS_TOOL]: "Now perform imprecise language identification analysis.",
  [IMPRECISE_LANGUAGE_TOOL]:
    "Respond that the input text has been processed and summarize the findings. " +
    "Ask if the user needs help understanding the findings or would like to know more " +
    "about any finding in particular.",
};

const FAILURE_COPY: Record<ToolName, { label: string; instructions: string }> = {
  [MEDICAL_CLAIMS_TOOL]: {
    label: "Identifying Medical Claims",
    instructions: "Error occurred while identifying medical claims. Please try again.",
  },
  [IMPRECISE_LANGUAGE_TOOL]: {
    label: "Identifying Imprecise Language",
    instructions: "Error occurred while identifying imprecise language. Please try again.",
  },
};

export function nextStepsInstruction(tool: ToolName, engageWorkflow: boolean): string {
  return engageWorkflow ? ENGAGED_NEXT_STEPS[tool] : PROCEED_INSTRUCTION;
}

const identifyMedicalClaims: ToolHandler<typeof MEDICAL_CLAIMS_TOOL> = async (args, ctx) => {
  const newId = ctx.newId ?? randomUUID;
  const claims = args.identified_claims;
  const prompts = claims.map((entry) =>
    formatPrompt(ctx.verificationPrompt, { input_claim: entry.claim })
  );

  const results = await ctx.verificationPool.generateTexts(prompts, ctx.verificationWorkers);

  // A failed verification leaves a hole; the claim is still reported, just without analysis.
  const processedClaims: ProcessedClaim[] = claims.map((entry, index) => {
    const result = results[index];
    const analysis = result ? structureClaimsAnalysis(result) : {};
    return isClaimAnalysis(analysis)
      ? { ...entry, ...analysis, id: newId() }
      : { ...entry, id: newId() };
  });

  ctx.log.info(
    {
      claims: claims.length,
      analysed: processedClaims.filter((claim) => claim.claim_analysis !== undefined).length,
      failed: results.filter((result) => result === null).length,
    },
    "tool.claims_verified"
  );

  await reportProgress(ctx.progressSink, ctx.log, ctx, {
    styleMode: ctx.styleMode,
    processedClaims,
  });

  return {
    payload: {
      content: "Processed all claims and generated analysis.",
      processed_claims: processedClaims,
      next_steps_instruction: nextStepsInstruction(MEDICAL_CLAIMS_TOOL, ctx.engageWorkflow),
    },
    processedClaims,
  };
};

const identifyImpreciseLanguage: ToolHandler<typeof IMPRECISE_LANGUAGE_TOOL> = async (args, ctx) => {
  const newId = ctx.newId ?? randomUUID;
  const processedInstances: ImpreciseLanguageInstance[] = args.identified_instances.map(
    (instance) => ({ ...instance, id: newId() })
  );

  ctx.log.info({ instances: processedInstances.length }, "tool.imprecise_language_identified");

  await reportProgress(ctx.progressSink, ctx.log, ctx, {
    styleMode: ctx.styleMode,
    processedInstances,
  });

  return {
    payload: {
      content: "Processed all imprecise language identified.",
      processed_imprecise_language_instances: processedInstances,
      next_steps_instruction: nextStepsInstruction(IMPRECISE_LANGUAGE_TOOL, ctx.engageWorkflow),
    },
    processedInstances,
  };
};

/** Adding a tool name without a handler here is a compile error. */
const TOOL_HANDLERS: { [K in ToolName]: ToolHandler<K> } = {
  [MEDICAL_CLAIMS_TOOL]: identifyMedicalClaims,
  [IMPRECISE_LANGUAGE_TOOL]: identifyImpreciseLanguage,
};

function runHandler<K extends ToolName>(
  call: { name: K; args: ToolArgs[K] },
  ctx: ToolContext
): Promise<HandlerResult> {
  const handler: ToolHandler<K> = TOOL_HANDLERS[call.name];
  return handler(call.args, ctx);
}

function failureResponse(name: ToolName, error: ToolExecutionError): ToolResponse {
  return {
    name,
    response: {
      error: error.message,
      instructions: FAILURE_COPY[name].instructions,
    },
  };
}

/**
 * Run one decoded call. Failures come back as an error-shaped response so sibling calls
 * in the same round still run.
 */
export async function dispatchToolCall(
  decoded: Exclude<DecodedToolCall, { kind: "unresolved" }>,
  ctx: ToolContext
): Promise<DispatchOutcome> {
  const name = decoded.kind === "call" ? decoded.call.name : decoded.name;
  const label = FAILURE_COPY[name].label;
  ctx.log.info({ tool: name }, "tool.call");

  try {
    if (decoded.kind === "invalid_args") {
      throw new Error(`invalid arguments (${decoded.issues})`);
    }
    const result = await runHandler(decoded.call, ctx);
    return {
      toolResponse: { name, response: result.payload },
      processedClaims: result.processedClaims,
      processedInstances: result.processedInstances,
    };
  } catch (cause) {
    const error = new ToolExecutionError(name, `Error when ${label}: ${errorMessage(cause)}`, { cause });
    ctx.log.error({ tool: name, error: error.message }, "tool.call_failed");
    return { toolResponse: failureResponse(name, error), error };
  }
}
