import { IMPRECISE_LANGUAGE_TOOL, MEDICAL_CLAIMS_TOOL, type ToolName } from "../contracts/tools";
import {
  GOOGLE_SEARCH_TOOL,
  type FunctionDeclaration,
  type GenerativeModel,
  type GenerativeModelFactory,
  type ModelSpec,
  type ToolConfig,
} from "../providers/generative_model";

export type ConversationPhase =
  | "claims_identification"
  | "imprecise_language_identification"
  | "free_form";

export type ModelSet = {
  claims: GenerativeModel;
  impreciseLanguage: GenerativeModel;
  verification: GenerativeModel;
  output: GenerativeModel;
};

export type ModelSetArgs = {
  model: string;
  systemInstruction?: string;
  toolDeclarations: FunctionDeclaration[];
  engageWorkflow: boolean;
};

const CHAT_TEMPERATURE = 0.2;

/** Forced mode pins the phase to its own tool; automatic lets the model choose. */
export function toolConfigFor(tool: ToolName, engageWorkflow: boolean): ToolConfig {
  return engageWorkflow
    ? { functionCallingConfig: { mode: "ANY", allowedFunctionNames: [tool] } }
    : { functionCallingConfig: { mode: "AUTO" } };
}

export function buildModelSpecs(args: ModelSetArgs): Record<keyof ModelSet, ModelSpec> {
  const base = {
    model: args.model,
    systemInstruction: args.systemInstruction || undefined,
    generationConfig: { temperature: CHAT_TEMPERATURE },
  };
  const tools = [{ functionDeclarations: args.toolDeclarations }];

  return {
    claims: {
      ...base,
      label: "claims_identification",
      tools,
      toolConfig: toolConfigFor(MEDICAL_CLAIMS_TOOL, args.engageWorkflow),
    },
    impreciseLanguage: {
      ...base,
      label: "imprecise_language_identification",
      tools,
      toolConfig: toolConfigFor(IMPRECISE_LANGUAGE_TOOL, args.engageWorkflow),
    },
    verification: {
      ...base,
      label: "grounded_verification",
      tools: [GOOGLE_SEARCH_TOOL],
    },
    output: {
      ...base,
      label: "output_response",
    },
  };
}

export function buildModelSet(factory: GenerativeModelFactory, args: ModelSetArgs): ModelSet {
  const specs = buildModelSpecs(args);
  return {
    claims: factory(specs.claims),
    impreciseLanguage: factory(specs.impreciseLanguage),
    verification: factory(specs.verification),
    output: factory(specs.output),
  };
}
