import { z } from "zod";

import type { FunctionCall } from "./content";
import {
  IdentifiedClaim,
  IdentifiedInstance,
  type ImpreciseLanguageInstance,
  type ProcessedClaim,
} from "./claims";

export const MEDICAL_CLAIMS_TOOL = "medical_claims_identification";
export const IMPRECISE_LANGUAGE_TOOL = "imprecise_language_identification";

export const ToolName = z.enum([MEDICAL_CLAIMS_TOOL, IMPRECISE_LANGUAGE_TOOL]);

export type ToolName = z.infer<typeof ToolName>;

export const MedicalClaimsArgs = z.object({
  identified_claims: z.array(IdentifiedClaim).default([]),
});

export type MedicalClaimsArgs = z.infer<typeof MedicalClaimsArgs>;

export const ImpreciseLanguageArgs = z.object({
  identified_instances: z.array(IdentifiedInstance).default([]),
});

export type ImpreciseLanguageArgs = z.infer<typeof ImpreciseLanguageArgs>;

export type ToolArgs = {
  [MEDICAL_CLAIMS_TOOL]: MedicalClaimsArgs;
  [IMPRECISE_LANGUAGE_TOOL]: ImpreciseLanguageArgs;
};

/** A model-emitted call whose name and arguments have both been validated. */
export type ToolCall = {
  [K in ToolName]: { name: K; args: ToolArgs[K] };
}[ToolName];

export type DecodedToolCall =
  | { kind: "call"; call: ToolCall }
  | { kind: "invalid_args"; name: ToolName; issues: string }
  | { kind: "unresolved"; name: string };

export type ToolSuccessPayload = {
  content: string;
  next_steps_instruction: string;
  processed_claims?: ProcessedClaim[];
  processed_imprecise_language_instances?: ImpreciseLanguageInstance[];
};

export type ToolErrorPayload = {
  error: string;
  instructions: string;
};

export type ToolResponse = {
  name: ToolName;
  response: ToolSuccessPayload | ToolErrorPayload;
};

function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Decode a raw function call at the dispatch boundary.
 * Handlers only ever see validated arguments.
 */
export function decodeToolCall(functionCall: FunctionCall): DecodedToolCall {
  const name = ToolName.safeParse(functionCall.name);
  if (!name.success) {
    return { kind: "unresolved", name: functionCall.name };
  }

  switch (name.data) {
    case MEDICAL_CLAIMS_TOOL: {
      const args = MedicalClaimsArgs.safeParse(functionCall.args);
      return args.success
        ? { kind: "call", call: { name: name.data, args: args.data } }
        : { kind: "invalid_args", name: name.data, issues: summarizeIssues(args.error) };
    }
    case IMPRECISE_LANGUAGE_TOOL: {
      const args = ImpreciseLanguageArgs.safeParse(functionCall.args);
      return args.success
        ? { kind: "call", call: { name: name.data, args: args.data } }
        : { kind: "invalid_args", name: name.data, issues: summarizeIssues(args.error) };
    }
    default: {
      const unreachable: never = name.data;
      return { kind: "unresolved", name: String(unreachable) };
    }
  }
}
