import { IMPRECISE_LANGUAGE_TOOL, MEDICAL_CLAIMS_TOOL, type ToolName } from "../contracts/tools";
import type { FunctionDeclaration } from "../providers/generative_model";
import type { PromptConfigSource } from "../remote-config/prompt_source";
import { ConfigurationMissingError } from "./errors";

export const PROMPTS_GROUP = "Prompts";

export const PROMPT_KEYS = {
  rolePrompt: "role_prompt",
  verificationPrompt: "verification_prompt",
  chatTitle: "generate_chat_title",
} as const;

const TOOL_DECLARATION_KEYS: Record<ToolName, { description: string; parameters: string }> = {
  [MEDICAL_CLAIMS_TOOL]: {
    description: "identify_medical_claims_multi_function_description",
    parameters: "identify_medical_claims_multi_function_parameters",
  },
  [IMPRECISE_LANGUAGE_TOOL]: {
    description: "identify_imprecise_language_multi_function_description",
    parameters: "identify_imprecise_language_multi_function_parameters",
  },
};

export type ChatPrompts = {
  rolePrompt: string;
  verificationPrompt: string;
  toolDeclarations: FunctionDeclaration[];
};

export class InvalidToolSchemaError extends Error {
  constructor(key: string, detail: string) {
    super(`Invalid tool parameters for ${key}: ${detail}`);
    this.name = "InvalidToolSchemaError";
  }
}

/**
 * Fills `{name}` placeholders; `{{` and `}}` are literal braces.
 * Unknown placeholders are left as written.
 */
export function formatPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{|\}\}|\{(\w+)\}/g, (match: string, name: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    return name !== undefined && name in vars ? vars[name] : match;
  });
}

export class PromptCatalog {
  constructor(private readonly source: PromptConfigSource) {}

  async getPrompt(key: string): Promise<string> {
    const entry = await this.source.get(PROMPTS_GROUP, key);
    if (!entry) {
      throw new ConfigurationMissingError(PROMPTS_GROUP, key);
    }
    return this.source.fetchText(entry.fileName);
  }

  async createFunctionDeclaration(name: ToolName): Promise<FunctionDeclaration> {
    const keys = TOOL_DECLARATION_KEYS[name];
    const description = await this.getPrompt(keys.description);
    const rawParameters = await this.getPrompt(keys.parameters);

    let parameters: unknown;
    try {
      parameters = JSON.parse(rawParameters);
    } catch (error) {
      throw new InvalidToolSchemaError(keys.parameters, String(error));
    }
    if (!parameters || typeof parameters !== "object" || Array.isArray(parameters)) {
      throw new InvalidToolSchemaError(keys.parameters, "expected a JSON object");
    }

    return { name, description: description.trim(), parameters: { ...parameters } };
  }

  async loadChatPrompts(): Promise<ChatPrompts> {
    const rolePrompt = await this.getPrompt(PROMPT_KEYS.rolePrompt);
    const verificationPrompt = await this.getPrompt(PROMPT_KEYS.verificationPrompt);
    const toolDeclarations = [
      await this.createFunctionDeclaration(IMPRECISE_LANGUAGE_TOOL),
      await this.createFunctionDeclaration(MEDICAL_CLAIMS_TOOL),
    ];
    return { rolePrompt, verificationPrompt, toolDeclarations };
  }
}
