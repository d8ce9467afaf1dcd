import type { Content, GenerateContentResponse } from "../contracts/content";

export type FunctionDeclaration = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ModelTool =
  | { functionDeclarations: FunctionDeclaration[] }
  | { googleSearch: Record<string, never> };

export type FunctionCallingMode = "ANY" | "AUTO" | "NONE";

export type ToolConfig = {
  functionCallingConfig: {
    mode: FunctionCallingMode;
    allowedFunctionNames?: string[];
  };
};

export type GenerationConfig = {
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  topK?: number;
};

/** Everything that distinguishes one model instance from another. */
export type ModelSpec = {
  label: string;
  model: string;
  systemInstruction?: string;
  tools?: ModelTool[];
  toolConfig?: ToolConfig;
  generationConfig?: GenerationConfig;
};

export type GenerateContentRequest = {
  contents: Content[];
  // Per-call override, merged over the instance's generation config.
  generationConfig?: GenerationConfig;
};

export interface GenerativeModel {
  readonly spec: ModelSpec;
  generateContent(request: GenerateContentRequest): Promise<GenerateContentResponse>;
}

export type GenerativeModelFactory = (spec: ModelSpec) => GenerativeModel;

export const GOOGLE_SEARCH_TOOL: ModelTool = { googleSearch: {} };
