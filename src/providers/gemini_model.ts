import { GenerateContentResponse } from "../contracts/content";
import type { Logger } from "../logger";
import type {
  GenerateContentRequest,
  GenerativeModel,
  ModelSpec,
} from "./generative_model";

export class GeminiProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorStatus?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorStatus?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "GeminiProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorStatus = args.errorStatus;
    this.retryAfterMs = args.retryAfterMs;
  }
}

const HARM_CATEGORIES = [
  "HARM_CATEGORY_HATE_SPEECH",
  "HARM_CATEGORY_DANGEROUS_CONTENT",
  "HARM_CATEGORY_SEXUALLY_EXPLICIT",
  "HARM_CATEGORY_HARASSMENT",
] as const;

const SAFETY_SETTINGS = HARM_CATEGORIES.map((category) => ({
  category,
  threshold: "BLOCK_NONE",
}));

export type GeminiModelOptions = {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  logger?: Partial<Logger>;
};

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - Date.now());
  }
  return undefined;
}

function readErrorBody(text: string): { status?: string; message?: string } {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "error" in parsed) {
      const error = parsed.error;
      if (error && typeof error === "object") {
        return {
          status: "status" in error && typeof error.status === "string" ? error.status : undefined,
          message: "message" in error && typeof error.message === "string" ? error.message : undefined,
        };
      }
    }
  } catch {
    // Non-JSON error bodies are reported verbatim.
  }
  return {};
}

export function buildGenerateContentBody(spec: ModelSpec, request: GenerateContentRequest) {
  const generationConfig = { ...spec.generationConfig, ...request.generationConfig };
  return {
    contents: request.contents,
    ...(spec.systemInstruction
      ? { systemInstruction: { parts: [{ text: spec.systemInstruction }] } }
      : {}),
    ...(spec.tools && spec.tools.length > 0 ? { tools: spec.tools } : {}),
    ...(spec.toolConfig ? { toolConfig: spec.toolConfig } : {}),
    ...(Object.keys(generationConfig).length > 0 ? { generationConfig } : {}),
    safetySettings: SAFETY_SETTINGS,
  };
}

export class GeminiModel implements GenerativeModel {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(
    readonly spec: ModelSpec,
    private readonly options: GeminiModelOptions
  ) {
    this.baseUrl = options.baseUrl ?? "https://generativelanguage.googleapis.com/v1beta";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generateContent(request: GenerateContentRequest): Promise<GenerateContentResponse> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.spec.model)}:generateContent`;
    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-goog-api-key": this.options.apiKey,
      },
      body: JSON.stringify(buildGenerateContentBody(this.spec, request)),
    });

    if (!res.ok) {
      const text = await res.text();
      const body = readErrorBody(text);
      const bodySnippet = (body.message ?? text).slice(0, 500);
      const statusCode = res.status;
      const retryable = statusCode === 429 || statusCode >= 500;
      this.options.logger?.error?.(
        { statusCode, model: this.spec.model, label: this.spec.label, errorStatus: body.status, bodySnippet },
        "gemini.request_failed"
      );
      throw new GeminiProviderError(`Gemini error ${statusCode}: ${bodySnippet}`, {
        statusCode,
        retryable,
        errorStatus: body.status,
        retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
      });
    }

    const data: unknown = await res.json();
    const parsed = GenerateContentResponse.safeParse(data);
    if (!parsed.success) {
      this.options.logger?.error?.(
        { model: this.spec.model, label: this.spec.label, issues: parsed.error.issues.slice(0, 5) },
        "gemini.response_invalid"
      );
      throw new GeminiProviderError("Gemini response did not match the expected shape", {
        statusCode: 502,
        retryable: true,
      });
    }

    this.options.logger?.debug?.(
      {
        model: this.spec.model,
        label: this.spec.label,
        candidates: parsed.data.candidates.length,
        totalTokens: parsed.data.usageMetadata?.totalTokenCount,
      },
      "gemini.response"
    );

    return parsed.data;
  }
}

export function geminiModelFactory(options: GeminiModelOptions) {
  return (spec: ModelSpec): GenerativeModel => new GeminiModel(spec, options);
}
