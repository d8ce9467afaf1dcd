import type {
  FunctionCall,
  GenerateContentResponse,
  GroundingChunk,
  GroundingSupport,
} from "../../src/contracts/content";
import type {
  GenerateContentRequest,
  GenerativeModel,
  GenerativeModelFactory,
  ModelSpec,
} from "../../src/providers/generative_model";

export type ScriptStep = GenerateContentResponse | Error;
export type Responder = (request: GenerateContentRequest) => ScriptStep;

export type RecordedRequest = {
  label: string;
  spec: ModelSpec;
  request: GenerateContentRequest;
};

export function textResponse(text: string): GenerateContentResponse {
  return { candidates: [{ content: { role: "model", parts: [{ text }] } }] };
}

export function callResponse(...calls: Array<{ name: string; args?: Record<string, unknown> }>): GenerateContentResponse {
  const parts = calls.map((call): { functionCall: FunctionCall } => ({
    functionCall: { name: call.name, args: call.args ?? {} },
  }));
  return { candidates: [{ content: { role: "model", parts } }] };
}

export function groundedResponse(
  text: string,
  supports: GroundingSupport[],
  chunks: GroundingChunk[]
): GenerateContentResponse {
  return {
    candidates: [
      {
        content: { role: "model", parts: [{ text }] },
        groundingMetadata: { groundingSupports: supports, groundingChunks: chunks },
      },
    ],
  };
}

/**
 * Model factory whose instances answer from per-label scripts. A queue is consumed in
 * order; a responder answers every request for its label.
 */
export class ScriptedModels {
  readonly requests: RecordedRequest[] = [];
  private readonly queues = new Map<string, ScriptStep[]>();
  private readonly responders = new Map<string, Responder>();

  constructor(script: Record<string, ScriptStep[] | Responder>) {
    for (const [label, entry] of Object.entries(script)) {
      if (typeof entry === "function") {
        this.responders.set(label, entry);
      } else {
        this.queues.set(label, [...entry]);
      }
    }
  }

  readonly factory: GenerativeModelFactory = (spec: ModelSpec): GenerativeModel => ({
    spec,
    generateContent: async (request) => {
      this.requests.push({ label: spec.label, spec, request });
      const responder = this.responders.get(spec.label);
      const step = responder ? responder(request) : this.queues.get(spec.label)?.shift();
      if (!step) {
        throw new Error(`no scripted response left for ${spec.label}`);
      }
      if (step instanceof Error) throw step;
      return step;
    },
  });

  labels(): string[] {
    return this.requests.map((entry) => entry.label);
  }
}

export const silentLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
