import { isTextPart, type Content, type GenerateContentResponse } from "../contracts/content";
import type { GenerateContentRequest, GenerativeModel, ModelSpec } from "./generative_model";

function lastUserText(contents: Content[]): string {
  for (let i = contents.length - 1; i >= 0; i--) {
    const turn = contents[i];
    if (turn.role !== "user") continue;
    const text = turn.parts.filter(isTextPart).map((part) => part.text).join("\n");
    if (text) return text;
  }
  return "";
}

export function fakeModelReply(input: { userText: string; label: string }): string {
  return `[${input.label}] Stub response: I received ${input.userText.length} chars.`;
}

/**
 * Local-development provider: never calls tools and never grounds.
 * With it the workflow terminates on the first turn.
 */
export class FakeGenerativeModel implements GenerativeModel {
  constructor(readonly spec: ModelSpec) {}

  async generateContent(request: GenerateContentRequest): Promise<GenerateContentResponse> {
    const text = fakeModelReply({
      userText: lastUserText(request.contents),
      label: this.spec.label,
    });
    return {
      candidates: [{ content: { role: "model", parts: [{ text }] }, finishReason: "STOP" }],
    };
  }
}

export function fakeModelFactory() {
  return (spec: ModelSpec): GenerativeModel => new FakeGenerativeModel(spec);
}
