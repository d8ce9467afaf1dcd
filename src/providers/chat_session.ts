import type { Content, GenerateContentResponse, Part } from "../contracts/content";
import type { GenerativeModel } from "./generative_model";

/**
 * Multi-turn chat over a stateless model.
 * History only grows when a call succeeds, so a failed send leaves it untouched.
 */
export class ChatSession {
  private turns: Content[];

  constructor(
    private readonly model: GenerativeModel,
    history: Content[] = []
  ) {
    this.turns = [...history];
  }

  get history(): Content[] {
    return [...this.turns];
  }

  get modelLabel(): string {
    return this.model.spec.label;
  }

  async sendMessage(parts: Part[]): Promise<GenerateContentResponse> {
    const userTurn: Content = { role: "user", parts };
    const response = await this.model.generateContent({
      contents: [...this.turns, userTurn],
    });

    this.turns.push(userTurn);
    const reply = response.candidates[0]?.content;
    if (reply && reply.parts.length > 0) {
      this.turns.push({ role: "model", parts: reply.parts });
    }

    return response;
  }
}

/** Continue an existing conversation on a different model instance. */
export function startChat(model: GenerativeModel, history: Content[] = []): ChatSession {
  return new ChatSession(model, history);
}
