import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";

import { chatRoutes, type ChatRouteOptions } from "./chat";
import type { ChatTaskInput } from "../contracts/chat";
import { ConfigurationMissingError } from "../control-plane/errors";
import { MemoryConversationStore } from "../store/conversation_store";
import type { TaskDispatcher } from "../tasks/task_dispatcher";

class RecordingDispatcher implements TaskDispatcher {
  readonly tasks: ChatTaskInput[] = [];
  dispatch(task: ChatTaskInput): void {
    this.tasks.push(task);
  }
}

function makeApp(overrides: Partial<ChatRouteOptions["chatService"]> = {}) {
  const app = Fastify({ logger: false });
  const store = new MemoryConversationStore();
  const dispatcher = new RecordingDispatcher();
  const chatService: ChatRouteOptions["chatService"] = {
    runTask: vi.fn(async (input: ChatTaskInput) => ({
      outputText: `answered: ${input.text}`,
      chatId: input.chatId ?? "generated",
      result: {
        outputText: `answered: ${input.text}`,
        chatId: input.chatId ?? "generated",
        processedClaims: null,
        processedInstances: null,
        errors: [],
        session: { id: input.chatId ?? "generated", turns: [], phase: "claims_identification" as const, roundIndex: 0 },
      },
    })),
    generateTitle: vi.fn(async () => "Coffee and Colds"),
    ...overrides,
  };
  app.register(chatRoutes, { prefix: "/v1", chatService, store, dispatcher });
  return { app, store, dispatcher, chatService };
}

describe("/v1/chat", () => {
  let ctx: ReturnType<typeof makeApp>;
  let app: FastifyInstance;

  beforeEach(async () => {
    ctx = makeApp();
    app = ctx.app;
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("requires the user header", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/chat", payload: { text: "hello" } });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "unauthorized", message: "Missing x-user-id header" });
    expect(ctx.dispatcher.tasks).toHaveLength(0);
  });

  it("rejects a request without text", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: { "x-user-id": "u1" },
      payload: { chatId: "c1" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("accepts the message and hands it to the background task", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: { "x-user-id": "u1" },
      payload: { text: "Is coffee healthy?", chat_id: "c1", style_mode: "concise", chatId: "ignored" },
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: "processing", chatId: "c1" });
    expect(ctx.dispatcher.tasks).toEqual([
      {
        userId: "u1",
        chatId: "c1",
        text: "Is coffee healthy?",
        styleMode: "concise",
        systemInstruction: undefined,
        engageWorkflow: false,
        attachments: [],
      },
    ]);
  });

  it("assigns a chat id when the client sends none", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      headers: { "x-user-id": "u1" },
      payload: { text: "hello" },
    });

    const body = res.json();
    expect(res.statusCode).toBe(202);
    expect(typeof body.chatId).toBe("string");
    expect(ctx.dispatcher.tasks[0]?.chatId).toBe(body.chatId);
    expect(ctx.dispatcher.tasks[0]?.styleMode).toBe("descriptive");
  });
});

describe("/v1/chat/task", () => {
  it("runs the task and returns the answer", async () => {
    const { app } = makeApp();

    const res = await app.inject({
      method: "POST",
      url: "/v1/chat/task",
      payload: { userId: "u1", chatId: "c1", text: "hello" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ output_text: "answered: hello", chat_history_id: "c1" });
    await app.close();
  });

  it("answers 404 when a prompt is not configured", async () => {
    const { app } = makeApp({
      runTask: vi.fn(async () => {
        throw new ConfigurationMissingError("Prompts", "role_prompt");
      }),
    });

    const res = await app.inject({
      method: "POST",
      url: "/v1/chat/task",
      payload: { userId: "u1", text: "hello" },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: "configuration_missing",
      message: "Configuration not found for role_prompt",
      group: "Prompts",
      key: "role_prompt",
    });
    await app.close();
  });
});

describe("/v1/chats/:chatId", () => {
  it("returns the stored progress for the caller only", async () => {
    const { app, store } = makeApp();
    await store.updateProgress("u1", "c1", { styleMode: "descriptive", outputText: "Done.", isFinal: true });

    const mine = await app.inject({ method: "GET", url: "/v1/chats/c1", headers: { "x-user-id": "u1" } });
    expect(mine.statusCode).toBe(200);
    expect(mine.json().chat).toMatchObject({ chatId: "c1", status: "completed", lastMessage: "Done." });

    const theirs = await app.inject({ method: "GET", url: "/v1/chats/c1", headers: { "x-user-id": "u2" } });
    expect(theirs.statusCode).toBe(404);
    await app.close();
  });
});

describe("/v1/chat/title", () => {
  it("returns the generated title", async () => {
    const { app, chatService } = makeApp();

    const res = await app.inject({
      method: "POST",
      url: "/v1/chat/title",
      headers: { "x-user-id": "u1" },
      payload: { text: "Does coffee cure colds?" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ title: "Coffee and Colds" });
    expect(chatService.generateTitle).toHaveBeenCalledWith("Does coffee cure colds?");
    await app.close();
  });

  it("reports a model failure with a placeholder title", async () => {
    const { app } = makeApp({
      generateTitle: vi.fn(async () => {
        throw new Error("model unavailable");
      }),
    });

    const res = await app.inject({
      method: "POST",
      url: "/v1/chat/title",
      headers: { "x-user-id": "u1" },
      payload: { text: "hello" },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ title: "Error occurred", error: "model unavailable" });
    await app.close();
  });
});
