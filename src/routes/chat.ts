import { randomUUID } from "node:crypto";

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { ChatRequest, ChatTaskInput, TitleRequest, UserIdHeader } from "../contracts/chat";
import type { ChatService } from "../control-plane/chat_service";
import { ConfigurationMissingError, errorMessage } from "../control-plane/errors";
import type { ConversationStore } from "../store/conversation_store";
import type { TaskDispatcher } from "../tasks/task_dispatcher";

export type ChatRouteOptions = {
  chatService: Pick<ChatService, "runTask" | "generateTitle">;
  store: Pick<ConversationStore, "getChat">;
  dispatcher: TaskDispatcher;
};

const ChatParams = z.object({ chatId: z.string().min(1).max(200) });

// Identity is asserted by the fronting gateway; this service only reads the header.
function resolveUserId(req: FastifyRequest, reply: FastifyReply): string | null {
  const parsed = UserIdHeader.safeParse(req.headers["x-user-id"]);
  if (!parsed.success) {
    void reply.code(401).send({ error: "unauthorized", message: "Missing x-user-id header" });
    return null;
  }
  return parsed.data;
}

export async function chatRoutes(app: FastifyInstance, opts: ChatRouteOptions) {
  const { chatService, store, dispatcher } = opts;

  app.options("/chat", async (_req, reply) => reply.code(204).send());

  app.post("/chat", async (req, reply) => {
    const userId = resolveUserId(req, reply);
    if (!userId) return reply;

    const parsed = ChatRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const body = parsed.data;
    const chatId = body.chatId ?? randomUUID();
    dispatcher.dispatch({
      userId,
      chatId,
      text: body.text,
      styleMode: body.styleMode,
      systemInstruction: body.systemInstruction,
      engageWorkflow: body.engageWorkflow,
      attachments: body.attachments,
    });

    const log = req.log.child({ plane: "chat", chatId, userId });
    log.info(
      { evt: "chat.accepted", styleMode: body.styleMode, textChars: body.text.length },
      "chat.accepted"
    );
    return reply.code(202).send({ status: "processing", chatId });
  });

  // Background entry point; also callable directly for synchronous runs.
  app.post("/chat/task", async (req, reply) => {
    const parsed = ChatTaskInput.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const log = req.log.child({
      plane: "chat",
      chatId: parsed.data.chatId ?? null,
      userId: parsed.data.userId,
    });
    try {
      const { outputText, chatId } = await chatService.runTask(parsed.data);
      return reply.code(200).send({ output_text: outputText, chat_history_id: chatId });
    } catch (error) {
      if (error instanceof ConfigurationMissingError) {
        log.warn({ evt: "chat.task_unconfigured", key: error.key }, "chat.task_unconfigured");
        return reply.code(404).send(error.toJSON());
      }
      throw error;
    }
  });

  app.get("/chats/:chatId", async (req, reply) => {
    const userId = resolveUserId(req, reply);
    if (!userId) return reply;

    const params = ChatParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const chat = await store.getChat(userId, params.data.chatId);
    if (!chat) {
      return reply.code(404).send({ error: "not_found" });
    }
    return { ok: true, chat };
  });

  app.post("/chat/title", async (req, reply) => {
    const userId = resolveUserId(req, reply);
    if (!userId) return reply;

    const parsed = TitleRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    try {
      const title = await chatService.generateTitle(parsed.data.text);
      return { title };
    } catch (error) {
      if (error instanceof ConfigurationMissingError) {
        return reply.code(404).send(error.toJSON());
      }
      req.log
        .child({ plane: "chat", userId })
        .error({ evt: "chat.title_failed", error: errorMessage(error) }, "chat.title_failed");
      return reply.code(500).send({ title: "Error occurred", error: errorMessage(error) });
    }
  });
}
