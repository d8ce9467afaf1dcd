import Fastify from "fastify";
import cors from "@fastify/cors";

import { ChatService } from "./control-plane/chat_service";
import { PromptCatalog } from "./control-plane/prompt_catalog";
import { createLogger, pinoOptions } from "./logger";
import { fakeModelFactory } from "./providers/fake_model";
import { geminiModelFactory } from "./providers/gemini_model";
import type { GenerativeModelFactory } from "./providers/generative_model";
import { loadServiceConfig, type ServiceConfig } from "./providers/provider_config";
import { FilePromptSource } from "./remote-config/prompt_source";
import { chatRoutes } from "./routes/chat";
import { healthRoutes } from "./routes/healthz";
import { SqliteConversationStore } from "./store/sqlite_conversation_store";
import { InProcessTaskDispatcher } from "./tasks/task_dispatcher";
import { RateLimiter } from "./verification/rate_limiter";

const app = Fastify({ logger: pinoOptions() });

function selectModelFactory(config: ServiceConfig): GenerativeModelFactory {
  const log = createLogger({ plane: "provider", provider: config.provider });
  if (config.provider === "gemini" && config.gemini.apiKey) {
    return geminiModelFactory({
      apiKey: config.gemini.apiKey,
      baseUrl: config.gemini.baseUrl,
      logger: log,
    });
  }
  log.warn({ model: config.gemini.model }, "provider.fake_selected");
  return fakeModelFactory();
}

async function main() {
  const config = loadServiceConfig();

  const store = new SqliteConversationStore(config.conversationDbPath, createLogger({ plane: "store" }));
  const catalog = new PromptCatalog(
    new FilePromptSource({
      configPath: config.prompts.configPath,
      promptsDir: config.prompts.promptsDir,
      ttlMs: config.prompts.ttlMs,
      logger: createLogger({ plane: "remote_config" }),
    })
  );
  // One limiter for the process so concurrent chats share the verification budget.
  const rateLimiter = new RateLimiter({
    maxCallsPerWindow: config.verification.maxCallsPerWindow,
    windowMs: config.verification.windowMs,
    logger: createLogger({ plane: "verification" }),
  });

  const chatService = new ChatService({
    catalog,
    store,
    modelFactory: selectModelFactory(config),
    modelName: config.gemini.model,
    rateLimiter,
    verificationWorkers: config.verification.workers,
    logger: createLogger({ plane: "chat" }),
  });
  const dispatcher = new InProcessTaskDispatcher(
    (task) => chatService.runTask(task),
    createLogger({ plane: "tasks" })
  );

  // CORS (v0/dev): permissive. Tighten before prod.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes);
  app.register(chatRoutes, { prefix: "/v1", chatService, store, dispatcher });

  app.addHook("onClose", async () => {
    await dispatcher.drain();
    store.close();
  });

  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
