import { config as loadEnv } from "dotenv";
import { z } from "zod";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type ModelProvider = "gemini" | "fake";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const ServiceEnv = z.object({
  NODE_ENV: z.string().optional(),
  PORT: intFromEnv(3333),
  MODEL_PROVIDER: z.enum(["gemini", "fake"]).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),
  GEMINI_MODEL: z.string().min(1).default("gemini-1.5-pro-002"),
  VERIFICATION_WORKERS: intFromEnv(8),
  VERIFICATION_MAX_CALLS_PER_WINDOW: intFromEnv(60),
  VERIFICATION_WINDOW_MS: intFromEnv(60_000),
  PROMPT_CONFIG_PATH: z.string().min(1).default("./config/remote_config.json"),
  PROMPTS_DIR: z.string().min(1).default("./prompts"),
  PROMPT_CONFIG_TTL_MS: intFromEnv(3_600_000),
  CONVERSATION_DB_PATH: z.string().min(1).default("./data/conversations.db"),
});

export type ServiceConfig = {
  port: number;
  provider: ModelProvider;
  gemini: {
    apiKey?: string;
    baseUrl: string;
    model: string;
  };
  verification: {
    workers: number;
    maxCallsPerWindow: number;
    windowMs: number;
  };
  prompts: {
    configPath: string;
    promptsDir: string;
    ttlMs: number;
  };
  conversationDbPath: string;
};

export class ServiceConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServiceConfigError";
  }
}

// Empty strings in .env files mean "unset".
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Without credentials outside production the fake provider keeps local runs working.
 * Production never falls back silently.
 */
function resolveProvider(args: {
  requested?: ModelProvider;
  apiKey?: string;
  nodeEnv?: string;
}): ModelProvider {
  if (args.requested) return args.requested;
  if (args.apiKey) return "gemini";
  if (args.nodeEnv === "production") {
    throw new ServiceConfigError("GEMINI_API_KEY must be set in production.");
  }
  return "fake";
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = ServiceEnv.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ServiceConfigError(`Invalid service configuration: ${details}`);
  }

  const e = parsed.data;
  const provider = resolveProvider({
    requested: e.MODEL_PROVIDER,
    apiKey: e.GEMINI_API_KEY,
    nodeEnv: e.NODE_ENV,
  });

  if (provider === "gemini" && !e.GEMINI_API_KEY) {
    throw new ServiceConfigError("GEMINI_API_KEY missing for MODEL_PROVIDER=gemini");
  }

  return {
    port: e.PORT,
    provider,
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      baseUrl: e.GEMINI_BASE_URL,
      model: e.GEMINI_MODEL,
    },
    verification: {
      workers: e.VERIFICATION_WORKERS,
      maxCallsPerWindow: e.VERIFICATION_MAX_CALLS_PER_WINDOW,
      windowMs: e.VERIFICATION_WINDOW_MS,
    },
    prompts: {
      configPath: e.PROMPT_CONFIG_PATH,
      promptsDir: e.PROMPTS_DIR,
      ttlMs: e.PROMPT_CONFIG_TTL_MS,
    },
    conversationDbPath: e.CONVERSATION_DB_PATH,
  };
}
