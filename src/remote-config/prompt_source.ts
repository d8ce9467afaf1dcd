import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { z } from "zod";

import { createLogger, type Logger } from "../logger";

export type ConfigEntry = {
  fileName: string;
};

/**
 * Where prompts and tool schemas come from. `get` looks up a pointer in a parameter
 * group, `fetchText` dereferences it.
 */
export interface PromptConfigSource {
  get(group: string, key: string): Promise<ConfigEntry | null>;
  fetchText(fileReference: string): Promise<string>;
}

const ConfigEntrySchema = z.object({ fileName: z.string().min(1) });

// Same layout as an exported remote-config template.
const ConfigTemplate = z.object({
  parameterGroups: z
    .record(
      z.string(),
      z.object({
        parameters: z
          .record(
            z.string(),
            z.object({
              valueType: z.enum(["STRING", "JSON", "NUMBER", "BOOLEAN"]).default("STRING"),
              defaultValue: z.object({ value: z.string() }),
            })
          )
          .default({}),
      })
    )
    .default({}),
});

export type FilePromptSourceOptions = {
  configPath: string;
  promptsDir: string;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
};

/**
 * Reads a remote-config style template from disk and prompt files from a directory.
 * The template is re-read once its TTL lapses; prompt text is kept per file.
 */
export class FilePromptSource implements PromptConfigSource {
  private values = new Map<string, unknown>();
  private lastFetchAt: number | null = null;
  private promptCache = new Map<string, string>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly options: FilePromptSourceOptions) {
    this.ttlMs = options.ttlMs ?? 3_600_000;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ plane: "remote_config" });
  }

  private async refresh(): Promise<void> {
    const current = this.now();
    if (this.lastFetchAt !== null && current - this.lastFetchAt <= this.ttlMs) return;

    try {
      const raw = await readFile(this.options.configPath, "utf8");
      const template = ConfigTemplate.parse(JSON.parse(raw));
      const next = new Map<string, unknown>();
      for (const [groupName, group] of Object.entries(template.parameterGroups)) {
        for (const [key, param] of Object.entries(group.parameters)) {
          const value = param.valueType === "JSON" ? JSON.parse(param.defaultValue.value) : param.defaultValue.value;
          next.set(`${groupName}:${key}`, value);
        }
      }
      this.values = next;
      this.log.debug({ configPath: this.options.configPath, entries: next.size }, "remote_config.refreshed");
    } catch (error) {
      // Keep serving the previous values; a missing key still surfaces as missing.
      this.log.error(
        { configPath: this.options.configPath, error: String(error) },
        "remote_config.refresh_failed"
      );
    }
    this.lastFetchAt = current;
  }

  async get(group: string, key: string): Promise<ConfigEntry | null> {
    await this.refresh();
    const parsed = ConfigEntrySchema.safeParse(this.values.get(`${group}:${key}`));
    return parsed.success ? parsed.data : null;
  }

  async fetchText(fileReference: string): Promise<string> {
    const cached = this.promptCache.get(fileReference);
    if (cached !== undefined) return cached;

    const text = await readFile(resolve(this.options.promptsDir, fileReference), "utf8");
    this.promptCache.set(fileReference, text);
    return text;
  }
}
