import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import { ImpreciseLanguageInstance, ProcessedClaim } from "../contracts/claims";
import { Content } from "../contracts/content";
import { createLogger, type Logger } from "../logger";
import type {
  ChatMessage,
  ChatSnapshot,
  ChatStatus,
  ConversationStore,
  ProgressUpdate,
  StoredClaim,
  StoredInstance,
} from "./conversation_store";

type ChatRow = {
  mode: string;
  status: ChatStatus;
  last_message: string | null;
  updated_at: string;
};

type MessageRow = {
  id: string;
  content: string;
  status: ChatStatus;
  created_at: string;
};

type DataRow = {
  id: string;
  data_json: string;
  style_mode: string;
  updated_at: string;
};

const HistoryTurns = z.array(Content);

// Unreadable JSON becomes undefined, which the row's schema then rejects.
function parseStoredJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class SqliteConversationStore implements ConversationStore {
  private db: Database.Database;
  private log: Logger;

  constructor(
    dbPath: string = "./data/conversations.db",
    log: Logger = createLogger({ plane: "store" })
  ) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
    this.log.info({ dbPath }, "store.sqlite_ready");
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chat_histories (
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        turns_json TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (user_id, chat_id)
      );

      CREATE TABLE IF NOT EXISTS chats (
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        mode TEXT NOT NULL,
        status TEXT NOT NULL,
        last_message TEXT,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (user_id, chat_id)
      );

      CREATE TABLE IF NOT EXISTS chat_messages (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        content TEXT NOT NULL,
        type TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        FOREIGN KEY (user_id, chat_id) REFERENCES chats(user_id, chat_id)
      );

      CREATE INDEX IF NOT EXISTS idx_chat_messages_chat ON chat_messages(user_id, chat_id);

      CREATE TABLE IF NOT EXISTS processed_claims (
        id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        data_json TEXT NOT NULL,
        style_mode TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        seq INTEGER NOT NULL,
        PRIMARY KEY (user_id, chat_id, id),
        FOREIGN KEY (user_id, chat_id) REFERENCES chats(user_id, chat_id)
      );

      CREATE TABLE IF NOT EXISTS imprecise_language_instances (
        id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        data_json TEXT NOT NULL,
        style_mode TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        seq INTEGER NOT NULL,
        PRIMARY KEY (user_id, chat_id, id),
        FOREIGN KEY (user_id, chat_id) REFERENCES chats(user_id, chat_id)
      );
    `);
  }

  async loadHistory(userId: string, chatId: string): Promise<Content[]> {
    const row = this.db
      .prepare<[string, string], { turns_json: string }>(
        "SELECT turns_json FROM chat_histories WHERE user_id = ? AND chat_id = ?"
      )
      .get(userId, chatId);

    if (!row) return [];
    const parsed = HistoryTurns.safeParse(parseStoredJson(row.turns_json));
    if (!parsed.success) {
      this.log.warn({ userId, chatId, issues: parsed.error.issues.slice(0, 3) }, "store.history_invalid");
      return [];
    }
    return parsed.data;
  }

  async saveHistory(userId: string, chatId: string, turns: Content[]): Promise<void> {
    this.db
      .prepare(`
        INSERT INTO chat_histories (user_id, chat_id, turns_json, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT (user_id, chat_id) DO UPDATE SET
          turns_json = excluded.turns_json,
          updated_at = excluded.updated_at
      `)
      .run(userId, chatId, JSON.stringify(turns), new Date().toISOString());
  }

  async updateProgress(userId: string, chatId: string, update: ProgressUpdate): Promise<void> {
    const now = new Date().toISOString();
    const status: ChatStatus = update.isFinal ? "completed" : "processing";

    const upsertChat = this.db.prepare(`
      INSERT INTO chats (user_id, chat_id, mode, status, last_message, updated_at)
      VALUES (@userId, @chatId, @mode, @status, @lastMessage, @updatedAt)
      ON CONFLICT (user_id, chat_id) DO UPDATE SET
        mode = excluded.mode,
        status = excluded.status,
        last_message = COALESCE(excluded.last_message, chats.last_message),
        updated_at = excluded.updated_at
    `);
    const insertMessage = this.db.prepare(`
      INSERT INTO chat_messages (id, user_id, chat_id, content, type, status, created_at)
      VALUES (?, ?, ?, ?, 'answer', ?, ?)
    `);
    const upsertData = (table: "processed_claims" | "imprecise_language_instances") =>
      this.db.prepare(`
        INSERT INTO ${table} (id, user_id, chat_id, data_json, style_mode, updated_at, seq)
        VALUES (@id, @userId, @chatId, @dataJson, @styleMode, @updatedAt,
          (SELECT COALESCE(MAX(seq), 0) + 1 FROM ${table} WHERE user_id = @userId AND chat_id = @chatId))
        ON CONFLICT (user_id, chat_id, id) DO UPDATE SET
          data_json = excluded.data_json,
          style_mode = excluded.style_mode,
          updated_at = excluded.updated_at
      `);

    const apply = this.db.transaction(() => {
      upsertChat.run({
        userId,
        chatId,
        mode: update.styleMode,
        status,
        lastMessage: update.outputText || null,
        updatedAt: now,
      });

      if (update.outputText) {
        insertMessage.run(randomUUID(), userId, chatId, update.outputText, status, now);
      }

      const claims = update.processedClaims ?? [];
      if (claims.length > 0) {
        const stmt = upsertData("processed_claims");
        for (const claim of claims) {
          stmt.run({
            id: claim.id,
            userId,
            chatId,
            dataJson: JSON.stringify(claim),
            styleMode: update.styleMode,
            updatedAt: now,
          });
        }
      }

      const instances = update.processedInstances ?? [];
      if (instances.length > 0) {
        const stmt = upsertData("imprecise_language_instances");
        for (const instance of instances) {
          stmt.run({
            id: instance.id,
            userId,
            chatId,
            dataJson: JSON.stringify(instance),
            styleMode: update.styleMode,
            updatedAt: now,
          });
        }
      }
    });

    apply();
  }

  async getChat(userId: string, chatId: string): Promise<ChatSnapshot | null> {
    const chat = this.db
      .prepare<[string, string], ChatRow>(
        "SELECT mode, status, last_message, updated_at FROM chats WHERE user_id = ? AND chat_id = ?"
      )
      .get(userId, chatId);
    if (!chat) return null;

    const messages: ChatMessage[] = this.db
      .prepare<[string, string], MessageRow>(`
        SELECT id, content, status, created_at FROM chat_messages
        WHERE user_id = ? AND chat_id = ?
        ORDER BY created_at ASC, rowid ASC
      `)
      .all(userId, chatId)
      .map((row): ChatMessage => ({
        id: row.id,
        content: row.content,
        type: "answer",
        status: row.status,
        createdAt: row.created_at,
      }));

    const readData = (table: "processed_claims" | "imprecise_language_instances") =>
      this.db
        .prepare<[string, string], DataRow>(`
          SELECT id, data_json, style_mode, updated_at FROM ${table}
          WHERE user_id = ? AND chat_id = ?
          ORDER BY seq ASC
        `)
        .all(userId, chatId);

    const processedClaims: StoredClaim[] = [];
    for (const row of readData("processed_claims")) {
      const parsed = ProcessedClaim.safeParse(parseStoredJson(row.data_json));
      if (!parsed.success) {
        this.log.warn({ userId, chatId, claimId: row.id }, "store.claim_invalid");
        continue;
      }
      processedClaims.push({
        id: row.id,
        claimData: parsed.data,
        styleMode: row.style_mode,
        updatedAt: row.updated_at,
      });
    }

    const impreciseLanguageInstances: StoredInstance[] = [];
    for (const row of readData("imprecise_language_instances")) {
      const parsed = ImpreciseLanguageInstance.safeParse(parseStoredJson(row.data_json));
      if (!parsed.success) {
        this.log.warn({ userId, chatId, instanceId: row.id }, "store.instance_invalid");
        continue;
      }
      impreciseLanguageInstances.push({
        id: row.id,
        instanceData: parsed.data,
        styleMode: row.style_mode,
        updatedAt: row.updated_at,
      });
    }

    return {
      chatId,
      userId,
      mode: chat.mode,
      status: chat.status,
      lastMessage: chat.last_message,
      updatedAt: chat.updated_at,
      messages,
      processedClaims,
      impreciseLanguageInstances,
    };
  }

  close() {
    this.db.close();
  }
}
