import { randomUUID } from "node:crypto";

import type { ImpreciseLanguageInstance, ProcessedClaim } from "../contracts/claims";
import type { Content } from "../contracts/content";

export type ChatStatus = "processing" | "completed";

export type ProgressUpdate = {
  styleMode: string;
  outputText?: string;
  processedClaims?: ProcessedClaim[] | null;
  processedInstances?: ImpreciseLanguageInstance[] | null;
  isFinal?: boolean;
};

export type ChatMessage = {
  id: string;
  content: string;
  type: "answer";
  status: ChatStatus;
  createdAt: string;
};

export type StoredClaim = {
  id: string;
  claimData: ProcessedClaim;
  styleMode: string;
  updatedAt: string;
};

export type StoredInstance = {
  id: string;
  instanceData: ImpreciseLanguageInstance;
  styleMode: string;
  updatedAt: string;
};

export type ChatSnapshot = {
  chatId: string;
  userId: string;
  mode: string;
  status: ChatStatus;
  lastMessage: string | null;
  updatedAt: string;
  messages: ChatMessage[];
  processedClaims: StoredClaim[];
  impreciseLanguageInstances: StoredInstance[];
};

export interface HistoryStore {
  /** Ordered turns for the chat, empty when none were saved. */
  loadHistory(userId: string, chatId: string): Promise<Content[]>;
  saveHistory(userId: string, chatId: string, turns: Content[]): Promise<void>;
}

export interface ProgressSink {
  /**
   * Upsert chat progress. Partial calls set only the fields given;
   * claims and instances are keyed by their ids, so replays are idempotent.
   */
  updateProgress(userId: string, chatId: string, update: ProgressUpdate): Promise<void>;
}

export interface ConversationStore extends HistoryStore, ProgressSink {
  getChat(userId: string, chatId: string): Promise<ChatSnapshot | null>;
}

type ChatRecord = {
  mode: string;
  status: ChatStatus;
  lastMessage: string | null;
  updatedAt: string;
  messages: ChatMessage[];
  claims: Map<string, StoredClaim>;
  instances: Map<string, StoredInstance>;
};

const chatKey = (userId: string, chatId: string) => `${userId}:${chatId}`;

export class MemoryConversationStore implements ConversationStore {
  private histories = new Map<string, Content[]>();
  private chats = new Map<string, ChatRecord>();

  async loadHistory(userId: string, chatId: string): Promise<Content[]> {
    return structuredClone(this.histories.get(chatKey(userId, chatId)) ?? []);
  }

  async saveHistory(userId: string, chatId: string, turns: Content[]): Promise<void> {
    this.histories.set(chatKey(userId, chatId), structuredClone(turns));
  }

  async updateProgress(userId: string, chatId: string, update: ProgressUpdate): Promise<void> {
    const now = new Date().toISOString();
    const key = chatKey(userId, chatId);
    const status: ChatStatus = update.isFinal ? "completed" : "processing";
    const record: ChatRecord = this.chats.get(key) ?? {
      mode: update.styleMode,
      status,
      lastMessage: null,
      updatedAt: now,
      messages: [],
      claims: new Map(),
      instances: new Map(),
    };

    record.mode = update.styleMode;
    record.status = status;
    record.updatedAt = now;

    if (update.outputText) {
      record.messages.push({
        id: randomUUID(),
        content: update.outputText,
        type: "answer",
        status,
        createdAt: now,
      });
      record.lastMessage = update.outputText;
    }

    for (const claim of update.processedClaims ?? []) {
      record.claims.set(claim.id, {
        id: claim.id,
        claimData: structuredClone(claim),
        styleMode: update.styleMode,
        updatedAt: now,
      });
    }

    for (const instance of update.processedInstances ?? []) {
      record.instances.set(instance.id, {
        id: instance.id,
        instanceData: structuredClone(instance),
        styleMode: update.styleMode,
        updatedAt: now,
      });
    }

    this.chats.set(key, record);
  }

  async getChat(userId: string, chatId: string): Promise<ChatSnapshot | null> {
    const record = this.chats.get(chatKey(userId, chatId));
    if (!record) return null;
    return {
      chatId,
      userId,
      mode: record.mode,
      status: record.status,
      lastMessage: record.lastMessage,
      updatedAt: record.updatedAt,
      messages: [...record.messages],
      processedClaims: [...record.claims.values()],
      impreciseLanguageInstances: [...record.instances.values()],
    };
  }
}
