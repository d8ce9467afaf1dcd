import type { Content } from "../contracts/content";
import type { Logger } from "../logger";
import type { HistoryStore, ProgressSink, ProgressUpdate } from "../store/conversation_store";
import { errorMessage } from "./errors";

/**
 * Progress writes never roll back or abort the conversation; a failed write is logged
 * and the caller carries on.
 */
export async function reportProgress(
  sink: ProgressSink,
  log: Logger,
  target: { userId: string; chatId: string },
  update: ProgressUpdate
): Promise<boolean> {
  try {
    await sink.updateProgress(target.userId, target.chatId, update);
    log.debug(
      {
        isFinal: Boolean(update.isFinal),
        hasOutput: Boolean(update.outputText),
        claims: update.processedClaims?.length ?? 0,
        instances: update.processedInstances?.length ?? 0,
      },
      "progress.updated"
    );
    return true;
  } catch (error) {
    log.warn({ isFinal: Boolean(update.isFinal), error: errorMessage(error) }, "progress.update_failed");
    return false;
  }
}

/** An unreadable history starts the chat afresh. */
export async function loadHistoryOrEmpty(
  store: HistoryStore,
  log: Logger,
  target: { userId: string; chatId: string }
): Promise<Content[]> {
  try {
    return await store.loadHistory(target.userId, target.chatId);
  } catch (error) {
    log.warn({ error: errorMessage(error) }, "history.load_failed");
    return [];
  }
}

export async function persistHistory(
  store: HistoryStore,
  log: Logger,
  target: { userId: string; chatId: string },
  turns: Content[]
): Promise<boolean> {
  try {
    await store.saveHistory(target.userId, target.chatId, turns);
    return true;
  } catch (error) {
    log.warn({ turns: turns.length, error: errorMessage(error) }, "history.save_failed");
    return false;
  }
}
