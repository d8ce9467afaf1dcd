import type { ChatTaskInput } from "../contracts/chat";
import { errorMessage } from "../control-plane/errors";
import type { Logger } from "../logger";

/** Hands accepted chat work to whatever runs it outside the request. */
export interface TaskDispatcher {
  dispatch(task: ChatTaskInput): void;
}

/**
 * Runs tasks on the same process after the current request has been answered.
 * Failures are logged; the chat record keeps whatever progress was written before.
 */
export class InProcessTaskDispatcher implements TaskDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly run: (task: ChatTaskInput) => Promise<unknown>,
    private readonly log: Logger
  ) {}

  dispatch(task: ChatTaskInput): void {
    const job = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.run(task))
      .then(
        () => {
          this.log.debug({ userId: task.userId, chatId: task.chatId ?? null }, "task.completed");
        },
        (error: unknown) => {
          this.log.error(
            { userId: task.userId, chatId: task.chatId ?? null, error: errorMessage(error) },
            "task.failed"
          );
        }
      )
      .finally(() => {
        this.pending.delete(job);
      });
    this.pending.add(job);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /** Resolves once every dispatched task has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
