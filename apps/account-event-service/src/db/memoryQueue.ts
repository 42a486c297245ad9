import { AccountEvent } from "../types/account";
import { QueueTransport, QueueSendError } from "./eventQueue";

/**
 * In-memory queue transport
 * Used when Supabase is not configured (development/testing)
 */
export class InMemoryQueueTransport implements QueueTransport {
  private readonly queues: Map<string, AccountEvent[]> = new Map();
  private failure: QueueSendError | null = null;

  async send(queue: string, message: AccountEvent): Promise<{ error: QueueSendError | null }> {
    if (this.failure) {
      return { error: this.failure };
    }

    const messages = this.queues.get(queue) ?? [];
    messages.push(message);
    this.queues.set(queue, messages);
    return { error: null };
  }

  /**
   * Make every following send fail with `error`, or pass null to recover
   */
  failWith(error: QueueSendError | null): void {
    this.failure = error;
  }

  messages(queue: string): AccountEvent[] {
    return [...(this.queues.get(queue) ?? [])];
  }
}
