import { SupabaseClient } from "@supabase/supabase-js";
import { AccountEvent, PublishError, PublishResult, err, ok } from "../types/account";
import { createLogger } from "../config/logger";

/**
 * Event channel boundary. Delivers one event to a named destination, never throws.
 */
export interface EventPublisher {
  publish(destination: string, event: AccountEvent): Promise<PublishResult>;
}

export interface QueueSendError {
  message: string;
  code?: string;
}

/**
 * Raw send primitive the publisher sits on
 */
export interface QueueTransport {
  send(queue: string, message: AccountEvent): Promise<{ error: QueueSendError | null }>;
}

/**
 * Supabase Queues (pgmq) exposed through the pgmq_public RPC schema
 */
export function supabaseQueueTransport(client: SupabaseClient): QueueTransport {
  return {
    async send(queue, message) {
      const { error } = await client.schema("pgmq_public").rpc("send", {
        queue_name: queue,
        message,
        sleep_seconds: 0,
      });
      return { error: error ? { message: error.message, code: error.code } : null };
    },
  };
}

export interface PublisherOptions {
  retries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const log = createLogger("eventQueue");

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Publishes account events to a Supabase queue.
 * Delivery is at-least-once: transport failures are retried, broker rejections are not.
 */
export class SupabaseEventPublisher implements EventPublisher {
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly transport: QueueTransport, options: PublisherOptions = {}) {
    this.retries = options.retries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async publish(destination: string, event: AccountEvent): Promise<PublishResult> {
    let failure: PublishError | null = null;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) {
        await this.sleep(this.retryDelayMs);
        log.warn(`Retrying publish to ${destination}`, { attempt });
      }

      failure = await this.sendOnce(destination, event);
      if (!failure) {
        log.info(`Published ${event.eventType} to ${destination}`, {
          accountId: event.accountId,
          status: event.status,
        });
        return ok(undefined);
      }
      if (failure.kind === "Rejected") break;
    }

    return err<PublishError>(failure ?? { kind: "ChannelUnavailable", description: `Queue ${destination} unavailable` });
  }

  private async sendOnce(destination: string, event: AccountEvent): Promise<PublishError | null> {
    try {
      const { error } = await this.transport.send(destination, event);
      if (!error) return null;

      if (error.code) {
        log.error(`Queue ${destination} rejected event`, { code: error.code, message: error.message });
        return { kind: "Rejected", description: `Queue ${destination} rejected event: ${error.message}` };
      }

      log.error(`Queue ${destination} unavailable`, { message: error.message });
      return { kind: "ChannelUnavailable", description: `Queue ${destination} unavailable: ${error.message}` };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.error(`Queue ${destination} unavailable`, { message });
      return { kind: "ChannelUnavailable", description: `Queue ${destination} unavailable: ${message}` };
    }
  }
}
