import {
  AccountRecord,
  CreateOptions,
  CreateResult,
  RecordClientError,
  err,
} from "../types/account";
import { RecordClient } from "./recordClient";
import { createLogger } from "../config/logger";

interface Entry {
  fingerprint: string;
  result: Promise<CreateResult>;
  settledAt: number | null;
}

const log = createLogger("idempotency");

/**
 * Collapses creates that share an idempotency key into a single remote call.
 * In-flight calls share one promise; successes are replayed until the TTL runs out;
 * failures are dropped so the caller can try again. A key reused with a
 * different record is refused as invalid input.
 */
export class IdempotentRecordClient implements RecordClient {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly inner: RecordClient,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  createAccount(record: AccountRecord, options: CreateOptions = {}): Promise<CreateResult> {
    const key = options.idempotencyKey;
    if (!key) {
      return this.inner.createAccount(record, options);
    }

    this.evictExpired();

    const fingerprint = fingerprintOf(record);
    const existing = this.entries.get(key);
    if (existing && existing.fingerprint !== fingerprint) {
      log.warn("Idempotency key reused with a different record", { key });
      return Promise.resolve(
        err<RecordClientError>({
          kind: "InvalidInput",
          description: "Idempotency-Key reused with a different request",
        })
      );
    }
    if (existing) {
      log.info("Replaying create for idempotency key", { key });
      return existing.result;
    }

    const entry: Entry = {
      fingerprint,
      result: this.inner.createAccount(record, options).then(
        (result) => {
          if (result.ok) {
            entry.settledAt = this.now();
          } else {
            this.entries.delete(key);
          }
          return result;
        },
        (error: unknown) => {
          this.entries.delete(key);
          throw error;
        }
      ),
      settledAt: null,
    };

    this.entries.set(key, entry);
    return entry.result;
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [key, entry] of this.entries) {
      if (entry.settledAt !== null && entry.settledAt <= cutoff) {
        this.entries.delete(key);
      }
    }
  }
}

function fingerprintOf(record: AccountRecord): string {
  const fields = Object.entries(record)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(fields);
}
