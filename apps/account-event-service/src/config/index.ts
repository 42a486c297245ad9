import { z } from "zod";
import { DEFAULT_EVENT_SOURCE } from "../types/account";

/**
 * Environment configuration
 */
const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  nodeEnv: z.string().default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Salesforce REST endpoint. Token refresh happens outside this service. */
  salesforce: z.object({
    instanceUrl: z.string().url().or(z.literal("")).default(""),
    accessToken: z.string().default(""),
    apiVersion: z
      .string()
      .regex(/^v\d+\.\d+$/, "expected a version like v59.0")
      .default("v59.0"),
    timeoutMs: z.coerce.number().int().positive().default(10_000),
  }),

  // Supabase (event queue)
  supabaseUrl: z.string().default(""),
  supabaseServiceKey: z.string().default(""),

  events: z.object({
    queue: z.string().min(1).default("account-events"),
    source: z.string().min(1).default(DEFAULT_EVENT_SOURCE),
    publishTimeoutMs: z.coerce.number().int().positive().default(5_000),
    publishRetries: z.coerce.number().int().min(0).max(5).default(0),
    publishRetryDelayMs: z.coerce.number().int().min(0).default(200),
  }),

  idempotencyTtlMs: z.coerce.number().int().min(0).default(24 * 60 * 60 * 1000),
});

export type AppConfig = z.infer<typeof configSchema>;

const ENV_NAMES: Record<string, string> = {
  port: "PORT",
  nodeEnv: "NODE_ENV",
  logLevel: "LOG_LEVEL",
  "salesforce.instanceUrl": "SALESFORCE_INSTANCE_URL",
  "salesforce.accessToken": "SALESFORCE_ACCESS_TOKEN",
  "salesforce.apiVersion": "SALESFORCE_API_VERSION",
  "salesforce.timeoutMs": "RECORD_TIMEOUT_MS",
  supabaseUrl: "SUPABASE_URL",
  supabaseServiceKey: "SUPABASE_SERVICE_KEY",
  "events.queue": "ACCOUNT_EVENTS_QUEUE",
  "events.source": "EVENT_SOURCE",
  "events.publishTimeoutMs": "PUBLISH_TIMEOUT_MS",
  "events.publishRetries": "PUBLISH_RETRIES",
  "events.publishRetryDelayMs": "PUBLISH_RETRY_DELAY_MS",
  idempotencyTtlMs: "IDEMPOTENCY_TTL_MS",
};

/**
 * Parse configuration from an environment map.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const result = configSchema.safeParse({
    port: read("PORT"),
    nodeEnv: read("NODE_ENV"),
    logLevel: read("LOG_LEVEL"),
    salesforce: {
      instanceUrl: read("SALESFORCE_INSTANCE_URL"),
      accessToken: read("SALESFORCE_ACCESS_TOKEN"),
      apiVersion: read("SALESFORCE_API_VERSION"),
      timeoutMs: read("RECORD_TIMEOUT_MS"),
    },
    supabaseUrl: read("SUPABASE_URL"),
    supabaseServiceKey: read("SUPABASE_SERVICE_KEY"),
    events: {
      queue: read("ACCOUNT_EVENTS_QUEUE"),
      source: read("EVENT_SOURCE"),
      publishTimeoutMs: read("PUBLISH_TIMEOUT_MS"),
      publishRetries: read("PUBLISH_RETRIES"),
      publishRetryDelayMs: read("PUBLISH_RETRY_DELAY_MS"),
    },
    idempotencyTtlMs: read("IDEMPOTENCY_TTL_MS"),
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return `${ENV_NAMES[path] ?? path}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  return result.data;
}

export const config = loadConfig(process.env);
