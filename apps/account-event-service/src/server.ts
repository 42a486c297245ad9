import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { AppConfig, config } from "./config";
import { createLogger } from "./config/logger";
import { createAccountRouter } from "./routes/createAccount";
import { AccountPipeline, invalidInput, unhandled } from "./services/pipeline";
import { SalesforceRecordClient } from "./clients/recordClient";
import { IdempotentRecordClient } from "./clients/idempotentRecordClient";
import { getSupabase, SupabaseEventPublisher, supabaseQueueTransport } from "./db";
import { InMemoryQueueTransport } from "./db/memoryQueue";
import type { QueueTransport } from "./db";

const log = createLogger("server");

export interface PipelineOverrides {
  transport?: QueueTransport;
  fetch?: typeof fetch;
}

/**
 * Wire the pipeline from configuration
 */
export function buildPipeline(cfg: AppConfig, overrides: PipelineOverrides = {}): AccountPipeline {
  const salesforce = new SalesforceRecordClient({
    instanceUrl: cfg.salesforce.instanceUrl,
    accessToken: cfg.salesforce.accessToken,
    apiVersion: cfg.salesforce.apiVersion,
    fetch: overrides.fetch,
  });

  const publisher = new SupabaseEventPublisher(overrides.transport ?? resolveTransport(cfg), {
    retries: cfg.events.publishRetries,
    retryDelayMs: cfg.events.publishRetryDelayMs,
  });

  return new AccountPipeline({
    recordClient: new IdempotentRecordClient(salesforce, cfg.idempotencyTtlMs),
    publisher,
    destination: cfg.events.queue,
    eventSource: cfg.events.source,
    recordTimeoutMs: cfg.salesforce.timeoutMs,
    publishTimeoutMs: cfg.events.publishTimeoutMs,
  });
}

function resolveTransport(cfg: AppConfig): QueueTransport {
  const supabase = getSupabase(cfg);
  if (supabase) {
    return supabaseQueueTransport(supabase);
  }
  if (cfg.nodeEnv === "production") {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_KEY are required in production");
  }
  log.warn("Supabase not configured, events go to an in-memory queue");
  return new InMemoryQueueTransport();
}

// body-parser error types
const BODY_ERROR_DETAILS: Record<string, string> = {
  "entity.parse.failed": "request body must be valid JSON",
  "entity.too.large": "request body too large",
  "entity.verify.failed": "request body could not be verified",
  "encoding.unsupported": "unsupported request body encoding",
  "charset.unsupported": "unsupported request body charset",
  "parameters.too.many": "too many parameters in request body",
  "request.aborted": "request body was aborted",
  "request.size.invalid": "request body size does not match Content-Length",
  "stream.encoding.set": "request body could not be read",
  "stream.not.readable": "request body could not be read",
};

/**
 * Map any error that reaches Express to one of the pipeline's response shapes
 */
export function errorResponse(error: unknown) {
  if (typeof error === "object" && error !== null && "type" in error && typeof error.type === "string") {
    const details = BODY_ERROR_DETAILS[error.type];
    if (details) return invalidInput(details);
  }
  return unhandled(error instanceof Error ? error.message : "Unknown error");
}

export function createApp(pipeline: AccountPipeline) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Mount routes
  app.use("/accounts", createAccountRouter(pipeline));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const response = errorResponse(error);
    if (response.statusCode === 500) {
      log.error("Error:", error instanceof Error ? error.message : error);
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(response.statusCode).json(response.body);
  });

  return app;
}

// Start server
if (require.main === module) {
  const app = createApp(buildPipeline(config));

  app.listen(config.port, () => {
    log.info(`Account Event Service started`);
    log.info(`Port: ${config.port}`);
    log.info(`Environment: ${config.nodeEnv}`);
    log.info(`Salesforce: ${config.salesforce.instanceUrl ? "configured" : "not configured"}`);
    log.info(`Event queue: ${config.events.queue}`);
  });
}
