import { Router, Request, Response } from "express";
import { AccountPipeline, unhandled } from "../services/pipeline";
import { PipelineResponse } from "../types/account";
import { idempotencyKey } from "../middleware/idempotencyKey";
import { createLogger } from "../config/logger";

export interface InboundAccountRequest {
  body: unknown;
  query: Request["query"];
  idempotencyKey?: string;
}

export interface ResponseSink {
  status(code: number): { json(body: unknown): unknown };
}

const log = createLogger("create-account");

/**
 * Run the pipeline for one inbound request and write its response.
 * The pipeline always runs to completion; if the caller has already gone the
 * response is dropped.
 */
export async function handleCreateAccount(
  pipeline: AccountPipeline,
  req: InboundAccountRequest,
  res: ResponseSink,
  callerGone: () => boolean = () => false
): Promise<void> {
  let response: PipelineResponse;

  try {
    const label = req.query.accountName;
    const result = await pipeline.run({
      body: req.body,
      queryAccountName: typeof label === "string" ? label : undefined,
      idempotencyKey: req.idempotencyKey,
    });
    response = result.response;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error("Error:", message);
    response = unhandled(message);
  }

  if (callerGone()) {
    log.warn("Caller disconnected before response; discarding", { statusCode: response.statusCode });
    return;
  }

  res.status(response.statusCode).json(response.body);
}

/**
 * POST /accounts
 * Create a Salesforce account and publish the outcome event
 */
export function createAccountRouter(pipeline: AccountPipeline): Router {
  const router = Router();

  router.post("/", idempotencyKey, async (req: Request, res: Response) => {
    let gone = false;
    res.on("close", () => {
      if (!res.writableEnded) gone = true;
    });

    await handleCreateAccount(pipeline, req, res, () => gone);
  });

  return router;
}
