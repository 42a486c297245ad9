import { randomUUID } from "crypto";
import {
  AccountEvent,
  AccountRequest,
  CreateResult,
  INVALID_INPUT_ERROR,
  PipelineInput,
  PipelineResponse,
  PipelineRunResult,
  PipelineState,
  PublishError,
  PublishResult,
  RecordClientError,
  SUCCESS_MESSAGE,
  err,
} from "../types/account";
import { RecordClient } from "../clients/recordClient";
import { EventPublisher } from "../db/eventQueue";
import { toAccountRecord } from "../mappers/salesforce";
import { validateAccountRequest } from "./validation";
import { buildAccountEvent } from "./eventBuilder";
import { withTimeout } from "./timeout";
import { createLogger } from "../config/logger";

export interface PipelineDeps {
  recordClient: RecordClient;
  publisher: EventPublisher;
  /** Queue the outcome event is published to */
  destination: string;
  eventSource?: string;
  recordTimeoutMs: number;
  publishTimeoutMs: number;
  now?: () => Date;
}

const log = createLogger("pipeline");

export function invalidInput(details: string): PipelineResponse {
  return { statusCode: 400, body: { error: INVALID_INPUT_ERROR, details } };
}

export function unhandled(description: string): PipelineResponse {
  return { statusCode: 500, body: { error: `Unhandled error: ${description}` } };
}

function created(accountId: string): PipelineResponse {
  return { statusCode: 200, body: { message: SUCCESS_MESSAGE, accountId, success: true } };
}

/**
 * Validate → create record → build event → publish → respond
 *
 * Every run ends in `Responded` exactly once. A failed create still builds and
 * publishes a FAILED event; the create failure then decides the response.
 * Nothing is retried here.
 */
export class AccountPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async run(input: PipelineInput): Promise<PipelineRunResult> {
    const runId = randomUUID();
    const trail: PipelineState[] = ["Received"];

    try {
      return await this.execute(runId, input, trail);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.error("Pipeline aborted", { runId, message });
      trail.push("Responded");
      return { state: "Responded", response: unhandled(message), trail };
    }
  }

  private async execute(
    runId: string,
    input: PipelineInput,
    trail: PipelineState[]
  ): Promise<PipelineRunResult> {
    const respond = (response: PipelineResponse, event?: AccountEvent): PipelineRunResult => {
      trail.push("Responded");
      log.info("Responded", { runId, statusCode: response.statusCode, trail: trail.join(" → ") });
      return { state: "Responded", response, trail, ...(event && { event }) };
    };

    const validation = validateAccountRequest(input.body);
    if (!validation.ok) {
      log.warn("Validation failed", { runId, field: validation.error.field, kind: validation.error.kind });
      return respond(invalidInput(validation.error.description));
    }
    const request = validation.value;
    trail.push("Validated");

    const createResult = await this.createRecord(request, input.idempotencyKey);
    trail.push(createResult.ok ? "RecordCreated" : "RecordFailed");
    if (!createResult.ok) {
      log.warn("Record create failed", { runId, kind: createResult.error.kind });
    }

    const event = buildAccountEvent(createResult, request, input.queryAccountName, {
      source: this.deps.eventSource,
      now: this.deps.now,
    });
    trail.push("EventBuilt");

    const publishResult = await this.publishEvent(event);
    trail.push(publishResult.ok ? "Published" : "PublishFailed");

    if (!createResult.ok) {
      return respond(recordFailureResponse(createResult.error), event);
    }
    if (!publishResult.ok) {
      log.error("Record exists but event was not published", {
        runId,
        accountId: createResult.value.recordId,
        kind: publishResult.error.kind,
      });
      return respond(unhandled(publishResult.error.description), event);
    }
    return respond(created(createResult.value.recordId), event);
  }

  private createRecord(request: AccountRequest, idempotencyKey?: string): Promise<CreateResult> {
    const { recordClient, recordTimeoutMs } = this.deps;
    const record = toAccountRecord(request);

    return withTimeout(
      async (signal) => {
        try {
          return await recordClient.createAccount(record, { idempotencyKey, signal });
        } catch (error) {
          const message = error instanceof Error ? error.message : "Unknown error";
          return err<RecordClientError>({ kind: "Unexpected", description: message });
        }
      },
      recordTimeoutMs,
      () =>
        err<RecordClientError>({
          kind: "Unexpected",
          description: `Salesforce create timed out after ${recordTimeoutMs}ms`,
        })
    );
  }

  private publishEvent(event: AccountEvent): Promise<PublishResult> {
    const { publisher, destination, publishTimeoutMs } = this.deps;

    return withTimeout(
      async () => {
        try {
          return await publisher.publish(destination, event);
        } catch (error) {
          const message = error instanceof Error ? error.message : "Unknown error";
          return err<PublishError>({ kind: "ChannelUnavailable", description: message });
        }
      },
      publishTimeoutMs,
      () =>
        err<PublishError>({
          kind: "ChannelUnavailable",
          description: `Publish to ${destination} timed out after ${publishTimeoutMs}ms`,
        })
    );
  }
}

function recordFailureResponse(error: RecordClientError): PipelineResponse {
  return error.kind === "InvalidInput" ? invalidInput(error.description) : unhandled(error.description);
}
