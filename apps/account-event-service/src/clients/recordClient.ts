import {
  AccountRecord,
  CreateOptions,
  CreateOutcome,
  CreateResult,
  RecordClientError,
  err,
  ok,
} from "../types/account";
import { SalesforceCreateResponse } from "../types/salesforce";
import { classifySalesforceError, toSalesforceAccount } from "../mappers/salesforce";
import { createLogger } from "../config/logger";

/**
 * System-of-record boundary. One remote create per call, never throws.
 */
export interface RecordClient {
  createAccount(record: AccountRecord, options?: CreateOptions): Promise<CreateResult>;
}

export interface SalesforceClientOptions {
  instanceUrl: string;
  accessToken: string;
  apiVersion: string;
  fetch?: typeof fetch;
}

const log = createLogger("salesforce");

/**
 * Creates Account records through the Salesforce REST API
 */
export class SalesforceRecordClient implements RecordClient {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SalesforceClientOptions) {
    const base = options.instanceUrl.replace(/\/+$/, "");
    this.endpoint = `${base}/services/data/${options.apiVersion}/sobjects/Account/`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createAccount(record: AccountRecord, options: CreateOptions = {}): Promise<CreateResult> {
    const payload = toSalesforceAccount(record);

    log.debug("Creating account", { name: payload.Name, idempotencyKey: options.idempotencyKey });

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(payload),
        signal: options.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.error("Request failed", { message });
      return err<RecordClientError>({ kind: "Unexpected", description: `Salesforce request failed: ${message}` });
    }

    const body = await readJson(response);

    if (!response.ok) {
      const failure = classifySalesforceError(response.status, body);
      log.warn("Create rejected", { status: response.status, kind: failure.kind });
      return err(failure);
    }

    if (!isCreateResponse(body) || !body.success) {
      return err<RecordClientError>({ kind: "Unexpected", description: "Salesforce returned an unreadable create response" });
    }

    log.info("Account created", { recordId: body.id });
    return ok<CreateOutcome>({ success: true, recordId: body.id });
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}

function isCreateResponse(body: unknown): body is SalesforceCreateResponse {
  return (
    typeof body === "object" &&
    body !== null &&
    "id" in body &&
    typeof body.id === "string" &&
    body.id.length > 0 &&
    "success" in body &&
    typeof body.success === "boolean"
  );
}
