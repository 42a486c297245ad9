/**
 * Account creation pipeline types
 * Shared by the validator, record client, event builder and orchestrator
 */

// ============================================================================
// RESULT
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// REQUEST / RECORD
// ============================================================================

export interface AccountRequest {
  readonly accountName: string;
  readonly phone?: string;
  readonly city?: string;
  readonly industry?: string;
}

export const ACCOUNT_TYPE = "Prospect";

/**
 * Canonical account sent to the record system
 */
export interface AccountRecord {
  name: string;
  phone?: string;
  billingCity?: string;
  industry?: string;
  type: typeof ACCOUNT_TYPE;
}

export type ValidationErrorKind = "MissingField" | "MalformedField";

export interface ValidationError {
  kind: ValidationErrorKind;
  field: string;
  description: string;
}

// ============================================================================
// RECORD SYSTEM
// ============================================================================

export interface CreateOutcome {
  success: true;
  recordId: string;
}

export type RecordClientErrorKind = "InvalidInput" | "Unexpected";

export interface RecordClientError {
  kind: RecordClientErrorKind;
  description: string;
}

export type CreateResult = Result<CreateOutcome, RecordClientError>;

export interface CreateOptions {
  idempotencyKey?: string;
  signal?: AbortSignal;
}

// ============================================================================
// EVENTS
// ============================================================================

export const ACCOUNT_CREATED = "ACCOUNT_CREATED";
export const NOT_AVAILABLE = "N/A";
export const DEFAULT_EVENT_SOURCE = "account-event-service";

export type AccountEventStatus = "SUCCESS" | "FAILED";

export interface AccountEvent {
  eventType: typeof ACCOUNT_CREATED;
  accountId: string;
  accountName: string;
  timestamp: string;
  status: AccountEventStatus;
  source: string;
}

export type PublishErrorKind = "ChannelUnavailable" | "Rejected";

export interface PublishError {
  kind: PublishErrorKind;
  description: string;
}

export type PublishResult = Result<void, PublishError>;

// ============================================================================
// PIPELINE
// ============================================================================

export type PipelineState =
  | "Received"
  | "Validated"
  | "RecordCreated"
  | "RecordFailed"
  | "EventBuilt"
  | "Published"
  | "PublishFailed"
  | "Responded";

export const SUCCESS_MESSAGE = "Account created and event published successfully";
export const INVALID_INPUT_ERROR = "Invalid Salesforce input";

export interface SuccessBody {
  message: typeof SUCCESS_MESSAGE;
  accountId: string;
  success: true;
}

export interface InvalidInputBody {
  error: typeof INVALID_INPUT_ERROR;
  details: string;
}

export interface UnhandledErrorBody {
  error: string;
}

export type PipelineResponse =
  | { statusCode: 200; body: SuccessBody }
  | { statusCode: 400; body: InvalidInputBody }
  | { statusCode: 500; body: UnhandledErrorBody };

export interface PipelineInput {
  body: unknown;
  queryAccountName?: string;
  idempotencyKey?: string;
}

export interface PipelineRunResult {
  state: "Responded";
  response: PipelineResponse;
  trail: PipelineState[];
  event?: AccountEvent;
}
