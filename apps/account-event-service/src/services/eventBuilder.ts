import {
  ACCOUNT_CREATED,
  AccountEvent,
  AccountRequest,
  CreateResult,
  DEFAULT_EVENT_SOURCE,
  NOT_AVAILABLE,
} from "../types/account";

export interface EventBuildOptions {
  source?: string;
  now?: () => Date;
}

/**
 * Build the ACCOUNT_CREATED event for a create attempt, successful or not.
 *
 * `accountName` is the label the caller passed as a query parameter. It is
 * deliberately not read from the request body.
 */
export function buildAccountEvent(
  result: CreateResult,
  _request: AccountRequest,
  queryAccountName?: string,
  options: EventBuildOptions = {}
): AccountEvent {
  const now = options.now ?? (() => new Date());
  const label = queryAccountName?.trim();

  return {
    eventType: ACCOUNT_CREATED,
    accountId: result.ok ? result.value.recordId : NOT_AVAILABLE,
    accountName: label ? label : NOT_AVAILABLE,
    timestamp: now().toISOString(),
    status: result.ok ? "SUCCESS" : "FAILED",
    source: options.source ?? DEFAULT_EVENT_SOURCE,
  };
}
