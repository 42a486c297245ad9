import { ACCOUNT_TYPE, AccountRecord, AccountRequest, RecordClientError } from "../types/account";
import { SalesforceAccountPayload, SalesforceApiError } from "../types/salesforce";

/**
 * Error codes Salesforce uses when the submitted record itself is at fault
 */
const INVALID_INPUT_CODES = new Set([
  "INVALID_FIELD",
  "REQUIRED_FIELD_MISSING",
  "FIELD_CUSTOM_VALIDATION_EXCEPTION",
  "INVALID_OR_NULL_FOR_RESTRICTED_PICKLIST",
  "STRING_TOO_LONG",
  "MALFORMED_ID",
  "INVALID_TYPE",
  "DUPLICATES_DETECTED",
  "JSON_PARSER_ERROR",
  "INVALID_FIELD_FOR_INSERT_UPDATE",
]);

/**
 * Map a validated request to the canonical account record
 */
export function toAccountRecord(request: AccountRequest): AccountRecord {
  return {
    name: request.accountName,
    phone: request.phone,
    billingCity: request.city,
    industry: request.industry,
    type: ACCOUNT_TYPE,
  };
}

/**
 * Map an account record to the Salesforce Account sObject.
 * Absent fields are left out rather than sent as null.
 */
export function toSalesforceAccount(record: AccountRecord): SalesforceAccountPayload {
  return {
    Name: record.name,
    ...(record.phone && { Phone: record.phone }),
    ...(record.billingCity && { BillingCity: record.billingCity }),
    ...(record.industry && { Industry: record.industry }),
    Type: record.type,
  };
}

/**
 * Detect Salesforce's error array shape
 */
export function isSalesforceErrorList(payload: unknown): payload is SalesforceApiError[] {
  return (
    Array.isArray(payload) &&
    payload.length > 0 &&
    payload.every(
      (entry) =>
        typeof entry === "object" &&
        entry !== null &&
        typeof entry.message === "string" &&
        typeof entry.errorCode === "string"
    )
  );
}

/**
 * Classify a failed create response.
 * Only a 400 whose every error carries an input-related code is the caller's fault.
 */
export function classifySalesforceError(status: number, payload: unknown): RecordClientError {
  if (!isSalesforceErrorList(payload)) {
    return { kind: "Unexpected", description: `Salesforce responded with HTTP ${status}` };
  }

  const description = payload
    .map((entry) => `${entry.errorCode}: ${entry.message}`)
    .join("; ");

  const invalidInput =
    status === 400 && payload.every((entry) => INVALID_INPUT_CODES.has(entry.errorCode));

  return { kind: invalidInput ? "InvalidInput" : "Unexpected", description };
}
