/**
 * Salesforce Account sObject payload
 * Matches the standard Account fields this service writes
 */
export interface SalesforceAccountPayload {
  Name: string;
  Phone?: string;
  BillingCity?: string;
  Industry?: string;
  Type: string;
}

/**
 * Body of a successful POST /sobjects/Account/
 */
export interface SalesforceCreateResponse {
  id: string;
  success: boolean;
  errors: unknown[];
}

/**
 * One entry of the error array Salesforce returns on 4xx/5xx
 */
export interface SalesforceApiError {
  message: string;
  errorCode: string;
  fields?: string[];
}
