import { z } from "zod";
import {
  AccountRequest,
  Result,
  ValidationError,
  err,
  ok,
} from "../types/account";

function optionalText(field: string) {
  return z
    .string({ invalid_type_error: `${field} must be a string` })
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));
}

const accountRequestSchema = z.object({
  accountName: z
    .string({
      required_error: "accountName required",
      invalid_type_error: "accountName must be a string",
    })
    .trim()
    .min(1, "accountName required"),
  phone: optionalText("phone"),
  city: optionalText("city"),
  industry: optionalText("industry"),
});

/**
 * Validate and normalize an inbound account creation body.
 * Strings are trimmed before checking, so a whitespace-only `accountName`
 * counts as empty and fails with `MissingField`. Empty optional fields are
 * dropped and unknown keys ignored.
 */
export function validateAccountRequest(raw: unknown): Result<AccountRequest, ValidationError> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return err<ValidationError>({
      kind: "MalformedField",
      field: "body",
      description: "request body must be a JSON object",
    });
  }

  // null counts as absent
  const present = Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== null));
  const parsed = accountRequestSchema.safeParse(present);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const missing =
      issue.code === "too_small" ||
      (issue.code === "invalid_type" && issue.received === "undefined");

    return err<ValidationError>({
      kind: missing ? "MissingField" : "MalformedField",
      field: issue.path.join(".") || "body",
      description: issue.message,
    });
  }

  const { accountName, phone, city, industry } = parsed.data;

  const request: AccountRequest = {
    accountName,
    ...(phone !== undefined && { phone }),
    ...(city !== undefined && { city }),
    ...(industry !== undefined && { industry }),
  };

  return ok(Object.freeze(request));
}
