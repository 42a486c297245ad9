import { Request, Response, NextFunction } from "express";
import { invalidInput } from "../services/pipeline";

// Extend Express Request to carry the caller's idempotency key
declare global {
  namespace Express {
    interface Request {
      idempotencyKey?: string;
    }
  }
}

const KEY_PATTERN = /^[\x21-\x7e]{1,255}$/;

export type KeyExtraction =
  | { ok: true; key: string | undefined }
  | { ok: false; details: string };

/**
 * Extract the idempotency key from the request
 * Looks in: Idempotency-Key header, then ?idempotencyKey query param
 */
export function extractIdempotencyKey(
  headers: Request["headers"],
  query: Request["query"]
): KeyExtraction {
  const header = headers["idempotency-key"];
  const raw = typeof header === "string" ? header : query.idempotencyKey;

  if (raw === undefined || raw === "") {
    return { ok: true, key: undefined };
  }

  if (typeof raw !== "string" || !KEY_PATTERN.test(raw)) {
    return { ok: false, details: "Idempotency-Key must be 1-255 visible ASCII characters" };
  }

  return { ok: true, key: raw };
}

/**
 * Middleware that attaches the idempotency key, rejecting malformed ones
 */
export function idempotencyKey(req: Request, res: Response, next: NextFunction) {
  const extraction = extractIdempotencyKey(req.headers, req.query);

  if (!extraction.ok) {
    const response = invalidInput(extraction.details);
    return res.status(response.statusCode).json(response.body);
  }

  req.idempotencyKey = extraction.key;
  next();
}
