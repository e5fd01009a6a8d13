import type { ErrorRequestHandler, RequestHandler } from "express";
import { ZodError } from "zod";

/** Keyed validation details for 400 responses, e.g. `{ "ratings.craft": ["Expected number"] }`. */
export function zodErrorDetails(error: ZodError): Record<string, string[]> {
  const details: Record<string, string[]> = {};
  for (const e of error.errors) {
    const path = e.path.join(".") || "body";
    if (!details[path]) details[path] = [];
    details[path].push(e.message);
  }
  return details;
}

function clientStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ detail: "Not Found" });
};

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({ detail: "Validation failed", errors: zodErrorDetails(err) });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);

  // body-parser errors (malformed JSON, oversized body) carry their own 4xx status
  const status = clientStatus(err);
  if (status) {
    res.status(status).json({ detail: message });
    return;
  }

  console.error(err);
  res.status(500).json({ detail: message });
};
