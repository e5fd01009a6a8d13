import crypto from "node:crypto";

/** 24 hex characters, the same width as a MongoDB ObjectId. */
export function newId(): string {
  return crypto.randomBytes(12).toString("hex");
}
