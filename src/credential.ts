import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { MissingCredentialError } from "./errors.js";

/**
 * Read the bot token from `path`. Surrounding whitespace is dropped; a file
 * that is missing, unreadable or blank is a startup-fatal condition.
 */
export function loadCredential(path: string): string {
  const resolvedPath = resolve(path);

  let raw: string;
  try {
    raw = readFileSync(resolvedPath, "utf-8");
  } catch (err) {
    throw new MissingCredentialError(resolvedPath, { cause: err });
  }

  const token = raw.trim();
  if (!token) {
    throw new MissingCredentialError(resolvedPath);
  }
  return token;
}
