import { existsSync, readFileSync } from "fs";
import type { ZodTypeAny, output } from "zod";

const MAX_REPORTED_ISSUES = 3;

export type JsonErrorFactory = (path: string, message: string, cause?: unknown) => Error;

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read a JSON file and validate it against a zod schema. Every failure
 * (missing file, unparsable JSON, schema mismatch) is reported through
 * `makeError` with the offending path in the message.
 */
export function readValidatedJson<S extends ZodTypeAny>(
  path: string,
  schema: S,
  makeError: JsonErrorFactory
): output<S> {
  if (!existsSync(path)) {
    throw makeError(path, `File not found: ${path}`);
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw makeError(path, `Failed to read ${path}: ${describeCause(err)}`, err);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw makeError(path, `Invalid JSON in ${path}: ${describeCause(err)}`, err);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, MAX_REPORTED_ISSUES)
      .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`);
    const more = parsed.error.issues.length > MAX_REPORTED_ISSUES ? ` (+${parsed.error.issues.length - MAX_REPORTED_ISSUES} more)` : "";
    throw makeError(path, `Unexpected content in ${path}: ${issues.join("; ")}${more}`, parsed.error);
  }
  return parsed.data;
}
