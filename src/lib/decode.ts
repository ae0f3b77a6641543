import type { z } from "zod";
import { DecodeError, errorMessage } from "./errors.js";

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Rename object keys that match one of `names` ignoring case. A key spelled
 * exactly like the name wins over other spellings.
 *
 * foldKeys(["Version"])({ version: "v1.0.0" }) -> { Version: "v1.0.0" }
 */
export function foldKeys(names: readonly string[]): (value: unknown) => unknown {
  return (value) => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return value;
    }

    const folded: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      const name = names.find((n) => n.toLowerCase() === key.toLowerCase()) ?? key;
      if (key !== name && name in folded) {
        continue;
      }
      folded[name] = field;
    }
    return folded;
  };
}

/**
 * Parse a JSON document and validate it against a schema. Both syntax and
 * shape problems become a DecodeError naming the document's source.
 */
export function decodeJson<S extends z.ZodTypeAny>(
  source: string,
  body: string,
  schema: S,
  what: string = "document",
): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new DecodeError(
      source,
      `invalid ${what} from ${source}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(
      source,
      `invalid ${what} from ${source}: ${describeIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
