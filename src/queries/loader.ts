import { pathExists, readJson } from "fs-extra/esm";
import path from "node:path";
import type { ZodError } from "zod";
import { LoadError, describeError } from "../errors";
import type { JsonValue } from "../schemas/json";
import { QuerySpecListSchema, type QuerySpec } from "../schemas/query";

/**
 * Reads the ordered list of query definitions from a JSON file.
 *
 * The list order is the execution order within each sweep. Entries and their
 * bodies are deeply frozen; bodies are forwarded to the search endpoint untouched.
 */
export async function loadQuerySpecs(source: string): Promise<readonly QuerySpec[]> {
  const resolved = path.resolve(source);

  if (!(await pathExists(resolved))) {
    throw new LoadError(`Query definition file "${resolved}" does not exist`, resolved);
  }

  let raw: unknown;
  try {
    raw = await readJson(resolved);
  } catch (error) {
    throw new LoadError(
      `Query definition file "${resolved}" is not valid JSON: ${describeError(error)}`,
      resolved,
      { cause: error },
    );
  }

  return parseQuerySpecs(raw, resolved);
}

export function parseQuerySpecs(raw: unknown, source: string): readonly QuerySpec[] {
  const parsed = QuerySpecListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LoadError(
      `Query definition file "${source}" is malformed: ${formatIssues(parsed.error)}`,
      source,
      { cause: parsed.error },
    );
  }

  if (parsed.data.length === 0) {
    throw new LoadError(`Query definition file "${source}" defines no queries`, source);
  }

  const seen = new Set<string>();
  for (const spec of parsed.data) {
    if (seen.has(spec.name)) {
      throw new LoadError(
        `Query definition file "${source}" defines "${spec.name}" more than once`,
        source,
      );
    }
    seen.add(spec.name);
  }

  return Object.freeze(
    parsed.data.map((spec) => {
      deepFreeze(spec.body);
      return Object.freeze(spec);
    }),
  );
}

function deepFreeze(value: JsonValue): void {
  if (value === null || typeof value !== "object") {
    return;
  }
  const children: JsonValue[] = Array.isArray(value) ? value : Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  Object.freeze(value);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}
