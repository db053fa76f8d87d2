import type { OpenAPI } from "@openapi-deref/core/openapi";
import type { Logger } from "@openapi-deref/core/logging";

type DocumentParts = Omit<OpenAPI.Document, "openapi" | "info">;

export const makeDocument = (parts: DocumentParts = {}): OpenAPI.Document => ({
  openapi: "3.1.0",
  info: { title: "Test API", version: "1.0.0" },
  ...parts,
});

export type LogLine = { level: keyof Logger; message: string };

export const createRecordingLogger = (): Logger & { lines: LogLine[] } => {
  const lines: LogLine[] = [];
  return {
    lines,
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Follow a path of keys and indices through a plain value.
 */
export const pick = (value: unknown, path: (string | number)[]): unknown => {
  let current = value;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === "number") {
      current = current[segment];
    } else if (isRecord(current) && typeof segment === "string") {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
};

/**
 * Every `$ref` at a slot position, in document order. Values of resolved
 * slots are skipped, so input and output of the resolver give the same list.
 */
export const collectRefs = (value: unknown, refs: string[] = []): string[] => {
  if (Array.isArray(value)) {
    for (const item of value) collectRefs(item, refs);
  } else if (isRecord(value)) {
    if (typeof value.$ref === "string") {
      refs.push(value.$ref);
      return refs;
    }
    for (const item of Object.values(value)) collectRefs(item, refs);
  }
  return refs;
};
