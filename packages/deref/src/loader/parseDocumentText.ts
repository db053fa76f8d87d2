import { z } from "zod";
import { parseDocument } from "yaml";
import { OpenAPI } from "@openapi-deref/core/openapi";
import { err, ok, Result } from "@openapi-deref/core/result";

export type ParseError =
  | { type: "syntaxError"; message: string }
  | { type: "unsupportedVersion"; version: string | undefined }
  | { type: "invalidDocument"; issues: string[] };

const VersionHeader = z.object({ openapi: z.string() });

// 3.0.x and 3.1.x
const SUPPORTED_VERSION = /^3\.[01]\.\d+$/;

export const isSupportedVersion = (version: string): boolean =>
  SUPPORTED_VERSION.test(version);

const formatIssue = (issue: z.ZodError["issues"][number]): string => {
  const path = issue.path.map(String).join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

/**
 * Parse JSON or YAML text into a typed document. JSON goes through the YAML
 * parser too; duplicate mapping keys are rejected.
 */
export function parseDocumentText(
  text: string
): Result<OpenAPI.Document, ParseError> {
  const yaml = parseDocument(text, { uniqueKeys: true });
  if (yaml.errors.length > 0) {
    return err({
      type: "syntaxError",
      message: yaml.errors.map((e) => e.message).join("\n"),
    });
  }

  const raw: unknown = yaml.toJS();

  const header = VersionHeader.safeParse(raw);
  if (!header.success) {
    return err({ type: "unsupportedVersion", version: undefined });
  }
  if (!isSupportedVersion(header.data.openapi)) {
    return err({ type: "unsupportedVersion", version: header.data.openapi });
  }

  const document = OpenAPI.Document.safeParse(raw);
  if (!document.success) {
    return err({
      type: "invalidDocument",
      issues: document.error.issues.map(formatIssue),
    });
  }
  return ok(document.data);
}
