import type { OpenAPI } from "@openapi-deref/core/openapi";
import { mapError, Result } from "@openapi-deref/core/result";
import { VFS, VFSError } from "../vfs/VFS.js";
import { ParseError, parseDocumentText } from "./parseDocumentText.js";

export type LoadError = VFSError | (ParseError & { path: string });

export async function loadDocument(
  vfs: VFS,
  path: string
): Promise<Result<OpenAPI.Document, LoadError>> {
  const text = await vfs.readFile(path);
  if (!text.success) {
    return text;
  }

  return mapError(
    parseDocumentText(text.data),
    (error): LoadError => ({ ...error, path })
  );
}

export const describeLoadError = (error: LoadError): string => {
  switch (error.type) {
    case "notFound":
      return `${error.path}: file not found`;
    case "permissionDenied":
      return `${error.path}: permission denied`;
    case "unknown":
      return `${error.path}: ${error.message}`;
    case "syntaxError":
      return `${error.path}: syntax error\n${error.message}`;
    case "unsupportedVersion":
      return error.version === undefined
        ? `${error.path}: missing "openapi" version field`
        : `${error.path}: unsupported OpenAPI version ${error.version}`;
    case "invalidDocument":
      return [`${error.path}: invalid OpenAPI document`, ...error.issues].join("\n  ");
  }
};
