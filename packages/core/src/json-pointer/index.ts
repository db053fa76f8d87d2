import { Result, ok, err } from "../result/result.js";

export type JsonPointerError =
  | { type: "invalidSyntax"; message: string }
  | { type: "invalidEscape"; message: string };

export type JsonPointer = string[];

export type JsonPointerResult = Result<JsonPointer, JsonPointerError>;

// A ~ must be followed by 0 or 1
const BAD_ESCAPE = /~(?![01])/;

/**
 * Decode one reference token (RFC 6901): ~1 → /, then ~0 → ~
 */
function decodeToken(token: string): Result<string, JsonPointerError> {
  const bad = BAD_ESCAPE.exec(token);
  if (bad) {
    const next = token[bad.index + 1];
    return err({
      type: "invalidEscape",
      message:
        next === undefined
          ? `Incomplete escape at position ${bad.index}`
          : `Invalid escape ~${next} at position ${bad.index}`,
    });
  }
  return ok(token.replace(/~1/g, "/").replace(/~0/g, "~"));
}

/**
 * Encode one reference token: ~ → ~0, then / → ~1
 */
export function encodeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

function decodeFragment(fragment: string): Result<string, JsonPointerError> {
  try {
    return ok(decodeURIComponent(fragment));
  } catch {
    return err({
      type: "invalidSyntax",
      message: `Invalid percent-encoding in fragment "${fragment}"`,
    });
  }
}

/**
 * Parse a pointer into its segments. Takes raw pointers ("/a/b") and
 * percent-encoded URI fragments ("#/a/b"); "" and "#" are the root.
 */
export function parseJsonPointer(pointer: string): JsonPointerResult {
  let raw = pointer;
  if (pointer.startsWith("#")) {
    const decoded = decodeFragment(pointer.slice(1));
    if (!decoded.success) return decoded;
    raw = decoded.data;
  }

  if (raw === "") return ok([]);
  if (!raw.startsWith("/")) {
    return err({
      type: "invalidSyntax",
      message: "JSON Pointer must start with '/'",
    });
  }

  const segments: JsonPointer = [];
  for (const token of raw.slice(1).split("/")) {
    const decoded = decodeToken(token);
    if (!decoded.success) return decoded;
    segments.push(decoded.data);
  }
  return ok(segments);
}

/**
 * Format segments as a URI fragment pointer ("#/a/b")
 */
export function formatJsonPointer(segments: JsonPointer): string {
  return "#" + segments.map((segment) => "/" + encodeToken(segment)).join("");
}

/**
 * Same-document pointers start with #
 */
export function isLocalPointer(ref: string): boolean {
  return ref.startsWith("#");
}
