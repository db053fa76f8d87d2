import { describe, it, expect } from "vitest";
import {
  encodeToken,
  formatJsonPointer,
  isLocalPointer,
  parseJsonPointer,
} from "../src/json-pointer/index.js";

describe("parseJsonPointer", () => {
  it("splits a fragment pointer into segments", () => {
    expect(parseJsonPointer("#/components/schemas/Pet")).toEqual({
      success: true,
      data: ["components", "schemas", "Pet"],
    });
  });

  it("accepts raw pointers without #", () => {
    expect(parseJsonPointer("/paths/~1pets")).toEqual({
      success: true,
      data: ["paths", "/pets"],
    });
  });

  it("decodes ~1 and ~0 escapes", () => {
    expect(parseJsonPointer("#/a~1b/c~0d/~01")).toEqual({
      success: true,
      data: ["a/b", "c~d", "~1"],
    });
  });

  it("percent-decodes fragments", () => {
    expect(parseJsonPointer("#/components/schemas/Pet%20Store")).toEqual({
      success: true,
      data: ["components", "schemas", "Pet Store"],
    });
  });

  it("treats an empty pointer as the whole document", () => {
    expect(parseJsonPointer("#")).toEqual({ success: true, data: [] });
    expect(parseJsonPointer("")).toEqual({ success: true, data: [] });
  });

  it("rejects pointers that do not start with /", () => {
    expect(parseJsonPointer("#components")).toEqual({
      success: false,
      error: {
        type: "invalidSyntax",
        message: "JSON Pointer must start with '/'",
      },
    });
  });

  it("rejects unknown escapes", () => {
    expect(parseJsonPointer("#/a~2")).toEqual({
      success: false,
      error: {
        type: "invalidEscape",
        message: "Invalid escape ~2 at position 1",
      },
    });
  });

  it("rejects a trailing ~", () => {
    expect(parseJsonPointer("#/ab~")).toEqual({
      success: false,
      error: {
        type: "invalidEscape",
        message: "Incomplete escape at position 2",
      },
    });
  });

  it("rejects broken percent-encoding", () => {
    const result = parseJsonPointer("#/components/schemas/%E0%A4%A");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("invalidSyntax");
    }
  });
});

describe("formatJsonPointer", () => {
  it("escapes each segment", () => {
    expect(formatJsonPointer(["components", "schemas", "a/b~c"])).toBe(
      "#/components/schemas/a~1b~0c"
    );
  });

  it("formats the root as #", () => {
    expect(formatJsonPointer([])).toBe("#");
  });

  it("is the inverse of parseJsonPointer", () => {
    const segments = ["paths", "/pets/{id}", "get"];
    expect(parseJsonPointer(formatJsonPointer(segments))).toEqual({
      success: true,
      data: segments,
    });
  });
});

describe("encodeToken", () => {
  it("escapes ~ before /", () => {
    expect(encodeToken("~/")).toBe("~0~1");
  });
});

describe("isLocalPointer", () => {
  it("only accepts same-document pointers", () => {
    expect(isLocalPointer("#/components/schemas/Pet")).toBe(true);
    expect(isLocalPointer("pets.yaml#/Pet")).toBe(false);
    expect(isLocalPointer("https://example.com/api.yaml")).toBe(false);
  });
});
