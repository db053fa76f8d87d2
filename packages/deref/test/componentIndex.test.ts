import { describe, it, expect } from "vitest";
import { unwrap } from "@openapi-deref/core/result";
import {
  ComponentIndex,
  parseComponentPointer,
  toComponentPointer,
} from "../src/components/ComponentIndex.js";
import { makeDocument } from "./utils/fixtures.js";

const document = makeDocument({
  components: {
    schemas: {
      Pet: { type: "object" },
      "a/b": { type: "string" },
    },
    parameters: {
      limit: { name: "limit", in: "query" },
    },
    securitySchemes: {
      apiKey: { type: "apiKey", name: "X-Key", in: "header" },
    },
  },
});

describe("ComponentIndex.build", () => {
  it("registers every component section entry", () => {
    const index = unwrap(ComponentIndex.build(document));
    expect(index.size).toBe(4);
    expect(index.has("Schema", "Pet")).toBe(true);
    expect(index.has("Parameter", "limit")).toBe(true);
    expect(index.has("SecurityScheme", "apiKey")).toBe(true);
    expect(index.has("Schema", "limit")).toBe(false);
  });

  it("gives an empty index without components", () => {
    const index = unwrap(ComponentIndex.build(makeDocument()));
    expect(index.size).toBe(0);
  });

  it("visits components section by section in document order", () => {
    const index = unwrap(ComponentIndex.build(document));
    const visited: string[] = [];
    index.forEach((entry) => visited.push(`${entry.kind} ${entry.pointer}`));

    expect(visited).toEqual([
      "Schema #/components/schemas/Pet",
      "Schema #/components/schemas/a~1b",
      "Parameter #/components/parameters/limit",
      "SecurityScheme #/components/securitySchemes/apiKey",
    ]);
  });
});

describe("ComponentIndex.register", () => {
  it("rejects a second entry under the same pointer", () => {
    const index = new ComponentIndex();
    expect(index.register("Schema", "Pet", { type: "object" })).toEqual({
      success: true,
      data: undefined,
    });
    expect(index.register("Schema", "Pet", { type: "string" })).toEqual({
      success: false,
      error: {
        type: "duplicateComponent",
        pointer: "#/components/schemas/Pet",
      },
    });
  });

  it("keeps names in different sections apart", () => {
    const index = new ComponentIndex();
    expect(index.register("Schema", "Pet", { type: "object" }).success).toBe(true);
    expect(
      index.register("Response", "Pet", { description: "A pet" }).success
    ).toBe(true);
    expect(index.size).toBe(2);
  });
});

describe("ComponentIndex.lookup", () => {
  const index = unwrap(ComponentIndex.build(document));

  it("finds an entry of the expected kind", () => {
    expect(index.lookup("#/components/schemas/Pet", "Schema")).toEqual({
      success: true,
      data: {
        pointer: "#/components/schemas/Pet",
        kind: "Schema",
        section: "schemas",
        name: "Pet",
        node: { type: "object" },
      },
    });
  });

  it("decodes escaped and percent-encoded names", () => {
    const escaped = unwrap(index.lookup("#/components/schemas/a~1b", "Schema"));
    expect(escaped.name).toBe("a/b");

    const encoded = unwrap(index.lookup("#/components/schemas/a%7E1b", "Schema"));
    expect(encoded.pointer).toBe("#/components/schemas/a~1b");
  });

  it("reports a missing component", () => {
    expect(index.lookup("#/components/schemas/Owner", "Schema")).toEqual({
      success: false,
      error: { type: "unknownComponent", pointer: "#/components/schemas/Owner" },
    });
  });

  it("reports a component of another kind", () => {
    expect(index.lookup("#/components/schemas/Pet", "Parameter")).toEqual({
      success: false,
      error: {
        type: "kindMismatch",
        pointer: "#/components/schemas/Pet",
        expected: "Parameter",
        actual: "Schema",
      },
    });
  });

  it("checks existence before kind", () => {
    const result = index.lookup("#/components/schemas/Owner", "Parameter");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("unknownComponent");
    }
  });
});

describe("parseComponentPointer", () => {
  it("parses section and name", () => {
    expect(parseComponentPointer("#/components/requestBodies/NewPet")).toEqual({
      success: true,
      data: { section: "requestBodies", kind: "RequestBody", name: "NewPet" },
    });
  });

  it.each([
    [
      "pets.yaml#/components/schemas/Pet",
      "references must be in the same document and start with #",
    ],
    ["https://example.com/api.yaml", "references must be in the same document and start with #"],
    ["#/definitions/Pet", "expected #/components/<section>/<name>"],
    ["#/components/schemas/Pet/properties/name", "expected #/components/<section>/<name>"],
    ["#/components/widgets/Pet", 'unknown component section "widgets"'],
    ["#/components/schemas/a~2", "Invalid escape ~2 at position 1"],
  ])("rejects %s", (pointer, message) => {
    expect(parseComponentPointer(pointer)).toEqual({
      success: false,
      error: { type: "malformedPointer", pointer, message },
    });
  });
});

describe("toComponentPointer", () => {
  it("escapes the name", () => {
    expect(toComponentPointer("Schema", "a/b~c")).toBe(
      "#/components/schemas/a~1b~0c"
    );
    expect(toComponentPointer("PathItem", "Shared")).toBe(
      "#/components/pathItems/Shared"
    );
  });
});
