import { describe, it, expect } from "vitest";
import dedent from "dedent";
import { parseDocumentText } from "../src/loader/parseDocumentText.js";
import { describeLoadError, loadDocument } from "../src/loader/loadDocument.js";
import { MemoryVFS } from "../src/vfs/MemoryVFS.js";

const petstore = dedent`
  openapi: 3.0.3
  info:
    title: Petstore
    version: 1.0.0
  paths:
    /pets:
      get:
        responses:
          "200":
            $ref: "#/components/responses/PetList"
  components:
    responses:
      PetList:
        description: A list of pets
`;

describe("parseDocumentText", () => {
  it("parses YAML", () => {
    const result = parseDocumentText(petstore);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.info.title).toBe("Petstore");
      expect(result.data.components?.responses).toEqual({
        PetList: { description: "A list of pets" },
      });
    }
  });

  it("parses JSON", () => {
    const text = JSON.stringify({
      openapi: "3.1.0",
      info: { title: "Petstore", version: "1.0.0" },
      webhooks: { newPet: { $ref: "#/components/pathItems/NewPet" } },
    });

    expect(parseDocumentText(text)).toEqual({
      success: true,
      data: {
        openapi: "3.1.0",
        info: { title: "Petstore", version: "1.0.0" },
        webhooks: { newPet: { $ref: "#/components/pathItems/NewPet" } },
      },
    });
  });

  it("rejects duplicate keys", () => {
    const result = parseDocumentText(dedent`
      openapi: 3.1.0
      info:
        title: Petstore
        title: Again
        version: 1.0.0
    `);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("syntaxError");
    }
  });

  it("rejects broken YAML", () => {
    const result = parseDocumentText("openapi: [3.1.0");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("syntaxError");
    }
  });

  it("rejects other OpenAPI versions", () => {
    expect(
      parseDocumentText(dedent`
        openapi: 3.2.0
        info:
          title: Petstore
          version: 1.0.0
      `)
    ).toEqual({
      success: false,
      error: { type: "unsupportedVersion", version: "3.2.0" },
    });
  });

  it("rejects Swagger 2.0 documents", () => {
    expect(
      parseDocumentText(dedent`
        swagger: "2.0"
        info:
          title: Petstore
          version: 1.0.0
      `)
    ).toEqual({
      success: false,
      error: { type: "unsupportedVersion", version: undefined },
    });
  });

  it("reports schema violations with their path", () => {
    const result = parseDocumentText(dedent`
      openapi: 3.1.0
      info:
        title: Petstore
        version: 1.0.0
      paths:
        /pets:
          get:
            parameters:
              - name: limit
                in: body
    `);

    expect(result.success).toBe(false);
    if (!result.success && result.error.type === "invalidDocument") {
      expect(result.error.issues.length).toBeGreaterThan(0);
      expect(result.error.issues[0]).toMatch(/^paths\.\/pets/);
    } else {
      expect.unreachable("expected invalidDocument");
    }
  });
});

describe("loadDocument", () => {
  it("reads and parses a file", async () => {
    const vfs = new MemoryVFS({ "/api/petstore.yaml": petstore });

    const result = await loadDocument(vfs, "/api/petstore.yaml");

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.openapi).toBe("3.0.3");
    }
  });

  it("reports a missing file", async () => {
    const result = await loadDocument(new MemoryVFS(), "/api/missing.yaml");

    expect(result).toEqual({
      success: false,
      error: { type: "notFound", path: "/api/missing.yaml" },
    });
  });

  it("adds the path to parse errors", async () => {
    const vfs = new MemoryVFS({ "/api/old.yaml": "swagger: '2.0'" });

    const result = await loadDocument(vfs, "/api/old.yaml");

    expect(result).toEqual({
      success: false,
      error: { type: "unsupportedVersion", version: undefined, path: "/api/old.yaml" },
    });
    if (!result.success) {
      expect(describeLoadError(result.error)).toBe(
        '/api/old.yaml: missing "openapi" version field'
      );
    }
  });
});
