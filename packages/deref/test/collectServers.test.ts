import { describe, it, expect } from "vitest";
import { unwrap } from "@openapi-deref/core/result";
import { collectServers } from "../src/servers/collectServers.js";
import { dereference } from "../src/dereference.js";
import { makeDocument } from "./utils/fixtures.js";

const server = (url: string) => ({ url });

describe("collectServers", () => {
  it("collects servers from the document, path items and operations", () => {
    const document = makeDocument({
      servers: [server("https://api.example.com")],
      paths: {
        "/pets": {
          servers: [server("https://pets.example.com")],
          post: { servers: [server("https://write.example.com")] },
          get: { servers: [server("https://read.example.com")] },
        },
        "/owners": {
          get: { servers: [server("https://owners.example.com")] },
        },
      },
    });

    expect(unwrap(collectServers(document)).map((s) => s.url)).toEqual([
      "https://api.example.com",
      "https://pets.example.com",
      "https://read.example.com",
      "https://write.example.com",
      "https://owners.example.com",
    ]);
  });

  it("returns an empty list for a document without servers", () => {
    expect(collectServers(makeDocument())).toEqual({ success: true, data: [] });
  });

  it("looks into resolved path items", () => {
    const document = makeDocument({
      paths: { "/shared": { $ref: "#/components/pathItems/Shared" } },
      components: {
        pathItems: {
          Shared: { servers: [server("https://shared.example.com")] },
        },
      },
    });

    const output = unwrap(dereference(document));

    expect(collectServers(output.document)).toEqual({
      success: true,
      data: [server("https://shared.example.com")],
    });
  });

  it("fails on a path item that is still a reference", () => {
    const document = makeDocument({
      paths: { "/legacy": { $ref: "#/components/pathItems/Legacy" } },
    });

    expect(collectServers(document)).toEqual({
      success: false,
      error: { type: "notDereferenced", path: "/legacy" },
    });
  });
});
