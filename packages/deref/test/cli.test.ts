import { describe, it, expect } from "vitest";
import dedent from "dedent";
import { ExitCode, runCli } from "../src/cli/main.js";
import { USAGE } from "../src/cli/args.js";
import { MemoryVFS } from "../src/vfs/MemoryVFS.js";
import { createRecordingLogger } from "./utils/fixtures.js";

const petstore = dedent`
  openapi: 3.1.0
  info:
    title: Petstore
    version: 1.0.0
  servers:
    - url: https://api.example.com
  paths:
    /pets:
      get:
        responses:
          "200":
            $ref: "#/components/responses/Ok"
  components:
    responses:
      Ok:
        description: OK
`;

const broken = dedent`
  openapi: 3.1.0
  info:
    title: Petstore
    version: 1.0.0
  paths:
    /pets:
      get:
        parameters:
          - $ref: "#/components/parameters/Missing"
`;

const setup = (files: Record<string, string> = {}) => {
  const vfs = new MemoryVFS(files);
  const logger = createRecordingLogger();
  const out = { stdout: "", stderr: "" };
  const run = (...argv: string[]) =>
    runCli(argv, {
      vfs,
      stdout: (text) => {
        out.stdout += text;
      },
      stderr: (text) => {
        out.stderr += text;
      },
      createLogger: () => logger,
    });
  return { vfs, logger, out, run };
};

describe("runCli", () => {
  it("prints the dereferenced document", async () => {
    const { out, run } = setup({ "api.yaml": petstore });

    expect(await run("api.yaml")).toBe(ExitCode.Ok);
    expect(JSON.parse(out.stdout)).toEqual({
      openapi: "3.1.0",
      info: { title: "Petstore", version: "1.0.0" },
      servers: [{ url: "https://api.example.com" }],
      paths: {
        "/pets": {
          get: {
            responses: {
              "200": {
                $ref: "#/components/responses/Ok",
                $deref: "resolved",
                value: { description: "OK" },
              },
            },
          },
        },
      },
      components: { responses: { Ok: { description: "OK" } } },
    });
  });

  it("warns about per-slot errors and exits with 1", async () => {
    const { logger, run } = setup({ "api.yaml": broken });

    expect(await run("api.yaml")).toBe(ExitCode.SlotErrors);
    expect(logger.lines).toEqual([
      {
        level: "warn",
        message:
          "paths./pets.get.parameters.0: unknown component #/components/parameters/Missing",
      },
    ]);
  });

  it("writes to --out instead of stdout", async () => {
    const { vfs, out, run } = setup({ "api.yaml": petstore });

    expect(await run("api.yaml", "--out", "deref.json")).toBe(ExitCode.Ok);
    expect(out.stdout).toBe("");
    expect(vfs.get("deref.json")).toMatch(/^\{\n  "openapi": "3\.1\.0",/);
  });

  it("prints servers with --servers", async () => {
    const { out, run } = setup({ "api.yaml": petstore });

    expect(await run("api.yaml", "--servers")).toBe(ExitCode.Ok);
    expect(out.stdout).toBe('[\n  {\n    "url": "https://api.example.com"\n  }\n]\n');
  });

  it("fails on a missing file", async () => {
    const { logger, run } = setup();

    expect(await run("missing.yaml")).toBe(ExitCode.Failure);
    expect(logger.lines).toEqual([
      { level: "error", message: "missing.yaml: file not found" },
    ]);
  });

  it("fails when the document is too deep", async () => {
    const { logger, run } = setup({ "api.yaml": petstore });

    expect(await run("api.yaml", "--max-depth", "1")).toBe(ExitCode.Failure);
    expect(logger.lines).toEqual([
      {
        level: "error",
        message: "paths./pets.get.responses.200: document is nested deeper than 1 levels",
      },
    ]);
  });

  it("prints usage on bad arguments", async () => {
    const { out, run } = setup();

    expect(await run()).toBe(ExitCode.Usage);
    expect(out.stderr).toBe(`openapi-deref: missing input file\n\n${USAGE}\n`);
  });

  it("prints help", async () => {
    const { out, run } = setup();

    expect(await run("--help")).toBe(ExitCode.Ok);
    expect(out.stdout).toBe(`${USAGE}\n`);
  });
});
