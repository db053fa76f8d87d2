#!/usr/bin/env node
import { createConsoleLogger } from "@openapi-deref/core/logging";
import { runCli } from "./cli/main.js";
import { NodeVFS } from "./vfs/NodeVFS.js";

const exitCode = await runCli(process.argv.slice(2), {
  vfs: new NodeVFS(),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  createLogger: createConsoleLogger,
});

process.exitCode = exitCode;
