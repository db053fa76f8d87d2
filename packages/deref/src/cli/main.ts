import type { Logger } from "@openapi-deref/core/logging";
import { dereference } from "../dereference.js";
import { describeDerefError } from "../errors.js";
import { describeLoadError, loadDocument } from "../loader/loadDocument.js";
import { collectServers } from "../servers/collectServers.js";
import { VFS } from "../vfs/VFS.js";
import { CliArgs, parseCliArgs, USAGE } from "./args.js";

export const ExitCode = {
  Ok: 0,
  SlotErrors: 1,
  Failure: 2,
  Usage: 64,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIO {
  vfs: VFS;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createLogger: (options: { debug: boolean }) => Logger;
}

const toJson = (value: unknown): string => JSON.stringify(value, null, 2) + "\n";

export async function runCli(argv: string[], io: CliIO): Promise<ExitCode> {
  const parsed = parseCliArgs(argv);
  if (!parsed.success) {
    io.stderr(`openapi-deref: ${parsed.error.message}\n\n${USAGE}\n`);
    return ExitCode.Usage;
  }
  if (parsed.data.command === "help") {
    io.stdout(`${USAGE}\n`);
    return ExitCode.Ok;
  }
  return run(parsed.data.args, io);
}

async function run(args: CliArgs, io: CliIO): Promise<ExitCode> {
  const logger = io.createLogger({ debug: args.debug });

  const loaded = await loadDocument(io.vfs, args.file);
  if (!loaded.success) {
    logger.error(describeLoadError(loaded.error));
    return ExitCode.Failure;
  }

  const result = dereference(loaded.data, {
    configuration: {
      maxDepth: args.maxDepth,
      shareResolvedComponents: args.share,
      debug: args.debug,
    },
    logger,
  });
  if (!result.success) {
    logger.error(describeDerefError(result.error));
    return ExitCode.Failure;
  }

  const { document, errors } = result.data;
  for (const error of errors) {
    logger.warn(describeDerefError(error));
  }

  let output: string;
  if (args.servers) {
    const servers = collectServers(document);
    if (!servers.success) {
      logger.error(`paths.${servers.error.path}: reference could not be resolved`);
      return ExitCode.Failure;
    }
    output = toJson(servers.data);
  } else {
    output = toJson(document);
  }

  if (args.out !== undefined) {
    const written = await io.vfs.writeFile(args.out, output);
    if (!written.success) {
      logger.error(describeLoadError(written.error));
      return ExitCode.Failure;
    }
  } else {
    io.stdout(output);
  }

  return errors.length > 0 ? ExitCode.SlotErrors : ExitCode.Ok;
}
