import { err, ok, Result } from "@openapi-deref/core/result";

export interface CliArgs {
  file: string;
  out?: string;
  maxDepth?: number;
  share: boolean;
  debug: boolean;
  servers: boolean;
}

export type ParsedArgs = { command: "help" } | { command: "run"; args: CliArgs };

export type UsageError = { type: "usage"; message: string };

export const USAGE = `Usage: openapi-deref <file> [options]

Resolve every local $ref in an OpenAPI 3.0/3.1 document (YAML or JSON)
and print the result as JSON.

Options:
  --out <file>       Write the result to <file> instead of stdout
  --max-depth <n>    Maximum nesting depth (default: 512)
  --no-share         Resolve every reference separately
  --servers          Print the servers from every level instead
  --debug            Log resolution details to stderr
  -h, --help         Show this help message`;

const usage = (message: string) => err<UsageError>({ type: "usage", message });

/**
 * Parse command line arguments, without the node executable and script path.
 */
export function parseCliArgs(argv: string[]): Result<ParsedArgs, UsageError> {
  let file: string | undefined;
  let out: string | undefined;
  let maxDepth: number | undefined;
  let share = true;
  let debug = false;
  let servers = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        return ok({ command: "help" });
      case "--out": {
        const value = argv[++i];
        if (value === undefined) return usage("--out needs a file name");
        out = value;
        break;
      }
      case "--max-depth": {
        const value = argv[++i];
        const parsed = Number(value);
        if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
          return usage("--max-depth needs a positive integer");
        }
        maxDepth = parsed;
        break;
      }
      case "--no-share":
        share = false;
        break;
      case "--debug":
        debug = true;
        break;
      case "--servers":
        servers = true;
        break;
      default:
        if (arg.startsWith("-")) return usage(`unknown option ${arg}`);
        if (file !== undefined) return usage(`unexpected argument ${arg}`);
        file = arg;
    }
  }

  if (file === undefined) return usage("missing input file");

  const args: CliArgs = { file, share, debug, servers };
  if (out !== undefined) args.out = out;
  if (maxDepth !== undefined) args.maxDepth = maxDepth;
  return ok({ command: "run", args });
}
