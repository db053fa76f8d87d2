import type { OpenAPI } from "@openapi-deref/core/openapi";
import { DerefConfiguration } from "@openapi-deref/core/configuration";
import { Logger, silentLogger } from "@openapi-deref/core/logging";
import { err, ok, Result } from "@openapi-deref/core/result";
import { ComponentIndex } from "../components/ComponentIndex.js";
import { SlotError, TooDeepError } from "../errors.js";
import { MaxDepthExceeded, ResolveContext, ResolveStats } from "./ResolveContext.js";
import { collectReferences, findCycleGroups } from "./graph.js";
import { SlotResolver } from "./walk.js";

export interface ResolveOutput {
  document: OpenAPI.Document;
  /** Per-slot errors in traversal order */
  errors: SlotError[];
  stats: ResolveStats;
}

export interface ResolverOptions {
  config: DerefConfiguration;
  logger?: Logger;
}

export class Resolver {
  private config: DerefConfiguration;
  private logger: Logger;

  constructor(
    private index: ComponentIndex,
    options: ResolverOptions
  ) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Replace every reference slot in `document` with its resolved state.
   * The input is not modified.
   */
  resolve(document: OpenAPI.Document): Result<ResolveOutput, TooDeepError> {
    const groups = findCycleGroups(
      collectReferences(this.index, this.config.maxDepth)
    );
    const ctx = new ResolveContext(this.index, this.config, groups, this.logger);

    let resolved: OpenAPI.Document;
    try {
      resolved = new SlotResolver(ctx).walkDocument(document);
    } catch (error) {
      if (error instanceof MaxDepthExceeded) {
        ctx.debug(error.message);
        return err({
          type: "tooDeep",
          location: error.location,
          maxDepth: error.maxDepth,
        });
      }
      throw error;
    }

    const { references, circular, shared } = ctx.stats;
    ctx.debug(
      `Resolved ${references} references (${circular} circular, ${shared} shared) with ${ctx.errors.length} errors`
    );

    return ok({ document: resolved, errors: ctx.errors, stats: ctx.stats });
  }
}
