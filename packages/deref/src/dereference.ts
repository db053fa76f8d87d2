import type { OpenAPI } from "@openapi-deref/core/openapi";
import {
  DerefConfiguration,
  DerefConfigurationInput,
} from "@openapi-deref/core/configuration";
import type { Logger } from "@openapi-deref/core/logging";
import { Result } from "@openapi-deref/core/result";
import { ComponentIndex } from "./components/ComponentIndex.js";
import { FatalError } from "./errors.js";
import { ResolveOutput, Resolver } from "./resolver/Resolver.js";

export interface DereferenceOptions {
  configuration?: DerefConfigurationInput;
  logger?: Logger;
}

/**
 * Build the component index of `document` and resolve every reference in it.
 *
 * Fails only on a duplicate component or when the document is nested deeper
 * than `maxDepth`; every other problem is reported per slot in `errors`.
 */
export function dereference(
  document: OpenAPI.Document,
  options: DereferenceOptions = {}
): Result<ResolveOutput, FatalError> {
  const config = DerefConfiguration.parse(options.configuration ?? {});

  const index = ComponentIndex.build(document);
  if (!index.success) {
    return index;
  }

  const resolver = new Resolver(index.data, { config, logger: options.logger });
  return resolver.resolve(document);
}
