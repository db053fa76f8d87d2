import { getSlotValue, OpenAPI } from "@openapi-deref/core/openapi";
import { err, ok, Result } from "@openapi-deref/core/result";

export type CollectServersError = {
  type: "notDereferenced";
  /** Key of the path entry that is still a reference */
  path: string;
};

/**
 * Gather `servers` from every level of a dereferenced document: the document
 * itself, then each path item followed by its operations.
 */
export function collectServers(
  document: OpenAPI.Document
): Result<OpenAPI.Server[], CollectServersError> {
  const servers: OpenAPI.Server[] = [...(document.servers ?? [])];

  for (const [path, slot] of Object.entries(document.paths ?? {})) {
    const pathItem = getSlotValue(slot);
    if (!pathItem) {
      return err({ type: "notDereferenced", path });
    }

    servers.push(...(pathItem.servers ?? []));
    for (const method of OpenAPI.HTTP_METHODS) {
      servers.push(...(pathItem[method]?.servers ?? []));
    }
  }

  return ok(servers);
}
