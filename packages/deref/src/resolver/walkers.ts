import { ComponentKind, OpenAPI } from "@openapi-deref/core/openapi";
import { ComponentNode, ComponentValues } from "../components/ComponentIndex.js";
import type { DocumentPath } from "./ResolveContext.js";

/**
 * Receives every referenceable slot and every list of security requirements
 * met while walking a node. Walkers copy the node and put whatever `slot`
 * returns in place of each slot.
 */
export interface SlotVisitor {
  slot<K extends ComponentKind>(
    slot: ComponentNode<K>,
    kind: K,
    path: DocumentPath
  ): ComponentNode<K>;
  security(requirements: OpenAPI.SecurityRequirement[], path: DocumentPath): void;
}

type Walker<T> = (node: T, visitor: SlotVisitor, path: DocumentPath) => T;

export type Walkers = {
  [K in ComponentKind]: Walker<ComponentValues[K]>;
};

export const mapRecord = <T, U>(
  record: Record<string, T>,
  fn: (value: T, key: string) => U
): Record<string, U> =>
  Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, fn(value, key)])
  );

export const slotRecord = <K extends ComponentKind>(
  record: Record<string, ComponentNode<K>>,
  kind: K,
  visitor: SlotVisitor,
  path: DocumentPath
): Record<string, ComponentNode<K>> =>
  mapRecord(record, (slot, key) => visitor.slot(slot, kind, [...path, key]));

const slotArray = <K extends ComponentKind>(
  slots: ComponentNode<K>[],
  kind: K,
  visitor: SlotVisitor,
  path: DocumentPath
): ComponentNode<K>[] =>
  slots.map((slot, i) => visitor.slot(slot, kind, [...path, i]));

// ===========================================================================
// Schema
// ===========================================================================

const SCHEMA_LISTS = ["allOf", "oneOf", "anyOf", "prefixItems"] as const;
const SCHEMA_SINGLES = ["not", "if", "then", "else", "items"] as const;

function walkSchema(
  schema: OpenAPI.Schema,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Schema {
  const result: OpenAPI.Schema = { ...schema };

  for (const key of SCHEMA_LISTS) {
    const slots = schema[key];
    if (slots) result[key] = slotArray(slots, "Schema", visitor, [...path, key]);
  }

  if (schema.properties) {
    result.properties = slotRecord(schema.properties, "Schema", visitor, [
      ...path,
      "properties",
    ]);
  }

  for (const key of SCHEMA_SINGLES) {
    const slot = schema[key];
    if (slot) result[key] = visitor.slot(slot, "Schema", [...path, key]);
  }

  if (typeof schema.additionalProperties === "object") {
    result.additionalProperties = visitor.slot(
      schema.additionalProperties,
      "Schema",
      [...path, "additionalProperties"]
    );
  }

  return result;
}

// ===========================================================================
// Content, parameters, headers
// ===========================================================================

function walkContent(
  content: Record<string, OpenAPI.MediaType>,
  visitor: SlotVisitor,
  path: DocumentPath
): Record<string, OpenAPI.MediaType> {
  return mapRecord(content, (mediaType, key) =>
    walkMediaType(mediaType, visitor, [...path, key])
  );
}

function walkMediaType(
  mediaType: OpenAPI.MediaType,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.MediaType {
  const result = { ...mediaType };
  if (mediaType.schema) {
    result.schema = visitor.slot(mediaType.schema, "Schema", [...path, "schema"]);
  }
  if (mediaType.examples) {
    result.examples = slotRecord(mediaType.examples, "Example", visitor, [
      ...path,
      "examples",
    ]);
  }
  if (mediaType.encoding) {
    result.encoding = mapRecord(mediaType.encoding, (encoding, key) =>
      walkEncoding(encoding, visitor, [...path, "encoding", key])
    );
  }
  return result;
}

function walkEncoding(
  encoding: OpenAPI.Encoding,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Encoding {
  const result = { ...encoding };
  if (encoding.headers) {
    result.headers = slotRecord(encoding.headers, "Header", visitor, [
      ...path,
      "headers",
    ]);
  }
  return result;
}

function walkParameter(
  parameter: OpenAPI.Parameter,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Parameter {
  const result = { ...parameter };
  if (parameter.schema) {
    result.schema = visitor.slot(parameter.schema, "Schema", [...path, "schema"]);
  }
  if (parameter.examples) {
    result.examples = slotRecord(parameter.examples, "Example", visitor, [
      ...path,
      "examples",
    ]);
  }
  if (parameter.content) {
    result.content = walkContent(parameter.content, visitor, [...path, "content"]);
  }
  return result;
}

function walkHeader(
  header: OpenAPI.Header,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Header {
  const result = { ...header };
  if (header.schema) {
    result.schema = visitor.slot(header.schema, "Schema", [...path, "schema"]);
  }
  if (header.examples) {
    result.examples = slotRecord(header.examples, "Example", visitor, [
      ...path,
      "examples",
    ]);
  }
  if (header.content) {
    result.content = walkContent(header.content, visitor, [...path, "content"]);
  }
  return result;
}

// ===========================================================================
// Request bodies and responses
// ===========================================================================

function walkRequestBody(
  requestBody: OpenAPI.RequestBody,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.RequestBody {
  return {
    ...requestBody,
    content: walkContent(requestBody.content, visitor, [...path, "content"]),
  };
}

function walkResponse(
  response: OpenAPI.Response,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Response {
  const result = { ...response };
  if (response.headers) {
    result.headers = slotRecord(response.headers, "Header", visitor, [
      ...path,
      "headers",
    ]);
  }
  if (response.content) {
    result.content = walkContent(response.content, visitor, [...path, "content"]);
  }
  if (response.links) {
    result.links = slotRecord(response.links, "Link", visitor, [...path, "links"]);
  }
  return result;
}

// Examples, links and security schemes hold no slots
const walkLeaf = <T>(node: T): T => node;

// ===========================================================================
// Operations, path items, callbacks
// ===========================================================================

function walkOperation(
  operation: OpenAPI.Operation,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Operation {
  const result = { ...operation };
  if (operation.parameters) {
    result.parameters = slotArray(operation.parameters, "Parameter", visitor, [
      ...path,
      "parameters",
    ]);
  }
  if (operation.requestBody) {
    result.requestBody = visitor.slot(operation.requestBody, "RequestBody", [
      ...path,
      "requestBody",
    ]);
  }
  if (operation.responses) {
    result.responses = slotRecord(operation.responses, "Response", visitor, [
      ...path,
      "responses",
    ]);
  }
  if (operation.callbacks) {
    result.callbacks = slotRecord(operation.callbacks, "Callback", visitor, [
      ...path,
      "callbacks",
    ]);
  }
  if (operation.security) {
    visitor.security(operation.security, [...path, "security"]);
  }
  return result;
}

function walkPathItem(
  pathItem: OpenAPI.PathItem,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.PathItem {
  const result = { ...pathItem };
  if (pathItem.parameters) {
    result.parameters = slotArray(pathItem.parameters, "Parameter", visitor, [
      ...path,
      "parameters",
    ]);
  }
  for (const method of OpenAPI.HTTP_METHODS) {
    const operation = pathItem[method];
    if (operation) {
      result[method] = walkOperation(operation, visitor, [...path, method]);
    }
  }
  return result;
}

function walkCallback(
  callback: OpenAPI.Callback,
  visitor: SlotVisitor,
  path: DocumentPath
): OpenAPI.Callback {
  return slotRecord(callback, "PathItem", visitor, path);
}

export const walkers: Walkers = {
  Schema: walkSchema,
  Response: walkResponse,
  Parameter: walkParameter,
  Example: walkLeaf,
  RequestBody: walkRequestBody,
  Header: walkHeader,
  SecurityScheme: walkLeaf,
  Link: walkLeaf,
  Callback: walkCallback,
  PathItem: walkPathItem,
};
