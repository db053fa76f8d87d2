/**
 * Typed OpenAPI document model
 * Covers OpenAPI v3.0.3 and v3.1.0
 * https://spec.openapis.org/oas/v3.0.3.html
 * https://spec.openapis.org/oas/v3.1.0.html
 *
 * Zod v4 implementation
 */

import { z } from "zod";
import { ReferenceOr, referenceOr } from "./reference.js";

// ------------------------------------------------------------------------------
// OpenAPI Namespace
//
// Every referenceable position is a `referenceOr(...)` slot, so a document
// parses the same way before and after dereferencing.
// Uses z.lazy() for the three recursive groups:
//   Schema
//   Header -> MediaType -> Encoding -> Header
//   Operation -> Callback -> PathItem -> Operation
// All other types use direct references
// ------------------------------------------------------------------------------
export namespace OpenAPI {
  // ===========================================================================
  // Layer 1: Leaf types (no dependencies)
  // ===========================================================================

  // XML Object
  export const XML = z.object({
    name: z.string().optional(),
    namespace: z.string().optional(),
    prefix: z.string().optional(),
    attribute: z.boolean().optional(),
    wrapped: z.boolean().optional(),
  });

  // Discriminator Object
  export const Discriminator = z.object({
    propertyName: z.string(),
    mapping: z.record(z.string(), z.string()).optional(),
  });

  // Contact Object
  export const Contact = z.object({
    name: z.string().optional(),
    url: z.string().optional(),
    email: z.string().optional(),
  });

  // License Object
  export const License = z.object({
    name: z.string(),
    identifier: z.string().optional(),
    url: z.string().optional(),
  });

  // Server Variable Object
  export const ServerVariable = z.object({
    enum: z.array(z.string()).optional(),
    default: z.string(),
    description: z.string().optional(),
  });

  // OAuth Flow Object
  export const OAuthFlow = z.object({
    authorizationUrl: z.string().optional(),
    tokenUrl: z.string().optional(),
    refreshUrl: z.string().optional(),
    scopes: z.record(z.string(), z.string()),
  });

  // Example Object
  export const Example = z.object({
    summary: z.string().optional(),
    description: z.string().optional(),
    value: z.unknown().optional(),
    externalValue: z.string().optional(),
  });

  // Security Requirement Object
  export const SecurityRequirement = z.record(z.string(), z.array(z.string()));

  // ===========================================================================
  // Layer 2: Simple composed types
  // ===========================================================================

  // External Documentation Object
  export const ExternalDocumentation = z.object({
    description: z.string().optional(),
    url: z.string(),
  });

  // OAuth Flows Object
  export const OAuthFlows = z.object({
    implicit: OAuthFlow.optional(),
    password: OAuthFlow.optional(),
    clientCredentials: OAuthFlow.optional(),
    authorizationCode: OAuthFlow.optional(),
  });

  // Server Object
  export const Server = z.object({
    url: z.string(),
    description: z.string().optional(),
    variables: z.record(z.string(), ServerVariable).optional(),
  });

  // ===========================================================================
  // Layer 3: Schema (recursive - uses z.lazy)
  // ===========================================================================

  type SchemaType = {
    // JSON Schema properties
    title?: string;
    multipleOf?: number;
    maximum?: number;
    // boolean in 3.0, number in 3.1
    exclusiveMaximum?: boolean | number;
    minimum?: number;
    exclusiveMinimum?: boolean | number;
    maxLength?: number;
    minLength?: number;
    pattern?: string;
    maxItems?: number;
    minItems?: number;
    uniqueItems?: boolean;
    maxProperties?: number;
    minProperties?: number;
    required?: string[];
    enum?: unknown[];
    const?: unknown;

    // Modified JSON Schema properties
    type?: string | string[];
    allOf?: ReferenceOr<SchemaType>[];
    oneOf?: ReferenceOr<SchemaType>[];
    anyOf?: ReferenceOr<SchemaType>[];
    not?: ReferenceOr<SchemaType>;
    if?: ReferenceOr<SchemaType>;
    then?: ReferenceOr<SchemaType>;
    else?: ReferenceOr<SchemaType>;
    items?: ReferenceOr<SchemaType>;
    prefixItems?: ReferenceOr<SchemaType>[];
    properties?: Record<string, ReferenceOr<SchemaType>>;
    additionalProperties?: boolean | ReferenceOr<SchemaType>;
    description?: string;
    format?: string;
    default?: unknown;

    // OpenAPI-specific properties
    nullable?: boolean;
    discriminator?: Discriminator;
    readOnly?: boolean;
    writeOnly?: boolean;
    xml?: XML;
    externalDocs?: ExternalDocumentation;
    example?: unknown;
    examples?: unknown[];
    deprecated?: boolean;
  };

  const SchemaOrRef: z.ZodType<ReferenceOr<SchemaType>> = z.lazy(() =>
    referenceOr(Schema)
  );

  export const Schema: z.ZodType<SchemaType> = z.lazy(() =>
    z.object({
      // JSON Schema properties
      title: z.string().optional(),
      multipleOf: z.number().optional(),
      maximum: z.number().optional(),
      exclusiveMaximum: z.union([z.boolean(), z.number()]).optional(),
      minimum: z.number().optional(),
      exclusiveMinimum: z.union([z.boolean(), z.number()]).optional(),
      maxLength: z.number().int().optional(),
      minLength: z.number().int().optional(),
      pattern: z.string().optional(),
      maxItems: z.number().int().optional(),
      minItems: z.number().int().optional(),
      uniqueItems: z.boolean().optional(),
      maxProperties: z.number().int().optional(),
      minProperties: z.number().int().optional(),
      required: z.array(z.string()).optional(),
      enum: z.array(z.unknown()).optional(),
      const: z.unknown().optional(),

      // Modified JSON Schema properties - use SchemaOrRef for schema references
      type: z.union([z.string(), z.array(z.string())]).optional(),
      allOf: z.array(SchemaOrRef).optional(),
      oneOf: z.array(SchemaOrRef).optional(),
      anyOf: z.array(SchemaOrRef).optional(),
      not: SchemaOrRef.optional(),
      if: SchemaOrRef.optional(),
      then: SchemaOrRef.optional(),
      else: SchemaOrRef.optional(),
      items: SchemaOrRef.optional(),
      prefixItems: z.array(SchemaOrRef).optional(),
      properties: z.record(z.string(), SchemaOrRef).optional(),
      additionalProperties: z.union([z.boolean(), SchemaOrRef]).optional(),
      description: z.string().optional(),
      format: z.string().optional(),
      default: z.unknown().optional(),

      // OpenAPI-specific properties
      nullable: z.boolean().optional(),
      discriminator: Discriminator.optional(),
      readOnly: z.boolean().optional(),
      writeOnly: z.boolean().optional(),
      xml: XML.optional(),
      externalDocs: ExternalDocumentation.optional(),
      example: z.unknown().optional(),
      examples: z.array(z.unknown()).optional(),
      deprecated: z.boolean().optional(),
    })
  );

  // ===========================================================================
  // Layer 4: Schema-dependent types
  // ===========================================================================

  const ExampleOrReference = referenceOr(Example);

  type HeaderType = {
    description?: string;
    required?: boolean;
    deprecated?: boolean;
    allowEmptyValue?: boolean;
    style?: string;
    explode?: boolean;
    allowReserved?: boolean;
    schema?: ReferenceOr<SchemaType>;
    example?: unknown;
    examples?: Record<string, ReferenceOr<Example>>;
    content?: Record<string, MediaTypeType>;
  };

  type MediaTypeType = {
    schema?: ReferenceOr<SchemaType>;
    example?: unknown;
    examples?: Record<string, ReferenceOr<Example>>;
    encoding?: Record<string, EncodingType>;
  };

  type EncodingType = {
    contentType?: string;
    headers?: Record<string, ReferenceOr<HeaderType>>;
    style?: string;
    explode?: boolean;
    allowReserved?: boolean;
  };

  // Header Object
  export const Header: z.ZodType<HeaderType> = z.lazy(() =>
    z.object({
      description: z.string().optional(),
      required: z.boolean().optional(),
      deprecated: z.boolean().optional(),
      allowEmptyValue: z.boolean().optional(),
      style: z.string().optional(),
      explode: z.boolean().optional(),
      allowReserved: z.boolean().optional(),
      schema: SchemaOrRef.optional(),
      example: z.unknown().optional(),
      examples: z.record(z.string(), ExampleOrReference).optional(),
      content: z.record(z.string(), MediaType).optional(),
    })
  );

  const HeaderOrReference: z.ZodType<ReferenceOr<HeaderType>> = z.lazy(() =>
    referenceOr(Header)
  );

  // Encoding Object
  export const Encoding: z.ZodType<EncodingType> = z.lazy(() =>
    z.object({
      contentType: z.string().optional(),
      headers: z.record(z.string(), HeaderOrReference).optional(),
      style: z.string().optional(),
      explode: z.boolean().optional(),
      allowReserved: z.boolean().optional(),
    })
  );

  // MediaType Object
  export const MediaType: z.ZodType<MediaTypeType> = z.lazy(() =>
    z.object({
      schema: SchemaOrRef.optional(),
      example: z.unknown().optional(),
      examples: z.record(z.string(), ExampleOrReference).optional(),
      encoding: z.record(z.string(), Encoding).optional(),
    })
  );

  // Link Object
  export const Link = z.object({
    operationRef: z.string().optional(),
    operationId: z.string().optional(),
    parameters: z.record(z.string(), z.unknown()).optional(),
    requestBody: z.unknown().optional(),
    description: z.string().optional(),
    server: Server.optional(),
  });

  const LinkOrReference = referenceOr(Link);

  // Response Object
  export const Response = z.object({
    description: z.string(),
    headers: z.record(z.string(), HeaderOrReference).optional(),
    content: z.record(z.string(), MediaType).optional(),
    links: z.record(z.string(), LinkOrReference).optional(),
  });

  const ResponseOrReference = referenceOr(Response);

  // Parameter Object
  export const Parameter = z.object({
    name: z.string(),
    in: z.union([
      z.literal("query"),
      z.literal("header"),
      z.literal("path"),
      z.literal("cookie"),
    ]),
    description: z.string().optional(),
    required: z.boolean().optional(),
    deprecated: z.boolean().optional(),
    allowEmptyValue: z.boolean().optional(),
    style: z.string().optional(),
    explode: z.boolean().optional(),
    allowReserved: z.boolean().optional(),
    schema: SchemaOrRef.optional(),
    example: z.unknown().optional(),
    examples: z.record(z.string(), ExampleOrReference).optional(),
    content: z.record(z.string(), MediaType).optional(),
  });

  const ParameterOrReference = referenceOr(Parameter);

  // Request Body Object
  export const RequestBody = z.object({
    description: z.string().optional(),
    content: z.record(z.string(), MediaType),
    required: z.boolean().optional(),
  });

  const RequestBodyOrReference = referenceOr(RequestBody);

  // Security Scheme Object
  export const SecurityScheme = z.object({
    type: z.union([
      z.literal("apiKey"),
      z.literal("http"),
      z.literal("mutualTLS"),
      z.literal("oauth2"),
      z.literal("openIdConnect"),
    ]),
    description: z.string().optional(),
    name: z.string().optional(),
    in: z
      .union([z.literal("query"), z.literal("header"), z.literal("cookie")])
      .optional(),
    scheme: z.string().optional(),
    bearerFormat: z.string().optional(),
    flows: OAuthFlows.optional(),
    openIdConnectUrl: z.string().optional(),
  });

  const SecuritySchemeOrReference = referenceOr(SecurityScheme);

  // ===========================================================================
  // Layer 5: Operation-level types (recursive through callbacks)
  // ===========================================================================

  type OperationType = {
    tags?: string[];
    summary?: string;
    description?: string;
    externalDocs?: ExternalDocumentation;
    operationId?: string;
    parameters?: ReferenceOr<Parameter>[];
    requestBody?: ReferenceOr<RequestBody>;
    // required in 3.0, optional in 3.1
    responses?: Record<string, ReferenceOr<Response>>;
    callbacks?: Record<string, ReferenceOr<CallbackType>>;
    deprecated?: boolean;
    security?: SecurityRequirement[];
    servers?: Server[];
  };

  type PathItemType = {
    summary?: string;
    description?: string;
    get?: OperationType;
    put?: OperationType;
    post?: OperationType;
    delete?: OperationType;
    options?: OperationType;
    head?: OperationType;
    patch?: OperationType;
    trace?: OperationType;
    servers?: Server[];
    parameters?: ReferenceOr<Parameter>[];
  };

  type CallbackType = Record<string, ReferenceOr<PathItemType>>;

  const PathItemOrReference: z.ZodType<ReferenceOr<PathItemType>> = z.lazy(
    () => referenceOr(PathItem)
  );

  // Callback Object
  export const Callback: z.ZodType<CallbackType> = z.lazy(() =>
    z.record(z.string(), PathItemOrReference)
  );

  const CallbackOrReference: z.ZodType<ReferenceOr<CallbackType>> = z.lazy(
    () => referenceOr(Callback)
  );

  // Operation Object
  export const Operation: z.ZodType<OperationType> = z.lazy(() =>
    z.object({
      tags: z.array(z.string()).optional(),
      summary: z.string().optional(),
      description: z.string().optional(),
      externalDocs: ExternalDocumentation.optional(),
      operationId: z.string().optional(),
      parameters: z.array(ParameterOrReference).optional(),
      requestBody: RequestBodyOrReference.optional(),
      responses: z.record(z.string(), ResponseOrReference).optional(),
      callbacks: z.record(z.string(), CallbackOrReference).optional(),
      deprecated: z.boolean().optional(),
      security: z.array(SecurityRequirement).optional(),
      servers: z.array(Server).optional(),
    })
  );

  // Path Item Object
  export const PathItem: z.ZodType<PathItemType> = z.lazy(() =>
    z.object({
      summary: z.string().optional(),
      description: z.string().optional(),
      get: Operation.optional(),
      put: Operation.optional(),
      post: Operation.optional(),
      delete: Operation.optional(),
      options: Operation.optional(),
      head: Operation.optional(),
      patch: Operation.optional(),
      trace: Operation.optional(),
      servers: z.array(Server).optional(),
      parameters: z.array(ParameterOrReference).optional(),
    })
  );

  // ===========================================================================
  // Layer 6: Components
  // ===========================================================================

  // Components Object
  export const Components = z.object({
    schemas: z.record(z.string(), SchemaOrRef).optional(),
    responses: z.record(z.string(), ResponseOrReference).optional(),
    parameters: z.record(z.string(), ParameterOrReference).optional(),
    examples: z.record(z.string(), ExampleOrReference).optional(),
    requestBodies: z.record(z.string(), RequestBodyOrReference).optional(),
    headers: z.record(z.string(), HeaderOrReference).optional(),
    securitySchemes: z.record(z.string(), SecuritySchemeOrReference).optional(),
    links: z.record(z.string(), LinkOrReference).optional(),
    callbacks: z.record(z.string(), CallbackOrReference).optional(),
    // 3.1
    pathItems: z.record(z.string(), PathItemOrReference).optional(),
  });

  // ===========================================================================
  // Layer 7: Top-level types
  // ===========================================================================

  // Tag Object
  export const Tag = z.object({
    name: z.string(),
    description: z.string().optional(),
    externalDocs: ExternalDocumentation.optional(),
  });

  // Info Object
  export const Info = z.object({
    title: z.string(),
    summary: z.string().optional(),
    description: z.string().optional(),
    termsOfService: z.string().optional(),
    contact: Contact.optional(),
    license: License.optional(),
    version: z.string(),
  });

  // OpenAPI Document Object
  export const Document = z.object({
    openapi: z.string(),
    info: Info,
    jsonSchemaDialect: z.string().optional(),
    servers: z.array(Server).optional(),
    paths: z.record(z.string(), PathItemOrReference).optional(),
    // 3.1
    webhooks: z.record(z.string(), PathItemOrReference).optional(),
    components: Components.optional(),
    security: z.array(SecurityRequirement).optional(),
    tags: z.array(Tag).optional(),
    externalDocs: ExternalDocumentation.optional(),
  });

  // ===========================================================================
  // Type exports
  // ===========================================================================
  export type ExternalDocumentation = z.infer<typeof ExternalDocumentation>;
  export type XML = z.infer<typeof XML>;
  export type Discriminator = z.infer<typeof Discriminator>;
  export type Schema = z.infer<typeof Schema>;
  export type MediaType = z.infer<typeof MediaType>;
  export type Example = z.infer<typeof Example>;
  export type Encoding = z.infer<typeof Encoding>;
  export type Header = z.infer<typeof Header>;
  export type Link = z.infer<typeof Link>;
  export type Server = z.infer<typeof Server>;
  export type ServerVariable = z.infer<typeof ServerVariable>;
  export type Response = z.infer<typeof Response>;
  export type Parameter = z.infer<typeof Parameter>;
  export type RequestBody = z.infer<typeof RequestBody>;
  export type Callback = z.infer<typeof Callback>;
  export type SecurityRequirement = z.infer<typeof SecurityRequirement>;
  export type Operation = z.infer<typeof Operation>;
  export type PathItem = z.infer<typeof PathItem>;
  export type SecurityScheme = z.infer<typeof SecurityScheme>;
  export type OAuthFlows = z.infer<typeof OAuthFlows>;
  export type OAuthFlow = z.infer<typeof OAuthFlow>;
  export type Components = z.infer<typeof Components>;
  export type Tag = z.infer<typeof Tag>;
  export type Contact = z.infer<typeof Contact>;
  export type License = z.infer<typeof License>;
  export type Info = z.infer<typeof Info>;
  export type Document = z.infer<typeof Document>;

  export const HTTP_METHODS = [
    "get",
    "put",
    "post",
    "delete",
    "options",
    "head",
    "patch",
    "trace",
  ] as const;

  export type HttpMethod = (typeof HTTP_METHODS)[number];
}
