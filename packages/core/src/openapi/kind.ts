import { z } from "zod";

// Kinds of reusable components, one per `components` section
export const ComponentKind = z.enum([
  "Schema",
  "Response",
  "Parameter",
  "Example",
  "RequestBody",
  "Header",
  "SecurityScheme",
  "Link",
  "Callback",
  "PathItem",
]);

export type ComponentKind = z.infer<typeof ComponentKind>;

export const ComponentSection = z.enum([
  "schemas",
  "responses",
  "parameters",
  "examples",
  "requestBodies",
  "headers",
  "securitySchemes",
  "links",
  "callbacks",
  "pathItems",
]);

export type ComponentSection = z.infer<typeof ComponentSection>;

const sectionKinds: Record<ComponentSection, ComponentKind> = {
  schemas: "Schema",
  responses: "Response",
  parameters: "Parameter",
  examples: "Example",
  requestBodies: "RequestBody",
  headers: "Header",
  securitySchemes: "SecurityScheme",
  links: "Link",
  callbacks: "Callback",
  pathItems: "PathItem",
};

const kindSections: Record<ComponentKind, ComponentSection> = {
  Schema: "schemas",
  Response: "responses",
  Parameter: "parameters",
  Example: "examples",
  RequestBody: "requestBodies",
  Header: "headers",
  SecurityScheme: "securitySchemes",
  Link: "links",
  Callback: "callbacks",
  PathItem: "pathItems",
};

export const isComponentSection = (value: string): value is ComponentSection =>
  ComponentSection.safeParse(value).success;

export const getSectionKind = (section: ComponentSection): ComponentKind =>
  sectionKinds[section];

export const getKindSection = (kind: ComponentKind): ComponentSection =>
  kindSections[kind];
