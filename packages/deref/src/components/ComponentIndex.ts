import {
  ComponentKind,
  ComponentSection,
  getKindSection,
  getSectionKind,
  isComponentSection,
  OpenAPI,
  ReferenceOr,
} from "@openapi-deref/core/openapi";
import {
  formatJsonPointer,
  isLocalPointer,
  parseJsonPointer,
} from "@openapi-deref/core/json-pointer";
import { err, ok, Result } from "@openapi-deref/core/result";
import { DuplicateComponentError, LookupError } from "../errors.js";

/**
 * Value type stored under each component kind
 */
export type ComponentValues = {
  Schema: OpenAPI.Schema;
  Response: OpenAPI.Response;
  Parameter: OpenAPI.Parameter;
  Example: OpenAPI.Example;
  RequestBody: OpenAPI.RequestBody;
  Header: OpenAPI.Header;
  SecurityScheme: OpenAPI.SecurityScheme;
  Link: OpenAPI.Link;
  Callback: OpenAPI.Callback;
  PathItem: OpenAPI.PathItem;
};

export type ComponentNode<K extends ComponentKind> = ReferenceOr<
  ComponentValues[K]
>;

export type ComponentEntry<K extends ComponentKind = ComponentKind> = {
  /** Canonical pointer, e.g. `#/components/schemas/Pet` */
  pointer: string;
  kind: K;
  section: ComponentSection;
  name: string;
  node: ComponentNode<K>;
};

export type ComponentVisitor = <K extends ComponentKind>(
  entry: ComponentEntry<K>
) => void;

type ComponentTables = {
  [K in ComponentKind]: Map<string, ComponentNode<K>>;
};

export type ComponentAddress = {
  section: ComponentSection;
  kind: ComponentKind;
  name: string;
};

/**
 * Format the canonical pointer of a component
 */
export const toComponentPointer = (kind: ComponentKind, name: string): string =>
  formatJsonPointer(["components", getKindSection(kind), name]);

/**
 * Parse `#/components/<section>/<name>`. Anything else (external files,
 * URLs, pointers into other parts of the document) is malformed.
 */
export const parseComponentPointer = (
  pointer: string
): Result<ComponentAddress, LookupError> => {
  const malformed = (message: string) =>
    err<LookupError>({ type: "malformedPointer", pointer, message });

  if (!isLocalPointer(pointer)) {
    return malformed("references must be in the same document and start with #");
  }

  const parsed = parseJsonPointer(pointer);
  if (!parsed.success) {
    return malformed(parsed.error.message);
  }

  const [root, section, name] = parsed.data;
  if (parsed.data.length !== 3 || root !== "components") {
    return malformed("expected #/components/<section>/<name>");
  }
  if (!isComponentSection(section)) {
    return malformed(`unknown component section "${section}"`);
  }

  return ok({ section, kind: getSectionKind(section), name });
};

/**
 * Lookup table from canonical pointer to component node.
 * Filled before resolution starts and only read afterwards.
 */
export class ComponentIndex {
  private tables: ComponentTables = {
    Schema: new Map(),
    Response: new Map(),
    Parameter: new Map(),
    Example: new Map(),
    RequestBody: new Map(),
    Header: new Map(),
    SecurityScheme: new Map(),
    Link: new Map(),
    Callback: new Map(),
    PathItem: new Map(),
  };

  static build(
    document: OpenAPI.Document
  ): Result<ComponentIndex, DuplicateComponentError> {
    const index = new ComponentIndex();
    const components = document.components;
    if (!components) {
      return ok(index);
    }

    const results = [
      index.registerAll("Schema", components.schemas),
      index.registerAll("Response", components.responses),
      index.registerAll("Parameter", components.parameters),
      index.registerAll("Example", components.examples),
      index.registerAll("RequestBody", components.requestBodies),
      index.registerAll("Header", components.headers),
      index.registerAll("SecurityScheme", components.securitySchemes),
      index.registerAll("Link", components.links),
      index.registerAll("Callback", components.callbacks),
      index.registerAll("PathItem", components.pathItems),
    ];

    for (const result of results) {
      if (!result.success) return result;
    }
    return ok(index);
  }

  get size(): number {
    return Object.values(this.tables).reduce(
      (total, table) => total + table.size,
      0
    );
  }

  register<K extends ComponentKind>(
    kind: K,
    name: string,
    node: ComponentNode<K>
  ): Result<void, DuplicateComponentError> {
    const table = this.tables[kind];
    if (table.has(name)) {
      return err({
        type: "duplicateComponent",
        pointer: toComponentPointer(kind, name),
      });
    }
    table.set(name, node);
    return ok(undefined);
  }

  lookup<K extends ComponentKind>(
    pointer: string,
    expected: K
  ): Result<ComponentEntry<K>, LookupError> {
    const address = parseComponentPointer(pointer);
    if (!address.success) {
      return address;
    }

    const { kind, section, name } = address.data;
    const canonical = toComponentPointer(kind, name);

    if (!this.tables[kind].has(name)) {
      return err({ type: "unknownComponent", pointer });
    }
    if (kind !== expected) {
      return err({ type: "kindMismatch", pointer, expected, actual: kind });
    }

    const node = this.tables[expected].get(name);
    if (node === undefined) {
      return err({ type: "unknownComponent", pointer });
    }
    return ok({ pointer: canonical, kind: expected, section, name, node });
  }

  has(kind: ComponentKind, name: string): boolean {
    return this.tables[kind].has(name);
  }

  /** Visit every component, section by section, in document order */
  forEach(fn: ComponentVisitor): void {
    for (const kind of ComponentKind.options) {
      this.forEachOfKind(kind, fn);
    }
  }

  private forEachOfKind<K extends ComponentKind>(kind: K, fn: ComponentVisitor): void {
    const section = getKindSection(kind);
    for (const [name, node] of this.tables[kind]) {
      fn({ pointer: toComponentPointer(kind, name), kind, section, name, node });
    }
  }

  private registerAll<K extends ComponentKind>(
    kind: K,
    nodes: Record<string, ComponentNode<K>> | undefined
  ): Result<void, DuplicateComponentError> {
    for (const [name, node] of Object.entries(nodes ?? {})) {
      const result = this.register(kind, name, node);
      if (!result.success) return result;
    }
    return ok(undefined);
  }
}
