import {
  ComponentKind,
  getKindSection,
  isCircularReference,
  isReference,
  isResolvedReference,
  OpenAPI,
  Reference,
  toCircularReference,
  toReference,
  toResolvedReference,
  toUnresolvedReference,
  UnresolvedReference,
  type ProcessedReference,
} from "@openapi-deref/core/openapi";
import {
  ComponentEntry,
  ComponentNode,
  ComponentValues,
  toComponentPointer,
} from "../components/ComponentIndex.js";
import { LookupError } from "../errors.js";
import { DocumentPath, ResolveContext, ResolvedSlot } from "./ResolveContext.js";
import { mapRecord, SlotVisitor, slotRecord, walkers } from "./walkers.js";

/**
 * Walks a document and replaces every reference slot with its processed
 * state. One instance per resolution call.
 */
export class SlotResolver implements SlotVisitor {
  constructor(private ctx: ResolveContext) {}

  /**
   * Resolve one referenceable slot.
   *
   * Direct values are walked for nested slots. Resolved and circular slots are
   * returned as they are, so running the resolver on its own output changes
   * nothing. Plain references and error placeholders are looked up again.
   */
  slot<K extends ComponentKind>(
    slot: ComponentNode<K>,
    kind: K,
    path: DocumentPath
  ): ResolvedSlot<ComponentValues[K]> {
    return this.ctx.descend(path, () => {
      if (!isReference(slot)) {
        return walkers[kind](slot, this, path);
      }
      if (
        isResolvedReference<ComponentValues[K]>(slot) ||
        isCircularReference(slot)
      ) {
        return slot;
      }
      return this.resolveReference(slot, kind, path);
    });
  }

  /**
   * Security requirements name schemes by key instead of `$ref`. Unknown names
   * are reported; the requirement itself is kept as written.
   */
  security(requirements: OpenAPI.SecurityRequirement[], path: DocumentPath): void {
    requirements.forEach((requirement, i) => {
      for (const name of Object.keys(requirement)) {
        const pointer = toComponentPointer("SecurityScheme", name);
        const found = this.ctx.index.lookup(pointer, "SecurityScheme");
        if (!found.success) {
          this.ctx.report(found.error, [...path, i, name]);
        }
      }
    });
  }

  /**
   * Resolve a component's own node. Errors inside it are reported at the
   * component's location, so a component used from many places reports them
   * once.
   *
   * The expansion only depends on the component: references back into its
   * cycle group are cut, and everything else it reaches lies outside any
   * cycle through it. So the result can be shared by every use site.
   */
  resolveComponent<K extends ComponentKind>(
    entry: ComponentEntry<K>
  ): ResolvedSlot<ComponentValues[K]> {
    const shared = this.ctx.getShared(entry.kind, entry.pointer);
    if (shared !== undefined) {
      this.ctx.stats.shared++;
      this.ctx.replay(shared.profile);
      return shared.slot;
    }

    const { value, profile } = this.ctx.measure(() =>
      this.ctx.expand(entry.pointer, () =>
        this.slot(entry.node, entry.kind, ["components", entry.section, entry.name])
      )
    );
    this.ctx.setShared(entry.kind, entry.pointer, { slot: value, profile });
    return value;
  }

  /**
   * Walk a whole document: paths, webhooks, components, then the
   * document-level security requirements.
   */
  walkDocument(document: OpenAPI.Document): OpenAPI.Document {
    const result = { ...document };
    if (document.paths) {
      result.paths = slotRecord(document.paths, "PathItem", this, ["paths"]);
    }
    if (document.webhooks) {
      result.webhooks = slotRecord(document.webhooks, "PathItem", this, [
        "webhooks",
      ]);
    }
    if (document.components) {
      result.components = this.walkComponents(document.components);
    }
    if (document.security) {
      this.security(document.security, ["security"]);
    }
    return result;
  }

  private resolveReference<K extends ComponentKind>(
    slot: Reference | UnresolvedReference,
    kind: K,
    path: DocumentPath
  ): ProcessedReference<ComponentValues[K]> {
    const reference = toReference(slot);
    this.ctx.stats.references++;

    const found = this.ctx.index.lookup(slot.$ref, kind);
    if (!found.success) {
      return this.fail(reference, found.error, path);
    }

    const entry = found.data;
    if (this.ctx.isCut(entry.pointer)) {
      this.ctx.stats.circular++;
      return toCircularReference(reference);
    }

    // An aliased component (itself a reference) hands over its outcome
    const target = this.resolveComponent(entry);
    if (!isReference(target)) {
      return toResolvedReference(reference, target);
    }
    if (isResolvedReference<ComponentValues[K]>(target)) {
      return toResolvedReference(reference, target.value);
    }
    if (isCircularReference(target)) {
      return toCircularReference(reference);
    }

    const cause = this.ctx.getCause(target);
    if (cause === undefined) {
      return toUnresolvedReference(reference, target.error);
    }
    return this.fail(reference, cause, path);
  }

  /** Report `error` here and leave an error placeholder that remembers it */
  private fail(
    reference: Reference,
    error: LookupError,
    path: DocumentPath
  ): UnresolvedReference {
    this.ctx.report(error, path);
    const placeholder = toUnresolvedReference(reference, error.type);
    this.ctx.setCause(placeholder, error);
    return placeholder;
  }

  private walkSection<K extends ComponentKind>(
    kind: K,
    nodes: Record<string, ComponentNode<K>>
  ): Record<string, ResolvedSlot<ComponentValues[K]>> {
    return mapRecord(nodes, (node, name) =>
      this.resolveComponent({
        pointer: toComponentPointer(kind, name),
        kind,
        section: getKindSection(kind),
        name,
        node,
      })
    );
  }

  private walkComponents(components: OpenAPI.Components): OpenAPI.Components {
    const result = { ...components };
    if (components.schemas) {
      result.schemas = this.walkSection("Schema", components.schemas);
    }
    if (components.responses) {
      result.responses = this.walkSection("Response", components.responses);
    }
    if (components.parameters) {
      result.parameters = this.walkSection("Parameter", components.parameters);
    }
    if (components.examples) {
      result.examples = this.walkSection("Example", components.examples);
    }
    if (components.requestBodies) {
      result.requestBodies = this.walkSection(
        "RequestBody",
        components.requestBodies
      );
    }
    if (components.headers) {
      result.headers = this.walkSection("Header", components.headers);
    }
    if (components.securitySchemes) {
      result.securitySchemes = this.walkSection(
        "SecurityScheme",
        components.securitySchemes
      );
    }
    if (components.links) {
      result.links = this.walkSection("Link", components.links);
    }
    if (components.callbacks) {
      result.callbacks = this.walkSection("Callback", components.callbacks);
    }
    if (components.pathItems) {
      result.pathItems = this.walkSection("PathItem", components.pathItems);
    }
    return result;
  }
}
