import { ComponentKind, isReference } from "@openapi-deref/core/openapi";
import { ComponentIndex, ComponentNode } from "../components/ComponentIndex.js";
import type { DocumentPath } from "./ResolveContext.js";
import { SlotVisitor, walkers } from "./walkers.js";

/** Canonical pointer → canonical pointers its node refers to, in walk order */
export type ReferenceGraph = Map<string, string[]>;

/**
 * Collect which components refer to which. Only `$ref`s at slot positions
 * that look up successfully count; `$ref` keys inside examples or defaults
 * are data. Nodes nested deeper than `maxDepth` are not entered, since the
 * resolver stops there anyway.
 */
export function collectReferences(
  index: ComponentIndex,
  maxDepth: number
): ReferenceGraph {
  const graph: ReferenceGraph = new Map();

  index.forEach((entry) => {
    const targets: string[] = [];
    let depth = 0;

    const visitor: SlotVisitor = {
      slot: visitSlot,
      security: () => {},
    };

    function visitSlot<K extends ComponentKind>(
      slot: ComponentNode<K>,
      kind: K,
      path: DocumentPath
    ): ComponentNode<K> {
      if (depth >= maxDepth) return slot;
      if (isReference(slot)) {
        const found = index.lookup(slot.$ref, kind);
        if (found.success) targets.push(found.data.pointer);
        return slot;
      }

      depth++;
      try {
        walkers[kind](slot, visitor, path);
      } finally {
        depth--;
      }
      return slot;
    }

    visitSlot(entry.node, entry.kind, []);
    graph.set(entry.pointer, targets);
  });

  return graph;
}

/**
 * Split the graph into strongly connected groups (Tarjan). Every pointer maps
 * to the group it belongs to; a component on no cycle gets a group of one.
 */
export function findCycleGroups(
  graph: ReferenceGraph
): Map<string, ReadonlySet<string>> {
  const groups = new Map<string, ReadonlySet<string>>();
  const order = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (pointer: string): number => {
    const own = order.size;
    order.set(pointer, own);
    let lowest = own;
    stack.push(pointer);
    onStack.add(pointer);

    for (const target of graph.get(pointer) ?? []) {
      const seen = order.get(target);
      if (seen === undefined) {
        lowest = Math.min(lowest, visit(target));
      } else if (onStack.has(target)) {
        lowest = Math.min(lowest, seen);
      }
    }

    if (lowest === own) {
      const group = new Set<string>();
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        group.add(member);
        groups.set(member, group);
      } while (member !== pointer);
    }
    return lowest;
  };

  for (const pointer of graph.keys()) {
    if (!order.has(pointer)) visit(pointer);
  }
  return groups;
}
