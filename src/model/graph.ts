// Composition graph helpers.
// Purpose: derive component adjacency from shared endpoint names and expose traversal primitives.
// Assumes component names are unique within the view (Composition enforces this on insert).

import type { CompositionView, EndpointView } from "./schema.js";

export type EndpointOccurrence = {
  component: string;
  endpoint: EndpointView;
};

export type CompositionAdjacency = {
  /** Component names in composition order. */
  readonly nodes: readonly string[];
  /** Neighbouring component names in composition order; empty for unknown names. */
  neighbors(componentName: string): readonly string[];
  /** Number of distinct undirected links between two different components. */
  readonly linkCount: number;
};

// =============================================================================
// INDEX
// =============================================================================

export function indexEndpointsByName(
  composition: CompositionView,
): Map<string, EndpointOccurrence[]> {
  const index = new Map<string, EndpointOccurrence[]>();

  for (const component of composition.components) {
    for (const endpoint of component.endpoints) {
      const occurrence = { component: component.name, endpoint };
      const list = index.get(endpoint.name);
      if (list) {
        list.push(occurrence);
      } else {
        index.set(endpoint.name, [occurrence]);
      }
    }
  }

  return index;
}

// =============================================================================
// ADJACENCY
// =============================================================================

/**
 * Builds the undirected, direction-agnostic adjacency once: two components are linked
 * when they own at least one endpoint with the same name, whatever the directions.
 * Several shared names between the same pair collapse into one link.
 */
export function buildAdjacency(composition: CompositionView): CompositionAdjacency {
  const nodes = composition.components.map((component) => component.name);
  const order = new Map(nodes.map((name, position) => [name, position]));
  const endpointIndex = indexEndpointsByName(composition);
  const linked = new Map<string, Set<string>>(nodes.map((name) => [name, new Set<string>()]));

  for (const occurrences of endpointIndex.values()) {
    for (const left of occurrences) {
      for (const right of occurrences) {
        if (left.component === right.component) continue;
        linked.get(left.component)?.add(right.component);
      }
    }
  }

  const neighborLists = new Map<string, string[]>();
  let linkCount = 0;
  for (const [name, neighbours] of linked) {
    neighborLists.set(name, sortByOrder(Array.from(neighbours), order));
    linkCount += neighbours.size;
  }

  return {
    nodes,
    neighbors: (componentName) => neighborLists.get(componentName) ?? [],
    linkCount: linkCount / 2,
  };
}

// =============================================================================
// TRAVERSAL
// =============================================================================

/** Components reachable from `start` (inclusive), breadth-first, in discovery order. */
export function collectConnected(adjacency: CompositionAdjacency, start: string): string[] {
  if (!adjacency.nodes.includes(start)) return [];

  const queue = [start];
  const visited = new Set<string>(queue);

  for (let cursor = 0; cursor < queue.length; cursor += 1) {
    for (const next of adjacency.neighbors(queue[cursor])) {
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }

  return queue;
}

/** Connected groups of components; each group and the group list follow composition order. */
export function connectedGroups(adjacency: CompositionAdjacency): string[][] {
  const assigned = new Set<string>();
  const groups: string[][] = [];
  const order = new Map(adjacency.nodes.map((name, position) => [name, position]));

  for (const node of adjacency.nodes) {
    if (assigned.has(node)) continue;
    const group = collectConnected(adjacency, node);
    for (const member of group) assigned.add(member);
    groups.push(sortByOrder(group, order));
  }

  return groups;
}

function sortByOrder(names: string[], order: Map<string, number>): string[] {
  return [...names].sort((left, right) => (order.get(left) ?? 0) - (order.get(right) ?? 0));
}
