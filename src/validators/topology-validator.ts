import { buildAdjacency, type CompositionAdjacency } from "../model/graph.js";
import type { CompositionView } from "../model/schema.js";

import { createFinding, FINDING_CODES, type Finding } from "./findings.js";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Depth-first search over the undirected shared-endpoint adjacency, one root per
 * unvisited component in composition order.
 *
 * - Stepping back to the frame's parent is not a cycle, so an ordinary A <-> B link
 *   (even over several shared names) is never reported.
 * - Reaching any other component still on the stack reports that component once;
 *   the search does not descend through it again.
 * - A component appears in at most one finding per run.
 *
 * The search keeps its own frame stack, so long chains do not grow the call stack.
 */
export function validateTopology(
  composition: CompositionView,
  adjacency: CompositionAdjacency = buildAdjacency(composition),
): Finding[] {
  const findings: Finding[] = [];
  const visited = new Set<string>();
  const reported = new Set<string>();
  const path: string[] = [];
  const onStack = new Set<string>();
  const frames: SearchFrame[] = [];

  const enter = (node: string, parent: string | null): void => {
    visited.add(node);
    path.push(node);
    onStack.add(node);
    frames.push({ node, parent, neighbors: adjacency.neighbors(node), index: 0 });
  };

  for (const root of adjacency.nodes) {
    if (visited.has(root)) continue;
    enter(root, null);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.index >= frame.neighbors.length) {
        frames.pop();
        path.pop();
        onStack.delete(frame.node);
        continue;
      }

      const next = frame.neighbors[frame.index];
      frame.index += 1;
      if (next === frame.parent) continue;

      if (onStack.has(next)) {
        if (!reported.has(next)) {
          reported.add(next);
          findings.push(buildCycleFinding(next, [...path.slice(path.indexOf(next)), next]));
        }
        continue;
      }

      if (!visited.has(next)) {
        enter(next, frame.node);
      }
    }
  }

  return findings;
}

// =============================================================================
// INTERNALS
// =============================================================================

type SearchFrame = {
  node: string;
  parent: string | null;
  neighbors: readonly string[];
  /** Next neighbour to examine. */
  index: number;
};

function buildCycleFinding(component: string, cycle: string[]): Finding {
  return createFinding("topology", FINDING_CODES.topologyCycle, {
    component,
    detail: `Circular dependency detected involving component '${component}' (${cycle.join(" -> ")}).`,
    cycle,
  });
}
