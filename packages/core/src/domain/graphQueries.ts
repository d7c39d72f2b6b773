import { cycleWarning, type Diagnostic } from "./diagnostics";
import type { Dependency, RuleGraph, Unit } from "./models";
import {
  emptyGraph,
  freezeGraph,
  indexActivationEdges,
  owningObjectiveId,
} from "./ruleGraph";

export interface TraversalResult {
  ids: Set<string>;
  /** Inferred objective -> activity edges added while bridging. */
  bridges: Dependency[];
  diagnostics: Diagnostic[];
}

export interface FocusNeighborhood {
  nodeIds: Set<string>;
  edges: Dependency[];
  inferredEdges: Dependency[];
  diagnostics: Diagnostic[];
}

// rotate so the smallest id leads; the same ring found from two entry points compares equal
const canonicalCycle = (cycle: string[]): string[] => {
  const ring = cycle.slice(0, -1);
  let start = 0;
  ring.forEach((id, index) => {
    if (id < ring[start]) {
      start = index;
    }
  });
  const rotated = [...ring.slice(start), ...ring.slice(0, start)];
  return [...rotated, rotated[0]];
};

const findCycles = (
  ids: Iterable<string>,
  adjacency: Map<string, Dependency[]>
): string[][] => {
  const visited = new Set<string>();
  const stack = new Set<string>();
  const cycles: string[][] = [];

  const dfs = (node: string, path: string[]) => {
    if (stack.has(node)) {
      const cycleStart = path.indexOf(node);
      cycles.push(canonicalCycle(path.slice(cycleStart)));
      return;
    }
    if (visited.has(node)) {
      return;
    }

    visited.add(node);
    stack.add(node);
    adjacency.get(node)?.forEach(edge => {
      dfs(edge.toId, [...path, edge.toId]);
    });
    stack.delete(node);
  };

  for (const id of ids) {
    if (!visited.has(id)) {
      dfs(id, [id]);
    }
  }

  return cycles;
};

/** Activation cycles, each as a closed path of unit ids. */
export const detectCycles = (graph: RuleGraph): string[][] =>
  findCycles(graph.nodes.keys(), indexActivationEdges(graph.edges).adjacency);

/** Kahn order over activation edges; units caught in a cycle are left out. */
export const topologicalOrder = (graph: RuleGraph): string[] => {
  const { adjacency, reverseAdjacency } = indexActivationEdges(graph.edges);
  const inDegree = new Map<string, number>();
  graph.nodes.forEach((_, id) => {
    inDegree.set(id, reverseAdjacency.get(id)?.length ?? 0);
  });

  const queue: string[] = [];
  inDegree.forEach((count, id) => {
    if (count === 0) {
      queue.push(id);
    }
  });

  const order: string[] = [];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    order.push(current);
    adjacency.get(current)?.forEach(edge => {
      const next = (inDegree.get(edge.toId) ?? 0) - 1;
      inDegree.set(edge.toId, next);
      if (next === 0) {
        queue.push(edge.toId);
      }
    });
  }

  return order;
};

const unknownUnit = (unitId: string): TraversalResult => ({
  ids: new Set(),
  bridges: [],
  diagnostics: [
    {
      kind: "UnknownUnit",
      unitId,
      message: `Unit "${unitId}" is not part of the graph`,
    },
  ],
});

const traversalCycles = (traversed: Dependency[]): Diagnostic[] => {
  const adjacency = new Map<string, Dependency[]>();
  traversed.forEach(edge => {
    const list = adjacency.get(edge.fromId) ?? [];
    list.push(edge);
    adjacency.set(edge.fromId, list);
  });
  return findCycles(adjacency.keys(), adjacency).map(cycleWarning);
};

const bridgeEdge = (graph: RuleGraph, activity: Unit, objectiveId: string): Dependency => ({
  id: `${graph.moduleId}:bridge:${objectiveId}->${activity.id}`,
  fromId: objectiveId,
  toId: activity.id,
  kind: "activation",
  isInferred: true,
});

/**
 * Every unit that must be unlocked before `unitId`. Each visited activity also
 * pulls in its owning objective, since objective-level rules gate the
 * activities beneath them.
 */
export const ancestors = (graph: RuleGraph, unitId: string): TraversalResult => {
  if (!graph.nodes.has(unitId)) {
    return unknownUnit(unitId);
  }
  const { reverseAdjacency } = indexActivationEdges(graph.edges);
  const visited = new Set<string>([unitId]);
  const bridged = new Set<string>();
  const bridges: Dependency[] = [];
  const traversed: Dependency[] = [];
  const queue = [unitId];

  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    const unit = graph.nodes.get(current);

    if (unit?.kind === "activity" && !bridged.has(current)) {
      bridged.add(current);
      const objectiveId = unit.objectiveId;
      if (objectiveId && objectiveId !== current && graph.nodes.has(objectiveId)) {
        bridges.push(bridgeEdge(graph, unit, objectiveId));
        if (!visited.has(objectiveId)) {
          visited.add(objectiveId);
          queue.push(objectiveId);
        }
      }
    }

    reverseAdjacency.get(current)?.forEach(edge => {
      traversed.push(edge);
      if (!visited.has(edge.fromId)) {
        visited.add(edge.fromId);
        queue.push(edge.fromId);
      }
    });
  }

  visited.delete(unitId);
  return { ids: visited, bridges, diagnostics: traversalCycles(traversed) };
};

/** Every unit that `unitId` helps unlock, following activation edges forward. */
export const descendants = (graph: RuleGraph, unitId: string): TraversalResult => {
  if (!graph.nodes.has(unitId)) {
    return unknownUnit(unitId);
  }
  const { adjacency } = indexActivationEdges(graph.edges);
  const visited = new Set<string>([unitId]);
  const traversed: Dependency[] = [];
  const queue = [unitId];

  for (let head = 0; head < queue.length; head += 1) {
    adjacency.get(queue[head])?.forEach(edge => {
      traversed.push(edge);
      if (!visited.has(edge.toId)) {
        visited.add(edge.toId);
        queue.push(edge.toId);
      }
    });
  }

  visited.delete(unitId);
  return { ids: visited, bridges: [], diagnostics: traversalCycles(traversed) };
};

const uniqueDiagnostics = (diagnostics: Diagnostic[]): Diagnostic[] => {
  const seen = new Set<string>();
  return diagnostics.filter(diagnostic => {
    const key = `${diagnostic.kind}|${diagnostic.message}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

export const focusNeighborhood = (graph: RuleGraph, unitId: string): FocusNeighborhood => {
  if (!graph.nodes.has(unitId)) {
    const { diagnostics } = unknownUnit(unitId);
    return { nodeIds: new Set(), edges: [], inferredEdges: [], diagnostics };
  }
  const upstream = ancestors(graph, unitId);
  const downstream = descendants(graph, unitId);
  const nodeIds = new Set<string>([unitId, ...upstream.ids, ...downstream.ids]);

  return {
    nodeIds,
    edges: graph.edges.filter(edge => nodeIds.has(edge.fromId) && nodeIds.has(edge.toId)),
    inferredEdges: upstream.bridges,
    diagnostics: uniqueDiagnostics([...upstream.diagnostics, ...downstream.diagnostics]),
  };
};

/**
 * Restricts the graph to the units owned by the selected objectives and the
 * edges running between them.
 */
export const filterByObjectives = (
  graph: RuleGraph,
  objectiveIds: Iterable<string>
): RuleGraph => {
  const selected = new Set(
    Array.from(objectiveIds, id => id.trim()).filter(id => id.length > 0)
  );
  if (selected.size === 0) {
    return emptyGraph(graph.moduleId);
  }

  const nodes = new Map<string, Unit>();
  graph.nodes.forEach((unit, id) => {
    const owner = owningObjectiveId(unit);
    if (unit.moduleId === graph.moduleId && owner !== undefined && selected.has(owner)) {
      nodes.set(id, unit);
    }
  });
  const edges = graph.edges.filter(edge => nodes.has(edge.fromId) && nodes.has(edge.toId));
  return freezeGraph(graph.moduleId, nodes, [...edges]);
};
