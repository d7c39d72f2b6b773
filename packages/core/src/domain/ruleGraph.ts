import type { Dependency, RuleGraph, Unit } from "./models";

export interface ActivationIndex {
  adjacency: Map<string, Dependency[]>;
  reverseAdjacency: Map<string, Dependency[]>;
}

export const freezeGraph = (
  moduleId: string,
  nodes: Map<string, Unit>,
  edges: Dependency[]
): RuleGraph => {
  nodes.forEach((node) => Object.freeze(node));
  edges.forEach((edge) => Object.freeze(edge));
  return Object.freeze({
    moduleId,
    nodes,
    edges: Object.freeze(edges),
  });
};

export const emptyGraph = (moduleId: string): RuleGraph =>
  freezeGraph(moduleId, new Map(), []);

// Deactivation edges disable a unit; they never take part in unlock chains.
export const indexActivationEdges = (
  edges: readonly Dependency[]
): ActivationIndex => {
  const adjacency = new Map<string, Dependency[]>();
  const reverseAdjacency = new Map<string, Dependency[]>();

  edges.forEach((edge) => {
    if (edge.kind !== "activation") {
      return;
    }
    const outgoing = adjacency.get(edge.fromId) ?? [];
    outgoing.push(edge);
    adjacency.set(edge.fromId, outgoing);

    const incoming = reverseAdjacency.get(edge.toId) ?? [];
    incoming.push(edge);
    reverseAdjacency.set(edge.toId, incoming);
  });

  return { adjacency, reverseAdjacency };
};

export const owningObjectiveId = (unit: Unit): string | undefined =>
  unit.kind === "objective" ? unit.id : unit.objectiveId;
