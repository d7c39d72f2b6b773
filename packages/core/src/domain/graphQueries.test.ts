import { describe, expect, it } from "vitest";
import { identityResolver } from "./codeResolver";
import { buildRuleGraph } from "./graphBuilder";
import {
  ancestors,
  descendants,
  detectCycles,
  filterByObjectives,
  focusNeighborhood,
  topologicalOrder,
} from "./graphQueries";

const buildGraph = (rules: Record<string, unknown>) =>
  buildRuleGraph({ moduleId: "M1", resolver: identityResolver(Object.keys(rules)), rules }).graph;

const chain = buildGraph({
  A1: { activation_requirements: [], initially_open: true },
  A2: { activation_requirements: ["A1@60%"] },
  O2: { activation_requirements: ["A2"] },
});

// O1 holds A1..A3; O2 is unlocked by O1's third activity, O1 itself by an O3 activity
const curriculum = buildRuleGraph({
  moduleId: "M1",
  resolver: identityResolver([
    "M1O1",
    "M1O2",
    "M1O1A1",
    "M1O1A2",
    "M1O1A3",
    "M1O3A1",
    "M1O4A1",
  ]),
  rules: {
    M1O1A1: { initially_open: true },
    M1O1A2: { activation_requirements: ["M1O1A1"] },
    M1O1A3: { activation_requirements: ["M1O1A1"] },
    M1O1: { activation_requirements: ["M1O3A1"] },
    M1O3A1: {},
    M1O2: {
      activation_requirements: ["M1O1A3@70%"],
      deactivation_requirements: ["M1O4A1"],
    },
  },
}).graph;

const cyclic = buildGraph({
  A1: { activation_requirements: ["A2"] },
  A2: { activation_requirements: ["A1"] },
  A3: { activation_requirements: ["A2"] },
});

describe("ancestors and descendants", () => {
  it("walk the activation chain in both directions", () => {
    const upstream = ancestors(chain, "O2");
    expect(Array.from(upstream.ids)).toEqual(["A2", "A1"]);
    expect(upstream.bridges).toEqual([]);
    expect(upstream.diagnostics).toEqual([]);

    expect(Array.from(descendants(chain, "A1").ids)).toEqual(["A2", "O2"]);
  });

  it("are duals of each other", () => {
    chain.nodes.forEach((_, from) => {
      descendants(chain, from).ids.forEach((to) => {
        expect(ancestors(chain, to).ids.has(from)).toBe(true);
      });
    });
  });

  it("pull in the owning objective of each visited activity", () => {
    const upstream = ancestors(curriculum, "M1O2");
    expect(Array.from(upstream.ids)).toEqual(["M1O1A3", "M1O1", "M1O1A1", "M1O3A1"]);
    expect(upstream.bridges).toEqual([
      {
        id: "M1:bridge:M1O1->M1O1A3",
        fromId: "M1O1",
        toId: "M1O1A3",
        kind: "activation",
        isInferred: true,
      },
      {
        id: "M1:bridge:M1O1->M1O1A1",
        fromId: "M1O1",
        toId: "M1O1A1",
        kind: "activation",
        isInferred: true,
      },
    ]);
  });

  it("do not bleed into sibling activities", () => {
    expect(ancestors(curriculum, "M1O2").ids.has("M1O1A2")).toBe(false);
  });

  it("ignore deactivation edges", () => {
    expect(ancestors(curriculum, "M1O2").ids.has("M1O4A1")).toBe(false);
    expect(descendants(curriculum, "M1O4A1").ids.size).toBe(0);
  });

  it("do not bridge forward", () => {
    const downstream = descendants(curriculum, "M1O1A1");
    expect(Array.from(downstream.ids)).toEqual(["M1O1A2", "M1O1A3", "M1O2"]);
    expect(downstream.bridges).toEqual([]);
  });

  it("terminate on cycles and report them", () => {
    const upstream = ancestors(cyclic, "A3");
    expect(Array.from(upstream.ids)).toEqual(["A2", "A1"]);
    expect(upstream.diagnostics).toEqual([
      {
        kind: "GraphIntegrityWarning",
        reason: "cycle",
        path: ["A1", "A2", "A1"],
        message: "Activation cycle detected: A1 -> A2 -> A1",
      },
    ]);
  });

  it("report unknown units", () => {
    const result = ancestors(chain, "A404");
    expect(result.ids.size).toBe(0);
    expect(result.diagnostics).toEqual([
      { kind: "UnknownUnit", unitId: "A404", message: 'Unit "A404" is not part of the graph' },
    ]);
    expect(descendants(chain, "A404").diagnostics[0].kind).toBe("UnknownUnit");
  });

  it("traverse through ghost nodes", () => {
    const { graph } = buildRuleGraph({
      moduleId: "M1",
      resolver: identityResolver(["A2", "A3"]),
      rules: {
        A2: { activation_requirements: ["A99"] },
        A3: { activation_requirements: ["A2"] },
      },
    });
    expect(Array.from(ancestors(graph, "A3").ids)).toEqual(["A2", "A99"]);
    expect(Array.from(descendants(graph, "A99").ids)).toEqual(["A2", "A3"]);
  });
});

describe("focusNeighborhood", () => {
  it("joins both closures with the edges between them", () => {
    const focus = focusNeighborhood(curriculum, "M1O1A3");
    expect(Array.from(focus.nodeIds)).toEqual([
      "M1O1A3",
      "M1O1",
      "M1O1A1",
      "M1O3A1",
      "M1O2",
    ]);
    expect(focus.edges.map((edge) => `${edge.fromId}->${edge.toId}`)).toEqual([
      "M1O1A1->M1O1A3",
      "M1O3A1->M1O1",
      "M1O1A3->M1O2",
    ]);
    expect(focus.inferredEdges.map((edge) => edge.id)).toEqual([
      "M1:bridge:M1O1->M1O1A3",
      "M1:bridge:M1O1->M1O1A1",
    ]);
    expect(focus.diagnostics).toEqual([]);
  });

  it("reports a cycle once", () => {
    const focus = focusNeighborhood(cyclic, "A2");
    expect(focus.diagnostics.map((diagnostic) => diagnostic.kind)).toEqual([
      "GraphIntegrityWarning",
    ]);
  });

  it("is empty for unknown units", () => {
    const focus = focusNeighborhood(chain, "A404");
    expect(focus.nodeIds.size).toBe(0);
    expect(focus.edges).toEqual([]);
    expect(focus.diagnostics).toHaveLength(1);
  });
});

describe("detectCycles and topologicalOrder", () => {
  it("orders an acyclic graph", () => {
    expect(detectCycles(chain)).toEqual([]);
    expect(topologicalOrder(chain)).toEqual(["A1", "A2", "O2"]);
  });

  it("finds cycles and leaves their units unordered", () => {
    expect(detectCycles(cyclic)).toEqual([["A1", "A2", "A1"]]);
    expect(topologicalOrder(cyclic)).toEqual([]);
  });
});

describe("filterByObjectives", () => {
  it("keeps the selected objectives and their activities", () => {
    const filtered = filterByObjectives(curriculum, ["M1O1"]);
    expect(Array.from(filtered.nodes.keys())).toEqual(["M1O1A1", "M1O1A2", "M1O1A3", "M1O1"]);
    expect(filtered.edges.map((edge) => `${edge.fromId}->${edge.toId}`)).toEqual([
      "M1O1A1->M1O1A2",
      "M1O1A1->M1O1A3",
    ]);
    expect(filtered.moduleId).toBe("M1");
  });

  it("drops edges that leave the selection", () => {
    const filtered = filterByObjectives(curriculum, ["M1O1", "M1O2"]);
    expect(filtered.edges.map((edge) => `${edge.fromId}->${edge.toId}`)).toContain(
      "M1O1A3->M1O2"
    );
    expect(filtered.nodes.has("M1O3A1")).toBe(false);
  });

  it("returns an empty graph for an empty selection", () => {
    const filtered = filterByObjectives(curriculum, [" "]);
    expect(filtered.nodes.size).toBe(0);
    expect(filtered.edges).toEqual([]);
  });

  it("leaves the source graph untouched", () => {
    filterByObjectives(curriculum, ["M1O2"]);
    expect(curriculum.nodes.size).toBe(7);
  });
});
