import { parseLearningCatalog, parseRulesDocument } from "../index";

export const rulesDocumentJson = () => ({
  map_id_code: {
    code_to_id: {
      M1: "mod-1",
      M2: "mod-2",
      M3: "mod-3",
      M1O1: "obj-1",
      M1O2: "obj-2",
      M1O1A1: "act-1",
      M1O1A2: "act-2",
    },
    id_to_codes: {
      "mod-1": ["M1"],
      "obj-1": ["M1O1"],
      "obj-2": ["M1O2"],
      "act-1": ["M1O1A1"],
      "act-2": ["M1O1A2"],
    },
  },
  module_rules: [
    {
      module_code: "M1",
      node_rules: [
        { id: "act-1", type: "activity", rules: { init_ssb: [[0]] } },
        {
          code: "M1O1A2",
          type: "activity",
          rules: {
            init_ssb: [[1]],
            requirements: [{ "act-2": { "act-1": { sr: 0.75, lvl: 1 } } }],
          },
        },
        {
          code: "M1O2",
          type: "objective",
          rules: {
            requirements: [{ "obj-2": { "act-2": { lvl: [2] }, "ghost-9": { sr: null } } }],
            deact_requirements: [{ "obj-2": { dim: "act-1", sr: "0.9" } }],
          },
        },
      ],
    },
    {
      module_code: "M2",
      map_id_code: { M2O1A1: "act-21" },
      node_rules: [],
    },
  ],
  links_to_catalog: { rule_module_ids: ["mod-1", "mod-2"] },
});

export const catalogJson = () => ({
  modules: [
    {
      code: "M1",
      objectives: [
        {
          id: "obj-1",
          code: "M1O1",
          title: { short: "Numbers" },
          activities: [
            { id: "act-1", code: "M1O1A1", title: { long: "Count to ten" } },
            { code: "M1O1A2" },
          ],
        },
        { code: "M1O2" },
      ],
    },
    { code: "M3" },
    { code: "M2" },
  ],
});

export const rulesDocument = () => parseRulesDocument(rulesDocumentJson());
export const learningCatalog = () => parseLearningCatalog(catalogJson());
