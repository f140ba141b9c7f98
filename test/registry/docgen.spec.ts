import { describe, it, expect, beforeEach } from "vitest";
import { ActionRegistry, describeTopic, generateSummary, listTopics } from "../../src/registry";
import { keyed, pattern } from "../../src/catalog/helpers";
import { MacroTable } from "../../src/core/macro";
import { tokenize } from "../../src/core/reader/tokenize";

const double = keyed("Test", {
  key: "dbl",
  aliases: ["twice"],
  summary: "double x",
}, { pop: 1, push: 1 }, ([x]) => [x]);

const tag = pattern("Test", {
  name: "tag",
  usage: "@name",
  pattern: /^@(\w+)$/,
  summary: "tag x",
}, { pop: 0, push: 0 }, () => []);

const triple = keyed("More", {
  key: "tpl",
  aliases: ["thrice", "x3"],
  summary: "triple x",
  synopsis: "x, ... → 3x, ...",
  detail: "x is multiplied by three.",
}, { pop: 1, push: 1 }, ([x]) => [x]);

let registry: ActionRegistry;
let macros: MacroTable;

beforeEach(() => {
  registry = ActionRegistry.from([double, tag, triple]);
  macros = new MacroTable();
});

describe("generateSummary", () => {
  it("lists actions under their categories", () => {
    expect(generateSummary(registry)).toBe([
      "Test",
      "    dbl: double x (alias: twice)",
      "    @name: tag x",
      "",
      "More",
      "    tpl: triple x (aliases: thrice,x3)",
    ].join("\n"));
  });
});

describe("describeTopic", () => {
  it("describes an action found by alias", () => {
    expect(describeTopic(registry, macros, "twice")).toEqual([
      "dbl: double x",
      "",
      "alias: twice",
    ]);
  });

  it("includes detail and the stack picture", () => {
    expect(describeTopic(registry, macros, "tpl")).toEqual([
      "tpl: triple x",
      "",
      "x is multiplied by three.",
      "",
      "stack: x, ... → 3x, ...",
      "aliases: thrice,x3",
    ]);
  });

  it("describes pattern actions by usage", () => {
    expect(describeTopic(registry, macros, "@name")).toEqual(["@name: tag x"]);
  });

  it("shows user-defined functions", () => {
    macros.define("to_omega", tokenize("2pi *"));
    expect(describeTopic(registry, macros, "to_omega")).toEqual([
      "to_omega: user-defined function",
      "",
      "definition: (2pi *)to_omega",
    ]);
  });

  it("returns undefined for unknown topics", () => {
    expect(describeTopic(registry, macros, "nothing")).toBeUndefined();
  });
});

describe("listTopics", () => {
  it("lays topics out in columns", () => {
    expect(listTopics(registry, 40)).toEqual([
      "For summary of all topics, use 'help'.",
      "For help on a particular topic, use '?topic'.",
      "",
      "Available topics:",
      "@name   dbl     tpl",
    ]);
  });

  it("fills columns top to bottom", () => {
    expect(listTopics(registry, 16).slice(4)).toEqual(["@name   tpl", "dbl"]);
  });
});
