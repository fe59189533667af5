import { expect, test } from "vitest";
import {
  Chart,
  TerminalSequenceError,
  advanceEdge,
  cat,
  createEdge,
  formatChart,
  formatEdge,
  fundamentalRule,
  isComplete,
  isTerminal,
  parseFeatureGrammar,
  splitWords,
  toTerminals,
  validateTerminals,
  type Edge,
  type Production,
} from "../index";

const grammar = parseFeatureGrammar(`
NP[num=?n] -> Det[num=?n] N[num=?n]
Det[num=sg] -> 'the'
N[num=sg] -> 'dog'
`);
const npRule: Production = grammar.productions[0]!;
const detRule: Production = grammar.productions[1]!;

function lexicalEdge(prod: Production, chart: Chart, position: number): Edge {
  const seed = createEdge(prod, position);
  const terminal = chart.terminals[position]!;
  return advanceEdge(seed, terminal, terminal.span.end, seed.bindings);
}

test("splitWords and toTerminals number the input", () => {
  expect(splitWords("  the dog\tbarks ")).toEqual(["the", "dog", "barks"]);
  expect(toTerminals(["the", "dog"])).toEqual([
    { symbol: "the", span: { start: 0, end: 1 } },
    { symbol: "dog", span: { start: 1, end: 2 } },
  ]);
});

test("validateTerminals rejects empty symbols and broken spans", () => {
  expect(() => validateTerminals([{ symbol: "", span: { start: 0, end: 1 } }])).toThrowError(
    "terminal 0: symbol must be a non-empty string",
  );
  expect(() => validateTerminals([{ symbol: "the", span: { start: 1, end: 2 } }])).toThrowError(TerminalSequenceError);
});

test("insert reports whether a derivation is new", () => {
  const chart = new Chart(toTerminals(["the", "dog"]));
  expect(chart.insert(lexicalEdge(detRule, chart, 0))).toBe(true);
  expect(chart.insert(lexicalEdge(detRule, chart, 0))).toBe(false);
  expect(chart.size).toBe(1);
});

test("seeds equal up to variable renaming share one key", () => {
  const chart = new Chart(toTerminals(["the", "dog"]));
  expect(chart.insert(createEdge(npRule, 0))).toBe(true);
  expect(chart.insert(createEdge(npRule, 0))).toBe(false);
  expect(chart.insert(createEdge(npRule, 1))).toBe(true);
  expect(chart.numEdgeKeys).toBe(2);
});

test("edgesNeeding filters incomplete edges by unification", () => {
  const chart = new Chart(toTerminals(["the", "dog"]));
  const seed = createEdge(npRule, 0);
  const det = lexicalEdge(detRule, chart, 0);
  chart.insert(seed);
  chart.insert(det);

  expect([...chart.edgesNeeding(cat("Det"), 0)]).toEqual([seed]);
  expect([...chart.edgesNeeding(cat("Det", { num: "pl" }), 0)]).toEqual([seed]);
  expect([...chart.edgesNeeding(cat("N"), 0)]).toEqual([]);

  const advanced = [...fundamentalRule.apply(chart, grammar, det)];
  expect(advanced.map(formatEdge)).toEqual(["[0:1] NP[num=sg] -> Det[num=sg] * N[num=sg]"]);
  chart.insert(advanced[0]!);

  expect([...chart.edgesNeeding(cat("N", { num: "pl" }), 1)]).toHaveLength(0);
  expect([...chart.edgesNeeding(cat("N", { num: "sg" }), 1)]).toHaveLength(1);
});

test("complete edges are found by span and by start", () => {
  const chart = new Chart(toTerminals(["the", "dog"]));
  chart.insert(createEdge(npRule, 0));
  const det = lexicalEdge(detRule, chart, 0);
  chart.insert(det);

  expect(isComplete(det)).toBe(true);
  expect([...chart.completeEdges({ start: 0, end: 1 })]).toEqual([det]);
  expect([...chart.completeEdges({ start: 0, end: 1 }, cat("Det"))]).toEqual([det]);
  expect([...chart.completeEdges({ start: 0, end: 1 }, cat("Det", { num: "pl" }))]).toEqual([]);
  expect(chart.completeEdgesStartingAt(0)).toEqual([det]);
  expect(chart.edgesEndingAt(0)).toHaveLength(1);
  expect(chart.derivations(det)).toEqual([det]);
  expect(isTerminal(det.children[0]!)).toBe(true);
});

test("formatEdge marks the dot and resolves categories", () => {
  const chart = new Chart(toTerminals(["the"]));
  expect(formatEdge(createEdge(npRule, 0))).toBe("[0:0] NP[num=?n] -> * Det[num=?n] N[num=?n]");
  expect(formatEdge(lexicalEdge(detRule, chart, 0))).toBe("[0:1] Det[num=sg] -> 'the' *");
});

test("formatChart draws one row per derivation under the leaves", () => {
  const chart = new Chart(toTerminals(["the", "dog"]));
  chart.insert(createEdge(npRule, 0));
  chart.insert(lexicalEdge(detRule, chart, 0));
  expect(formatChart(chart).split("\n")).toEqual([
    "|.the.dog.|",
    "|>   .   .| [0:0] NP[num=?n] -> * Det[num=?n] N[num=?n]",
    "|[---]   .| [0:1] Det[num=sg] -> 'the' *",
  ]);
});

test("formatChart truncates long leaves to the cell width", () => {
  expect(formatChart(new Chart(toTerminals(["an", "elephant"])))).toBe("|.an .ele.|");
});
