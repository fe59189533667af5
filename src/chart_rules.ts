import { EMPTY_BINDINGS, rename, resolve, unify, type Category } from "./category";
import {
  advanceEdge,
  createEdge,
  edgeHead,
  isComplete,
  nextElement,
  type Chart,
  type Edge,
} from "./chart";
import {
  canStartWith,
  productionsFor,
  productionsForTerminal,
  productionsStartingWith,
  type Grammar,
} from "./grammar";
import type { Terminal } from "./terminals";

/** Runs once before the agenda loop and seeds the chart. */
export type AxiomRule = {
  kind: "axiom";
  name: string;
  apply(chart: Chart, grammar: Grammar): Iterable<Edge>;
};

/** Runs for every edge the agenda loop picks up. */
export type InferenceRule = {
  kind: "inference";
  name: string;
  apply(chart: Chart, grammar: Grammar, edge: Edge): Iterable<Edge>;
};

export type ChartRule = AxiomRule | InferenceRule;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Lexical productions become complete edges over their word; productions whose
 * longer right-hand side starts with a word are seeded in front of it.
 */
export const scannerRule: AxiomRule = {
  kind: "axiom",
  name: "Scanner",
  *apply(chart, grammar) {
    const bySymbol = new Map<string, Terminal[]>();
    for (const terminal of chart.terminals) {
      const rows = bySymbol.get(terminal.symbol);
      if (rows) rows.push(terminal);
      else bySymbol.set(terminal.symbol, [terminal]);
    }
    for (const prod of grammar.lexical) {
      const [symbol] = prod.rhs;
      if (typeof symbol !== "string") continue;
      for (const terminal of bySymbol.get(symbol) ?? []) {
        const seed = createEdge(prod, terminal.span.start);
        yield advanceEdge(seed, terminal, terminal.span.end, seed.bindings);
      }
    }
    for (const terminal of chart.terminals) {
      for (const prod of productionsForTerminal(grammar, terminal.symbol)) {
        yield createEdge(prod, terminal.span.start);
      }
    }
  },
};

export const emptyRule: AxiomRule = {
  kind: "axiom",
  name: "Empty",
  *apply(chart, grammar) {
    if (grammar.empty.length === 0) return;
    for (let position = 0; position <= chart.numLeaves; position += 1) {
      for (const prod of grammar.empty) yield createEdge(prod, position);
    }
  },
};

/**
 * Bottom-up prediction. A complete edge over (i, j) seeds, at (i, i), every
 * production that could start with its head; the fundamental rule then
 * consumes the edge. The chart's duplicate check keeps each seed to one per
 * production and position.
 */
export const selfSeedRule: InferenceRule = {
  kind: "inference",
  name: "Self-Seed",
  *apply(_chart, grammar, edge) {
    if (!isComplete(edge)) return;
    for (const prod of productionsStartingWith(grammar, edgeHead(edge))) {
      yield createEdge(prod, edge.span.start);
    }
  },
};

function combine(left: Edge, right: Edge, head: Category): Edge | null {
  const next = nextElement(left);
  if (next === undefined || typeof next === "string") return null;
  const result = unify(next, left.bindings, head, EMPTY_BINDINGS);
  if (!result.ok) return null;
  return advanceEdge(left, right, right.span.end, result.bindings);
}

export const fundamentalRule: InferenceRule = {
  kind: "inference",
  name: "Fundamental",
  *apply(chart, _grammar, edge) {
    if (isComplete(edge)) {
      // the child's head gets its own variables so one edge can fill two slots
      const head = rename(edgeHead(edge));
      for (const left of chart.edgesNeeding(head, edge.span.start)) {
        const extended = combine(left, edge, head);
        if (extended) yield extended;
      }
      return;
    }

    const next = nextElement(edge);
    if (typeof next === "string") {
      const terminal = chart.terminals[edge.span.end];
      if (terminal?.symbol === next) yield advanceEdge(edge, terminal, terminal.span.end, edge.bindings);
      return;
    }
    for (const right of chart.completeEdgesStartingAt(edge.span.end)) {
      const extended = combine(edge, right, rename(edgeHead(right)));
      if (extended) yield extended;
    }
  },
};

/** True when the terminal after `edge` could begin the element it needs next. */
function leftCornerAllows(chart: Chart, grammar: Grammar, edge: Edge): boolean {
  return canStartWith(grammar, nextElement(edge), chart.terminals[edge.span.end]?.symbol);
}

function* predictCombine(chart: Chart, grammar: Grammar, edge: Edge, filtered: boolean): Generator<Edge> {
  if (!isComplete(edge)) return;
  const head = rename(edgeHead(edge));
  for (const prod of productionsStartingWith(grammar, head)) {
    const extended = combine(createEdge(prod, edge.span.start), edge, head);
    if (extended && (!filtered || leftCornerAllows(chart, grammar, extended))) yield extended;
  }
}

/** Self-seeding and the fundamental rule in one step: no zero-width seed enters the chart. */
export const predictCombineRule: InferenceRule = {
  kind: "inference",
  name: "Predict-Combine",
  apply: (chart, grammar, edge) => predictCombine(chart, grammar, edge, false),
};

/** Predict-combine that drops edges whose next element cannot start with the following terminal. */
export const filteredPredictCombineRule: InferenceRule = {
  kind: "inference",
  name: "Filtered Predict-Combine",
  apply: (chart, grammar, edge) => predictCombine(chart, grammar, edge, true),
};

export const filteredFundamentalRule: InferenceRule = {
  kind: "inference",
  name: "Filtered Fundamental",
  *apply(chart, grammar, edge) {
    for (const extended of fundamentalRule.apply(chart, grammar, edge)) {
      if (leftCornerAllows(chart, grammar, extended)) yield extended;
    }
  },
};

export const topDownInitRule: AxiomRule = {
  kind: "axiom",
  name: "Top-Down Init",
  *apply(_chart, grammar) {
    for (const prod of productionsFor(grammar, grammar.start)) yield createEdge(prod, 0);
  },
};

export const topDownPredictRule: InferenceRule = {
  kind: "inference",
  name: "Top-Down Predict",
  *apply(_chart, grammar, edge) {
    const next = nextElement(edge);
    if (next === undefined || typeof next === "string") return;
    for (const prod of productionsFor(grammar, resolve(next, edge.bindings))) {
      yield createEdge(prod, edge.span.end);
    }
  },
};

export const BOTTOM_UP_STRATEGY: readonly ChartRule[] = [scannerRule, emptyRule, selfSeedRule, fundamentalRule];

export const TOP_DOWN_STRATEGY: readonly ChartRule[] = [
  scannerRule,
  emptyRule,
  topDownInitRule,
  topDownPredictRule,
  fundamentalRule,
];

export const BOTTOM_UP_LEFT_CORNER_STRATEGY: readonly ChartRule[] = [
  scannerRule,
  emptyRule,
  predictCombineRule,
  fundamentalRule,
];

export const LEFT_CORNER_STRATEGY: readonly ChartRule[] = [
  scannerRule,
  emptyRule,
  filteredPredictCombineRule,
  filteredFundamentalRule,
];

export const STRATEGY_NAMES = ["bottom-up", "top-down", "bottom-up-left-corner", "left-corner"] as const;

export const STRATEGIES: Record<StrategyName, readonly ChartRule[]> = {
  "bottom-up": BOTTOM_UP_STRATEGY,
  "top-down": TOP_DOWN_STRATEGY,
  "bottom-up-left-corner": BOTTOM_UP_LEFT_CORNER_STRATEGY,
  "left-corner": LEFT_CORNER_STRATEGY,
};
