import { rename, type Category } from "./category";
import { edgeHead, isTerminal, type Chart, type Edge } from "./chart";
import type { Grammar } from "./grammar";
import type { Terminal } from "./terminals";
import type { ParseTree } from "./tree";

export type ExtractOptions = {
  start?: Category;
  maxTrees?: number;
};

function* product<T>(choices: readonly (readonly T[])[], prefix: T[] = [], index = 0): Generator<T[]> {
  if (index === choices.length) {
    yield [...prefix];
    return;
  }
  for (const option of choices[index] ?? []) {
    prefix.push(option);
    yield* product(choices, prefix, index + 1);
    prefix.pop();
  }
}

/**
 * Expands edges into trees. Every derivation recorded under an edge's key
 * contributes its own trees; a derivation that re-enters a key still being
 * expanded is dropped, which keeps unary cycles finite. Only expansions that
 * dropped nothing are memoized, since a cut depends on the keys above it.
 */
class TreeExpander {
  private readonly memo = new Map<string, ParseTree[]>();
  private readonly active = new Set<string>();
  private cuts = 0;

  constructor(private readonly chart: Chart) {}

  *edgeTrees(edge: Edge): Generator<ParseTree> {
    const key = this.chart.keyOf(edge);
    const cached = this.memo.get(key);
    if (cached) {
      yield* cached;
      return;
    }
    if (this.active.has(key)) {
      this.cuts += 1;
      return;
    }

    const cutsBefore = this.cuts;
    this.active.add(key);
    const out: ParseTree[] = [];
    try {
      for (const derivation of this.chart.derivations(edge)) {
        for (const tree of this.derivationTrees(derivation)) {
          out.push(tree);
          yield tree;
        }
      }
    } finally {
      this.active.delete(key);
    }
    if (this.cuts === cutsBefore) this.memo.set(key, out);
  }

  private *derivationTrees(edge: Edge): Generator<ParseTree> {
    const choices: Array<Array<ParseTree | Terminal>> = edge.children.map((child) =>
      isTerminal(child) ? [child] : [...this.edgeTrees(child)],
    );
    const label = edgeHead(edge);
    for (const children of product(choices)) {
      yield { label, children };
    }
  }
}

/**
 * Lazily enumerates the parses in a finished chart: one tree per derivation of
 * every complete edge that spans the input and whose head unifies with the
 * start category. Each iteration re-reads the chart from scratch. An empty
 * input has no parses, even under a grammar with empty productions.
 */
export function extract(chart: Chart, grammar: Grammar, options: ExtractOptions = {}): Iterable<ParseTree> {
  const start = rename(options.start ?? grammar.start);
  const maxTrees = options.maxTrees ?? Number.POSITIVE_INFINITY;
  return {
    *[Symbol.iterator]() {
      if (maxTrees <= 0 || chart.numLeaves === 0) return;
      const expander = new TreeExpander(chart);
      let count = 0;
      for (const edge of chart.completeEdges({ start: 0, end: chart.numLeaves }, start)) {
        for (const tree of expander.edgeTrees(edge)) {
          yield tree;
          count += 1;
          if (count >= maxTrees) return;
        }
      }
    },
  };
}
