import {
  EMPTY_BINDINGS,
  categoryKey,
  formatCategory,
  rename,
  resolve,
  unify,
  type Bindings,
  type Category,
  type Variable,
} from "./category";
import { formatRhsElement, type Production, type RhsElement } from "./grammar";
import type { Span, Terminal } from "./terminals";

export type DottedRule = {
  production: Production;
  dot: number;
};

export type EdgeChild = Edge | Terminal;

/**
 * A dotted rule over a span. `lhs` and `rhs` are the production's categories
 * with fresh variables, shared by every edge grown from the same seed; the
 * values those variables take along this derivation live in `bindings`.
 */
export type Edge = {
  rule: DottedRule;
  lhs: Category;
  rhs: readonly RhsElement[];
  span: Span;
  children: readonly EdgeChild[];
  bindings: Bindings;
};

export function isTerminal(child: EdgeChild): child is Terminal {
  return "symbol" in child;
}

export function isComplete(edge: Edge): boolean {
  return edge.rule.dot === edge.rhs.length;
}

export function nextElement(edge: Edge): RhsElement | undefined {
  return edge.rhs[edge.rule.dot];
}

export function edgeHead(edge: Edge): Category {
  return resolve(edge.lhs, edge.bindings);
}

export function createEdge(production: Production, position: number): Edge {
  const mapping = new Map<number, Variable>();
  const lhs = rename(production.lhs, mapping);
  const rhs = production.rhs.map((element) => (typeof element === "string" ? element : rename(element, mapping)));
  return {
    rule: { production, dot: 0 },
    lhs,
    rhs,
    span: { start: position, end: position },
    children: [],
    bindings: EMPTY_BINDINGS,
  };
}

export function advanceEdge(edge: Edge, child: EdgeChild, end: number, bindings: Bindings): Edge {
  return {
    rule: { production: edge.rule.production, dot: edge.rule.dot + 1 },
    lhs: edge.lhs,
    rhs: edge.rhs,
    span: { start: edge.span.start, end },
    children: [...edge.children, child],
    bindings,
  };
}

export function edgeKey(edge: Edge): string {
  const resolved = [edge.lhs, ...edge.rhs].map((element) =>
    typeof element === "string" ? element : resolve(element, edge.bindings),
  );
  return `${edge.span.start}:${edge.span.end}:${edge.rule.dot}:${categoryKey(resolved)}`;
}

type EdgeRecord = {
  id: number;
  derivations: Edge[];
};

function pushIndexed<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const rows = map.get(key);
  if (rows) rows.push(value);
  else map.set(key, [value]);
}

function spanKey(span: Span): string {
  return `${span.start}:${span.end}`;
}

export class Chart {
  readonly terminals: readonly Terminal[];
  private readonly all: Edge[] = [];
  private readonly records = new Map<string, EdgeRecord>();
  private readonly derivationKeys = new Set<string>();
  private readonly keys = new WeakMap<Edge, string>();
  private readonly incompleteByEnd = new Map<number, Edge[]>();
  private readonly completeByStart = new Map<number, Edge[]>();
  private readonly completeBySpan = new Map<string, Edge[]>();

  constructor(terminals: readonly Terminal[]) {
    this.terminals = terminals;
  }

  get numLeaves(): number {
    return this.terminals.length;
  }

  /** Number of derivations held, counting each ambiguous analysis of an edge separately. */
  get size(): number {
    return this.all.length;
  }

  get numEdgeKeys(): number {
    return this.records.size;
  }

  edges(): readonly Edge[] {
    return this.all;
  }

  keyOf(edge: Edge): string {
    let key = this.keys.get(edge);
    if (key === undefined) {
      key = edgeKey(edge);
      this.keys.set(edge, key);
    }
    return key;
  }

  private childKey(child: EdgeChild): string {
    if (isTerminal(child)) return `t${child.span.start}`;
    const key = this.keyOf(child);
    const record = this.records.get(key);
    return record ? `e${record.id}` : `k${key}`;
  }

  insert(edge: Edge): boolean {
    const key = this.keyOf(edge);
    const derivationKey = `${key}|${edge.children.map((child) => this.childKey(child)).join(",")}`;
    if (this.derivationKeys.has(derivationKey)) return false;
    this.derivationKeys.add(derivationKey);

    let record = this.records.get(key);
    const isNewKey = record === undefined;
    if (!record) {
      record = { id: this.records.size, derivations: [] };
      this.records.set(key, record);
    }
    record.derivations.push(edge);
    this.all.push(edge);

    if (!isComplete(edge)) {
      pushIndexed(this.incompleteByEnd, edge.span.end, edge);
    } else if (isNewKey) {
      pushIndexed(this.completeByStart, edge.span.start, edge);
      pushIndexed(this.completeBySpan, spanKey(edge.span), edge);
    }
    return true;
  }

  /** True when `edge` is the first derivation recorded under its key. */
  isFirstDerivation(edge: Edge): boolean {
    return this.records.get(this.keyOf(edge))?.derivations[0] === edge;
  }

  derivations(edge: Edge): readonly Edge[] {
    return this.records.get(this.keyOf(edge))?.derivations ?? [];
  }

  edgesEndingAt(position: number): readonly Edge[] {
    return this.incompleteByEnd.get(position) ?? [];
  }

  *edgesNeeding(category: Category, position: number): Generator<Edge> {
    for (const edge of this.edgesEndingAt(position)) {
      const next = nextElement(edge);
      if (next === undefined || typeof next === "string") continue;
      if (unify(next, edge.bindings, category, EMPTY_BINDINGS).ok) yield edge;
    }
  }

  completeEdgesStartingAt(position: number): readonly Edge[] {
    return this.completeByStart.get(position) ?? [];
  }

  *completeEdges(span: Span, category?: Category): Generator<Edge> {
    for (const edge of this.completeBySpan.get(spanKey(span)) ?? []) {
      if (category === undefined || unify(edge.lhs, edge.bindings, category, EMPTY_BINDINGS).ok) yield edge;
    }
  }
}

export function formatEdge(edge: Edge): string {
  const rhs = edge.rhs.map((element) =>
    formatRhsElement(typeof element === "string" ? element : resolve(element, edge.bindings)),
  );
  rhs.splice(edge.rule.dot, 0, "*");
  return `[${edge.span.start}:${edge.span.end}] ${formatCategory(edgeHead(edge))} -> ${rhs.join(" ")}`;
}

function edgeBar(edge: Edge, numLeaves: number, width: number): string {
  const { start, end } = edge.span;
  let out = `|${`.${" ".repeat(width - 1)}`.repeat(start)}`;
  if (start === end) {
    out += isComplete(edge) ? "#" : ">";
  } else {
    const fill = isComplete(edge) && start === 0 && end === numLeaves ? "=" : "-";
    out += `[${fill.repeat(width * (end - start) - 1)}${isComplete(edge) ? "]" : ">"}`;
  }
  out += `${" ".repeat(width - 1)}.`.repeat(numLeaves - end);
  return `${out}|`;
}

/** Text drawing of the chart: one row per derivation under a row of leaves. */
export function formatChart(chart: Chart, width = 4): string {
  const cells = chart.terminals.map((terminal) => `${terminal.symbol.slice(0, width - 1).padEnd(width - 1)}.`);
  const lines = [`|.${cells.join("")}|`];
  for (const edge of chart.edges()) {
    lines.push(`${edgeBar(edge, chart.numLeaves, width)} ${formatEdge(edge)}`);
  }
  return lines.join("\n");
}
