import type pino from "pino";
import { isCategory } from "./category";
import { Chart, formatEdge, isComplete, type Edge } from "./chart";
import { STRATEGIES, type ChartRule } from "./chart_rules";
import { parseChartParserConfig, type ChartParserConfig, type ChartParserConfigInput } from "./config";
import { GrammarError, PartialParseError, type BudgetReason } from "./errors";
import { extract } from "./extract";
import type { Grammar } from "./grammar";
import { createLogger } from "./logger";
import { toTerminals, validateTerminals, type Terminal } from "./terminals";
import type { ParseTree } from "./tree";

export type ChartParserOptions = ChartParserConfigInput & {
  logger?: pino.Logger;
};

export type ChartParseResult =
  | { status: "complete"; chart: Chart; rounds: number }
  | { status: "partial"; chart: Chart; rounds: number; reason: BudgetReason };

type Phase = "seeding" | "fixpoint";

/**
 * Agenda-driven chart parser. Axiom rules seed the chart, then every round
 * applies the inference rules to the edges the previous round added, until a
 * round adds nothing.
 */
export class ChartParser {
  readonly grammar: Grammar;
  readonly rules: readonly ChartRule[];
  private readonly config: ChartParserConfig;
  private readonly logger: pino.Logger;

  constructor(grammar: Grammar, options: ChartParserOptions = {}) {
    if (!grammar || !isCategory(grammar.start)) throw new GrammarError("grammar start category is missing");
    const { logger, ...rest } = options;
    this.grammar = grammar;
    this.config = parseChartParserConfig(rest);
    this.rules = typeof this.config.strategy === "string" ? STRATEGIES[this.config.strategy] : this.config.strategy;
    this.logger = logger ?? createLogger("chart-parser");
  }

  chartParse(terminals: readonly Terminal[]): ChartParseResult {
    validateTerminals(terminals);
    const chart = new Chart(terminals);
    const { maxRounds, maxEdges } = this.config.budget;
    let agenda: Edge[] = [];
    let rounds = 0;

    const add = (rule: ChartRule, phase: Phase, candidates: Iterable<Edge>): BudgetReason | null => {
      for (const edge of Array.from(candidates)) {
        if (!chart.insert(edge)) continue;
        agenda.push(edge);
        if (this.config.trace > 0) {
          this.logger.info({ rule: rule.name, phase, span: [edge.span.start, edge.span.end] }, formatEdge(edge));
        }
        if (maxEdges !== undefined && chart.size > maxEdges) return "maxEdges";
      }
      return null;
    };

    const abort = (reason: BudgetReason): ChartParseResult => {
      this.logger.warn({ reason, rounds, edges: chart.size }, "chart parse budget exceeded");
      return { status: "partial", chart, rounds, reason };
    };

    for (const rule of this.rules) {
      if (rule.kind !== "axiom") continue;
      const exceeded = add(rule, "seeding", rule.apply(chart, this.grammar));
      if (exceeded) return abort(exceeded);
    }

    const inferenceRules = this.rules.filter((rule) => rule.kind === "inference");
    while (agenda.length > 0) {
      if (maxRounds !== undefined && rounds >= maxRounds) return abort("maxRounds");
      const current = agenda;
      agenda = [];
      rounds += 1;
      for (const edge of current) {
        // later derivations of a complete edge reach their parents through its key
        if (isComplete(edge) && !chart.isFirstDerivation(edge)) continue;
        for (const rule of inferenceRules) {
          if (rule.kind !== "inference") continue;
          const exceeded = add(rule, "fixpoint", rule.apply(chart, this.grammar, edge));
          if (exceeded) return abort(exceeded);
        }
      }
      if (this.config.trace > 1) {
        this.logger.info({ round: rounds, inserted: agenda.length, edges: chart.size }, "round complete");
      }
    }

    return { status: "complete", chart, rounds };
  }

  parse(terminals: readonly Terminal[]): ParseTree[] {
    const result = this.chartParse(terminals);
    if (result.status === "partial") throw new PartialParseError(result.chart, result.rounds, result.reason);
    return [...extract(result.chart, this.grammar, { maxTrees: this.config.maxTrees })];
  }

  parseWords(words: readonly string[]): ParseTree[] {
    return this.parse(toTerminals(words));
  }
}
