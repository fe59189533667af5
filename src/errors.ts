import type { Chart } from "./chart";

export class ChartParserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChartParserError";
  }
}

export class GrammarError extends ChartParserError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "GrammarError";
    this.line = line;
  }
}

export class TerminalSequenceError extends ChartParserError {
  readonly index: number;

  constructor(message: string, index: number) {
    super(`terminal ${index}: ${message}`);
    this.name = "TerminalSequenceError";
    this.index = index;
  }
}

export class ConfigError extends ChartParserError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid chart parser options: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type BudgetReason = "maxRounds" | "maxEdges";

/**
 * Raised when a parse stops on its budget. The chart built so far travels with
 * the error so callers can still inspect it; it is never presented as a final
 * result.
 */
export class PartialParseError extends ChartParserError {
  readonly chart: Chart;
  readonly rounds: number;
  readonly reason: BudgetReason;

  constructor(chart: Chart, rounds: number, reason: BudgetReason) {
    super(`parse aborted after ${rounds} rounds with ${chart.size} edges (${reason} exceeded)`);
    this.name = "PartialParseError";
    this.chart = chart;
    this.rounds = rounds;
    this.reason = reason;
  }
}
