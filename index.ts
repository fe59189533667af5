export {
  CATEGORY_NAME,
  EMPTY_BINDINGS,
  atom,
  cat,
  categoriesEqual,
  categoryKey,
  categoryName,
  formatCategory,
  freshVariable,
  isCategory,
  rename,
  resolve,
  struct,
  unifies,
  unify,
} from "./src/category";
export type {
  Atom,
  Bindings,
  Category,
  FeatureStruct,
  UnificationFailure,
  UnificationResult,
  Variable,
} from "./src/category";

export {
  canStartWith,
  createGrammar,
  formatProduction,
  formatRhsElement,
  isLexical,
  production,
  productionsFor,
  productionsForTerminal,
  productionsStartingWith,
  uncoveredTerminals,
} from "./src/grammar";
export type { Grammar, LeftCornerTable, Production, RhsElement } from "./src/grammar";

export { parseCategory, parseFeatureGrammar } from "./src/grammar_loader";

export { splitWords, toTerminals, validateTerminals } from "./src/terminals";
export type { Span, Terminal } from "./src/terminals";

export {
  Chart,
  advanceEdge,
  createEdge,
  edgeHead,
  edgeKey,
  formatChart,
  formatEdge,
  isComplete,
  isTerminal,
  nextElement,
} from "./src/chart";
export type { DottedRule, Edge, EdgeChild } from "./src/chart";

export {
  BOTTOM_UP_LEFT_CORNER_STRATEGY,
  BOTTOM_UP_STRATEGY,
  LEFT_CORNER_STRATEGY,
  STRATEGIES,
  STRATEGY_NAMES,
  TOP_DOWN_STRATEGY,
  emptyRule,
  filteredFundamentalRule,
  filteredPredictCombineRule,
  fundamentalRule,
  predictCombineRule,
  scannerRule,
  selfSeedRule,
  topDownInitRule,
  topDownPredictRule,
} from "./src/chart_rules";
export type { AxiomRule, ChartRule, InferenceRule, StrategyName } from "./src/chart_rules";

export { ChartParser } from "./src/chart_parser";
export type { ChartParseResult, ChartParserOptions } from "./src/chart_parser";

export { extract } from "./src/extract";
export type { ExtractOptions } from "./src/extract";

export { isLeaf, mapTreeLabels, treeDepth, treeLeaves, treeToBracket } from "./src/tree";
export type { ParseTree } from "./src/tree";

export {
  ChartParserError,
  ConfigError,
  GrammarError,
  PartialParseError,
  TerminalSequenceError,
} from "./src/errors";
export type { BudgetReason } from "./src/errors";

export { chartParserOptionsSchema, parseChartParserConfig, readEnv } from "./src/config";
export type { Budget, ChartParserConfig, ChartParserConfigInput, EnvConfig } from "./src/config";

export { createLogger } from "./src/logger";
