import { z } from "zod";
import { STRATEGY_NAMES, type ChartRule } from "./chart_rules";
import { ConfigError } from "./errors";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const ruleSchema = z.custom<ChartRule>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    (value.kind === "axiom" || value.kind === "inference") &&
    "apply" in value &&
    typeof value.apply === "function",
  { message: "expected a chart rule" },
);

const budgetSchema = z
  .object({
    maxRounds: z.number().int().positive().optional(),
    maxEdges: z.number().int().positive().optional(),
  })
  .strict();

export const chartParserOptionsSchema = z
  .object({
    strategy: z.union([z.enum(STRATEGY_NAMES), z.array(ruleSchema).min(1)]).default("bottom-up"),
    trace: z.number().int().min(0).max(2).default(0),
    budget: budgetSchema.default({}),
    maxTrees: z.number().int().positive().optional(),
  })
  .strict();

export type ChartParserConfigInput = z.input<typeof chartParserOptionsSchema>;
export type ChartParserConfig = z.output<typeof chartParserOptionsSchema>;
export type Budget = z.output<typeof budgetSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
}

export function parseChartParserConfig(input: unknown): ChartParserConfig {
  const parsed = chartParserOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error));
  return parsed.data;
}

const envSchema = z.object({
  CHART_PARSER_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type EnvConfig = {
  logLevel: (typeof LOG_LEVELS)[number];
};

export function readEnv(source: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = envSchema.safeParse({ CHART_PARSER_LOG_LEVEL: source.CHART_PARSER_LOG_LEVEL });
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error));
  return { logLevel: parsed.data.CHART_PARSER_LOG_LEVEL };
}
