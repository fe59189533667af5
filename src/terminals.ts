import { TerminalSequenceError } from "./errors";

export type Span = {
  start: number;
  end: number;
};

export type Terminal = {
  symbol: string;
  span: Span;
};

export function splitWords(text: string): string[] {
  return text.split(/\s+/g).filter(Boolean);
}

export function toTerminals(words: readonly string[]): Terminal[] {
  return words.map((symbol, i) => ({ symbol, span: { start: i, end: i + 1 } }));
}

export function validateTerminals(terminals: readonly Terminal[]): void {
  terminals.forEach((terminal, i) => {
    if (typeof terminal.symbol !== "string" || terminal.symbol.length === 0) {
      throw new TerminalSequenceError("symbol must be a non-empty string", i);
    }
    if (terminal.span.start !== i || terminal.span.end !== i + 1) {
      throw new TerminalSequenceError(
        `expected span [${i}, ${i + 1}) but got [${terminal.span.start}, ${terminal.span.end})`,
        i,
      );
    }
  });
}
