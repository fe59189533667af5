import { categoryKey, categoryName, formatCategory, isCategory, rename, unifies, type Category } from "./category";
import { GrammarError } from "./errors";
import type { Terminal } from "./terminals";

export type RhsElement = Category | string;

export type Production = {
  lhs: Category;
  rhs: readonly RhsElement[];
};

/**
 * Left-corner relation over category names: the words each named category can
 * start with, the names that can derive nothing, and the names whose first
 * word cannot be bounded. `open` is set when some production has an unnamed
 * left-hand side, in which case every lookup answers yes.
 */
export type LeftCornerTable = {
  open: boolean;
  words: ReadonlyMap<string, ReadonlySet<string>>;
  nullable: ReadonlySet<string>;
  unbounded: ReadonlySet<string>;
};

export type Grammar = {
  start: Category;
  productions: readonly Production[];
  lexical: readonly Production[];
  nonLexical: readonly Production[];
  empty: readonly Production[];
  /** Non-lexical productions keyed by the terminal their right-hand side starts with. */
  byFirstTerminal: ReadonlyMap<string, readonly Production[]>;
  leftCorners: LeftCornerTable;
};

export function production(lhs: Category, rhs: readonly RhsElement[]): Production {
  return { lhs, rhs };
}

export function isLexical(prod: Production): boolean {
  return prod.rhs.length === 1 && typeof prod.rhs[0] === "string";
}

function validateProduction(prod: Production, index: number): void {
  if (typeof prod !== "object" || prod === null) {
    throw new GrammarError(`production ${index} is not an object`);
  }
  if (!isCategory(prod.lhs)) {
    throw new GrammarError(`production ${index} has no left-hand side category`);
  }
  if (!Array.isArray(prod.rhs)) {
    throw new GrammarError(`production ${index} has no right-hand side`);
  }
  prod.rhs.forEach((element, position) => {
    if (typeof element === "string") {
      if (element.length === 0) throw new GrammarError(`production ${index} has an empty terminal at ${position}`);
    } else if (!isCategory(element)) {
      throw new GrammarError(`production ${index} has an invalid element at ${position}`);
    }
  });
}

export function createGrammar(start: Category, productions: readonly Production[]): Grammar {
  if (!isCategory(start)) throw new GrammarError("grammar start category is missing");
  if (!Array.isArray(productions)) throw new GrammarError("grammar productions must be an array");

  const unique: Production[] = [];
  const seen = new Set<string>();
  productions.forEach((prod, index) => {
    validateProduction(prod, index);
    const key = categoryKey([prod.lhs, ...prod.rhs]);
    if (seen.has(key)) return;
    seen.add(key);
    unique.push(prod);
  });

  const lexical: Production[] = [];
  const nonLexical: Production[] = [];
  const empty: Production[] = [];
  const byFirstTerminal = new Map<string, Production[]>();
  for (const prod of unique) {
    if (prod.rhs.length === 0) empty.push(prod);
    else if (isLexical(prod)) lexical.push(prod);
    else nonLexical.push(prod);

    const first = prod.rhs[0];
    if (typeof first === "string" && !isLexical(prod)) {
      const rows = byFirstTerminal.get(first) ?? [];
      rows.push(prod);
      byFirstTerminal.set(first, rows);
    }
  }

  return {
    start,
    productions: unique,
    lexical,
    nonLexical,
    empty,
    byFirstTerminal,
    leftCorners: buildLeftCorners(unique),
  };
}

function buildLeftCorners(productions: readonly Production[]): LeftCornerTable {
  const words = new Map<string, Set<string>>();
  const nullable = new Set<string>();
  const unbounded = new Set<string>();
  const open = productions.some((prod) => categoryName(prod.lhs) === undefined);
  if (open) return { open, words, nullable, unbounded };

  const wordsOf = (name: string): Set<string> => {
    let set = words.get(name);
    if (!set) {
      set = new Set();
      words.set(name, set);
    }
    return set;
  };
  const sizeOf = () => {
    let total = nullable.size + unbounded.size;
    for (const set of words.values()) total += set.size;
    return total;
  };

  let before = -1;
  while (before !== sizeOf()) {
    before = sizeOf();
    for (const prod of productions) {
      const name = categoryName(prod.lhs);
      if (name === undefined) continue;
      const target = wordsOf(name);
      let skippable = true;
      for (const element of prod.rhs) {
        if (typeof element === "string") {
          target.add(element);
          skippable = false;
          break;
        }
        const child = categoryName(element);
        if (child === undefined || unbounded.has(child)) {
          unbounded.add(name);
          skippable = false;
          break;
        }
        for (const word of words.get(child) ?? []) target.add(word);
        if (!nullable.has(child)) {
          skippable = false;
          break;
        }
      }
      if (skippable) nullable.add(name);
    }
  }
  return { open, words, nullable, unbounded };
}

/**
 * Whether `element` can begin with `word` (`undefined` past the last
 * terminal). Answers yes for an absent element, for categories that can derive
 * nothing, and whenever the table cannot tell.
 */
export function canStartWith(grammar: Grammar, element: RhsElement | undefined, word: string | undefined): boolean {
  if (element === undefined) return true;
  if (typeof element === "string") return element === word;
  const { open, words, nullable, unbounded } = grammar.leftCorners;
  const name = categoryName(element);
  if (open || name === undefined || unbounded.has(name) || nullable.has(name)) return true;
  return word !== undefined && (words.get(name)?.has(word) ?? false);
}

export function productionsForTerminal(grammar: Grammar, symbol: string): readonly Production[] {
  return grammar.byFirstTerminal.get(symbol) ?? [];
}

/** Non-lexical productions whose first right-hand side element is a category unifying with `category`. */
export function productionsStartingWith(grammar: Grammar, category: Category): Production[] {
  const query = rename(category);
  return grammar.nonLexical.filter((prod) => {
    const first = prod.rhs[0];
    return first !== undefined && typeof first !== "string" && unifies(first, query);
  });
}

export function productionsFor(grammar: Grammar, category: Category): Production[] {
  const query = rename(category);
  return grammar.nonLexical.filter((prod) => unifies(prod.lhs, query));
}

export function uncoveredTerminals(grammar: Grammar, terminals: readonly Terminal[]): string[] {
  const known = new Set<string>();
  for (const prod of grammar.productions) {
    for (const element of prod.rhs) {
      if (typeof element === "string") known.add(element);
    }
  }
  const out: string[] = [];
  for (const terminal of terminals) {
    if (!known.has(terminal.symbol) && !out.includes(terminal.symbol)) out.push(terminal.symbol);
  }
  return out;
}

export function formatRhsElement(element: RhsElement): string {
  return typeof element === "string" ? `'${element}'` : formatCategory(element);
}

export function formatProduction(prod: Production): string {
  return `${formatCategory(prod.lhs)} -> ${prod.rhs.map(formatRhsElement).join(" ")}`.trimEnd();
}
