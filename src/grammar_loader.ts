import { CATEGORY_NAME, atom, freshVariable, type Category, type FeatureStruct, type Variable } from "./category";
import { GrammarError } from "./errors";
import { createGrammar, type Grammar, type Production, type RhsElement } from "./grammar";

type Scope = Map<string, Variable>;

type Cursor = {
  text: string;
  pos: number;
  line: number;
};

function isQuoted(raw: string): boolean {
  return raw.length >= 2 && ((raw.startsWith("'") && raw.endsWith("'")) || (raw.startsWith("\"") && raw.endsWith("\"")));
}

function skipSpace(cursor: Cursor): void {
  while (cursor.pos < cursor.text.length && /\s/.test(cursor.text[cursor.pos] ?? "")) cursor.pos += 1;
}

function readWord(cursor: Cursor): string {
  const word = /^[^\s,=[\]]+/.exec(cursor.text.slice(cursor.pos))?.[0];
  if (!word) throw new GrammarError(`expected a name at "${cursor.text.slice(cursor.pos)}"`, cursor.line);
  cursor.pos += word.length;
  return word;
}

function readValue(cursor: Cursor, scope: Scope): Category {
  skipSpace(cursor);
  const ch = cursor.text[cursor.pos];
  if (ch === "[") return readStruct(cursor, scope);
  const word = readWord(cursor);
  if (word.startsWith("?")) {
    const name = word.slice(1);
    if (!name) throw new GrammarError("variable needs a name", cursor.line);
    let variable = scope.get(name);
    if (!variable) {
      variable = freshVariable(name);
      scope.set(name, variable);
    }
    return variable;
  }
  return atom(isQuoted(word) ? word.slice(1, -1) : word);
}

function readStruct(cursor: Cursor, scope: Scope): FeatureStruct {
  if (cursor.text[cursor.pos] !== "[") throw new GrammarError("expected '['", cursor.line);
  cursor.pos += 1;
  const features = new Map<string, Category>();

  skipSpace(cursor);
  if (cursor.text[cursor.pos] === "]") {
    cursor.pos += 1;
    return { kind: "struct", features };
  }

  while (cursor.pos < cursor.text.length) {
    skipSpace(cursor);
    const sign = cursor.text[cursor.pos];
    if (sign === "+" || sign === "-") {
      cursor.pos += 1;
      features.set(readWord(cursor), atom(sign));
    } else {
      const key = readWord(cursor);
      skipSpace(cursor);
      if (cursor.text[cursor.pos] === "=") {
        cursor.pos += 1;
        features.set(key, readValue(cursor, scope));
      } else {
        features.set(key, atom("+"));
      }
    }

    skipSpace(cursor);
    const sep = cursor.text[cursor.pos];
    cursor.pos += 1;
    if (sep === "]") return { kind: "struct", features };
    if (sep !== ",") break;
  }
  throw new GrammarError(`unterminated feature list in "${cursor.text}"`, cursor.line);
}

export function parseCategory(raw: string, scope: Scope = new Map(), line?: number): FeatureStruct {
  const match = /^([A-Za-z_][\w'-]*)\s*(.*)$/s.exec(raw.trim());
  if (!match) throw new GrammarError(`invalid category "${raw}"`, line);
  const name = match[1]!;
  const rest = match[2]!;

  const features = new Map<string, Category>([[CATEGORY_NAME, atom(name)]]);
  if (rest) {
    const cursor: Cursor = { text: rest, pos: 0, line: line ?? 0 };
    const body = readStruct(cursor, scope);
    if (cursor.pos !== rest.length) throw new GrammarError(`unexpected text after category "${raw}"`, line);
    for (const [key, value] of body.features) features.set(key, value);
  }
  return { kind: "struct", features };
}

/** Splits a right-hand side into quoted terminals, categories (brackets included) and `|` separators. */
function tokenizeRuleRhs(rhs: string, line: number): string[] {
  const tokens: string[] = [];
  let i = 0;
  while (i < rhs.length) {
    const ch = rhs[i]!;
    if (/\s/.test(ch)) {
      i += 1;
    } else if (ch === "|") {
      tokens.push("|");
      i += 1;
    } else if (ch === "'" || ch === "\"") {
      const close = rhs.indexOf(ch, i + 1);
      if (close < 0) throw new GrammarError("unterminated terminal", line);
      tokens.push(rhs.slice(i, close + 1));
      i = close + 1;
    } else {
      let depth = 0;
      let j = i;
      while (j < rhs.length) {
        const c = rhs[j]!;
        if (c === "[") depth += 1;
        else if (c === "]") depth -= 1;
        else if (depth === 0 && (/\s/.test(c) || c === "|")) break;
        j += 1;
      }
      if (depth !== 0) throw new GrammarError("unbalanced brackets", line);
      tokens.push(rhs.slice(i, j));
      i = j;
    }
  }
  return tokens;
}

function splitAlternatives(tokens: string[]): string[][] {
  let current: string[] = [];
  const out = [current];
  for (const token of tokens) {
    if (token === "|") {
      current = [];
      out.push(current);
    } else {
      current.push(token);
    }
  }
  return out;
}

function splitRule(trimmed: string, line: number): [string, string] {
  let depth = 0;
  for (let i = 0; i < trimmed.length - 1; i += 1) {
    const ch = trimmed[i];
    if (ch === "[") depth += 1;
    else if (ch === "]") depth -= 1;
    else if (depth === 0 && ch === "-" && trimmed[i + 1] === ">") {
      return [trimmed.slice(0, i).trim(), trimmed.slice(i + 2).trim()];
    }
  }
  throw new GrammarError(`expected "->" in "${trimmed}"`, line);
}

/**
 * Reads a feature grammar:
 *
 *     %start S
 *     S -> NP[num=?n] VP[num=?n]
 *     NP[num=?n] -> Det[num=?n] N[num=?n] | 'kim'
 *
 * Variables are scoped to one production. Lines starting with `#` are comments.
 */
export function parseFeatureGrammar(grammarText: string, options?: { start?: string }): Grammar {
  const productions: Production[] = [];
  let startText = options?.start;
  let firstLhs: string | null = null;

  for (const [index, raw] of grammarText.split(/\r?\n/g).entries()) {
    const line = index + 1;
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    if (trimmed.startsWith("%")) {
      const directive = /^%start\s+(.+)$/.exec(trimmed);
      if (!directive) throw new GrammarError(`unknown directive "${trimmed}"`, line);
      startText ??= directive[1]!.trim();
      continue;
    }

    const [lhsText, rhsText] = splitRule(trimmed, line);
    if (!lhsText) throw new GrammarError("missing left-hand side", line);
    if (isQuoted(lhsText)) throw new GrammarError("left-hand side cannot be a terminal", line);
    firstLhs ??= lhsText;

    for (const alternative of splitAlternatives(tokenizeRuleRhs(rhsText, line))) {
      const scope: Scope = new Map();
      const lhs = parseCategory(lhsText, scope, line);
      const rhs: RhsElement[] = alternative.map((token) =>
        isQuoted(token) ? token.slice(1, -1) : parseCategory(token, scope, line),
      );
      productions.push({ lhs, rhs });
    }
  }

  const chosen = startText ?? firstLhs;
  if (productions.length === 0 || chosen === null) throw new GrammarError("feature grammar contains no productions");
  return createGrammar(parseCategory(chosen), productions);
}
